import test from "node:test";
import assert from "node:assert/strict";
import type { Part } from "@agentline/shared";
import { Conversation } from "../../model/Conversation.js";
import { createPlanningTools } from "../PlanningTools.js";
import { ToolRegistry } from "../ToolRegistry.js";
import type { ToolContext } from "../ToolTypes.js";

const createHarness = () => {
  const conversation = Conversation.create("c1");
  conversation.appendUserMessage("explain the billing flow");
  const message = conversation.appendAssistantMessage();
  const emitted: Part[] = [];
  const seen: Array<{ target: string; dependencies: Record<string, string> }> = [];
  const registry = new ToolRegistry();
  const tools = createPlanningTools({
    runSubTask: async (task, dependencies) => {
      seen.push({ target: task.target, dependencies: Object.fromEntries(dependencies) });
      if (task.target === "broken") throw new Error("no such file");
      return `${task.target} ok`;
    },
  });
  for (const tool of tools) registry.register(tool);
  const context: ToolContext = {
    conversationId: "c1",
    parts: {
      message,
      emit: async (part) => {
        conversation.upsertPart(part);
        emitted.push(part);
      },
    },
  };
  return { message, emitted, seen, registry, context };
};

test("set_goal records the goal once and updates it in place", async () => {
  const { message, emitted, registry, context } = createHarness();

  const first = await registry.execute("set_goal", { title: "Billing", description: "Explain invoices" }, context);
  assert.equal(first.ok, true);
  assert.equal(first.output, "Goal (in_progress): Billing");

  const second = await registry.execute(
    "set_goal",
    { title: "Billing", description: "Explain invoices and refunds", status: "completed" },
    context,
  );
  assert.equal(second.output, "Goal (completed): Billing");

  const goals = message.parts.filter((part) => part.type === "goal");
  assert.equal(goals.length, 1);
  const [goal] = goals;
  assert.equal(goal?.type === "goal" ? goal.description : undefined, "Explain invoices and refunds");
  assert.equal(goal?.type === "goal" ? goal.status : undefined, "completed");
  assert.equal(emitted[0]?.id, emitted[1]?.id);
});

test("update_todos replaces the list on a single part", async () => {
  const { message, registry, context } = createHarness();

  const first = await registry.execute(
    "update_todos",
    { items: [{ content: "read Invoice.ts", status: "completed" }, { content: "trace refunds" }] },
    context,
  );
  assert.equal(first.output, "[completed] read Invoice.ts\n[pending] trace refunds");
  assert.equal(first.title, "2 to-dos");

  await registry.execute("update_todos", { items: [{ content: "trace refunds", status: "in_progress" }] }, context);
  const todos = message.parts.filter((part) => part.type === "todo");
  assert.equal(todos.length, 1);
  const [todo] = todos;
  assert.deepEqual(todo?.type === "todo" ? todo.items : undefined, [
    { id: "todo-1", content: "trace refunds", status: "in_progress" },
  ]);
});

test("plan_subtasks runs sub-tasks in dependency order and reports each outcome", async () => {
  const { message, seen, registry, context } = createHarness();

  const result = await registry.execute(
    "plan_subtasks",
    {
      subtasks: [
        { id: "a", target: "Invoice.ts", question: "what creates invoices?" },
        { id: "b", target: "Refund.ts", question: "how are refunds issued?" },
        { id: "c", target: "summary", question: "how do they connect?", dependsOn: ["a", "b"] },
        { id: "d", target: "broken", question: "what is here?" },
        { id: "e", target: "after-broken", question: "and then?", dependsOn: ["d"] },
        { id: "f", target: "ghost-dep", question: "who knows?", dependsOn: ["zzz"] },
      ],
    },
    context,
  );

  assert.equal(result.ok, true);
  assert.equal(result.title, "3/6 sub-tasks completed");
  assert.equal(result.output.split("\n\n")[0], "## Invoice.ts\nInvoice.ts ok");

  const subtasks = message.parts.flatMap((part) => (part.type === "subtask" ? [part] : []));
  assert.deepEqual(
    subtasks.map((task) => `${task.target}:${task.status}`),
    [
      "Invoice.ts:completed",
      "Refund.ts:completed",
      "summary:completed",
      "broken:blocked",
      "after-broken:blocked",
      "ghost-dep:blocked",
    ],
  );
  assert.equal(subtasks[3]?.blockReason, "no such file");
  assert.match(subtasks[4]?.blockReason ?? "", /^Dependency .+ is blocked$/);
  assert.equal(subtasks[5]?.blockReason, "Unknown dependency: zzz");
  assert.deepEqual(
    seen.find((entry) => entry.target === "summary")?.dependencies,
    { "Invoice.ts": "Invoice.ts ok", "Refund.ts": "Refund.ts ok" },
  );
  assert.equal(
    seen.some((entry) => entry.target === "after-broken" || entry.target === "ghost-dep"),
    false,
  );
});

test("planning tools reject bad arguments and calls outside a round", async () => {
  const { registry, context } = createHarness();

  assert.deepEqual(await registry.execute("plan_subtasks", {}, context), {
    ok: false,
    output: "",
    error: "Missing required arguments: subtasks",
  });
  const badList = await registry.execute("plan_subtasks", { subtasks: "a" }, context);
  assert.equal(badList.error, "Expected subtasks to be a list of objects");
  const blankTitle = await registry.execute("set_goal", { title: " ", description: "x" }, context);
  assert.equal(blankTitle.error, "Expected a non-empty string for title");

  const outside = await registry.execute("update_todos", { items: [] }, { conversationId: "c1" });
  assert.equal(outside.error, "update_todos can only run inside a round");
});
