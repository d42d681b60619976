import type { GoalStatus, SubTaskPart, TodoItem, TodoStatus } from "@agentline/shared";
import { createGoalPart, createSubTaskPart, createTodoPart, nowIso } from "../model/Parts.js";
import { SubTaskScheduler } from "../subtasks/SubTaskScheduler.js";
import type { ToolContext, ToolDefinition, ToolPartSink } from "./ToolTypes.js";

/** Answers one sub-task, given the conclusions of the tasks it depends on (keyed by target). */
export type SubTaskRunner = (task: SubTaskPart, dependencies: ReadonlyMap<string, string>) => Promise<string>;

export interface PlanningToolsOptions {
  runSubTask: SubTaskRunner;
  maxConcurrentSubTasks?: number;
}

const STATUSES = ["pending", "in_progress", "completed", "cancelled"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readStatus = (value: unknown, fallback: TodoStatus & GoalStatus): TodoStatus & GoalStatus =>
  STATUSES.find((status) => status === value) ?? fallback;

const readText = (record: Record<string, unknown>, key: string): string => {
  const value = record[key];
  if (typeof value !== "string" || !value.trim()) {
    throw new Error(`Expected a non-empty string for ${key}`);
  }
  return value.trim();
};

const readStrings = (record: Record<string, unknown>, key: string): string[] => {
  const value = record[key];
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === "string")) {
    throw new Error(`Expected a list of strings for ${key}`);
  }
  return value;
};

const readList = (args: unknown, key: string): Record<string, unknown>[] => {
  const list = isRecord(args) ? args[key] : undefined;
  if (!Array.isArray(list) || !list.every(isRecord)) {
    throw new Error(`Expected ${key} to be a list of objects`);
  }
  return list;
};

const sinkOf = (name: string, context: ToolContext): ToolPartSink => {
  if (!context.parts) {
    throw new Error(`${name} can only run inside a round`);
  }
  return context.parts;
};

const setGoal = (): ToolDefinition => ({
  name: "set_goal",
  description: "Record or update the goal of the current answer. Call it once you understand what the user wants.",
  inputSchema: {
    type: "object",
    properties: {
      title: { type: "string" },
      description: { type: "string" },
      status: { type: "string", enum: [...STATUSES] },
    },
    required: ["title", "description"],
  },
  handler: async (args, context) => {
    const { message, emit } = sinkOf("set_goal", context);
    const input = isRecord(args) ? args : {};
    const title = readText(input, "title");
    const description = readText(input, "description");
    const status = readStatus(input.status, "in_progress");
    const existing = message.parts.find((part) => part.type === "goal");
    const goal =
      existing?.type === "goal"
        ? { ...existing, title, description, status, updatedAt: nowIso() }
        : createGoalPart(message, title, description, status);
    await emit(goal);
    return { output: `Goal (${status}): ${title}`, title };
  },
});

const updateTodos = (): ToolDefinition => ({
  name: "update_todos",
  description: "Replace the to-do list shown to the user. Keep at most one item in_progress.",
  inputSchema: {
    type: "object",
    properties: {
      items: {
        type: "array",
        items: {
          type: "object",
          properties: { content: { type: "string" }, status: { type: "string", enum: [...STATUSES] } },
          required: ["content"],
        },
      },
    },
    required: ["items"],
  },
  handler: async (args, context) => {
    const { message, emit } = sinkOf("update_todos", context);
    const items: TodoItem[] = readList(args, "items").map((item, index) => ({
      id: `todo-${index + 1}`,
      content: readText(item, "content"),
      status: readStatus(item.status, "pending"),
    }));
    const existing = message.parts.find((part) => part.type === "todo");
    const todo =
      existing?.type === "todo" ? { ...existing, items, updatedAt: nowIso() } : createTodoPart(message, items);
    await emit(todo);
    return {
      output: items.map((item) => `[${item.status}] ${item.content}`).join("\n"),
      title: `${items.length} to-dos`,
    };
  },
});

const planSubTasks = (options: PlanningToolsOptions): ToolDefinition => ({
  name: "plan_subtasks",
  description:
    "Split the question into sub-tasks that are answered separately. Tasks without dependencies run in parallel; " +
    "dependsOn lists the ids of tasks whose conclusions a task needs.",
  inputSchema: {
    type: "object",
    properties: {
      subtasks: {
        type: "array",
        items: {
          type: "object",
          properties: {
            id: { type: "string" },
            target: { type: "string" },
            question: { type: "string" },
            reason: { type: "string" },
            requiredTools: { type: "array", items: { type: "string" } },
            dependsOn: { type: "array", items: { type: "string" } },
          },
          required: ["id", "target", "question"],
        },
      },
    },
    required: ["subtasks"],
  },
  handler: async (args, context) => {
    const { message, emit } = sinkOf("plan_subtasks", context);
    const planned = readList(args, "subtasks").map((entry) => ({
      key: readText(entry, "id"),
      target: readText(entry, "target"),
      question: readText(entry, "question"),
      reason: typeof entry.reason === "string" ? entry.reason : undefined,
      requiredTools: readStrings(entry, "requiredTools"),
      dependsOn: readStrings(entry, "dependsOn"),
    }));

    // the model names tasks with its own ids; parts get unique ids, unknown names stay as-is so they block
    const partIds = new Map<string, string>();
    const parts = planned.map((entry) => {
      const part = createSubTaskPart(message, entry);
      partIds.set(entry.key, part.id);
      return part;
    });
    const subtasks = parts.map((part) => ({
      ...part,
      dependsOn: part.dependsOn.map((key) => partIds.get(key) ?? key),
    }));
    for (const part of subtasks) await emit(part);

    const conclusions = new Map<string, string>();
    const byId = new Map(subtasks.map((part) => [part.id, part]));
    const results = await new SubTaskScheduler().run(
      subtasks,
      async (task) => {
        const dependencies = new Map<string, string>();
        for (const id of task.dependsOn) {
          const conclusion = conclusions.get(id);
          const target = byId.get(id)?.target;
          if (conclusion !== undefined && target !== undefined) dependencies.set(target, conclusion);
        }
        const conclusion = await options.runSubTask(task, dependencies);
        conclusions.set(task.id, conclusion);
        return conclusion;
      },
      { maxConcurrent: options.maxConcurrentSubTasks, onUpdate: emit },
    );

    const output = results
      .map((task) =>
        task.status === "completed"
          ? `## ${task.target}\n${task.conclusion ?? ""}`
          : `## ${task.target}\n(${task.status}: ${task.blockReason ?? "no conclusion"})`,
      )
      .join("\n\n");
    const completed = results.filter((task) => task.status === "completed").length;
    return { output, title: `${completed}/${results.length} sub-tasks completed`, data: results };
  },
});

/** Server-side tools the model uses to structure its answer: goal, to-do list and parallel sub-tasks. */
export const createPlanningTools = (options: PlanningToolsOptions): ToolDefinition[] => [
  setGoal(),
  updateTodos(),
  planSubTasks(options),
];
