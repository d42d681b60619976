import test from "node:test";
import assert from "node:assert/strict";
import type { Part } from "@agentline/shared";
import type { RoundContext } from "../../execution/ReasoningLoop.js";
import { Conversation } from "../../model/Conversation.js";
import type { Provider, ProviderRequest, ProviderResponse } from "../../providers/ProviderTypes.js";
import type { ToolOutcome } from "../../tools/ToolExecutor.js";
import { ProviderReasoningLoop, buildProviderHistory, continuationNote } from "../ProviderReasoningLoop.js";

class StubProvider implements Provider {
  name = "stub";
  readonly requests: ProviderRequest[] = [];
  private calls = 0;

  constructor(private responses: ProviderResponse[]) {}

  async generate(request: ProviderRequest): Promise<ProviderResponse> {
    this.requests.push({ ...request, messages: [...request.messages] });
    const response = this.responses[this.calls];
    this.calls += 1;
    if (!response) {
      return { message: { role: "assistant", content: "" } };
    }
    return response;
  }
}

interface RecordedRound {
  round: RoundContext;
  emitted: Part[];
  toolCalls: Array<{ toolName: string; params: Record<string, unknown> }>;
}

const buildRound = (conversation: Conversation, outcome: ToolOutcome): RecordedRound => {
  const input = conversation.latestUser();
  if (!input) throw new Error("conversation needs a user message");
  const assistantMessage = conversation.appendAssistantMessage();
  const emitted: Part[] = [];
  const toolCalls: RecordedRound["toolCalls"] = [];
  const round: RoundContext = {
    conversation,
    input,
    assistantMessage,
    emit: async (part) => {
      conversation.upsertPart(part);
      emitted.push(part);
    },
    invokeTool: async (toolName, params) => {
      toolCalls.push({ toolName, params });
      return outcome;
    },
  };
  return { round, emitted, toolCalls };
};

const okOutcome: ToolOutcome = { ok: true, remote: true, output: "body", title: "a.ts", content: "body" };

test("ProviderReasoningLoop runs tool calls and emits parts in order", { concurrency: false }, async () => {
  const conversation = Conversation.create("c1");
  conversation.appendUserMessage("what does a.ts do?");
  const { round, emitted, toolCalls } = buildRound(conversation, okOutcome);

  const provider = new StubProvider([
    {
      message: { role: "assistant", content: "Let me look." },
      toolCalls: [{ id: "call_1", name: "read_file", args: { relativePath: "a.ts" } }],
    },
    { message: { role: "assistant", content: "It exports main." } },
  ]);
  const loop = new ProviderReasoningLoop({ provider, tools: [], maxSteps: 3, systemPrompt: "be brief" });
  await loop.process(round);

  assert.deepEqual(toolCalls, [{ toolName: "read_file", params: { relativePath: "a.ts" } }]);
  assert.deepEqual(
    emitted.map((part) => (part.type === "tool" ? `tool:${part.state.status}` : part.type)),
    ["progress", "reasoning", "progress", "tool:pending", "tool:running", "tool:completed", "progress", "text"],
  );
  const reasoning = emitted.find((part) => part.type === "reasoning");
  assert.equal(reasoning?.type === "reasoning" ? reasoning.text : undefined, "Let me look.");

  const second = provider.requests[1].messages;
  assert.deepEqual(second[0], { role: "system", content: "be brief" });
  assert.deepEqual(second.at(-1), {
    role: "tool",
    toolCallId: "call_1",
    name: "read_file",
    content: "body",
  });

  const parts = conversation.findMessage(round.assistantMessage.id)?.parts ?? [];
  assert.equal(parts.filter((part) => part.type === "progress").length, 1);
  const progress = parts.find((part) => part.type === "progress");
  assert.equal(progress?.type === "progress" ? progress.currentStep : undefined, 2);
});

test("ProviderReasoningLoop feeds tool failures back to the model", { concurrency: false }, async () => {
  const conversation = Conversation.create("c1");
  conversation.appendUserMessage("grep");
  const failed: ToolOutcome = {
    ok: false,
    remote: true,
    output: "",
    title: "",
    content: "",
    error: "Tool call timed out: grep_file",
  };
  const { round, emitted } = buildRound(conversation, failed);
  const provider = new StubProvider([
    { message: { role: "assistant", content: "" }, toolCalls: [{ id: "call_1", name: "grep_file", args: "not-json" }] },
    { message: { role: "assistant", content: "gave up" } },
  ]);
  await new ProviderReasoningLoop({ provider, tools: [], maxSteps: 3 }).process(round);

  assert.equal(provider.requests[1].messages.at(-1)?.content, "ERROR: Tool call timed out: grep_file");
  const tool = emitted.find((part) => part.type === "tool" && part.state.status === "error");
  assert.ok(tool);
});

test("ProviderReasoningLoop enforces the step limit", { concurrency: false }, async () => {
  const conversation = Conversation.create("c1");
  conversation.appendUserMessage("loop forever");
  const { round } = buildRound(conversation, okOutcome);
  const provider = new StubProvider([
    { message: { role: "assistant", content: "" }, toolCalls: [{ id: "call_1", name: "find_file", args: {} }] },
  ]);
  await assert.rejects(
    new ProviderReasoningLoop({ provider, tools: [], maxSteps: 1 }).process(round),
    /Reasoning step limit exceeded \(1\)/,
  );
});

test("buildProviderHistory wraps absorbed messages and skips later ones", () => {
  const conversation = Conversation.create("c1");
  conversation.appendUserMessage("A");
  const first = conversation.appendAssistantMessage();
  conversation.upsertPart({
    id: "p1",
    messageId: first.id,
    conversationId: "c1",
    type: "text",
    text: "answer A",
    createdAt: first.createdAt,
    updatedAt: first.createdAt,
  });
  conversation.appendUserMessage("B", "continuation");
  conversation.appendUserMessage("C", "continuation");
  const { round } = buildRound(conversation, okOutcome);
  conversation.appendUserMessage("D", "continuation");

  assert.deepEqual(buildProviderHistory(round), [
    { role: "user", content: "A" },
    { role: "assistant", content: "answer A" },
    { role: "user", content: continuationNote("B") },
    { role: "user", content: "C" },
  ]);
  assert.match(continuationNote("B"), /^<system-reminder>\n[\s\S]*\nB\n<\/system-reminder>$/);
});
