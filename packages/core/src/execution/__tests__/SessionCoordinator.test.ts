import test from "node:test";
import assert from "node:assert/strict";
import type { ConversationSnapshot } from "@agentline/shared";
import { FakeTransport, MemoryLogger, type RecordedFrame } from "@agentline/testing";
import { ConnectionRegistry } from "../../connection/ConnectionRegistry.js";
import { CapacityError, ShuttingDownError } from "../../errors/SessionErrors.js";
import { createTextPart, createToolPart } from "../../model/Parts.js";
import {
  ConversationStore,
  InMemoryConversationPersistence,
  type ConversationPersistence,
} from "../../store/ConversationStore.js";
import { ToolCallCorrelator } from "../../tools/ToolCallCorrelator.js";
import { ToolExecutor } from "../../tools/ToolExecutor.js";
import { executeToolPart } from "../../tools/ToolPartRunner.js";
import { ToolRegistry } from "../../tools/ToolRegistry.js";
import { ToolRouter } from "../../tools/ToolRouter.js";
import type { ReasoningLoop, RoundContext } from "../ReasoningLoop.js";
import { RoundPool } from "../RoundPool.js";
import { SessionCoordinator } from "../SessionCoordinator.js";

class Gate {
  readonly opened: Promise<void>;
  private release: (() => void) | undefined;

  constructor() {
    this.opened = new Promise<void>((resolve) => {
      this.release = resolve;
    });
  }

  open(): void {
    this.release?.();
  }
}

type RoundBody = (round: RoundContext) => Promise<void>;

/** Answers every round with a text part; individual calls can be held or replaced. */
class ScriptedLoop implements ReasoningLoop {
  readonly inputs: string[] = [];
  readonly histories: string[][] = [];
  readonly holds = new Map<number, Gate>();
  readonly bodies = new Map<number, RoundBody>();
  active = 0;
  maxActive = 0;
  private callWaiters: Array<{ count: number; resolve: () => void }> = [];

  async process(round: RoundContext): Promise<void> {
    const call = this.inputs.length;
    this.inputs.push(round.input.content);
    this.histories.push(
      round.conversation.historyBefore(round.assistantMessage.id).map((message) => message.content),
    );
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    this.callWaiters = this.callWaiters.filter((waiter) => {
      if (this.inputs.length < waiter.count) return true;
      waiter.resolve();
      return false;
    });
    try {
      await this.holds.get(call)?.opened;
      const body = this.bodies.get(call);
      if (body) {
        await body(round);
        return;
      }
      await round.emit(createTextPart(round.assistantMessage, `answer to ${round.input.content}`));
    } finally {
      this.active -= 1;
    }
  }

  hold(call: number): Gate {
    const gate = new Gate();
    this.holds.set(call, gate);
    return gate;
  }

  waitForCalls(count: number): Promise<void> {
    if (this.inputs.length >= count) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.callWaiters.push({ count, resolve });
    });
  }
}

interface HarnessOptions {
  maxConcurrent?: number;
  closeConnectionAfterRound?: boolean;
  toolTimeoutMs?: number;
  persistence?: ConversationPersistence;
}

const createHarness = (options: HarnessOptions = {}) => {
  const logger = new MemoryLogger();
  const loop = new ScriptedLoop();
  const persistence = options.persistence ?? new InMemoryConversationPersistence();
  const registry = new ConnectionRegistry(logger);
  const correlator = new ToolCallCorrelator({ timeoutMs: options.toolTimeoutMs ?? 1000, logger });
  const pool = new RoundPool({ maxConcurrent: options.maxConcurrent ?? 4 });
  const tools = new ToolExecutor({
    router: new ToolRouter(),
    registry: new ToolRegistry(),
    correlator,
    sinkFor: (conversationId) => registry.sinkFor(conversationId),
    logger,
  });
  const coordinator = new SessionCoordinator({
    store: new ConversationStore(persistence, logger),
    registry,
    pool,
    loop,
    tools,
    closeConnectionAfterRound: options.closeConnectionAfterRound,
    logger,
  });
  return { logger, loop, persistence, registry, correlator, pool, coordinator };
};

const partText = (frame: RecordedFrame): unknown => {
  const part = frame.part;
  if (typeof part !== "object" || part === null || !("data" in part)) return undefined;
  const data = part.data;
  return typeof data === "object" && data !== null && "text" in data ? data.text : undefined;
};

const storedContents = (snapshot: ConversationSnapshot | undefined): string[] =>
  snapshot?.messages.map((message) => `${message.role}:${message.content}`) ?? [];

test("a message sent mid-round is answered by a follow-up round", async () => {
  const { loop, registry, pool, coordinator, persistence } = createHarness();
  const transport = new FakeTransport();
  registry.register("c1", transport);
  const gate = loop.hold(0);

  assert.deepEqual(await coordinator.submit({ conversationId: "c1", input: "A" }), { status: "started" });
  await loop.waitForCalls(1);
  assert.deepEqual(await coordinator.submit({ conversationId: "c1", input: "B" }), { status: "queued" });
  assert.equal(loop.inputs.length, 1);

  gate.open();
  await pool.idle();

  assert.deepEqual(loop.inputs, ["A", "B"]);
  assert.equal(loop.maxActive, 1);
  // the first round never sees B; the second sees the whole history
  assert.deepEqual(loop.histories, [["A"], ["A", "", "B"]]);
  assert.deepEqual(transport.types(), ["part", "complete", "part", "complete"]);
  assert.deepEqual(transport.framesOfType("part").map(partText), ["answer to A", "answer to B"]);
  assert.equal(transport.closed, true);
  assert.equal(coordinator.isProcessing("c1"), false);

  const stored = await persistence.load("c1");
  assert.deepEqual(storedContents(stored), ["user:A", "assistant:", "user:B", "assistant:"]);
  assert.equal(stored?.messages[2].kind, "continuation");
  assert.equal(stored?.status, "idle");
});

test("rounds for one conversation never overlap", async () => {
  const { loop, pool, coordinator } = createHarness();
  const gate = loop.hold(0);

  await coordinator.submit({ conversationId: "c1", input: "A" });
  await loop.waitForCalls(1);
  const outcomes = await Promise.all(
    ["B", "C", "D"].map((input) => coordinator.submit({ conversationId: "c1", input })),
  );
  assert.deepEqual(
    outcomes.map((outcome) => outcome.status),
    ["queued", "queued", "queued"],
  );

  gate.open();
  await pool.idle();
  assert.deepEqual(loop.inputs, ["A", "D"]);
  assert.equal(loop.maxActive, 1);
  assert.deepEqual(loop.histories[1], ["A", "", "B", "C", "D"]);
});

test("messages that arrive while the conversation loads are answered by a continuation round", async () => {
  const { loop, pool, coordinator, persistence } = createHarness();
  const submits = ["A", "B", "C"].map((input) => coordinator.submit({ conversationId: "c1", input }));
  assert.equal(coordinator.isProcessing("c1"), true);

  const outcomes = await Promise.all(submits);
  assert.deepEqual(
    outcomes.map((outcome) => outcome.status),
    ["started", "queued", "queued"],
  );
  await pool.idle();

  assert.deepEqual(loop.inputs, ["A", "C"]);
  assert.deepEqual(loop.histories[0], ["A"]);
  assert.deepEqual(loop.histories[1], ["A", "", "B", "C"]);
  assert.deepEqual(storedContents(await persistence.load("c1")), [
    "user:A",
    "assistant:",
    "user:B",
    "user:C",
    "assistant:",
  ]);
});

test("two concurrent submits each get a round", async () => {
  const { loop, pool, coordinator } = createHarness();
  const outcomes = await Promise.all([
    coordinator.submit({ conversationId: "c1", input: "A" }),
    coordinator.submit({ conversationId: "c1", input: "B" }),
  ]);
  assert.deepEqual(outcomes, [{ status: "started" }, { status: "queued" }]);

  await pool.idle();
  assert.deepEqual(loop.inputs, ["A", "B"]);
  assert.equal(coordinator.isProcessing("c1"), false);
});

test("different conversations run concurrently", async () => {
  const { loop, pool, coordinator } = createHarness();
  const first = loop.hold(0);
  const second = loop.hold(1);

  await coordinator.submit({ conversationId: "c1", input: "one" });
  await coordinator.submit({ conversationId: "c2", input: "two" });
  await loop.waitForCalls(2);
  assert.equal(loop.maxActive, 2);
  assert.equal(coordinator.processingCount(), 2);

  first.open();
  second.open();
  await pool.idle();
  assert.equal(coordinator.processingCount(), 0);
});

test("a saturated pool rejects the submit and leaves the conversation idle", async () => {
  const { loop, pool, coordinator, persistence } = createHarness({ maxConcurrent: 1 });
  const gate = loop.hold(0);
  await coordinator.submit({ conversationId: "c1", input: "busy" });
  await loop.waitForCalls(1);

  await assert.rejects(coordinator.submit({ conversationId: "c2", input: "rejected" }), CapacityError);
  assert.equal(coordinator.isProcessing("c2"), false);
  const stored = await persistence.load("c2");
  assert.equal(stored?.status, "idle");
  assert.deepEqual(storedContents(stored), ["user:rejected"]);

  gate.open();
  await pool.idle();
  assert.deepEqual(await coordinator.submit({ conversationId: "c2", input: "retry" }), { status: "started" });
  await pool.idle();
  assert.deepEqual(loop.inputs, ["busy", "retry"]);
});

test("a failed round reports an error and still answers the continuation", async () => {
  const { loop, registry, pool, coordinator, persistence, logger } = createHarness();
  const transport = new FakeTransport();
  registry.register("c1", transport);
  const gate = loop.hold(0);
  loop.bodies.set(0, async () => {
    throw new Error("model unavailable");
  });

  await coordinator.submit({ conversationId: "c1", input: "A" });
  await loop.waitForCalls(1);
  await coordinator.submit({ conversationId: "c1", input: "B" });
  gate.open();
  await pool.idle();

  assert.deepEqual(transport.types(), ["error", "part", "complete"]);
  assert.deepEqual(transport.framesOfType("error")[0], {
    type: "error",
    message: "Processing failed: model unavailable",
  });
  assert.equal(coordinator.isProcessing("c1"), false);
  assert.equal(logger.ofType("round_failed").length, 1);
  assert.deepEqual(storedContents(await persistence.load("c1")), ["user:A", "assistant:", "user:B", "assistant:"]);
});

test("a failing round without a continuation does not loop", async () => {
  const { loop, pool, coordinator } = createHarness();
  loop.bodies.set(0, async () => {
    throw new Error("boom");
  });
  await coordinator.submit({ conversationId: "c1", input: "A" });
  await pool.idle();
  assert.deepEqual(loop.inputs, ["A"]);
  assert.equal(coordinator.isProcessing("c1"), false);
});

test("the connection stays open when per-round close is disabled", async () => {
  const { registry, pool, coordinator } = createHarness({ closeConnectionAfterRound: false });
  const transport = new FakeTransport();
  registry.register("c1", transport);
  await coordinator.submit({ conversationId: "c1", input: "A" });
  await pool.idle();
  assert.equal(transport.closed, false);
  assert.deepEqual(transport.types(), ["part", "complete"]);
});

test("a remote tool call suspends only its own round", async () => {
  const { loop, registry, correlator, pool, coordinator } = createHarness();
  const transport = new FakeTransport();
  registry.register("c1", transport);
  transport.onFrame((frame) => {
    if (frame.type !== "TOOL_CALL" || typeof frame.toolCallId !== "string") return;
    const toolCallId = frame.toolCallId;
    setImmediate(() => {
      correlator.resolve(toolCallId, { success: true, result: "file body", relativePath: "src/a.ts" });
    });
  });
  loop.bodies.set(0, async (round) => {
    const { part } = await executeToolPart(
      round,
      createToolPart(round.assistantMessage, "read_file", { relativePath: "src/a.ts" }),
    );
    await round.emit(createTextPart(round.assistantMessage, `read ${part.state.status}`));
  });

  await coordinator.submit({ conversationId: "c1", input: "read it" });
  await pool.idle();

  assert.deepEqual(transport.types(), ["part", "part", "TOOL_CALL", "part", "part", "complete"]);
  const toolStates = transport
    .framesOfType("part")
    .slice(0, 3)
    .map((frame) => {
      const part = frame.part;
      if (typeof part !== "object" || part === null || !("data" in part)) return undefined;
      const data = part.data;
      return typeof data === "object" && data !== null && "state" in data ? data.state : undefined;
    });
  assert.deepEqual(toolStates, ["PENDING", "RUNNING", "COMPLETED"]);
  assert.equal(partText(transport.framesOfType("part")[3]), "read completed");
  assert.equal(correlator.pendingCount(), 0);
});

test("a remote tool without a connection fails the step, not the round", async () => {
  const { loop, pool, coordinator, persistence } = createHarness();
  loop.bodies.set(0, async (round) => {
    const { outcome } = await executeToolPart(round, createToolPart(round.assistantMessage, "grep_file", {}));
    await round.emit(createTextPart(round.assistantMessage, outcome.error ?? ""));
  });
  await coordinator.submit({ conversationId: "c1", input: "search" });
  await pool.idle();

  const stored = await persistence.load("c1");
  const parts = stored?.messages[1].parts ?? [];
  assert.equal(parts.length, 2);
  const [tool, text] = parts;
  assert.equal(tool.type === "tool" ? tool.state.status : undefined, "error");
  assert.equal(
    text.type === "text" ? text.text : undefined,
    "Tool forwarding failed: Tool call could not be sent: connection unavailable",
  );
});

test("submit is refused after shutdown and waitForIdle reports drain", async () => {
  const { loop, pool, coordinator } = createHarness();
  const gate = loop.hold(0);
  await coordinator.submit({ conversationId: "c1", input: "A" });
  await loop.waitForCalls(1);

  coordinator.shutdown();
  await assert.rejects(coordinator.submit({ conversationId: "c2", input: "late" }), ShuttingDownError);
  assert.equal(await coordinator.waitForIdle(20), false);

  const drained = coordinator.waitForIdle(1000);
  gate.open();
  assert.equal(await drained, true);
  await pool.idle();
});

test("a load failure releases the slot", async () => {
  const failing: ConversationPersistence = {
    load: async () => {
      throw new Error("disk gone");
    },
    save: async () => undefined,
  };
  const { coordinator } = createHarness({ persistence: failing });
  await assert.rejects(coordinator.submit({ conversationId: "c1", input: "A" }), /disk gone/);
  assert.equal(coordinator.isProcessing("c1"), false);
});

test("handleDisconnect completes idle conversations only", async () => {
  const { loop, pool, coordinator, persistence } = createHarness();
  await coordinator.submit({ conversationId: "done", input: "A" });
  await pool.idle();
  const gate = loop.hold(1);
  await coordinator.submit({ conversationId: "busy", input: "B" });
  await loop.waitForCalls(2);

  await coordinator.handleDisconnect(["done", "busy", "unknown"]);
  assert.equal((await persistence.load("done"))?.status, "completed");
  assert.equal(await persistence.load("busy"), undefined);

  gate.open();
  await pool.idle();
});
