import type { MessageRecord, Part } from "@agentline/shared";
import type { ConnectionRegistry } from "../connection/ConnectionRegistry.js";
import { ShuttingDownError, errorMessage } from "../errors/SessionErrors.js";
import { NOOP_LOGGER, type SessionLogger } from "../logging/EventLog.js";
import type { Conversation } from "../model/Conversation.js";
import { toWirePart } from "../model/Parts.js";
import type { ConversationStore } from "../store/ConversationStore.js";
import type { ToolExecutor } from "../tools/ToolExecutor.js";
import type { ReasoningLoop, RoundContext } from "./ReasoningLoop.js";
import type { RoundPool } from "./RoundPool.js";

export interface SubmitRequest {
  conversationId: string;
  input: string;
  projectKey?: string;
}

export type SubmitOutcome = { status: "started" } | { status: "queued" };

export interface SessionCoordinatorOptions {
  store: ConversationStore;
  registry: ConnectionRegistry;
  pool: RoundPool;
  loop: ReasoningLoop;
  tools: ToolExecutor;
  closeConnectionAfterRound?: boolean;
  logger?: SessionLogger;
}

/**
 * In-flight marker for one conversation. Until the first round has opened its
 * assistant message, messages that arrive are kept in `backlog`.
 */
interface RoundSlot {
  conversationId: string;
  conversation?: Conversation;
  backlog: string[];
}

/**
 * Runs at most one reasoning round per conversation. Messages that arrive
 * while a round is active are appended as continuations and answered by a
 * follow-up round once the active one has finished.
 */
export class SessionCoordinator {
  private readonly inFlight = new Map<string, RoundSlot>();
  private readonly idleWaiters: Array<() => void> = [];
  private readonly store: ConversationStore;
  private readonly registry: ConnectionRegistry;
  private readonly pool: RoundPool;
  private readonly loop: ReasoningLoop;
  private readonly tools: ToolExecutor;
  private readonly closeConnectionAfterRound: boolean;
  private readonly logger: SessionLogger;
  private shuttingDown = false;

  constructor(options: SessionCoordinatorOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.pool = options.pool;
    this.loop = options.loop;
    this.tools = options.tools;
    this.closeConnectionAfterRound = options.closeConnectionAfterRound ?? true;
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  async submit(request: SubmitRequest): Promise<SubmitOutcome> {
    const { conversationId, input, projectKey } = request;
    if (this.shuttingDown) {
      throw new ShuttingDownError();
    }

    const existing = this.inFlight.get(conversationId);
    if (existing) {
      if (existing.conversation) {
        existing.conversation.appendUserMessage(input, "continuation");
      } else {
        existing.backlog.push(input);
      }
      this.logger.info("message_queued", { conversationId, loading: !existing.conversation });
      return { status: "queued" };
    }

    // claimed before the first await so a concurrent submit sees it
    const slot: RoundSlot = { conversationId, backlog: [] };
    this.inFlight.set(conversationId, slot);

    let conversation: Conversation;
    try {
      conversation = await this.store.loadOrCreate(conversationId, projectKey);
    } catch (error) {
      this.release(slot);
      throw error;
    }

    const inputMessage = conversation.appendUserMessage(input, "input");

    try {
      this.pool.submit(conversationId, () => this.runRounds(slot, conversation, inputMessage));
    } catch (error) {
      this.flushBacklog(slot, conversation);
      this.release(slot);
      this.logger.warn("round_rejected", { conversationId, error: errorMessage(error) });
      await this.persist(conversation);
      throw error;
    }

    this.logger.info("round_submitted", { conversationId, messageId: inputMessage.id });
    return { status: "started" };
  }

  isProcessing(conversationId: string): boolean {
    return this.inFlight.has(conversationId);
  }

  processingCount(): number {
    return this.inFlight.size;
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  /** Resolves true once no round is in flight, false if the timeout passes first. */
  async waitForIdle(timeoutMs: number): Promise<boolean> {
    if (this.inFlight.size === 0) return true;
    return new Promise<boolean>((resolve) => {
      const waiter = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        const index = this.idleWaiters.indexOf(waiter);
        if (index >= 0) this.idleWaiters.splice(index, 1);
        resolve(false);
      }, timeoutMs);
      this.idleWaiters.push(waiter);
    });
  }

  shutdown(): void {
    this.shuttingDown = true;
    this.pool.shutdown();
  }

  /** Marks conversations that lost their connection completed, unless a round is still running. */
  async handleDisconnect(conversationIds: string[]): Promise<void> {
    for (const conversationId of conversationIds) {
      if (this.inFlight.has(conversationId)) continue;
      try {
        await this.store.markCompleted(conversationId);
      } catch (error) {
        this.logger.warn("conversation_complete_failed", { conversationId, error: errorMessage(error) });
      }
    }
  }

  private async runRounds(slot: RoundSlot, conversation: Conversation, first: MessageRecord): Promise<void> {
    try {
      let input: MessageRecord | undefined = first;
      while (input) {
        try {
          await this.runRound(slot, conversation, input);
        } finally {
          this.unclaim(slot);
        }
        input = this.claimContinuation(slot, conversation, input);
      }
    } finally {
      this.notifyIfIdle();
    }
    if (this.closeConnectionAfterRound) {
      await this.registry.close(conversation.id, "round complete");
    }
  }

  /** Re-claims the slot when a user message arrived after the round started. */
  private claimContinuation(
    slot: RoundSlot,
    conversation: Conversation,
    previous: MessageRecord,
  ): MessageRecord | undefined {
    const next = conversation.newestUnansweredUser();
    if (!next || next.id === previous.id) return undefined;
    if (this.inFlight.has(conversation.id)) return undefined;
    this.inFlight.set(conversation.id, slot);
    this.logger.info("continuation_started", { conversationId: conversation.id, messageId: next.id });
    return next;
  }

  private async runRound(slot: RoundSlot, conversation: Conversation, input: MessageRecord): Promise<void> {
    const conversationId = conversation.id;
    const sink = this.registry.sinkFor(conversationId);
    const startedAt = Date.now();

    conversation.markProcessing();
    const assistantMessage = conversation.appendAssistantMessage();
    // later messages land after the assistant message, where the continuation check looks
    this.flushBacklog(slot, conversation);

    const emit = async (part: Part): Promise<void> => {
      conversation.upsertPart(part);
      await sink.send({ type: "part", sessionId: conversationId, part: toWirePart(part) });
    };
    const round: RoundContext = {
      conversation,
      input,
      assistantMessage,
      emit,
      invokeTool: (toolName, params) =>
        this.tools.execute({
          conversationId,
          projectKey: conversation.projectKey,
          toolName,
          params,
          parts: { message: assistantMessage, emit },
        }),
    };

    try {
      await this.loop.process(round);
      conversation.markIdle();
      await this.store.save(conversation);
      await sink.send({ type: "complete", sessionId: conversationId });
      this.logger.info("round_completed", {
        conversationId,
        messageId: input.id,
        parts: assistantMessage.parts.length,
        durationMs: Date.now() - startedAt,
      });
    } catch (error) {
      this.logger.error("round_failed", { conversationId, messageId: input.id, error: errorMessage(error) });
      conversation.markIdle();
      await sink.send({ type: "error", message: `Processing failed: ${errorMessage(error)}` });
      await this.persist(conversation);
    }
  }

  private flushBacklog(slot: RoundSlot, conversation: Conversation): void {
    for (const text of slot.backlog.splice(0)) {
      conversation.appendUserMessage(text, "continuation");
    }
    slot.conversation = conversation;
  }

  private async persist(conversation: Conversation): Promise<void> {
    try {
      await this.store.save(conversation);
    } catch (error) {
      this.logger.error("conversation_save_failed", {
        conversationId: conversation.id,
        error: errorMessage(error),
      });
    }
  }

  private release(slot: RoundSlot): void {
    this.unclaim(slot);
    this.notifyIfIdle();
  }

  private unclaim(slot: RoundSlot): void {
    if (this.inFlight.get(slot.conversationId) === slot) {
      this.inFlight.delete(slot.conversationId);
    }
  }

  private notifyIfIdle(): void {
    if (this.inFlight.size === 0) {
      while (this.idleWaiters.length > 0) {
        this.idleWaiters.shift()?.();
      }
    }
  }
}
