import { randomUUID } from "node:crypto";
import type { ToolCallFrame, ToolResultPayload } from "@agentline/shared";
import { NOOP_LOGGER, type SessionLogger } from "../logging/EventLog.js";
import { ToolDispatchError, ToolTimeoutError, errorMessage } from "../errors/SessionErrors.js";
import type { FrameSink } from "../connection/ConnectionWriter.js";

export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

export interface DispatchRequest {
  conversationId: string;
  toolName: string;
  params: Record<string, unknown>;
  timeoutMs?: number;
}

interface PendingToolCall {
  toolCallId: string;
  toolName: string;
  conversationId: string;
  createdAt: number;
  timer: NodeJS.Timeout;
  resolve: (payload: ToolResultPayload) => void;
  reject: (error: Error) => void;
}

export interface ToolCallCorrelatorOptions {
  timeoutMs?: number;
  logger?: SessionLogger;
}

/**
 * Matches `TOOL_RESULT` frames to the `TOOL_CALL` that asked for them. Each
 * pending entry is removed by exactly one of: result, timeout, failed send,
 * or `cancelAll`.
 */
export class ToolCallCorrelator {
  private pending = new Map<string, PendingToolCall>();
  private sequence = 0;
  private timeoutMs: number;
  private logger: SessionLogger;

  constructor(options: ToolCallCorrelatorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  nextToolCallId(toolName: string): string {
    this.sequence += 1;
    return `${toolName}-${this.sequence}-${randomUUID().slice(0, 8)}`;
  }

  dispatch(sink: FrameSink, request: DispatchRequest): Promise<ToolResultPayload> {
    const toolCallId = this.nextToolCallId(request.toolName);
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;

    const result = new Promise<ToolResultPayload>((resolve, reject) => {
      const timer = setTimeout(() => {
        const entry = this.take(toolCallId);
        if (!entry) return;
        this.logger.warn("tool_call_timeout", {
          toolCallId,
          toolName: entry.toolName,
          conversationId: entry.conversationId,
          timeoutMs,
        });
        entry.reject(new ToolTimeoutError(toolCallId, entry.toolName, timeoutMs));
      }, timeoutMs);
      this.pending.set(toolCallId, {
        toolCallId,
        toolName: request.toolName,
        conversationId: request.conversationId,
        createdAt: Date.now(),
        timer,
        resolve,
        reject,
      });
    });

    const frame: ToolCallFrame = {
      type: "TOOL_CALL",
      toolCallId,
      toolName: request.toolName,
      params: request.params,
    };
    this.logger.debug("tool_call_dispatched", {
      toolCallId,
      toolName: request.toolName,
      conversationId: request.conversationId,
    });
    sink.send(frame).then(
      (sent) => {
        if (!sent) this.failDispatch(toolCallId, "Tool call could not be sent: connection unavailable");
      },
      (error: unknown) => this.failDispatch(toolCallId, `Tool call could not be sent: ${errorMessage(error)}`),
    );

    return result;
  }

  /** Fulfils the pending call; returns false for an unknown, duplicate or late id. */
  resolve(toolCallId: string, payload: ToolResultPayload): boolean {
    const entry = this.take(toolCallId);
    if (!entry) {
      this.logger.warn("tool_result_unmatched", { toolCallId });
      return false;
    }
    this.logger.debug("tool_result_received", {
      toolCallId,
      toolName: entry.toolName,
      conversationId: entry.conversationId,
      success: payload.success ?? false,
      elapsedMs: Date.now() - entry.createdAt,
    });
    entry.resolve(payload);
    return true;
  }

  cancelAll(reason: string): number {
    const entries = Array.from(this.pending.values());
    for (const entry of entries) {
      this.take(entry.toolCallId);
      entry.reject(new ToolDispatchError(entry.toolCallId, entry.toolName, reason));
    }
    return entries.length;
  }

  pendingCount(): number {
    return this.pending.size;
  }

  isPending(toolCallId: string): boolean {
    return this.pending.has(toolCallId);
  }

  private failDispatch(toolCallId: string, reason: string): void {
    const entry = this.take(toolCallId);
    if (!entry) return;
    this.logger.warn("tool_call_send_failed", {
      toolCallId,
      toolName: entry.toolName,
      conversationId: entry.conversationId,
      reason,
    });
    entry.reject(new ToolDispatchError(toolCallId, entry.toolName, reason));
  }

  private take(toolCallId: string): PendingToolCall | undefined {
    const entry = this.pending.get(toolCallId);
    if (!entry) return undefined;
    this.pending.delete(toolCallId);
    clearTimeout(entry.timer);
    return entry;
  }
}
