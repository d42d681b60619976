import type { ToolResultPayload } from "@agentline/shared";
import { NOOP_LOGGER, type SessionLogger } from "../logging/EventLog.js";
import { ToolDispatchError, ToolTimeoutError } from "../errors/SessionErrors.js";
import type { FrameSink } from "../connection/ConnectionWriter.js";
import type { ToolCallCorrelator } from "./ToolCallCorrelator.js";
import type { ToolRegistry } from "./ToolRegistry.js";
import type { ToolRouter } from "./ToolRouter.js";
import type { ToolContext, ToolPartSink } from "./ToolTypes.js";

export interface ToolInvocation {
  conversationId: string;
  projectKey?: string;
  toolName: string;
  params: Record<string, unknown>;
  /** Handed to local tools so they can add parts to the round's assistant message. */
  parts?: ToolPartSink;
}

export interface ToolOutcome {
  ok: boolean;
  remote: boolean;
  output: unknown;
  title: string;
  content: string;
  error?: string;
  relatedFilePaths?: string[];
  metadata?: Record<string, unknown>;
}

export interface ToolExecutorOptions {
  router: ToolRouter;
  registry: ToolRegistry;
  correlator: ToolCallCorrelator;
  sinkFor: (conversationId: string) => FrameSink;
  timeoutMs?: number;
  logger?: SessionLogger;
}

const failure = (remote: boolean, error: string): ToolOutcome => ({
  ok: false,
  remote,
  output: "",
  title: "",
  content: "",
  error,
});

export const mapRemoteResult = (toolName: string, payload: ToolResultPayload): ToolOutcome => {
  if (payload.success !== true) {
    return failure(true, payload.error ?? payload.result ?? "Tool execution failed");
  }
  const content = payload.result ?? "";
  const outcome: ToolOutcome = {
    ok: true,
    remote: true,
    output: content,
    title: payload.relativePath ?? `${toolName} result`,
    content,
  };
  if (payload.relatedFilePaths?.length) outcome.relatedFilePaths = payload.relatedFilePaths;
  if (payload.metadata) outcome.metadata = payload.metadata;
  return outcome;
};

/** Runs a tool either on the client, through the correlator, or in-process. */
export class ToolExecutor {
  private router: ToolRouter;
  private registry: ToolRegistry;
  private correlator: ToolCallCorrelator;
  private sinkFor: (conversationId: string) => FrameSink;
  private timeoutMs?: number;
  private logger: SessionLogger;

  constructor(options: ToolExecutorOptions) {
    this.router = options.router;
    this.registry = options.registry;
    this.correlator = options.correlator;
    this.sinkFor = options.sinkFor;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  async execute(call: ToolInvocation): Promise<ToolOutcome> {
    const startedAt = Date.now();
    const outcome = this.router.mustForward(call.toolName)
      ? await this.executeRemote(call)
      : await this.executeLocal(call);
    this.logger.info("tool_executed", {
      conversationId: call.conversationId,
      toolName: call.toolName,
      remote: outcome.remote,
      ok: outcome.ok,
      error: outcome.error,
      durationMs: Date.now() - startedAt,
    });
    return outcome;
  }

  private async executeRemote(call: ToolInvocation): Promise<ToolOutcome> {
    try {
      const payload = await this.correlator.dispatch(this.sinkFor(call.conversationId), {
        conversationId: call.conversationId,
        toolName: call.toolName,
        params: call.params,
        timeoutMs: this.timeoutMs,
      });
      return mapRemoteResult(call.toolName, payload);
    } catch (error) {
      if (error instanceof ToolTimeoutError) {
        return failure(true, `Tool call timed out: ${call.toolName}`);
      }
      if (error instanceof ToolDispatchError) {
        return failure(true, `Tool forwarding failed: ${error.message}`);
      }
      throw error;
    }
  }

  private async executeLocal(call: ToolInvocation): Promise<ToolOutcome> {
    const context: ToolContext = {
      conversationId: call.conversationId,
      projectKey: call.projectKey,
      parts: call.parts,
    };
    const result = await this.registry.execute(call.toolName, call.params, context);
    if (!result.ok) {
      return failure(false, result.error ?? "Tool execution failed");
    }
    return {
      ok: true,
      remote: false,
      output: result.data ?? result.output,
      title: result.title ?? `${call.toolName} result`,
      content: result.output,
    };
  }
}
