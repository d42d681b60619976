import { createServer, type AddressInfo, type Server, type Socket } from "node:net";
import {
  CapacityError,
  ConnectionRegistry,
  ConversationStore,
  NOOP_LOGGER,
  OpenAiCompatibleProvider,
  ProviderReasoningLoop,
  RoundPool,
  SessionCoordinator,
  ShuttingDownError,
  ToolCallCorrelator,
  ToolExecutor,
  ToolRegistry,
  ToolRouter,
  createPlanningTools,
  createProviderSubTaskRunner,
  errorMessage,
  remoteToolDescriptor,
  type ConversationPersistence,
  type Provider,
  type ReasoningLoop,
  type SessionLogger,
  type ToolDefinition,
  type ToolDescriptor,
} from "@agentline/core";
import {
  consumeJsonLines,
  parseClientFrame,
  type ClientFrame,
  type SubmitFrame,
  type ToolResultFrame,
} from "@agentline/shared";
import type { ServerConfig } from "./config/ServerConfig.js";
import { SocketTransport } from "./transport/SocketTransport.js";

export const BUSY_MESSAGE = "Server busy, retry later";
export const SHUTTING_DOWN_MESSAGE = "Server is shutting down";

export interface AgentServerOptions {
  config: ServerConfig;
  persistence: ConversationPersistence;
  /** Replaces the provider-backed loop. */
  loop?: ReasoningLoop;
  provider?: Provider;
  /** In-process tools; defaults to the planning tools when a provider is available. */
  localTools?: ToolDefinition[];
  logger?: SessionLogger;
  /** Runs last during shutdown, after every connection is closed. */
  onShutdown?: () => Promise<void>;
}

interface ConnectionState {
  transport: SocketTransport;
  remainder: string;
}

const remoteDescriptors = (router: ToolRouter): ToolDescriptor[] =>
  router.forwardedTools().map(
    (name) => remoteToolDescriptor(name) ?? { name, description: `Runs ${name} on the connected client.` },
  );

/**
 * Accepts NDJSON socket connections and feeds their frames to the session
 * coordinator. One socket may carry several conversations; each conversation
 * is bound to the socket that last submitted to it.
 */
export class AgentServer {
  readonly registry: ConnectionRegistry;
  readonly correlator: ToolCallCorrelator;
  readonly coordinator: SessionCoordinator;
  readonly store: ConversationStore;
  private readonly pool: RoundPool;
  private readonly server: Server;
  private readonly connections = new Map<string, ConnectionState>();
  private readonly logger: SessionLogger;
  private heartbeat: NodeJS.Timeout | undefined;
  private listening = false;
  private stopping: Promise<void> | undefined;

  constructor(private options: AgentServerOptions) {
    const { config } = options;
    this.logger = options.logger ?? NOOP_LOGGER;
    this.registry = new ConnectionRegistry(this.logger);
    this.correlator = new ToolCallCorrelator({ timeoutMs: config.tools.timeoutMs, logger: this.logger });
    this.store = new ConversationStore(options.persistence, this.logger);
    this.pool = new RoundPool({
      maxConcurrent: config.pool.maxConcurrentRounds,
      queueCapacity: config.pool.queueCapacity,
      onError: (label, error) => this.logger.error("round_task_failed", { label, error: errorMessage(error) }),
    });

    const provider = options.provider ?? (options.loop ? undefined : AgentServer.createProvider(config));
    const localTools =
      options.localTools ??
      (provider
        ? createPlanningTools({
            runSubTask: createProviderSubTaskRunner({ provider, systemPrompt: config.systemPrompt }),
          })
        : []);

    const router = new ToolRouter(config.tools.forwarded);
    const registry = new ToolRegistry();
    for (const tool of localTools) registry.register(tool);
    const tools = new ToolExecutor({
      router,
      registry,
      correlator: this.correlator,
      sinkFor: (conversationId) => this.registry.sinkFor(conversationId),
      timeoutMs: config.tools.timeoutMs,
      logger: this.logger,
    });

    const loop =
      options.loop ??
      new ProviderReasoningLoop({
        provider: provider ?? AgentServer.createProvider(config),
        tools: [...registry.describe(), ...remoteDescriptors(router)],
        maxSteps: config.limits.maxSteps,
        systemPrompt: config.systemPrompt,
        logger: this.logger,
      });

    this.coordinator = new SessionCoordinator({
      store: this.store,
      registry: this.registry,
      pool: this.pool,
      loop,
      tools,
      closeConnectionAfterRound: config.session.closeConnectionAfterRound,
      logger: this.logger,
    });

    this.server = createServer((socket) => {
      this.handleConnection(socket);
    });
  }

  static createProvider(config: ServerConfig): Provider {
    return new OpenAiCompatibleProvider({
      model: config.provider.model ?? "",
      apiKey: config.provider.apiKey,
      baseUrl: config.provider.baseUrl,
      timeoutMs: config.provider.timeoutMs,
    });
  }

  async start(): Promise<AddressInfo> {
    if (!this.listening) {
      await new Promise<void>((resolve, reject) => {
        const onError = (error: Error): void => {
          this.server.off("listening", onListening);
          reject(error);
        };
        const onListening = (): void => {
          this.server.off("error", onError);
          this.listening = true;
          resolve();
        };

        this.server.once("error", onError);
        this.server.once("listening", onListening);
        this.server.listen(this.options.config.port, this.options.config.host);
      });
      this.startHeartbeat();
      const address = this.address();
      this.logger.info("server_listening", { host: address.address, port: address.port });
    }
    return this.address();
  }

  address(): AddressInfo {
    const value = this.server.address();
    if (value === null || typeof value === "string") {
      throw new Error("agentline server is not listening on tcp");
    }
    return value;
  }

  connectionCount(): number {
    return this.connections.size;
  }

  /**
   * Stops accepting, lets in-flight rounds finish within the drain timeout,
   * then notifies and closes every connection. Safe to call more than once.
   */
  shutdown(reason: string = SHUTTING_DOWN_MESSAGE): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.stop(reason);
    }
    return this.stopping;
  }

  private async stop(reason: string): Promise<void> {
    this.logger.info("server_stopping", {
      reason,
      inFlight: this.coordinator.processingCount(),
      connections: this.connections.size,
    });
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = undefined;
    }
    const closed = this.listening
      ? new Promise<void>((resolve) => {
          this.server.close(() => resolve());
        })
      : Promise.resolve();
    this.coordinator.shutdown();

    const drained = await this.coordinator.waitForIdle(this.options.config.shutdown.drainTimeoutMs);
    if (!drained) {
      this.logger.warn("drain_timeout", {
        inFlight: this.coordinator.processingCount(),
        timeoutMs: this.options.config.shutdown.drainTimeoutMs,
      });
    }

    const closedCount = await this.registry.closeAll(
      { type: "shutdown", message: reason, timestamp: Date.now() },
      "server shutdown",
    );
    const cancelled = this.correlator.cancelAll(reason);
    for (const state of this.connections.values()) {
      await state.transport.close();
    }

    await closed;
    this.listening = false;
    this.logger.info("server_stopped", { closedConnections: closedCount, cancelledToolCalls: cancelled });
    if (this.options.onShutdown) {
      await this.options.onShutdown();
    }
  }

  private startHeartbeat(): void {
    const interval = this.options.config.session.heartbeatIntervalMs;
    if (interval <= 0) return;
    this.heartbeat = setInterval(() => {
      for (const id of this.connections.keys()) {
        void this.registry.sendToTransport(id, { type: "ping", timestamp: Date.now() });
      }
    }, interval);
    this.heartbeat.unref();
  }

  private handleConnection(socket: Socket): void {
    const transport = new SocketTransport(socket);
    const state: ConnectionState = { transport, remainder: "" };
    this.connections.set(transport.id, state);
    this.registry.open(transport);
    this.logger.info("connection_opened", { transportId: transport.id, remote: transport.remoteAddress() });

    // decodes across chunk boundaries, so split multi-byte characters stay whole
    socket.setEncoding("utf8");
    socket.on("data", (chunk: string) => {
      this.handleSocketData(state, chunk);
    });

    socket.on("error", (error) => {
      this.logger.warn("connection_error", { transportId: transport.id, error: error.message });
    });

    socket.on("close", () => {
      this.cleanupConnection(transport.id);
    });

    void this.registry.sendToTransport(transport.id, { type: "connected", message: "agentline ready" });
  }

  private cleanupConnection(transportId: string): void {
    if (!this.connections.delete(transportId)) return;
    const unbound = this.registry.disconnect(transportId);
    this.logger.info("connection_closed", { transportId, conversations: unbound });
    if (!unbound.length) return;
    this.coordinator.handleDisconnect(unbound).catch((error: unknown) => {
      this.logger.warn("disconnect_cleanup_failed", { transportId, error: errorMessage(error) });
    });
  }

  private handleSocketData(state: ConnectionState, chunk: string): void {
    const combined = `${state.remainder}${chunk}`;
    const consumed = consumeJsonLines(combined);
    state.remainder = consumed.remainder;

    for (const message of consumed.messages) {
      const frame = parseClientFrame(message);
      if (frame === null) {
        this.logger.debug("frame_ignored", { transportId: state.transport.id });
        continue;
      }
      this.handleFrame(state, frame).catch((error: unknown) => {
        this.logger.error("frame_failed", {
          transportId: state.transport.id,
          frameType: frame.type,
          error: errorMessage(error),
        });
      });
    }
  }

  private async handleFrame(state: ConnectionState, frame: ClientFrame): Promise<void> {
    switch (frame.type) {
      case "ping":
        await this.registry.sendToTransport(state.transport.id, { type: "pong", timestamp: Date.now() });
        return;
      case "pong":
        this.logger.debug("heartbeat_ack", { transportId: state.transport.id });
        return;
      case "chat":
      case "analyze":
        await this.handleSubmit(state, frame);
        return;
      case "TOOL_RESULT":
        this.handleToolResult(frame);
        return;
    }
  }

  private async handleSubmit(state: ConnectionState, frame: SubmitFrame): Promise<void> {
    const { transport } = state;
    if (this.coordinator.isShuttingDown()) {
      await this.refuse(transport.id);
      return;
    }

    this.registry.register(frame.sessionId, transport);
    try {
      const outcome = await this.coordinator.submit({
        conversationId: frame.sessionId,
        input: frame.input,
        projectKey: frame.projectKey,
      });
      this.logger.info("message_accepted", {
        conversationId: frame.sessionId,
        mode: frame.type,
        status: outcome.status,
      });
    } catch (error) {
      if (error instanceof ShuttingDownError) {
        await this.refuse(transport.id);
        return;
      }
      const message = error instanceof CapacityError ? BUSY_MESSAGE : `Processing failed: ${errorMessage(error)}`;
      this.logger.warn("message_rejected", { conversationId: frame.sessionId, error: errorMessage(error) });
      await this.registry.sendToTransport(transport.id, { type: "error", message });
    }
  }

  private async refuse(transportId: string): Promise<void> {
    const handle = this.registry.handleFor(transportId);
    if (!handle) return;
    await handle.writer.send({ type: "error", message: SHUTTING_DOWN_MESSAGE });
    await handle.writer.closeAfterFlush("shutting down");
  }

  private handleToolResult(frame: ToolResultFrame): void {
    const { type: _type, toolCallId, ...payload } = frame;
    this.correlator.resolve(toolCallId, payload);
  }
}
