import type { ServerFrame } from "@agentline/shared";
import { NOOP_LOGGER, type SessionLogger } from "../logging/EventLog.js";
import { ConnectionWriter, type FrameSink, type FrameTransport } from "./ConnectionWriter.js";

export interface ConnectionHandle {
  transport: FrameTransport;
  writer: ConnectionWriter;
  conversationIds: Set<string>;
  openedAt: number;
}

/**
 * Tracks open transports and which transport currently serves each
 * conversation. Bindings are transient and rebuilt when a client reconnects.
 */
export class ConnectionRegistry {
  private handles = new Map<string, ConnectionHandle>();
  private bindings = new Map<string, string>();

  constructor(private logger: SessionLogger = NOOP_LOGGER) {}

  open(transport: FrameTransport): ConnectionHandle {
    const existing = this.handles.get(transport.id);
    if (existing) return existing;
    const handle: ConnectionHandle = {
      transport,
      writer: new ConnectionWriter(transport, this.logger),
      conversationIds: new Set(),
      openedAt: Date.now(),
    };
    this.handles.set(transport.id, handle);
    return handle;
  }

  register(conversationId: string, transport: FrameTransport): ConnectionHandle {
    const handle = this.open(transport);
    const previous = this.bindings.get(conversationId);
    if (previous && previous !== transport.id) {
      this.handles.get(previous)?.conversationIds.delete(conversationId);
      this.logger.info("connection_rebound", {
        conversationId,
        previousTransportId: previous,
        transportId: transport.id,
      });
    }
    this.bindings.set(conversationId, transport.id);
    handle.conversationIds.add(conversationId);
    return handle;
  }

  /**
   * Removes the binding. With `transportId`, only a binding to that transport
   * is removed, so a stale connection cannot unbind a newer one.
   */
  unregister(conversationId: string, transportId?: string): boolean {
    const bound = this.bindings.get(conversationId);
    if (!bound) return false;
    if (transportId !== undefined && bound !== transportId) return false;
    this.bindings.delete(conversationId);
    this.handles.get(bound)?.conversationIds.delete(conversationId);
    return true;
  }

  lookup(conversationId: string): ConnectionHandle | undefined {
    const transportId = this.bindings.get(conversationId);
    return transportId ? this.handles.get(transportId) : undefined;
  }

  handleFor(transportId: string): ConnectionHandle | undefined {
    return this.handles.get(transportId);
  }

  /** Drops the transport and every binding that points at it. Returns the unbound conversation ids. */
  disconnect(transportId: string): string[] {
    const handle = this.handles.get(transportId);
    if (!handle) return [];
    this.handles.delete(transportId);
    const unbound: string[] = [];
    for (const conversationId of handle.conversationIds) {
      if (this.bindings.get(conversationId) === transportId) {
        this.bindings.delete(conversationId);
        unbound.push(conversationId);
      }
    }
    handle.conversationIds.clear();
    return unbound;
  }

  async send(conversationId: string, frame: ServerFrame): Promise<boolean> {
    const handle = this.lookup(conversationId);
    if (!handle) {
      this.logger.warn("frame_dropped", { conversationId, frameType: frame.type, reason: "no connection" });
      return false;
    }
    return handle.writer.send(frame);
  }

  /** A sink that resolves the binding on every send, so a reconnect is picked up mid-round. */
  sinkFor(conversationId: string): FrameSink {
    return { send: (frame) => this.send(conversationId, frame) };
  }

  async sendToTransport(transportId: string, frame: ServerFrame): Promise<boolean> {
    const handle = this.handles.get(transportId);
    if (!handle) return false;
    return handle.writer.send(frame);
  }

  /** Flushes and closes the connection serving the conversation. */
  async close(conversationId: string, reason?: string): Promise<boolean> {
    const handle = this.lookup(conversationId);
    if (!handle) return false;
    this.disconnect(handle.transport.id);
    await handle.writer.closeAfterFlush(reason);
    return true;
  }

  async closeAll(frame?: ServerFrame, reason?: string): Promise<number> {
    const handles = Array.from(this.handles.values());
    this.handles.clear();
    this.bindings.clear();
    await Promise.all(
      handles.map(async (handle) => {
        if (frame) await handle.writer.send(frame);
        await handle.writer.closeAfterFlush(reason);
      }),
    );
    return handles.length;
  }

  connectionCount(): number {
    return this.handles.size;
  }

  bindingCount(): number {
    return this.bindings.size;
  }
}
