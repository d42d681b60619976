import { encodeFrame, type ServerFrame } from "@agentline/shared";
import { NOOP_LOGGER, type SessionLogger } from "../logging/EventLog.js";
import { errorMessage } from "../errors/SessionErrors.js";

/**
 * A duplex byte channel to one client. `write` settles once the payload has
 * been handed to the underlying stream; it rejects when the stream refuses it.
 */
export interface FrameTransport {
  readonly id: string;
  isOpen(): boolean;
  write(payload: string): Promise<void>;
  close(reason?: string): Promise<void>;
}

export interface FrameSink {
  send(frame: ServerFrame): Promise<boolean>;
}

interface QueuedFrame {
  payload: string;
  type: ServerFrame["type"];
  resolve: (written: boolean) => void;
}

/**
 * Serializes every outbound frame of one transport. Frames are written in the
 * order `send` was called and only one write is outstanding at any time.
 */
export class ConnectionWriter implements FrameSink {
  private queue: QueuedFrame[] = [];
  private draining: Promise<void> | undefined;
  private closing = false;
  private closed: Promise<void> | undefined;

  constructor(
    readonly transport: FrameTransport,
    private logger: SessionLogger = NOOP_LOGGER,
  ) {}

  get transportId(): string {
    return this.transport.id;
  }

  isClosing(): boolean {
    return this.closing;
  }

  pendingCount(): number {
    return this.queue.length;
  }

  send(frame: ServerFrame): Promise<boolean> {
    if (this.closing || !this.transport.isOpen()) {
      this.logger.warn("frame_dropped", {
        transportId: this.transport.id,
        frameType: frame.type,
        reason: this.closing ? "closing" : "transport closed",
      });
      return Promise.resolve(false);
    }
    return new Promise<boolean>((resolve) => {
      this.queue.push({ payload: encodeFrame(frame), type: frame.type, resolve });
      if (!this.draining) {
        this.draining = this.drain();
      }
    });
  }

  /** Closes the transport once every frame queued before this call is written. */
  closeAfterFlush(reason?: string): Promise<void> {
    if (this.closed) return this.closed;
    this.closing = true;
    this.closed = (async () => {
      if (this.draining) await this.draining;
      try {
        await this.transport.close(reason);
      } catch (error) {
        this.logger.warn("transport_close_failed", {
          transportId: this.transport.id,
          error: errorMessage(error),
        });
      }
    })();
    return this.closed;
  }

  private async drain(): Promise<void> {
    try {
      let next = this.queue.shift();
      while (next) {
        next.resolve(await this.writeOne(next));
        next = this.queue.shift();
      }
    } finally {
      this.draining = undefined;
    }
  }

  private async writeOne(frame: QueuedFrame): Promise<boolean> {
    if (!this.transport.isOpen()) {
      this.logger.warn("frame_dropped", {
        transportId: this.transport.id,
        frameType: frame.type,
        reason: "transport closed",
      });
      return false;
    }
    try {
      await this.transport.write(frame.payload);
      return true;
    } catch (error) {
      this.logger.warn("frame_write_failed", {
        transportId: this.transport.id,
        frameType: frame.type,
        error: errorMessage(error),
      });
      return false;
    }
  }
}
