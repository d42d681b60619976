import { randomUUID } from "node:crypto";
import type { Socket } from "node:net";
import type { FrameTransport } from "@agentline/core";

/** FrameTransport over a TCP socket carrying newline-delimited JSON. */
export class SocketTransport implements FrameTransport {
  readonly id: string;
  private ended: Promise<void> | undefined;

  constructor(
    private socket: Socket,
    id?: string,
  ) {
    this.id = id ?? `connection-${randomUUID()}`;
  }

  isOpen(): boolean {
    return !this.socket.destroyed && this.socket.writable && this.ended === undefined;
  }

  write(payload: string): Promise<void> {
    if (!this.isOpen()) {
      return Promise.reject(new Error("socket is closed"));
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.write(payload, "utf8", (error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }

  close(): Promise<void> {
    if (this.ended) return this.ended;
    this.ended = new Promise<void>((resolve) => {
      if (this.socket.destroyed) {
        resolve();
        return;
      }
      this.socket.once("close", () => resolve());
      // the peer may keep its side open; drop the socket once our side is flushed
      this.socket.end(() => this.socket.destroy());
    });
    return this.ended;
  }

  remoteAddress(): string {
    return `${this.socket.remoteAddress ?? "unknown"}:${this.socket.remotePort ?? 0}`;
  }
}
