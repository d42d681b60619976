import { CapacityError, ShuttingDownError } from "../errors/SessionErrors.js";

export type RoundTask = () => Promise<void>;

export interface RoundPoolOptions {
  maxConcurrent: number;
  queueCapacity?: number;
  onError?: (label: string, error: unknown) => void;
}

interface QueuedRound {
  label: string;
  task: RoundTask;
}

/**
 * Bounded executor for rounds. At most `maxConcurrent` tasks run and at most
 * `queueCapacity` wait; anything beyond that is rejected synchronously.
 */
export class RoundPool {
  private readonly maxConcurrent: number;
  private readonly queueCapacity: number;
  private readonly onError: (label: string, error: unknown) => void;
  private readonly queue: QueuedRound[] = [];
  private readonly running = new Set<Promise<void>>();
  private readonly drainWaiters: Array<() => void> = [];
  private stopped = false;

  constructor(options: RoundPoolOptions) {
    if (!Number.isInteger(options.maxConcurrent) || options.maxConcurrent < 1) {
      throw new Error(`maxConcurrent must be a positive integer, got ${options.maxConcurrent}`);
    }
    this.maxConcurrent = options.maxConcurrent;
    this.queueCapacity = Math.max(0, options.queueCapacity ?? 0);
    this.onError = options.onError ?? (() => undefined);
  }

  submit(label: string, task: RoundTask): void {
    if (this.stopped) {
      throw new ShuttingDownError();
    }
    if (this.running.size < this.maxConcurrent) {
      this.start({ label, task });
      return;
    }
    if (this.queue.length < this.queueCapacity) {
      this.queue.push({ label, task });
      return;
    }
    throw new CapacityError(label, this.maxConcurrent);
  }

  activeCount(): number {
    return this.running.size;
  }

  queuedCount(): number {
    return this.queue.length;
  }

  isShutdown(): boolean {
    return this.stopped;
  }

  /** Resolves once nothing is running or queued. */
  async idle(): Promise<void> {
    if (this.running.size === 0 && this.queue.length === 0) return;
    await new Promise<void>((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  /** Stops accepting work. Tasks already running or queued still complete. */
  shutdown(): void {
    this.stopped = true;
  }

  private start(round: QueuedRound): void {
    const run = Promise.resolve()
      .then(round.task)
      .catch((error: unknown) => this.onError(round.label, error))
      .finally(() => {
        this.running.delete(run);
        const next = this.queue.shift();
        if (next) {
          this.start(next);
        } else if (this.running.size === 0) {
          this.notifyDrained();
        }
      });
    this.running.add(run);
  }

  private notifyDrained(): void {
    while (this.drainWaiters.length > 0) {
      this.drainWaiters.shift()?.();
    }
  }
}
