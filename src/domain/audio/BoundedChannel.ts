export type OverflowPolicy = "drop-oldest" | "block";

export type ChannelResult<T> = { done: false; value: T } | { done: true };

interface PendingTake<T> {
  resolve(result: ChannelResult<T>): void;
  reject(err: unknown): void;
}

/**
 * Bounded single-producer/single-consumer queue between the capture pump and
 * whatever consumes its chunks. With "drop-oldest" a full queue evicts its
 * head so `push` never waits; with "block" the producer waits for room.
 */
export class BoundedChannel<T> {
  private readonly items: T[] = [];
  private waitingTake: PendingTake<T> | null = null;
  private waitingPush: (() => void) | null = null;
  private closed = false;
  private failure: unknown = null;

  constructor(
    private readonly capacity: number,
    private readonly policy: OverflowPolicy,
    private readonly onDrop?: (item: T) => void
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer (got ${capacity}).`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async push(item: T): Promise<void> {
    if (this.closed) return;

    const taker = this.waitingTake;
    if (taker) {
      this.waitingTake = null;
      taker.resolve({ done: false, value: item });
      return;
    }

    if (this.items.length >= this.capacity) {
      if (this.policy === "drop-oldest") {
        const [dropped] = this.items.splice(0, 1);
        this.onDrop?.(dropped);
      } else {
        await new Promise<void>((resolve) => {
          this.waitingPush = resolve;
        });
        if (this.closed) return;
      }
    }

    this.items.push(item);
  }

  take(): Promise<ChannelResult<T>> {
    if (this.items.length) {
      const [value] = this.items.splice(0, 1);
      this.releaseProducer();
      return Promise.resolve({ done: false, value });
    }
    if (this.closed) {
      return this.failure === null ? Promise.resolve({ done: true }) : Promise.reject(this.failure);
    }
    if (this.waitingTake) {
      return Promise.reject(new Error("BoundedChannel supports a single consumer."));
    }
    return new Promise((resolve, reject) => {
      this.waitingTake = { resolve, reject };
    });
  }

  /** Ends the channel; buffered items are still handed out before `error` (if any) is raised. */
  close(error?: unknown): void {
    if (this.closed) return;
    this.closed = true;
    if (error !== undefined) this.failure = error;

    this.releaseProducer();
    const taker = this.waitingTake;
    if (taker) {
      this.waitingTake = null;
      if (error === undefined) taker.resolve({ done: true });
      else taker.reject(error);
    }
  }

  private releaseProducer() {
    const producer = this.waitingPush;
    if (producer) {
      this.waitingPush = null;
      producer();
    }
  }
}
