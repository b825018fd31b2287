/**
 * Bounded per-connection outbound queue with its own writer loop.
 *
 * `push` never blocks. Items beyond `capacity` are parked in an overflow buffer
 * of the same size and a grace timer starts; the writer moves them into the
 * queue as it frees space. If the overflow is still non-empty when the timer
 * fires, or fills up completely, `onSaturated` is called once and the queue
 * stops accepting items. A `waitForCapacity` caller that is still waiting
 * after the same grace period saturates the queue as well.
 */

import { ConnectionClosedError, SlowConsumerError } from "./errors.js";

export interface OutboundQueueOptions<T> {
  capacity: number;
  graceMs: number;
  /** Write one item to the transport; resolves when it has been handed off. */
  write(item: T): Promise<void>;
  onWritten?(item: T): void;
  onSaturated(): void;
  onWriteError(error: unknown): void;
}

interface CapacityWaiter {
  count: number;
  timer: ReturnType<typeof setTimeout>;
  resolve(): void;
  reject(error: Error): void;
}

export class OutboundQueue<T> {
  private readonly options: OutboundQueueOptions<T>;
  private readonly items: T[] = [];
  private readonly overflow: T[] = [];
  private readonly waiters: CapacityWaiter[] = [];
  private graceTimer: ReturnType<typeof setTimeout> | null = null;
  private draining = false;
  private stopped = false;

  constructor(options: OutboundQueueOptions<T>) {
    this.options = options;
  }

  /** Items queued or parked, not yet written. */
  get size(): number {
    return this.items.length + this.overflow.length;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /** Non-blocking enqueue. Returns false when the item was not accepted. */
  push(item: T): boolean {
    if (this.stopped) return false;
    if (this.items.length < this.options.capacity && this.overflow.length === 0) {
      this.items.push(item);
      this.kick();
      return true;
    }
    if (this.overflow.length >= this.options.capacity) {
      this.saturate();
      return false;
    }
    this.overflow.push(item);
    if (this.graceTimer === null) {
      this.graceTimer = setTimeout(() => {
        this.graceTimer = null;
        if (this.overflow.length > 0) this.saturate();
      }, this.options.graceMs);
    }
    this.kick();
    return true;
  }

  /**
   * Resolves once `count` more items fit without touching the overflow buffer.
   * Rejects with SlowConsumerError when that takes longer than the grace
   * period, and with ConnectionClosedError if the queue is stopped first.
   */
  waitForCapacity(count: number): Promise<void> {
    if (this.stopped) return Promise.reject(new ConnectionClosedError());
    if (this.hasRoomFor(count)) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
      const waiter: CapacityWaiter = {
        count,
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index === -1) return;
          this.waiters.splice(index, 1);
          this.saturate(waiter);
        }, this.options.graceMs),
      };
      this.waiters.push(waiter);
    });
  }

  /**
   * Drop everything and refuse further items. Pending capacity waiters reject
   * with `reason`. Idempotent.
   */
  stop(reason: Error = new ConnectionClosedError()): void {
    if (this.stopped) return;
    this.stopped = true;
    this.items.length = 0;
    this.overflow.length = 0;
    this.clearGraceTimer();
    const waiters = this.waiters.splice(0);
    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
      waiter.reject(reason);
    }
  }

  private hasRoomFor(count: number): boolean {
    return this.overflow.length === 0 && this.items.length + count <= this.options.capacity;
  }

  private saturate(waiter?: CapacityWaiter): void {
    if (this.stopped) return;
    const error = new SlowConsumerError();
    this.stop(error);
    waiter?.reject(error);
    this.options.onSaturated();
  }

  private clearGraceTimer(): void {
    if (this.graceTimer !== null) {
      clearTimeout(this.graceTimer);
      this.graceTimer = null;
    }
  }

  private kick(): void {
    if (this.draining) return;
    this.drain().catch((err: unknown) => {
      this.draining = false;
      this.options.onWriteError(err);
    });
  }

  private async drain(): Promise<void> {
    this.draining = true;
    while (!this.stopped && this.items.length > 0) {
      const item = this.items[0];
      await this.options.write(item);
      if (this.stopped) break;
      this.items.shift();
      this.options.onWritten?.(item);
      this.refill();
    }
    this.draining = false;
  }

  private refill(): void {
    while (this.overflow.length > 0 && this.items.length < this.options.capacity) {
      const next = this.overflow.shift();
      if (next !== undefined) this.items.push(next);
    }
    if (this.overflow.length === 0) {
      this.clearGraceTimer();
    }
    while (this.waiters.length > 0 && this.hasRoomFor(this.waiters[0].count)) {
      const waiter = this.waiters.shift();
      if (waiter) {
        clearTimeout(waiter.timer);
        waiter.resolve();
      }
    }
  }
}
