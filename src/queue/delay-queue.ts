/**
 * Delay Queue
 *
 * Binary min-heap of delayed items with a single blocking consumer.
 * Producers never block; `take()` waits until the earliest item's delay has
 * elapsed and is woken early when a new earliest item arrives.
 */

import { IllegalStateError, InterruptedError } from '../errors/scheduler-errors.js';
import { Clock, MAX_TIMER_MS, SystemClock, TimerHandle } from '../timing/clock.js';

export interface Delayed<T> {
  /** Remaining nanoseconds until ready; zero or negative means ready */
  getDelay(): bigint;
  /** Negative when this item must come out before `other` */
  compareTo(other: T): number;
}

export interface DelayQueueOptions {
  clock?: Clock;
}

const NANOS_PER_MILLI = 1_000_000n;

export class DelayQueue<T extends Delayed<T>> {
  private heap: T[] = [];
  private readonly clock: Clock;
  private consumerWaiting = false;
  private wakeConsumer: (() => void) | null = null;

  constructor(options: DelayQueueOptions = {}) {
    this.clock = options.clock ?? new SystemClock();
  }

  get size(): number {
    return this.heap.length;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  peek(): T | undefined {
    return this.heap[0];
  }

  /**
   * Insert an item; wakes the consumer when the item becomes the new head
   */
  add(item: T): void {
    this.heap.push(item);
    this.siftUp(this.heap.length - 1);
    if (this.heap[0] === item) {
      this.signalConsumer();
    }
  }

  /**
   * Remove and return the head if its delay has elapsed
   */
  poll(): T | undefined {
    const head = this.heap[0];
    if (head === undefined || head.getDelay() > 0n) {
      return undefined;
    }
    return this.removeHead();
  }

  /**
   * Wait for the head to become ready, then remove and return it.
   * Only one caller may wait at a time.
   */
  async take(signal?: AbortSignal): Promise<T> {
    if (this.consumerWaiting) {
      throw new IllegalStateError('DelayQueue supports a single consumer; take() is already pending');
    }
    this.consumerWaiting = true;
    try {
      for (;;) {
        if (signal?.aborted) {
          throw toInterruption(signal);
        }
        const head = this.heap[0];
        if (head === undefined) {
          await this.waitForSignal(null, signal);
          continue;
        }
        const delay = head.getDelay();
        if (delay <= 0n) {
          return this.removeHead();
        }
        await this.waitForSignal(delay, signal);
      }
    } finally {
      this.consumerWaiting = false;
    }
  }

  /**
   * Move every item, in queue order, into `collection`
   */
  drainTo(collection: T[]): number {
    let count = 0;
    while (this.heap.length > 0) {
      collection.push(this.removeHead());
      count++;
    }
    return count;
  }

  /**
   * Snapshot of the items in queue order
   */
  toArray(): T[] {
    return [...this.heap].sort((a, b) => a.compareTo(b));
  }

  /**
   * Sleep until woken by an insertion, the delay elapsing, or the signal aborting.
   * A null delay waits for an insertion only.
   */
  private waitForSignal(delayNanos: bigint | null, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let timer: TimerHandle | null = null;

      const cleanup = (): void => {
        timer?.cancel();
        signal?.removeEventListener('abort', onAbort);
        this.wakeConsumer = null;
      };
      const onWake = (): void => {
        cleanup();
        resolve();
      };
      const onAbort = (): void => {
        cleanup();
        reject(signal ? toInterruption(signal) : new InterruptedError());
      };

      this.wakeConsumer = onWake;
      signal?.addEventListener('abort', onAbort, { once: true });
      if (delayNanos !== null) {
        timer = this.clock.setTimer(onWake, nanosToTimerMs(delayNanos));
      }
    });
  }

  private signalConsumer(): void {
    const wake = this.wakeConsumer;
    if (wake) {
      wake();
    }
  }

  private removeHead(): T {
    const head = this.heap[0];
    const last = this.heap.pop();
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return head;
  }

  private siftUp(index: number): void {
    const item = this.heap[index];
    while (index > 0) {
      const parentIndex = (index - 1) >> 1;
      const parent = this.heap[parentIndex];
      if (item.compareTo(parent) >= 0) break;
      this.heap[index] = parent;
      index = parentIndex;
    }
    this.heap[index] = item;
  }

  private siftDown(index: number): void {
    const length = this.heap.length;
    const item = this.heap[index];
    for (;;) {
      const left = 2 * index + 1;
      if (left >= length) break;
      const right = left + 1;
      const child = right < length && this.heap[right].compareTo(this.heap[left]) < 0 ? right : left;
      if (this.heap[child].compareTo(item) >= 0) break;
      this.heap[index] = this.heap[child];
      index = child;
    }
    this.heap[index] = item;
  }
}

function toInterruption(signal: AbortSignal): InterruptedError {
  const reason: unknown = signal.reason;
  return reason instanceof InterruptedError ? reason : new InterruptedError();
}

/**
 * Round up so a timer never fires before the deadline; clamp to what timers accept.
 * The consumer re-checks the delay on wake and re-arms if needed.
 */
function nanosToTimerMs(delayNanos: bigint): number {
  const ms = (delayNanos + NANOS_PER_MILLI - 1n) / NANOS_PER_MILLI;
  return ms > BigInt(MAX_TIMER_MS) ? MAX_TIMER_MS : Number(ms);
}
