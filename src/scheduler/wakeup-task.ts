/**
 * Wakeup Task
 *
 * One pending "resume this target no earlier than `deadline`" request.
 * Ordered by deadline, then by sequence number so same-deadline wakeups fire
 * in submission order.
 */

import { UnsupportedOperationError } from '../errors/scheduler-errors.js';
import { toError } from '../errors/base-error.js';
import type { Delayed } from '../queue/delay-queue.js';
import type { Clock } from '../timing/clock.js';
import { fromNanos, type TimeUnit } from '../timing/time-unit.js';
import { compareDeadlines, wrapInt64 } from '../timing/trigger-time.js';
import { getLogger, type Logger } from '../utils/logger.js';
import type { ScheduledWakeup, Suspendable } from './types.js';

export type WakeupFailureListener<T extends Suspendable> = (task: WakeupTask<T>, error: Error) => void;

export class WakeupTask<T extends Suspendable = Suspendable>
  implements ScheduledWakeup<T>, Delayed<WakeupTask<T>>
{
  readonly target: T;
  readonly deadline: bigint;
  readonly sequence: bigint;
  private readonly clock: Clock;
  private readonly onFailure?: WakeupFailureListener<T>;
  private readonly log: Logger;
  private cancelled = false;
  private fired = false;
  /** Last remaining delay observed, in nanoseconds */
  private lastDelay = 0n;

  constructor(
    target: T,
    deadline: bigint,
    sequence: bigint,
    clock: Clock,
    onFailure?: WakeupFailureListener<T>,
    log: Logger = getLogger()
  ) {
    this.target = target;
    this.deadline = deadline;
    this.sequence = sequence;
    this.clock = clock;
    this.onFailure = onFailure;
    this.log = log;
  }

  getDelay(unit: TimeUnit = 'nanoseconds'): bigint {
    const nanos = wrapInt64(this.deadline - this.clock.now());
    this.lastDelay = nanos;
    return unit === 'nanoseconds' ? nanos : fromNanos(nanos, unit);
  }

  compareTo(other: WakeupTask<T>): number {
    if (other === this) return 0;
    const byDeadline = compareDeadlines(this.deadline, other.deadline);
    if (byDeadline !== 0) return byDeadline;
    return this.sequence < other.sequence ? -1 : 1;
  }

  /**
   * Mark the wakeup dead. The entry stays queued and is skipped when dequeued.
   */
  cancel(): boolean {
    this.cancelled = true;
    return true;
  }

  isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Fire the wakeup. Called by the scheduler worker only; failures never escape.
   */
  run(): void {
    if (this.cancelled || this.fired) return;
    this.fired = true;

    // A failing latency hook is reported but never costs the wakeup
    try {
      this.target.recordWaitLatency?.(-this.lastDelay);
    } catch (error) {
      this.reportFailure(toError(error));
    }
    try {
      this.target.resume();
    } catch (error) {
      this.reportFailure(toError(error));
    }
  }

  isDone(): never {
    throw new UnsupportedOperationError('isDone');
  }

  get(): never {
    throw new UnsupportedOperationError('get');
  }

  toString(): string {
    return `WakeupTask#${this.sequence}@${this.deadline}`;
  }

  private reportFailure(error: Error): void {
    if (!this.onFailure) {
      this.log.debug(`Resume failed for ${this.toString()}`, { error: error.message });
      return;
    }
    try {
      this.onFailure(this, error);
    } catch (listenerError) {
      this.log.error(`Failure listener threw for ${this.toString()}`, toError(listenerError));
    }
  }
}
