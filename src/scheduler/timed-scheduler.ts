/**
 * Timed Scheduler - fires "resume no earlier than T" wakeups in deadline order
 *
 * Features:
 * - Any number of producers, one worker consuming a delay queue
 * - FIFO among wakeups sharing a deadline
 * - Advisory cancellation (cancelled entries are skipped, not removed)
 * - Graceful shutdown that drains queued wakeups, and forced shutdown that
 *   hands them back unrun
 */

import { EventEmitter } from 'events';
import { InterruptedError, InvalidArgumentError, RejectedExecutionError } from '../errors/scheduler-errors.js';
import { resolveSchedulerConfig } from '../config/scheduler-config.js';
import { DelayQueue } from '../queue/delay-queue.js';
import type { Clock } from '../timing/clock.js';
import { toMillis, toNanos, type TimeUnit } from '../timing/time-unit.js';
import { triggerTime } from '../timing/trigger-time.js';
import type { Logger } from '../utils/logger.js';
import type {
  ScheduledWakeup,
  Suspendable,
  TimedSchedulerEvents,
  TimedSchedulerOptions,
  WorkerContext,
} from './types.js';
import { SchedulerState } from './types.js';
import { WakeupTask } from './wakeup-task.js';

export class TimedScheduler<T extends Suspendable = Suspendable> extends EventEmitter {
  private state: SchedulerState = SchedulerState.ACCEPTING;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly workQueue: DelayQueue<WakeupTask<T>>;
  private readonly worker: WorkerContext;
  /** Tie-breaker between equal deadlines */
  private sequencer = 0n;

  constructor(options: TimedSchedulerOptions = {}) {
    super();
    const config = resolveSchedulerConfig(options);
    this.clock = config.clock;
    this.log = config.logger;
    this.workQueue = new DelayQueue<WakeupTask<T>>({ clock: this.clock });
    this.worker = config.workerFactory.newWorker((context) => this.work(context));
    this.worker.start();
  }

  /**
   * Request that `target` be resumed no earlier than `delay` from now
   */
  schedule(target: T, delay: number | bigint, unit: TimeUnit): ScheduledWakeup<T> {
    if (target === null || target === undefined) {
      throw InvalidArgumentError.nullArgument('target');
    }
    if (unit === null || unit === undefined) {
      throw InvalidArgumentError.nullArgument('unit');
    }

    const delayNanos = toNanos(delay, unit);
    const deadline = triggerTime(this.clock.now(), delayNanos, this.workQueue.peek());
    const task = new WakeupTask<T>(
      target,
      deadline,
      this.sequencer++,
      this.clock,
      (failed, error) => this.onTaskFailure(failed, error),
      this.log
    );

    if (this.isShutdown()) {
      throw new RejectedExecutionError(`Task ${task.toString()} rejected from ${this.toString()}`, {
        state: SchedulerState[this.state],
      });
    }

    this.workQueue.add(task);
    this.emit('task:scheduled', task);
    return task;
  }

  /**
   * Stop accepting wakeups; queued ones still fire in order.
   * Does not wait; use awaitTermination() for that.
   */
  shutdown(): void {
    if (this.state !== SchedulerState.ACCEPTING) return;
    this.advanceTo(SchedulerState.DRAINING);
    this.log.debug('Shutdown requested, draining queued wakeups', { pending: this.workQueue.size });
    // An idle worker has nothing to time out on; wake it to see the new state
    this.worker.interrupt();
  }

  /**
   * Stop immediately and return the wakeups that never fired
   */
  shutdownNow(): WakeupTask<T>[] {
    this.advanceTo(SchedulerState.STOPPING);
    this.worker.interrupt();
    const pending: WakeupTask<T>[] = [];
    this.workQueue.drainTo(pending);
    this.log.info('Forced shutdown', { returned: pending.length });
    return pending;
  }

  /**
   * Wait for the worker to exit. Does not request shutdown.
   */
  async awaitTermination(timeout: number | bigint, unit: TimeUnit): Promise<boolean> {
    const timeoutMs = toMillis(timeout, unit);
    if (this.isTerminated()) return true;
    return this.worker.join(timeoutMs);
  }

  isShutdown(): boolean {
    return this.state >= SchedulerState.DRAINING;
  }

  /**
   * True once the worker loop has finished. The state reaches TERMINATED as the
   * loop's last step, so this agrees with getState() inside `terminated` listeners.
   */
  isTerminated(): boolean {
    return this.state === SchedulerState.TERMINATED || !this.worker.isAlive();
  }

  getState(): SchedulerState {
    return this.state;
  }

  getPendingCount(): number {
    return this.workQueue.size;
  }

  toString(): string {
    return `TimedScheduler[${this.worker.name}, ${SchedulerState[this.state]}]`;
  }

  // ============================================================================
  // Worker loop
  // ============================================================================

  private async work(context: WorkerContext): Promise<void> {
    try {
      while (this.getState() === SchedulerState.ACCEPTING) {
        try {
          const task = await this.workQueue.take(context.signal);
          task.run();
        } catch (error) {
          this.rethrowUnlessInterrupted(error);
          context.clearInterrupt();
          if (this.getState() === SchedulerState.ACCEPTING) continue;
          if (this.getState() !== SchedulerState.DRAINING) {
            this.advanceTo(SchedulerState.STOPPING);
          }
          break;
        }
      }

      while (this.getState() === SchedulerState.DRAINING && !this.workQueue.isEmpty()) {
        try {
          const task = await this.workQueue.take(context.signal);
          task.run();
        } catch (error) {
          this.rethrowUnlessInterrupted(error);
          context.clearInterrupt();
          if (this.getState() !== SchedulerState.DRAINING) {
            this.advanceTo(SchedulerState.STOPPING);
            break;
          }
        }
      }
    } finally {
      this.advanceTo(SchedulerState.TERMINATED);
      this.emit('terminated');
    }
  }

  private rethrowUnlessInterrupted(error: unknown): void {
    if (!(error instanceof InterruptedError)) {
      throw error;
    }
  }

  /**
   * Move the state forward; never backward
   */
  private advanceTo(target: SchedulerState): void {
    const from = this.state;
    if (target <= from) return;
    this.state = target;
    this.log.debug(`State ${SchedulerState[from]} -> ${SchedulerState[target]}`);
    this.emit('state', from, target);
  }

  private onTaskFailure(task: WakeupTask<T>, error: Error): void {
    this.log.warn(`Resume failed for ${task.toString()}`, error);
    this.emit('task:error', task, error);
  }

  // ============================================================================
  // Type Declarations for EventEmitter
  // ============================================================================

  on<K extends keyof TimedSchedulerEvents<T>>(event: K, listener: TimedSchedulerEvents<T>[K]): this {
    return super.on(event, listener);
  }

  once<K extends keyof TimedSchedulerEvents<T>>(event: K, listener: TimedSchedulerEvents<T>[K]): this {
    return super.once(event, listener);
  }

  emit<K extends keyof TimedSchedulerEvents<T>>(
    event: K,
    ...args: Parameters<TimedSchedulerEvents<T>[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
