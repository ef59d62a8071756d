/**
 * Type definitions for the Timed Scheduler module
 */

import type { Clock } from '../timing/clock.js';
import type { TimeUnit } from '../timing/time-unit.js';
import type { Logger } from '../utils/logger.js';

/**
 * A suspended lightweight thread that can be woken.
 * The scheduler only holds a reference; the owner manages its lifecycle.
 */
export interface Suspendable {
  resume(): void;
  /**
   * Nanoseconds between the requested deadline and the moment the wakeup was
   * dequeued. Positive when fired late.
   */
  recordWaitLatency?(nanos: bigint): void;
}

/**
 * Forward-only lifecycle. Numeric order is the transition order.
 */
export enum SchedulerState {
  ACCEPTING = 0,
  DRAINING = 1,
  STOPPING = 2,
  TERMINATED = 3,
}

/**
 * Handle returned by `schedule()`. Only cancellation is supported; completion
 * cannot be observed or awaited.
 */
export interface ScheduledWakeup<T extends Suspendable = Suspendable> {
  readonly target: T;
  readonly deadline: bigint;
  readonly sequence: bigint;
  cancel(): boolean;
  isCancelled(): boolean;
  getDelay(unit?: TimeUnit): bigint;
  /** Always throws UnsupportedOperationError */
  isDone(): never;
  /** Always throws UnsupportedOperationError */
  get(): never;
}

/**
 * Execution context running the scheduler's consume loop
 */
export interface WorkerContext {
  readonly name: string;
  /** Aborts when the worker is interrupted; replaced by clearInterrupt() */
  readonly signal: AbortSignal;
  start(): void;
  interrupt(): void;
  /** Reset the interrupt status, returning whether it was set */
  clearInterrupt(): boolean;
  isAlive(): boolean;
  /** Resolves true once the work has exited, or false when `timeoutMs` elapses first */
  join(timeoutMs?: number): Promise<boolean>;
}

export type WorkerTask = (context: WorkerContext) => Promise<void>;

export interface WorkerFactory {
  newWorker(work: WorkerTask): WorkerContext;
}

export interface TimedSchedulerConfig {
  clock: Clock;
  workerFactory: WorkerFactory;
  logger: Logger;
}

export interface TimedSchedulerOptions {
  clock?: Clock;
  workerFactory?: WorkerFactory;
  /** Ignored when a workerFactory is given */
  workerNamePrefix?: string;
  /** Ignored when a clock is given */
  daemon?: boolean;
  logger?: Logger;
}

export interface TimedSchedulerEvents<T extends Suspendable = Suspendable> {
  'state': (from: SchedulerState, to: SchedulerState) => void;
  'task:scheduled': (task: ScheduledWakeup<T>) => void;
  'task:error': (task: ScheduledWakeup<T>, error: Error) => void;
  'terminated': () => void;
}
