/**
 * Timed Scheduler Module
 */

export type {
  Suspendable,
  ScheduledWakeup,
  WorkerContext,
  WorkerFactory,
  WorkerTask,
  TimedSchedulerConfig,
  TimedSchedulerOptions,
  TimedSchedulerEvents,
} from './types.js';
export { SchedulerState } from './types.js';
export { TimedScheduler } from './timed-scheduler.js';
export { WakeupTask, type WakeupFailureListener } from './wakeup-task.js';
export {
  AsyncWorker,
  AsyncWorkerFactory,
  DEFAULT_WORKER_NAME_PREFIX,
  type AsyncWorkerFactoryOptions,
} from './worker.js';
