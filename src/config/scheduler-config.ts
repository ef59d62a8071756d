/**
 * Scheduler configuration resolution: explicit options win over the environment,
 * which falls back to the defaults in env-schema. A variable is only read, and
 * only validated, when no option or injected collaborator already covers it.
 */

import { SystemClock } from '../timing/clock.js';
import { AsyncWorkerFactory } from '../scheduler/worker.js';
import type { TimedSchedulerConfig, TimedSchedulerOptions } from '../scheduler/types.js';
import { getLogger } from '../utils/logger.js';
import { SchedulerEnvSchema, parseEnv } from './env-schema.js';

type Env = Record<string, string | undefined>;

const DaemonEnvSchema = SchedulerEnvSchema.pick({ TIMED_SCHEDULER_DAEMON: true });
const WorkerPrefixEnvSchema = SchedulerEnvSchema.pick({ TIMED_SCHEDULER_WORKER_PREFIX: true });

export function resolveSchedulerConfig(
  options: TimedSchedulerOptions = {},
  env: Env = process.env
): TimedSchedulerConfig {
  const logger = options.logger ?? getLogger().child('timed-scheduler');

  const clock =
    options.clock ??
    new SystemClock({
      unrefTimers: options.daemon ?? parseEnv(DaemonEnvSchema, env).TIMED_SCHEDULER_DAEMON,
    });

  const workerFactory =
    options.workerFactory ??
    new AsyncWorkerFactory({
      namePrefix:
        options.workerNamePrefix ?? parseEnv(WorkerPrefixEnvSchema, env).TIMED_SCHEDULER_WORKER_PREFIX,
      logger: logger.child('worker'),
    });

  return { clock, workerFactory, logger };
}
