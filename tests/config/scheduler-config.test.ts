/**
 * Scheduler Configuration Tests
 */

import { resolveSchedulerConfig } from '../../src/config/scheduler-config.js';
import { ConfigurationError } from '../../src/errors/scheduler-errors.js';
import { SystemClock } from '../../src/timing/clock.js';
import { AsyncWorkerFactory } from '../../src/scheduler/worker.js';
import { Logger } from '../../src/utils/logger.js';
import { ManualClock } from '../helpers/manual-clock.js';

describe('resolveSchedulerConfig', () => {
  it('should build defaults from an empty environment', () => {
    const config = resolveSchedulerConfig({}, {});

    expect(config.clock).toBeInstanceOf(SystemClock);
    expect(config.workerFactory).toBeInstanceOf(AsyncWorkerFactory);
    expect(config.logger).toBeInstanceOf(Logger);
    expect(config.workerFactory.newWorker(async () => {}).name).toMatch(/^timed-scheduler-worker-\d+$/);
  });

  it('should take the worker prefix from the environment', () => {
    const config = resolveSchedulerConfig({}, { TIMED_SCHEDULER_WORKER_PREFIX: 'env-prefix' });

    expect(config.workerFactory.newWorker(async () => {}).name).toMatch(/^env-prefix-\d+$/);
  });

  it('should prefer explicit options over the environment', () => {
    const config = resolveSchedulerConfig(
      { workerNamePrefix: 'option-prefix' },
      { TIMED_SCHEDULER_WORKER_PREFIX: 'env-prefix' }
    );

    expect(config.workerFactory.newWorker(async () => {}).name).toMatch(/^option-prefix-\d+$/);
  });

  it('should use injected collaborators as given', () => {
    const clock = new ManualClock();
    const workerFactory = new AsyncWorkerFactory();
    const logger = new Logger({ level: 'silent' });

    const config = resolveSchedulerConfig({ clock, workerFactory, logger }, {});

    expect(config.clock).toBe(clock);
    expect(config.workerFactory).toBe(workerFactory);
    expect(config.logger).toBe(logger);
  });

  it('should fail on an invalid environment', () => {
    expect(() => resolveSchedulerConfig({}, { TIMED_SCHEDULER_DAEMON: 'sometimes' })).toThrow(ConfigurationError);
  });

  it('should not read variables that injected collaborators already cover', () => {
    const env = {
      LOG_LEVEL: 'verbose',
      TIMED_SCHEDULER_DAEMON: 'sometimes',
      TIMED_SCHEDULER_WORKER_PREFIX: 'has space',
    };
    const options = {
      clock: new ManualClock(),
      workerFactory: new AsyncWorkerFactory(),
      logger: new Logger({ level: 'silent' }),
    };

    expect(() => resolveSchedulerConfig(options, env)).not.toThrow();
    expect(() => resolveSchedulerConfig({ daemon: true, workerNamePrefix: 'ok' }, env)).not.toThrow();
  });

  it('should still validate the variables it reads', () => {
    expect(() =>
      resolveSchedulerConfig({ clock: new ManualClock() }, { TIMED_SCHEDULER_WORKER_PREFIX: 'has space' })
    ).toThrow(ConfigurationError);
  });
});
