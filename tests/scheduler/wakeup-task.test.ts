/**
 * Wakeup Task Tests
 */

import { WakeupTask } from '../../src/scheduler/wakeup-task.js';
import type { Suspendable } from '../../src/scheduler/types.js';
import { UnsupportedOperationError } from '../../src/errors/scheduler-errors.js';
import { Logger } from '../../src/utils/logger.js';
import { ManualClock, NANOS_PER_MS } from '../helpers/manual-clock.js';

function createTarget(): Suspendable & { resume: jest.Mock; recordWaitLatency: jest.Mock } {
  return {
    resume: jest.fn(),
    recordWaitLatency: jest.fn(),
  };
}

describe('WakeupTask', () => {
  let clock: ManualClock;

  beforeEach(() => {
    clock = new ManualClock();
  });

  const at = (ms: number, sequence: bigint, target: Suspendable = createTarget()) =>
    new WakeupTask(target, clock.now() + BigInt(ms) * NANOS_PER_MS, sequence, clock);

  describe('ordering', () => {
    it('should order by deadline first', () => {
      const early = at(10, 5n);
      const late = at(20, 1n);

      expect(early.compareTo(late)).toBe(-1);
      expect(late.compareTo(early)).toBe(1);
    });

    it('should order equal deadlines by sequence', () => {
      const first = at(10, 1n);
      const second = at(10, 2n);

      expect(first.compareTo(second)).toBe(-1);
      expect(second.compareTo(first)).toBe(1);
    });

    it('should only compare equal to itself', () => {
      const task = at(10, 1n);
      expect(task.compareTo(task)).toBe(0);
    });
  });

  describe('getDelay', () => {
    it('should report remaining time in the requested unit', () => {
      const task = at(1500, 0n);

      expect(task.getDelay()).toBe(1_500_000_000n);
      expect(task.getDelay('milliseconds')).toBe(1500n);
      expect(task.getDelay('seconds')).toBe(1n);

      clock.advanceMillis(2000);
      expect(task.getDelay('milliseconds')).toBe(-500n);
    });
  });

  describe('run', () => {
    it('should resume the target and report how late it fired', () => {
      const target = createTarget();
      const task = at(10, 0n, target);

      clock.advanceMillis(12);
      expect(task.getDelay()).toBe(-2_000_000n);
      task.run();

      expect(target.resume).toHaveBeenCalledTimes(1);
      expect(target.recordWaitLatency).toHaveBeenCalledWith(2_000_000n);
    });

    it('should work with targets that have no latency hook', () => {
      const resume = jest.fn();
      const task = at(0, 0n, { resume });

      task.run();

      expect(resume).toHaveBeenCalledTimes(1);
    });

    it('should fire at most once', () => {
      const target = createTarget();
      const task = at(0, 0n, target);

      task.run();
      task.run();

      expect(target.resume).toHaveBeenCalledTimes(1);
    });

    it('should swallow resume failures and hand them to the listener', () => {
      const failure = new Error('fiber already finished');
      const onFailure = jest.fn();
      const task = new WakeupTask(
        { resume: () => { throw failure; } },
        clock.now(),
        0n,
        clock,
        onFailure
      );

      expect(() => task.run()).not.toThrow();
      expect(onFailure).toHaveBeenCalledWith(task, failure);
    });

    it('should wrap non-Error throwables', () => {
      const onFailure = jest.fn();
      const task = new WakeupTask(
        { resume: () => { throw 'boom'; } },
        clock.now(),
        0n,
        clock,
        onFailure
      );

      task.run();

      const reported: unknown = onFailure.mock.calls[0][1];
      expect(reported).toBeInstanceOf(Error);
      expect(reported).toHaveProperty('message', 'boom');
    });

    it('should log a throwing listener to the given logger instead of escaping', () => {
      const lines: string[] = [];
      const log = new Logger({ level: 'error', format: 'json', sink: (line) => lines.push(line) });
      const task = new WakeupTask(
        { resume: () => { throw new Error('resume failed'); } },
        clock.now(),
        3n,
        clock,
        () => { throw new Error('listener failed'); },
        log
      );

      expect(() => task.run()).not.toThrow();
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0])).toMatchObject({
        message: `Failure listener threw for WakeupTask#3@${clock.now()}`,
        error: { message: 'listener failed' },
      });
    });

    it('should still resume when the latency hook fails', () => {
      const hookFailure = new Error('metrics offline');
      const resume = jest.fn();
      const onFailure = jest.fn();
      const task = new WakeupTask(
        { resume, recordWaitLatency: () => { throw hookFailure; } },
        clock.now(),
        0n,
        clock,
        onFailure
      );

      task.run();

      expect(resume).toHaveBeenCalledTimes(1);
      expect(onFailure).toHaveBeenCalledTimes(1);
      expect(onFailure).toHaveBeenCalledWith(task, hookFailure);
    });
  });

  describe('cancel', () => {
    it('should prevent a task that has not run from resuming', () => {
      const target = createTarget();
      const task = at(10, 0n, target);

      expect(task.cancel()).toBe(true);
      expect(task.isCancelled()).toBe(true);
      task.run();

      expect(target.resume).not.toHaveBeenCalled();
    });

    it('should succeed without effect after the task ran', () => {
      const target = createTarget();
      const task = at(0, 0n, target);

      task.run();
      expect(task.cancel()).toBe(true);
      expect(task.cancel()).toBe(true);
      task.run();

      expect(target.resume).toHaveBeenCalledTimes(1);
    });
  });

  describe('unsupported operations', () => {
    it('should reject completion queries', () => {
      const task = at(0, 0n);

      expect(() => task.isDone()).toThrow(UnsupportedOperationError);
      expect(() => task.get()).toThrow('get is not supported');
    });
  });
});
