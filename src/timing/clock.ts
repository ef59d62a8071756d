/**
 * Clock port: monotonic time source plus one-shot timers.
 *
 * The delay queue only ever reads time and arms timers through this interface,
 * so tests can drive it with a manual clock.
 */

export interface TimerHandle {
  cancel(): void;
}

export interface Clock {
  /** Monotonic time in nanoseconds, from an arbitrary origin */
  now(): bigint;
  /** Run `callback` once after at least `ms` milliseconds */
  setTimer(callback: () => void, ms: number): TimerHandle;
}

export interface SystemClockOptions {
  /** Pending timers do not keep the process alive */
  unrefTimers?: boolean;
}

/** Largest delay setTimeout accepts before clamping to 1ms */
export const MAX_TIMER_MS = 2_147_483_647;

export class SystemClock implements Clock {
  private readonly unrefTimers: boolean;

  constructor(options: SystemClockOptions = {}) {
    this.unrefTimers = options.unrefTimers ?? false;
  }

  now(): bigint {
    return process.hrtime.bigint();
  }

  setTimer(callback: () => void, ms: number): TimerHandle {
    const timeout = setTimeout(callback, Math.min(Math.max(ms, 0), MAX_TIMER_MS));
    if (this.unrefTimers) {
      timeout.unref();
    }
    return {
      cancel: () => clearTimeout(timeout),
    };
  }
}
