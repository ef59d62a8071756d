export { SystemClock, MAX_TIMER_MS, type Clock, type TimerHandle, type SystemClockOptions } from './clock.js';
export { NANOS_PER_UNIT, fromNanos, isTimeUnit, toMillis, toNanos, type TimeUnit } from './time-unit.js';
export {
  LONG_MAX,
  LONG_MIN,
  compareDeadlines,
  overflowFree,
  saturateInt64,
  triggerTime,
  wrapInt64,
  type HasDelay,
} from './trigger-time.js';
