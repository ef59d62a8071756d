/**
 * Time units and saturating conversions to/from nanoseconds
 */

import { InvalidArgumentError } from '../errors/scheduler-errors.js';
import { LONG_MAX, LONG_MIN, saturateInt64 } from './trigger-time.js';

export type TimeUnit =
  | 'nanoseconds'
  | 'microseconds'
  | 'milliseconds'
  | 'seconds'
  | 'minutes'
  | 'hours'
  | 'days';

export const NANOS_PER_UNIT: Record<TimeUnit, bigint> = {
  nanoseconds: 1n,
  microseconds: 1_000n,
  milliseconds: 1_000_000n,
  seconds: 1_000_000_000n,
  minutes: 60_000_000_000n,
  hours: 3_600_000_000_000n,
  days: 86_400_000_000_000n,
};

export function isTimeUnit(value: unknown): value is TimeUnit {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(NANOS_PER_UNIT, value);
}

function assertTimeUnit(unit: unknown): asserts unit is TimeUnit {
  if (unit === null || unit === undefined) {
    throw InvalidArgumentError.nullArgument('unit');
  }
  if (!isTimeUnit(unit)) {
    throw new InvalidArgumentError('unit', `Unknown time unit: ${String(unit)}`);
  }
}

/**
 * Whole-number part of a duration as a bigint; infinities saturate
 */
function toWholeBigInt(duration: number | bigint): bigint {
  if (typeof duration === 'bigint') return duration;
  if (Number.isNaN(duration)) {
    throw new InvalidArgumentError('duration', 'Duration must be a number, got NaN');
  }
  if (duration === Infinity) return LONG_MAX;
  if (duration === -Infinity) return LONG_MIN;
  return BigInt(Math.trunc(duration));
}

/**
 * Convert a duration to int64 nanoseconds, saturating instead of overflowing.
 * Fractional numbers are scaled before truncation, so 1.5 ms is 1_500_000 ns.
 */
export function toNanos(duration: number | bigint, unit: TimeUnit): bigint {
  assertTimeUnit(unit);
  const factor = NANOS_PER_UNIT[unit];

  if (typeof duration === 'number' && Number.isFinite(duration) && !Number.isInteger(duration)) {
    const whole = Math.trunc(duration);
    const fraction = duration - whole;
    const wholeNanos = toWholeBigInt(whole) * factor;
    const fractionNanos = BigInt(Math.trunc(fraction * Number(factor)));
    return saturateInt64(wholeNanos + fractionNanos);
  }

  return saturateInt64(toWholeBigInt(duration) * factor);
}

/**
 * Convert nanoseconds to another unit, truncating toward zero
 */
export function fromNanos(nanos: bigint, unit: TimeUnit): bigint {
  assertTimeUnit(unit);
  return nanos / NANOS_PER_UNIT[unit];
}

/**
 * Duration in milliseconds as a plain number, for timer APIs
 */
export function toMillis(duration: number | bigint, unit: TimeUnit): number {
  return Number(fromNanos(toNanos(duration, unit), 'milliseconds'));
}
