/**
 * Time Unit Tests
 */

import { InvalidArgumentError } from '../../src/errors/scheduler-errors.js';
import { fromNanos, isTimeUnit, toMillis, toNanos, type TimeUnit } from '../../src/timing/time-unit.js';
import { LONG_MAX, LONG_MIN } from '../../src/timing/trigger-time.js';

describe('toNanos', () => {
  it('should convert each unit', () => {
    expect(toNanos(7, 'nanoseconds')).toBe(7n);
    expect(toNanos(7, 'microseconds')).toBe(7_000n);
    expect(toNanos(7, 'milliseconds')).toBe(7_000_000n);
    expect(toNanos(7, 'seconds')).toBe(7_000_000_000n);
    expect(toNanos(2, 'minutes')).toBe(120_000_000_000n);
    expect(toNanos(1, 'hours')).toBe(3_600_000_000_000n);
    expect(toNanos(1, 'days')).toBe(86_400_000_000_000n);
  });

  it('should accept bigint durations', () => {
    expect(toNanos(3n, 'seconds')).toBe(3_000_000_000n);
  });

  it('should keep the fractional part of number durations', () => {
    expect(toNanos(1.5, 'milliseconds')).toBe(1_500_000n);
    expect(toNanos(-1.5, 'milliseconds')).toBe(-1_500_000n);
  });

  it('should saturate instead of overflowing', () => {
    expect(toNanos(LONG_MAX, 'days')).toBe(LONG_MAX);
    expect(toNanos(LONG_MIN, 'seconds')).toBe(LONG_MIN);
    expect(toNanos(Infinity, 'milliseconds')).toBe(LONG_MAX);
    expect(toNanos(-Infinity, 'milliseconds')).toBe(LONG_MIN);
  });

  it('should reject NaN', () => {
    expect(() => toNanos(NaN, 'seconds')).toThrow(InvalidArgumentError);
  });

  it('should reject a missing or unknown unit', () => {
    expect(() => toNanos(1, undefined as unknown as TimeUnit)).toThrow('unit must not be null or undefined');
    expect(() => toNanos(1, 'fortnights' as unknown as TimeUnit)).toThrow('Unknown time unit: fortnights');
  });
});

describe('fromNanos', () => {
  it('should truncate toward zero', () => {
    expect(fromNanos(1_999_999n, 'milliseconds')).toBe(1n);
    expect(fromNanos(-1_999_999n, 'milliseconds')).toBe(-1n);
  });
});

describe('toMillis', () => {
  it('should produce a plain number of milliseconds', () => {
    expect(toMillis(2, 'seconds')).toBe(2000);
    expect(toMillis(500, 'microseconds')).toBe(0);
  });
});

describe('isTimeUnit', () => {
  it('should recognise known units only', () => {
    expect(isTimeUnit('seconds')).toBe(true);
    expect(isTimeUnit('toString')).toBe(false);
    expect(isTimeUnit(5)).toBe(false);
  });
});
