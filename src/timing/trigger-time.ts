/**
 * Deadline arithmetic on signed 64-bit nanosecond values.
 *
 * Deadlines are bigints constrained to the int64 range and wrap like a 64-bit
 * integer, so every pending deadline must stay within LONG_MAX of every other
 * for comparisons (which subtract) to stay correct.
 */

export const LONG_MAX = (1n << 63n) - 1n;
export const LONG_MIN = -(1n << 63n);

/** Anything that can report how long until it becomes ready, in nanoseconds */
export interface HasDelay {
  getDelay(): bigint;
}

/**
 * Reduce a value to int64 with two's-complement wraparound
 */
export function wrapInt64(value: bigint): bigint {
  return BigInt.asIntN(64, value);
}

export function saturateInt64(value: bigint): bigint {
  if (value > LONG_MAX) return LONG_MAX;
  if (value < LONG_MIN) return LONG_MIN;
  return value;
}

/**
 * Sign of (a - b) computed the way a 64-bit subtraction would
 */
export function compareDeadlines(a: bigint, b: bigint): -1 | 0 | 1 {
  const diff = wrapInt64(a - b);
  if (diff < 0n) return -1;
  if (diff > 0n) return 1;
  return 0;
}

/**
 * Constrain a huge delay so the resulting deadline stays within LONG_MAX of an
 * overdue queue head. Otherwise an entry eligible to be dequeued, but not yet
 * dequeued, could compare as later than a task added with a delay near LONG_MAX.
 */
export function overflowFree(delay: bigint, head?: HasDelay | null): bigint {
  if (head) {
    const headDelay = head.getDelay();
    if (headDelay < 0n && wrapInt64(delay - headDelay) < 0n) {
      return LONG_MAX + headDelay;
    }
  }
  return delay;
}

/**
 * Absolute deadline for a wakeup requested `delay` nanoseconds after `now`.
 * Negative delays are clamped to zero.
 */
export function triggerTime(now: bigint, delay: bigint, head?: HasDelay | null): bigint {
  const clamped = delay < 0n ? 0n : saturateInt64(delay);
  const offset = clamped < LONG_MAX >> 1n ? clamped : overflowFree(clamped, head);
  return wrapInt64(now + offset);
}
