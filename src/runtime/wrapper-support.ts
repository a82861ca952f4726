/**
 * Helpers called from generated wrapper methods
 */

/** Elapsed-time measurement for one call */
export interface Stopwatch {
  /** Whole milliseconds since the stopwatch started */
  elapsedMs(): number;
}

/**
 * Starts a monotonic stopwatch (`performance.now()`, unaffected by wall
 * clock changes)
 */
export function startStopwatch(): Stopwatch {
  const startedAt = performance.now();
  return {
    elapsedMs: () => Math.round(performance.now() - startedAt)
  };
}

/**
 * Shortens a string argument to `maxLength` characters plus `...`.
 * Other values, and any value when `maxLength` is negative, pass through.
 */
export function clipValue<T>(value: T, maxLength: number): T | string {
  if (typeof value !== 'string' || maxLength < 0 || value.length <= maxLength) {
    return value;
  }
  return `${truncateUnits(value, maxLength)}...`;
}

/**
 * The first `length` UTF-16 code units of `value`, one fewer when the cut
 * would split a surrogate pair
 */
export function truncateUnits(value: string, length: number): string {
  const splitsPair =
    length > 0 &&
    length < value.length &&
    isHighSurrogate(value.charCodeAt(length - 1)) &&
    isLowSurrogate(value.charCodeAt(length));
  return value.slice(0, splitsPair ? length - 1 : length);
}

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;
const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff;
