export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Longest run of consecutive values matching the predicate. */
export function longestRun<T>(values: readonly T[], predicate: (value: T) => boolean): number {
  let current = 0;
  let longest = 0;
  for (const value of values) {
    if (predicate(value)) {
      current++;
      longest = Math.max(longest, current);
    } else {
      current = 0;
    }
  }
  return longest;
}

export const DAY_MS = 86_400_000;
