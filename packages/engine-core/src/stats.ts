/**
 * Score statistics over per-match totals.
 * All functions return 0 for an empty list.
 */

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

export function minimum(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return Math.min(...values);
}

/** Upper median: element floor(n/2) of the ascending list. */
export function upperMedian(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  return sorted[Math.floor(sorted.length / 2)];
}

/**
 * Percentile by linear interpolation between closest ranks.
 * Position (n - 1) * p in the ascending list; p in [0, 1].
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const pos = (sorted.length - 1) * p;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export function firstQuartile(values: readonly number[]): number {
  return percentile(values, 0.25);
}
