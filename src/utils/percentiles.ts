export interface DurationSummary {
  avg: number;
  median: number;
  p95: number;
}

/**
 * Exact summary over every value given; the input array is not modified.
 * median: middle element, or the mean of the two middles on even counts.
 * p95: element at ceil(0.95 * n) - 1 after sorting.
 */
export function summarizeDurations(values: readonly number[]): DurationSummary | null {
  if (values.length === 0) return null;

  const sorted = [...values].sort((a, b) => a - b);
  const n = sorted.length;
  const mid = Math.floor(n / 2);
  const median = n % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
  const p95 = sorted[Math.ceil(0.95 * n) - 1];
  const avg = sorted.reduce((sum, value) => sum + value, 0) / n;

  return { avg, median, p95 };
}
