import type { BenchmarkResult, LatencySummary } from './types.js';

function assertSamples(samples: readonly number[]): void {
  if (samples.length === 0) {
    throw new RangeError('At least one latency sample is required');
  }
}

export function min(samples: readonly number[]): number {
  assertSamples(samples);
  return samples.reduce((a, b) => (b < a ? b : a));
}

export function max(samples: readonly number[]): number {
  assertSamples(samples);
  return samples.reduce((a, b) => (b > a ? b : a));
}

export function mean(samples: readonly number[]): number {
  assertSamples(samples);
  return samples.reduce((sum, v) => sum + v, 0) / samples.length;
}

/** Nearest rank, no interpolation: sorted[min(floor(n * p), n - 1)]. */
export function percentile(samples: readonly number[], p: number): number {
  assertSamples(samples);
  const sorted = [...samples].sort((a, b) => a - b);
  const idx = Math.min(Math.floor(sorted.length * p), sorted.length - 1);
  return sorted[idx];
}

/** Decimal megabytes per second. */
export function throughputMbps(inputBytes: number, meanNs: number): number {
  if (meanNs === 0) return 0;
  return inputBytes / (meanNs / 1e9) / 1e6;
}

export function summarize(result: Pick<BenchmarkResult, 'inputBytes' | 'timesNs'>): LatencySummary {
  const meanNs = mean(result.timesNs);
  return {
    minNs: min(result.timesNs),
    maxNs: max(result.timesNs),
    meanNs,
    p50Ns: percentile(result.timesNs, 0.5),
    p95Ns: percentile(result.timesNs, 0.95),
    p99Ns: percentile(result.timesNs, 0.99),
    throughputMbps: throughputMbps(result.inputBytes, meanNs),
  };
}
