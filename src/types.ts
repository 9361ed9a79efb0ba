export const ENCODINGS = ['cl100k_base', 'o200k_base'] as const;

export type Encoding = typeof ENCODINGS[number];

/**
 * One tokenizer-under-test, one run. `timesNs` holds exactly `iterations`
 * samples in execution order; `tokens` is taken from the first timed call.
 */
export interface BenchmarkResult {
  name: string;
  encoding: string;
  inputBytes: number;
  iterations: number;
  tokens: number;
  timesNs: number[];
}

export interface RunConfig {
  encoding: Encoding;
  iterations: number;
  warmup: number;
}

export interface LatencySummary {
  minNs: number;
  maxNs: number;
  meanNs: number;
  p50Ns: number;
  p95Ns: number;
  p99Ns: number;
  throughputMbps: number;
}
