import { summarize } from './stats.js';
import type { BenchmarkResult } from './types.js';

export const FASTER_THRESHOLD = 1.1;
export const SLOWER_THRESHOLD = 0.9;

export type Verdict =
  | { kind: 'faster'; factor: number }
  | { kind: 'slower'; factor: number }
  | { kind: 'comparable'; ratio: number }
  | { kind: 'indeterminate' };

export type Parity =
  | { matches: true; tokens: number }
  | { matches: false; reference: number; candidate: number; difference: number };

export interface Comparison {
  reference: BenchmarkResult;
  candidate: BenchmarkResult;
  referenceThroughputMbps: number;
  candidateThroughputMbps: number;
  /** candidate / reference throughput; null when either side measured zero. */
  ratio: number | null;
  verdict: Verdict;
  parity: Parity;
}

/** Bounds are exclusive: exactly 1.1 or 0.9 is comparable. */
export function classifyRatio(ratio: number): Verdict {
  if (!Number.isFinite(ratio) || ratio <= 0) return { kind: 'indeterminate' };
  if (ratio > FASTER_THRESHOLD) return { kind: 'faster', factor: ratio };
  if (ratio < SLOWER_THRESHOLD) return { kind: 'slower', factor: 1 / ratio };
  return { kind: 'comparable', ratio };
}

export function checkParity(referenceTokens: number, candidateTokens: number): Parity {
  if (referenceTokens === candidateTokens) {
    return { matches: true, tokens: referenceTokens };
  }
  return {
    matches: false,
    reference: referenceTokens,
    candidate: candidateTokens,
    difference: Math.abs(referenceTokens - candidateTokens),
  };
}

export function compareResults(reference: BenchmarkResult, candidate: BenchmarkResult): Comparison {
  const referenceThroughputMbps = summarize(reference).throughputMbps;
  const candidateThroughputMbps = summarize(candidate).throughputMbps;

  const ratio = referenceThroughputMbps > 0 && candidateThroughputMbps > 0
    ? candidateThroughputMbps / referenceThroughputMbps
    : null;

  return {
    reference,
    candidate,
    referenceThroughputMbps,
    candidateThroughputMbps,
    ratio,
    verdict: ratio === null ? { kind: 'indeterminate' } : classifyRatio(ratio),
    parity: checkParity(reference.tokens, candidate.tokens),
  };
}
