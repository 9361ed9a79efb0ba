import chalk from 'chalk';
import Table from 'cli-table3';
import { writeFileSync } from 'node:fs';
import type { Comparison } from './compare.js';
import { summarize } from './stats.js';
import type { BenchmarkResult } from './types.js';

export type OutputFormat = 'json' | 'table';

export function detectFormat(opts: { json?: boolean }): OutputFormat {
  return opts.json ? 'json' : 'table';
}

export interface ReportMeta {
  inputSize: string;
  inputBytes: number;
  encoding: string;
  iterations: number;
}

export interface JsonResult {
  name: string;
  encoding: string;
  input_bytes: number;
  iterations: number;
  tokens: number;
  throughput_mbps: number;
  latency_ns: {
    min: number;
    p50: number;
    p95: number;
    p99: number;
    max: number;
    mean: number;
  };
}

export interface JsonReport {
  meta: {
    input_size: string;
    input_bytes: number;
    encoding: string;
    iterations: number;
  };
  results: JsonResult[];
}

const TABLE_HEAD = ['Implementation', 'Throughput', 'p50', 'p95', 'p99', 'Ratio'];

const ms = (ns: number): string => `${(ns / 1e6).toFixed(2)}ms`;
const count = (n: number): string => n.toLocaleString('en-US');

/** Rows in display order; ratio is relative to the first result. */
export function tableRows(results: BenchmarkResult[]): string[][] {
  if (results.length === 0) return [];
  const baseline = summarize(results[0]).throughputMbps;

  return results.map((result) => {
    const s = summarize(result);
    const ratio = baseline > 0 ? s.throughputMbps / baseline : 0;
    return [
      result.name,
      `${s.throughputMbps.toFixed(2)} MB/s`,
      ms(s.p50Ns),
      ms(s.p95Ns),
      ms(s.p99Ns),
      `${ratio.toFixed(2)}x`,
    ];
  });
}

export function formatTable(results: BenchmarkResult[]): string {
  if (results.length === 0) return 'No results to display';

  const table = new Table({
    head: TABLE_HEAD.map(c => chalk.cyan(c)),
    colAligns: ['left', 'right', 'right', 'right', 'right', 'right'],
    style: { head: [], border: [] },
  });
  for (const row of tableRows(results)) {
    table.push(row);
  }
  return table.toString();
}

export function parityLine(comparison: Comparison): string {
  const { parity } = comparison;
  if (parity.matches) {
    return chalk.green(`✓ Token count matches: ${count(parity.tokens)}`);
  }
  return chalk.yellow(
    `⚠ Token count differs by ${count(parity.difference)} (${parity.reference} vs ${parity.candidate})`
  );
}

export function verdictLine(comparison: Comparison): string {
  const { verdict, candidate, reference } = comparison;
  switch (verdict.kind) {
    case 'faster':
      return chalk.green(`${candidate.name} is ${verdict.factor.toFixed(2)}x FASTER than ${reference.name}`);
    case 'slower':
      return chalk.yellow(`${candidate.name} is ${verdict.factor.toFixed(2)}x SLOWER than ${reference.name}`);
    case 'comparable':
      return `≈ Performance is comparable (ratio: ${verdict.ratio.toFixed(2)}x)`;
    case 'indeterminate':
      return chalk.yellow('? Performance ratio is indeterminate (zero throughput measured)');
  }
}

export function formatComparison(comparison: Comparison): string {
  const { reference, candidate } = comparison;
  const width = Math.max(reference.name.length, candidate.name.length) + 1;
  const line = (r: BenchmarkResult, mbps: number) =>
    `  ${`${r.name}:`.padEnd(width)}  ${mbps.toFixed(2).padStart(7)} MB/s (${count(r.tokens)} tokens)`;

  return [
    '',
    chalk.bold('── Comparison Summary ──'),
    '',
    line(reference, comparison.referenceThroughputMbps),
    line(candidate, comparison.candidateThroughputMbps),
    '',
    `  ${parityLine(comparison)}`,
    '',
    `  ${verdictLine(comparison)}`,
  ].join('\n');
}

export function toJsonResult(result: BenchmarkResult): JsonResult {
  const s = summarize(result);
  return {
    name: result.name,
    encoding: result.encoding,
    input_bytes: result.inputBytes,
    iterations: result.iterations,
    tokens: result.tokens,
    throughput_mbps: Math.round(s.throughputMbps * 10_000) / 10_000,
    latency_ns: {
      min: s.minNs,
      p50: Math.trunc(s.p50Ns),
      p95: Math.trunc(s.p95Ns),
      p99: Math.trunc(s.p99Ns),
      max: s.maxNs,
      mean: Math.trunc(s.meanNs),
    },
  };
}

export function toJsonReport(meta: ReportMeta, results: BenchmarkResult[]): JsonReport {
  return {
    meta: {
      input_size: meta.inputSize,
      input_bytes: meta.inputBytes,
      encoding: meta.encoding,
      iterations: meta.iterations,
    },
    results: results.map(toJsonResult),
  };
}

/** Print to stdout, or write to `destination` when given. */
export function emit(output: string, destination?: string): void {
  if (destination) {
    writeFileSync(destination, output.endsWith('\n') ? output : `${output}\n`);
    return;
  }
  console.log(output);
}
