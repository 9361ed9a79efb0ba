import { Command } from 'commander';
import chalk from 'chalk';
import {
  DEFAULT_ENCODING,
  DEFAULT_ITERATIONS,
  DEFAULT_SIZE,
  DEFAULT_WARMUP,
  parseEncoding,
  parseIterations,
  parseSeed,
  parseWarmup,
  resolveCandidateBinary,
} from '../config.js';
import { compareResults, type Comparison } from '../compare.js';
import { DEFAULT_SEED, generateCorpus } from '../corpus.js';
import { createLogger } from '../log.js';
import { tiktokenReference, type ReferenceTokenizer } from '../reference.js';
import { detectFormat, emit, formatComparison, formatTable, toJsonReport } from '../report.js';
import { runLibrary } from '../runners/library.js';
import { runProcess } from '../runners/process.js';
import { parseSize } from '../size.js';
import { summarize } from '../stats.js';
import type { BenchmarkResult, Encoding, RunConfig } from '../types.js';

type BenchOptions = {
  size: string;
  iterations: number;
  encoding: Encoding;
  warmup: number;
  seed: number;
  json?: boolean;
  output?: string;
  candidate?: string;
  candidateName?: string;
  failOnMismatch?: boolean;
  debug?: boolean;
  quiet?: boolean;
};

export interface BenchDeps {
  tokenizer?: ReferenceTokenizer;
  /** Parent directory for the candidate's scratch corpus file. */
  tempDir?: string;
}

export function register(program: Command, deps: BenchDeps = {}): void {
  program
    .command('bench')
    .description('Benchmark the candidate binary against the reference tokenizer on a generated corpus')
    .option('--size <size>', 'Input size (e.g. 1KB, 10KB, 100KB, 1MB)', DEFAULT_SIZE)
    .option('--iterations <n>', 'Timed iterations', parseIterations, DEFAULT_ITERATIONS)
    .option('--encoding <name>', 'Encoding to benchmark (cl100k_base, o200k_base)', parseEncoding, DEFAULT_ENCODING)
    .option('--warmup <n>', 'Warmup iterations', parseWarmup, DEFAULT_WARMUP)
    .option('--seed <n>', 'Corpus seed', parseSeed, DEFAULT_SEED)
    .option('--output <file>', 'Write the report to a file instead of stdout')
    .option('--candidate <path>', 'Path to the candidate tokenizer binary')
    .option('--candidate-name <name>', 'Label for the candidate in reports')
    .option('--fail-on-mismatch', 'Exit with status 1 when token counts differ')
    .action(function (this: Command) {
      const opts = this.optsWithGlobals<BenchOptions>();
      const logger = createLogger({ debug: opts.debug, quiet: opts.quiet });
      const tokenizer = deps.tokenizer ?? tiktokenReference;

      // Reject bad input before any measurement starts.
      const sizeBytes = parseSize(opts.size);
      const config: RunConfig = {
        encoding: opts.encoding,
        iterations: opts.iterations,
        warmup: opts.warmup,
      };
      const candidatePath = resolveCandidateBinary(opts.candidate);

      logger.info(`Generating ${opts.size} test data...`);
      const text = generateCorpus(sizeBytes, { seed: opts.seed });
      logger.info(`  Generated ${sizeBytes.toLocaleString('en-US')} bytes`);
      logger.info(`Running benchmarks (${config.iterations} iterations, ${config.warmup} warmup)...`);

      const results: BenchmarkResult[] = [];

      logger.info(`  Benchmarking ${tokenizer.name}...`);
      const reference = runLibrary(text, config, tokenizer);
      results.push(reference);
      logger.info(`    ${summarize(reference).throughputMbps.toFixed(2)} MB/s`);

      logger.info(`  Benchmarking candidate (${candidatePath})...`);
      const candidate = runProcess(text, config, candidatePath, {
        name: opts.candidateName,
        tempDir: deps.tempDir,
        logger,
      });
      let comparison: Comparison | undefined;
      if (candidate) {
        results.push(candidate);
        logger.info(`    ${summarize(candidate).throughputMbps.toFixed(2)} MB/s`);
        comparison = compareResults(reference, candidate);
      } else {
        logger.info('    Skipped (binary not found)');
      }

      const previousLevel = chalk.level;
      if (opts.output) chalk.level = 0;
      try {
        const output = detectFormat(opts) === 'json'
          ? JSON.stringify(toJsonReport({
            inputSize: opts.size,
            inputBytes: sizeBytes,
            encoding: config.encoding,
            iterations: config.iterations,
          }, results), null, 2)
          : formatTable(results) + (comparison ? `\n${formatComparison(comparison)}` : '');

        emit(output, opts.output);
      } finally {
        chalk.level = previousLevel;
      }

      if (opts.output) {
        logger.info(`\nResults written to ${opts.output}`);
      }

      if (opts.failOnMismatch && comparison && !comparison.parity.matches) {
        process.exitCode = 1;
      }
    });
}
