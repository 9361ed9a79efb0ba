import { execFileSync } from 'node:child_process';
import { existsSync, mkdtempSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { CandidateInvocationError } from '../errors.js';
import { silentLogger, type Logger } from '../log.js';
import type { BenchmarkResult, RunConfig } from '../types.js';

const MODEL_FOR_ENCODING: Record<string, string> = {
  cl100k_base: 'gpt-4',
  o200k_base: 'gpt-4o',
};

export const DEFAULT_MODEL = 'gpt-4o';

// Candidate stdout is a count; anything larger is a broken candidate.
const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export function modelForEncoding(encoding: string): string {
  return MODEL_FOR_ENCODING[encoding] ?? DEFAULT_MODEL;
}

export interface ProcessRunOptions {
  /** Result name; defaults to the binary's file name. */
  name?: string;
  /** Parent directory for the scratch corpus file; defaults to the OS temp dir. */
  tempDir?: string;
  logger?: Logger;
}

/**
 * Leading whitespace-delimited field as a non-negative integer.
 * `"1234 tokens"` -> 1234; anything else -> undefined.
 */
export function parseTokenCount(stdout: string): number | undefined {
  const first = stdout.trim().split(/\s+/)[0];
  if (!first || !/^\d+$/.test(first)) return undefined;
  return Number(first);
}

function isExistingFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

function invoke(argv: string[]): string {
  const [file, ...args] = argv;
  try {
    return execFileSync(file, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      encoding: 'utf-8',
      maxBuffer: MAX_OUTPUT_BYTES,
    });
  } catch (err) {
    let status: number | null = null;
    let stderr = '';
    if (typeof err === 'object' && err !== null) {
      if ('status' in err && typeof err.status === 'number') status = err.status;
      if ('stderr' in err && (typeof err.stderr === 'string' || Buffer.isBuffer(err.stderr))) {
        stderr = err.stderr.toString();
      }
    }
    throw new CandidateInvocationError(argv, status, stderr, { cause: err });
  }
}

/**
 * Time an external candidate binary, one subprocess per iteration, measured
 * end to end including process startup. Returns undefined when the binary
 * does not exist.
 */
export function runProcess(
  text: string,
  config: RunConfig,
  binaryPath: string,
  opts: ProcessRunOptions = {},
): BenchmarkResult | undefined {
  const logger = opts.logger ?? silentLogger;

  if (!isExistingFile(binaryPath)) {
    logger.warn(`candidate binary not found at ${binaryPath}`);
    return undefined;
  }

  const workDir = mkdtempSync(join(opts.tempDir ?? tmpdir(), 'tokbench-'));
  let failure: unknown;
  try {
    const corpusPath = join(workDir, 'corpus.txt');
    writeFileSync(corpusPath, text, 'utf-8');

    const argv = [binaryPath, 'count', corpusPath, '--model', modelForEncoding(config.encoding)];
    logger.debug(`→ ${argv.join(' ')}`);

    for (let i = 0; i < config.warmup; i++) {
      invoke(argv);
    }

    const timesNs: number[] = [];
    let tokens: number | undefined;

    for (let i = 0; i < config.iterations; i++) {
      const start = process.hrtime.bigint();
      const stdout = invoke(argv);
      const elapsed = process.hrtime.bigint() - start;
      timesNs.push(Number(elapsed));

      if (i === 0) {
        tokens = parseTokenCount(stdout);
        if (tokens === undefined) {
          const preview = stdout.trim().slice(0, 80);
          logger.warn(`could not parse a token count from candidate output ${JSON.stringify(preview)}; using 0`);
        }
      }
    }

    return {
      name: opts.name ?? basename(binaryPath),
      encoding: config.encoding,
      inputBytes: Buffer.byteLength(text, 'utf-8'),
      iterations: config.iterations,
      tokens: tokens ?? 0,
      timesNs,
    };
  } catch (err) {
    failure = err;
    throw err;
  } finally {
    try {
      rmSync(workDir, { recursive: true, force: true });
    } catch (cleanupErr) {
      // Never replace the failure already in flight.
      if (failure === undefined) throw cleanupErr;
      const reason = cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr);
      logger.warn(`could not remove temp directory ${workDir}: ${reason}`);
    }
  }
}
