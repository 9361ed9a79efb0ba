import assert from 'node:assert/strict';
import { mkdtempSync, readdirSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { after, afterEach, before, test } from 'node:test';
import chalk from 'chalk';
import { register as registerBench } from '../src/commands/bench.js';
import { generateCorpus } from '../src/corpus.js';
import { UsageError } from '../src/errors.js';
import type { JsonReport } from '../src/report.js';
import { createProgram, createWordTokenizer, runCli, writeScript } from './cli-test-helpers.js';

chalk.level = 0;

let workDir: string;
let scratch: string;

before(() => {
  workDir = mkdtempSync(join(tmpdir(), 'tokbench-bench-'));
  scratch = mkdtempSync(join(workDir, 'scratch-'));
});

after(() => {
  rmSync(workDir, { recursive: true, force: true });
});

afterEach(() => {
  process.exitCode = undefined;
});

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

function setup() {
  const tokenizer = createWordTokenizer('reference');
  const program = createProgram([(p) => registerBench(p, { tokenizer, tempDir: scratch })]);
  return { tokenizer, program };
}

test('bench --json reports only the reference when the candidate is missing', async () => {
  const { tokenizer, program } = setup();
  const missing = join(workDir, 'missing-binary');

  const output = await runCli(program, [
    '--json', 'bench', '--size', '64B', '--iterations', '3', '--warmup', '1', '--candidate', missing,
  ]);

  assert.equal(output.stdout.length, 1);
  const report: JsonReport = JSON.parse(output.stdout[0]);
  assert.deepEqual(report.meta, { input_size: '64B', input_bytes: 64, encoding: 'o200k_base', iterations: 3 });
  assert.equal(report.results.length, 1);
  assert.equal(report.results[0].name, 'reference');
  assert.equal(report.results[0].input_bytes, 64);
  assert.equal(report.results[0].tokens, wordCount(generateCorpus(64)));
  assert.equal(tokenizer.encodeCalls, 4);
  assert.ok(output.stderr.includes(`Warning: candidate binary not found at ${missing}`));
  assert.ok(output.stderr.includes('    Skipped (binary not found)'));
});

test('bench compares a candidate that agrees on token counts', async () => {
  const { program } = setup();
  const candidate = writeScript(workDir, 'word-counter', 'wc -w < "$2"');

  const output = await runCli(program, [
    'bench', '--size', '2KB', '--iterations', '2', '--warmup', '0', '--encoding', 'cl100k_base',
    '--seed', '9', '--candidate', candidate, '--candidate-name', 'words',
  ]);

  const printed = output.stdout.join('\n');
  assert.ok(printed.includes('── Comparison Summary ──'));
  const expected = wordCount(generateCorpus(2048, { seed: 9 })).toLocaleString('en-US');
  assert.ok(printed.includes(`  ✓ Token count matches: ${expected}`));
  assert.equal(process.exitCode, undefined);
  assert.deepEqual(readdirSync(scratch), []);
});

test('bench --fail-on-mismatch sets a failing exit code after reporting', async () => {
  const { program } = setup();
  const candidate = writeScript(workDir, 'always-one', 'echo 1');

  const output = await runCli(program, [
    '--json', 'bench', '--size', '1KB', '--iterations', '1', '--warmup', '0',
    '--candidate', candidate, '--fail-on-mismatch',
  ]);

  const report: JsonReport = JSON.parse(output.stdout[0]);
  assert.equal(report.results.length, 2);
  assert.equal(report.results[1].name, 'always-one');
  assert.equal(report.results[1].tokens, 1);
  assert.equal(process.exitCode, 1);
});

test('bench writes the report to --output', async () => {
  const { program } = setup();
  const destination = join(workDir, 'report.json');

  const output = await runCli(program, [
    '--json', 'bench', '--size', '100', '--iterations', '2', '--warmup', '0',
    '--candidate', join(workDir, 'nope'), '--output', destination,
  ]);

  assert.deepEqual(output.stdout, []);
  const report: JsonReport = JSON.parse(readFileSync(destination, 'utf-8'));
  assert.equal(report.meta.input_bytes, 100);
  assert.equal(report.results[0].iterations, 2);
  assert.ok(output.stderr.includes(`\nResults written to ${destination}`));
});

test('bench writes an uncoloured table to --output and restores the colour level', async () => {
  const { program } = setup();
  const destination = join(workDir, 'report.txt');
  chalk.level = 1;

  try {
    await runCli(program, [
      'bench', '--size', '100', '--iterations', '1', '--warmup', '0',
      '--candidate', join(workDir, 'nope'), '--output', destination,
    ]);
    assert.equal(chalk.level, 1);
  } finally {
    chalk.level = 0;
  }

  const written = readFileSync(destination, 'utf-8');
  assert.ok(written.includes('Implementation'));
  assert.equal(written.includes('\u001b['), false);
});

test('bench rejects an unparseable size before measuring', async () => {
  const { tokenizer, program } = setup();

  await assert.rejects(
    runCli(program, ['bench', '--size', 'lots', '--candidate', join(workDir, 'nope')]),
    UsageError,
  );
  assert.equal(tokenizer.encodeCalls, 0);
});

test('bench rejects an unsupported encoding before measuring', async () => {
  const { tokenizer, program } = setup();

  await assert.rejects(
    runCli(program, ['bench', '--encoding', 'p50k_base', '--candidate', join(workDir, 'nope')]),
    UsageError,
  );
  assert.equal(tokenizer.encodeCalls, 0);
});

test('bench rejects a size too large to hold in memory before measuring', async () => {
  const { tokenizer, program } = setup();

  await assert.rejects(
    runCli(program, ['bench', '--size', '1GB', '--candidate', join(workDir, 'nope')]),
    UsageError,
  );
  assert.equal(tokenizer.encodeCalls, 0);
});
