import assert from 'node:assert/strict';
import { createHash } from 'node:crypto';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { after, before, test } from 'node:test';
import { register as registerCorpus } from '../src/commands/corpus.js';
import { generateCorpus } from '../src/corpus.js';
import { createProgram, runCli } from './cli-test-helpers.js';

let workDir: string;

before(() => {
  workDir = mkdtempSync(join(tmpdir(), 'tokbench-corpus-'));
});

after(() => {
  rmSync(workDir, { recursive: true, force: true });
});

test('corpus --output writes the deterministic corpus and its digest', async () => {
  const program = createProgram([registerCorpus]);
  const destination = join(workDir, 'corpus.txt');

  const output = await runCli(program, ['corpus', '--size', '100B', '--seed', '3', '--output', destination]);

  const expected = generateCorpus(100, { seed: 3 });
  assert.equal(readFileSync(destination, 'utf-8'), expected);
  assert.deepEqual(output.stderr, [
    `Wrote 100 bytes to ${destination}`,
    `sha256 ${createHash('sha256').update(expected).digest('hex')}`,
  ]);
});

test('corpus --quiet suppresses progress messages', async () => {
  const program = createProgram([registerCorpus]);
  const destination = join(workDir, 'quiet.txt');

  const output = await runCli(program, ['-q', 'corpus', '--size', '1KB', '--output', destination]);

  assert.equal(readFileSync(destination, 'utf-8').length, 1024);
  assert.deepEqual(output.stderr, []);
});
