#!/usr/bin/env node
import { program } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { isDisplayableError } from '../src/errors.js';

import { register as registerBench } from '../src/commands/bench.js';
import { register as registerCorpus } from '../src/commands/corpus.js';
import { register as registerGolden } from '../src/commands/golden.js';
import { register as registerConfig } from '../src/commands/config.js';

function loadCliVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // Source runs from bin/, the build from dist/bin/.
  for (const candidate of [join(here, '..', 'package.json'), join(here, '..', '..', 'package.json')]) {
    try {
      const packageJson: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
        && typeof packageJson.version === 'string' && packageJson.version.length > 0) {
        return packageJson.version;
      }
    } catch {
      // Try the next location.
    }
  }
  return '0.1.0';
}

// Global error handler
function handleError(err: unknown): never {
  const jsonMode = Boolean(program.opts().json);

  if (isDisplayableError(err)) {
    if (jsonMode) {
      console.error(JSON.stringify({ error: true, type: err.name, message: err.message }));
    } else {
      console.error(err.display());
      if (process.env.TOKBENCH_DEBUG || program.opts().debug) {
        console.error(err.stack);
      }
    }
    process.exit(err.exitCode);
  }
  if (err instanceof Error) {
    if (jsonMode) {
      console.error(JSON.stringify({ error: true, type: 'unknown_error', message: err.message }));
    } else {
      console.error(chalk.red(`Error: ${err.message}`));
      if (process.env.TOKBENCH_DEBUG || program.opts().debug) {
        console.error(err.stack);
      }
    }
  } else {
    if (jsonMode) {
      console.error(JSON.stringify({ error: true, type: 'unknown_error', message: 'An unexpected error occurred' }));
    } else {
      console.error(chalk.red('An unexpected error occurred'));
    }
  }
  process.exit(1);
}

// Setup program
program
  .name('tokbench')
  .version(loadCliVersion())
  .description('Benchmark a candidate tokenizer binary against an in-process reference, with token-count parity checks.')
  .option('--json', 'Output JSON instead of a table')
  .option('-q, --quiet', 'Suppress progress messages on stderr')
  .option('--no-color', 'Disable colors')
  .option('--debug', 'Print candidate invocations and stack traces to stderr');

if (process.argv.includes('--no-color')) {
  process.env.NO_COLOR = '1';
  chalk.level = 0;
}

registerBench(program);
registerCorpus(program);
registerGolden(program);
registerConfig(program);

// Parse and run
program.parseAsync(process.argv).catch(handleError);

process.on('uncaughtException', handleError);
process.on('unhandledRejection', handleError);
