import { Command } from 'commander';
import chalk from 'chalk';
import {
  getConfigPath,
  getConfiguredCandidateBinary,
  resolveCandidateBinary,
  setCandidateBinary,
} from '../config.js';
import { UsageError } from '../errors.js';

const SUPPORTED_KEYS = 'candidate-binary';

export function register(program: Command): void {
  const cmd = program
    .command('config')
    .description('Manage CLI configuration');

  cmd
    .command('set <key> <value>')
    .description('Set a config value (e.g., tokbench config set candidate-binary ./build/bin/tokenizer)')
    .action((key: string, value: string) => {
      if (key !== 'candidate-binary') {
        throw new UsageError(`Unknown config key: ${key}. Supported: ${SUPPORTED_KEYS}`);
      }
      setCandidateBinary(value);
      console.error(chalk.green(`Candidate binary saved to ${getConfigPath()}`));
    });

  cmd
    .command('get <key>')
    .description('Get a config value (e.g., tokbench config get candidate-binary)')
    .action((key: string) => {
      if (key !== 'candidate-binary') {
        throw new UsageError(`Unknown config key: ${key}. Supported: ${SUPPORTED_KEYS}`);
      }
      console.log(resolveCandidateBinary());
      if (!getConfiguredCandidateBinary() && !process.env.TOKBENCH_CANDIDATE_BIN) {
        console.error(chalk.dim('(default; not configured)'));
      }
    });

  cmd
    .command('path')
    .description('Print config file location')
    .action(() => {
      console.log(getConfigPath());
    });
}
