import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import * as dotenv from 'dotenv';
import { UsageError } from './errors.js';
import { ENCODINGS, type Encoding } from './types.js';

dotenv.config();

export const DEFAULT_CANDIDATE_BINARY = './build/bin/tokenizer';
export const DEFAULT_SIZE = '1MB';
export const DEFAULT_ITERATIONS = 100;
export const DEFAULT_WARMUP = 10;
export const DEFAULT_ENCODING: Encoding = 'o200k_base';

interface Config {
  candidateBinary?: string;
}

function configDir(): string {
  return process.env.TOKBENCH_CONFIG_DIR || join(homedir(), '.config', 'tokbench');
}

export function getConfigPath(): string {
  return join(configDir(), 'config.json');
}

function loadConfig(): Config {
  const file = getConfigPath();
  if (!existsSync(file)) return {};
  try {
    const parsed: unknown = JSON.parse(readFileSync(file, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'candidateBinary' in parsed
      && typeof parsed.candidateBinary === 'string') {
      return { candidateBinary: parsed.candidateBinary };
    }
    return {};
  } catch {
    // Unreadable config behaves like no config.
    return {};
  }
}

function saveConfig(config: Config): void {
  mkdirSync(configDir(), { recursive: true });
  writeFileSync(getConfigPath(), JSON.stringify(config, null, 2));
}

/**
 * Resolution order:
 * 1. --candidate flag
 * 2. TOKBENCH_CANDIDATE_BIN environment variable
 * 3. Config file
 * 4. DEFAULT_CANDIDATE_BINARY
 */
export function resolveCandidateBinary(flagValue?: string): string {
  return flagValue
    || process.env.TOKBENCH_CANDIDATE_BIN
    || loadConfig().candidateBinary
    || DEFAULT_CANDIDATE_BINARY;
}

export function setCandidateBinary(path: string): void {
  const config = loadConfig();
  config.candidateBinary = path;
  saveConfig(config);
}

export function getConfiguredCandidateBinary(): string | undefined {
  return loadConfig().candidateBinary;
}

function parseInteger(value: string, flag: string, minimum: number): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) < minimum) {
    const expected = minimum > 0 ? 'a positive integer' : 'a non-negative integer';
    throw new UsageError(`${flag} must be ${expected}, got "${value}"`);
  }
  return Number(trimmed);
}

export function parseIterations(value: string): number {
  return parseInteger(value, '--iterations', 1);
}

export function parseWarmup(value: string): number {
  return parseInteger(value, '--warmup', 0);
}

export function parseSeed(value: string): number {
  return parseInteger(value, '--seed', 0);
}

export function isEncoding(value: string): value is Encoding {
  return ENCODINGS.some(encoding => encoding === value);
}

export function parseEncoding(value: string): Encoding {
  if (!isEncoding(value)) {
    throw new UsageError(`Unsupported encoding "${value}". Supported: ${ENCODINGS.join(', ')}`);
  }
  return value;
}
