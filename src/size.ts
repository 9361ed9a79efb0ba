import { constants } from 'node:buffer';
import { UsageError } from './errors.js';

const MULTIPLIERS: Array<[suffix: string, bytes: number]> = [
  ['GB', 1024 * 1024 * 1024],
  ['MB', 1024 * 1024],
  ['KB', 1024],
  ['B', 1],
];

/** Parse "1KB", "10MB", "1.5kb" or a bare byte count. */
export function parseSize(input: string): number {
  const normalized = input.trim().toUpperCase();
  let numeric = normalized;
  let multiplier = 1;

  for (const [suffix, bytes] of MULTIPLIERS) {
    if (normalized.endsWith(suffix)) {
      numeric = normalized.slice(0, -suffix.length).trim();
      multiplier = bytes;
      break;
    }
  }

  if (!/^\d+(\.\d+)?$|^\.\d+$/.test(numeric)) {
    throw new UsageError(`Invalid size: "${input}". Expected e.g. 512B, 10KB, 1MB`);
  }

  const bytes = Math.trunc(Number(numeric) * multiplier);
  // The corpus is held as one string.
  if (bytes > constants.MAX_STRING_LENGTH) {
    throw new UsageError(
      `Size "${input}" exceeds the largest supported corpus (${constants.MAX_STRING_LENGTH} bytes)`
    );
  }
  return bytes;
}
