import goldenCases from '../data/golden-cases.json' with { type: 'json' };
import { silentLogger, type Logger } from './log.js';
import type { Encoder, ReferenceTokenizer } from './reference.js';
import type { Encoding } from './types.js';

export type GoldenCases = Record<string, string[]>;

export const DEFAULT_GOLDEN_CASES: GoldenCases = goldenCases;

export interface GoldenRecord {
  id: number;
  category: string;
  encoding: Encoding;
  text: string;
  tokens: number[];
  count: number;
}

/**
 * Encode every case with the reference tokenizer, once per encoding.
 * An encoding whose encoder cannot be created is skipped with a warning.
 */
export function buildGoldenRecords(
  cases: GoldenCases,
  encodings: readonly Encoding[],
  tokenizer: ReferenceTokenizer,
  logger: Logger = silentLogger,
): GoldenRecord[] {
  const records: GoldenRecord[] = [];
  let id = 0;

  for (const encoding of encodings) {
    let encoder: Encoder;
    try {
      encoder = tokenizer.getEncoder(encoding);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn(`encoding ${encoding} unavailable in ${tokenizer.name}, skipping (${reason})`);
      continue;
    }

    try {
      for (const [category, texts] of Object.entries(cases)) {
        for (const text of texts) {
          const tokens = Array.from(encoder.encode(text));
          records.push({ id: id++, category, encoding, text, tokens, count: tokens.length });
        }
      }
    } finally {
      encoder.free?.();
    }
  }

  return records;
}

export function toJsonLines(records: GoldenRecord[]): string {
  return records.map(r => JSON.stringify(r)).join('\n');
}
