import vocabularyByCategory from '../data/vocabulary.json' with { type: 'json' };
import { createSeededRandom, type RandomSource } from './random.js';

export const DEFAULT_SEED = 42;

export const DEFAULT_VOCABULARY: readonly string[] = Object.values(vocabularyByCategory).flat();

export interface CorpusOptions {
  seed?: number;
  /** Takes precedence over `seed`. */
  random?: RandomSource;
  vocabulary?: readonly string[];
}

function assertAsciiVocabulary(vocabulary: readonly string[]): void {
  if (vocabulary.length === 0) {
    throw new RangeError('Corpus vocabulary must not be empty');
  }
  for (const word of vocabulary) {
    if (word.length === 0 || !/^[\x20-\x7e]+$/.test(word)) {
      throw new RangeError(`Corpus vocabulary word must be printable ASCII: ${JSON.stringify(word)}`);
    }
  }
}

/**
 * Deterministic English-like text of exactly `sizeBytes` UTF-8 bytes.
 * Words are space separated; the last word is cut to fill the budget.
 */
export function generateCorpus(sizeBytes: number, opts: CorpusOptions = {}): string {
  if (!Number.isInteger(sizeBytes) || sizeBytes < 0) {
    throw new RangeError(`Corpus size must be a non-negative integer, got ${sizeBytes}`);
  }

  const vocabulary = opts.vocabulary ?? DEFAULT_VOCABULARY;
  assertAsciiVocabulary(vocabulary);
  const random = opts.random ?? createSeededRandom(opts.seed ?? DEFAULT_SEED);

  // ASCII only, so string length equals byte length.
  const parts: string[] = [];
  let length = 0;

  while (length < sizeBytes) {
    const word = vocabulary[Math.floor(random() * vocabulary.length)];
    const addition = parts.length > 0 ? ` ${word}` : word;
    if (length + addition.length > sizeBytes) {
      parts.push(addition.slice(0, sizeBytes - length));
      break;
    }
    parts.push(addition);
    length += addition.length;
  }

  return parts.join('');
}
