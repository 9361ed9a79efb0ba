import { ReferenceTokenizerError } from '../errors.js';
import { tiktokenReference, type Encoder, type ReferenceTokenizer } from '../reference.js';
import type { BenchmarkResult, RunConfig } from '../types.js';

function encodeOrThrow(encoder: Encoder, text: string, tokenizer: ReferenceTokenizer, config: RunConfig): ArrayLike<number> {
  try {
    return encoder.encode(text);
  } catch (err) {
    throw new ReferenceTokenizerError(tokenizer.name, config.encoding, { cause: err });
  }
}

/**
 * Time the reference tokenizer in-process. Any failure aborts the run;
 * there are no retries.
 */
export function runLibrary(
  text: string,
  config: RunConfig,
  tokenizer: ReferenceTokenizer = tiktokenReference,
): BenchmarkResult {
  let encoder: Encoder;
  try {
    encoder = tokenizer.getEncoder(config.encoding);
  } catch (err) {
    throw new ReferenceTokenizerError(tokenizer.name, config.encoding, { cause: err });
  }

  try {
    for (let i = 0; i < config.warmup; i++) {
      encodeOrThrow(encoder, text, tokenizer, config);
    }

    const timesNs: number[] = [];
    let tokens: number | undefined;

    for (let i = 0; i < config.iterations; i++) {
      const start = process.hrtime.bigint();
      const ids = encodeOrThrow(encoder, text, tokenizer, config);
      const elapsed = process.hrtime.bigint() - start;
      timesNs.push(Number(elapsed));
      if (tokens === undefined) tokens = ids.length;
    }

    return {
      name: tokenizer.name,
      encoding: config.encoding,
      inputBytes: Buffer.byteLength(text, 'utf-8'),
      iterations: config.iterations,
      tokens: tokens ?? 0,
      timesNs,
    };
  } finally {
    encoder.free?.();
  }
}
