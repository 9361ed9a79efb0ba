import tiktoken from 'tiktoken';
import type { Encoding } from './types.js';

export interface Encoder {
  encode(text: string): ArrayLike<number>;
  /** Releases native memory held by the encoder, if any. */
  free?(): void;
}

/** The in-process tokenizer the candidate is measured against. */
export interface ReferenceTokenizer {
  name: string;
  getEncoder(encoding: Encoding): Encoder;
}

export const tiktokenReference: ReferenceTokenizer = {
  name: 'tiktoken',
  getEncoder(encoding) {
    const enc = tiktoken.get_encoding(encoding);
    return {
      encode: (text) => enc.encode(text),
      free: () => enc.free(),
    };
  },
};
