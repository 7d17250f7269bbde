/**
 * FILE PURPOSE: Tokenizer seam for budget measurement
 *
 * WHY: The chunker only needs `tokenize(text).length`. Anything that can
 *      produce a token sequence plugs in here; js-tiktoken is the default
 *      because its BPE ranks ship inside the package.
 */

import { getEncoding } from 'js-tiktoken';
import type { TiktokenEncoding } from 'js-tiktoken';

export interface Tokenizer {
  tokenize(text: string): readonly unknown[];
}

export function countTokens(tokenizer: Tokenizer, text: string): number {
  return tokenizer.tokenize(text).length;
}

/** Whitespace-delimited words as tokens. Deterministic; used for word budgets and tests. */
export const whitespaceTokenizer: Tokenizer = {
  tokenize(text) {
    return text.split(/\s+/).filter(Boolean);
  },
};

export const DEFAULT_ENCODING: TiktokenEncoding = 'cl100k_base';

const SUPPORTED_ENCODINGS: readonly TiktokenEncoding[] = ['gpt2', 'r50k_base', 'p50k_base', 'p50k_edit', 'cl100k_base', 'o200k_base'];

export function isTiktokenEncoding(name: string): name is TiktokenEncoding {
  return SUPPORTED_ENCODINGS.some((encoding) => encoding === name);
}

/**
 * BPE tokenizer backed by js-tiktoken.
 *
 * EXAMPLE:
 * ```typescript
 * const tokenizer = createTiktokenTokenizer();
 * countTokens(tokenizer, 'Short title.'); // small positive integer
 * ```
 */
export function createTiktokenTokenizer(encoding: TiktokenEncoding = DEFAULT_ENCODING): Tokenizer {
  const enc = getEncoding(encoding);
  return {
    tokenize(text) {
      return enc.encode(text);
    },
  };
}
