/**
 * FILE PURPOSE: Serializable per-document settings and their resolution into ProcessOptions
 *
 * WHY: Settings travel through the queue as JSON and come from profile files,
 *      so they hold names (encoding, merge policy) instead of objects and are
 *      validated with zod before use.
 */

import { z } from 'zod';
import { SECTION_CHUNKING } from '../chunking/index.js';
import type { ChunkOptions } from '../chunking/index.js';
import { selectMergePolicy } from '../segmentation/index.js';
import { DEFAULT_ENCODING, createTiktokenTokenizer, isTiktokenEncoding, whitespaceTokenizer } from '../tokenizer/index.js';
import type { Tokenizer } from '../tokenizer/index.js';
import { ChunkerConfigError } from '../errors.js';
import type { ProcessOptions } from './process-document.js';

export const noisePatternSchema = z.object({
  name: z.string().min(1),
  pattern: z.string().min(1),
  flags: z.string().optional(),
  replacement: z.string().optional(),
});

export const documentSettingsSchema = z.object({
  statute: z.string().min(1).optional(),
  maxTokens: z.number().int().positive().default(SECTION_CHUNKING.maxTokens),
  budgetUnit: z.enum(['tokens', 'characters', 'words']).default('tokens'),
  encoding: z.string().default(DEFAULT_ENCODING),
  reserve: z.number().int().nonnegative().optional(),
  overlapWords: z.number().int().nonnegative().default(0),
  markerDigits: z.number().int().positive().optional(),
  maxSectionNumber: z.number().int().positive().optional(),
  mergePolicy: z.enum(['monotonic', 'consecutive']).default('monotonic'),
  noisePatterns: z.array(noisePatternSchema).default([]),
});

/** Settings as written by callers (defaults optional). */
export type DocumentSettings = z.input<typeof documentSettingsSchema>;
export type ResolvedDocumentSettings = z.output<typeof documentSettingsSchema>;

// One BPE table per encoding per process; getEncoding parses the ranks on every call.
const tokenizerCache = new Map<string, Tokenizer>();

export function tokenizerFor(encoding: string): Tokenizer {
  if (encoding === 'whitespace') return whitespaceTokenizer;
  if (!isTiktokenEncoding(encoding)) {
    throw new ChunkerConfigError(`Unknown tokenizer encoding "${encoding}"`);
  }
  let tokenizer = tokenizerCache.get(encoding);
  if (!tokenizer) {
    tokenizer = createTiktokenTokenizer(encoding);
    tokenizerCache.set(encoding, tokenizer);
  }
  return tokenizer;
}

export function resolveProcessOptions(settings: DocumentSettings = {}): ProcessOptions {
  const resolved = documentSettingsSchema.parse(settings);

  const chunk: ChunkOptions = {
    maxTokens: resolved.maxTokens,
    budgetUnit: resolved.budgetUnit,
    overlapWords: resolved.overlapWords,
    reserve: resolved.reserve,
    tokenizer: resolved.budgetUnit === 'tokens' ? tokenizerFor(resolved.encoding) : undefined,
  };

  return {
    statute: resolved.statute,
    normalize: { noisePatterns: resolved.noisePatterns },
    segment: {
      markerDigits: resolved.markerDigits,
      maxSectionNumber: resolved.maxSectionNumber,
      mergePolicy: selectMergePolicy(resolved.mergePolicy),
    },
    chunk,
  };
}
