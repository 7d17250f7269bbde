/**
 * FILE PURPOSE: Named chunker configurations for the two call sites
 * WHY: Section chunking feeds an encoder with a 512-token window and wants no
 *      duplicated text; general-corpus chunking is character-bounded and
 *      carries an overlap for context continuity.
 */

import type { ChunkOptions } from './chunker.js';

export type ChunkPresetName = 'section' | 'corpus';

/** 512-token encoder window minus the two framing tokens. */
export const SECTION_CHUNKING: Readonly<Omit<ChunkOptions, 'tokenizer'>> = {
  maxTokens: 510,
  budgetUnit: 'tokens',
  reserve: 2,
  overlapWords: 0,
};

export const CORPUS_CHUNKING: Readonly<Omit<ChunkOptions, 'tokenizer'>> = {
  maxTokens: 1000,
  budgetUnit: 'characters',
  reserve: 0,
  overlapWords: 30,
};

export const CHUNK_PRESETS: Record<ChunkPresetName, Readonly<Omit<ChunkOptions, 'tokenizer'>>> = {
  section: SECTION_CHUNKING,
  corpus: CORPUS_CHUNKING,
};
