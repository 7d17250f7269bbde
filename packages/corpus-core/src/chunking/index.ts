/**
 * FILE PURPOSE: Chunking entry points and preset selector
 */

import type { Tokenizer } from '../tokenizer/index.js';
import type { ChunkOptions } from './chunker.js';
import { CHUNK_PRESETS } from './presets.js';
import type { ChunkPresetName } from './presets.js';

export {
  chunkText,
  chunkTextDetailed,
  chunkSection,
  splitOversizedSentence,
  splitWordByCharacters,
  contentBudget,
  effectiveOverlapWords,
} from './chunker.js';
export type { ChunkOptions, ChunkDiagnostics, ChunkResult } from './chunker.js';
export { splitIntoSentences, splitIntoWords, trailingWords } from './sentences.js';
export { createMeasure, guardMeasure } from './measure.js';
export type { BudgetUnit, Measure, MeasureFailure, SafeMeasure } from './measure.js';
export { measureChunkStats, mergeLengthStats, EMPTY_LENGTH_STATS } from './stats.js';
export { chunkCorpus, splitParagraphs } from './corpus.js';
export type { CorpusChunkOptions } from './corpus.js';
export { SECTION_CHUNKING, CORPUS_CHUNKING, CHUNK_PRESETS } from './presets.js';
export type { ChunkPresetName } from './presets.js';

/** Resolve a preset into full chunk options, applying caller overrides last. */
export function selectChunkOptions(
  preset: ChunkPresetName,
  tokenizer?: Tokenizer,
  overrides: Partial<ChunkOptions> = {},
): ChunkOptions {
  return { ...CHUNK_PRESETS[preset], tokenizer, ...overrides };
}
