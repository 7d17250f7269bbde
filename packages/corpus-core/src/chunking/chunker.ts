/**
 * FILE PURPOSE: Sentence-aware chunker under a length budget
 *
 * WHY: Model inputs have a hard token limit. Cutting on sentence ends keeps
 *      chunks readable; cutting on words is the fallback for a single
 *      sentence that alone exceeds the limit.
 * HOW: Greedy accumulation. Every candidate chunk is measured as a whole, so
 *      the tokenizer (not a character estimate) decides admission. Word
 *      fallback sums per-word lengths and then re-measures each sub-chunk,
 *      shrinking it when the joined text tokenizes longer than the sum.
 *
 * EDGE CASES:
 * - Empty content → no chunks
 * - A sentence between the content budget and maxTokens is emitted alone
 * - A single word over budget is cut by characters (only case that loses the word boundary)
 * - Overlap seed is dropped when seed + sentence would not fit
 */

import type { ChunkRecord, SectionRecord } from '@statute-corpus/shared-types';
import { ChunkerConfigError } from '../errors.js';
import type { Tokenizer } from '../tokenizer/index.js';
import { createMeasure, guardMeasure } from './measure.js';
import type { BudgetUnit, Measure, MeasureFailure } from './measure.js';
import { splitIntoSentences, splitIntoWords, trailingWords } from './sentences.js';

export interface ChunkOptions {
  /** Hard limit per emitted chunk, in `budgetUnit`. */
  maxTokens: number;
  budgetUnit?: BudgetUnit;
  tokenizer?: Tokenizer;
  /** Headroom kept for framing tokens. Defaults to 2 for tokens, 0 otherwise. */
  reserve?: number;
  /** Words of the previous chunk carried into the next one on overflow. 0 = off. */
  overlapWords?: number;
  /** Cap on the overlap as a share of the content budget. */
  maxOverlapRatio?: number;
}

export interface ChunkDiagnostics {
  sentences: number;
  /** Sentences that went through the word-level fallback. */
  oversizedSentences: number;
  overlapSeeds: number;
  measureFailures: MeasureFailure[];
}

export interface ChunkResult {
  chunks: string[];
  diagnostics: ChunkDiagnostics;
}

const DEFAULT_TOKEN_RESERVE = 2;
const MAX_OVERLAP_WORDS = 50;
const DEFAULT_OVERLAP_RATIO = 0.25;

export function contentBudget(options: ChunkOptions): number {
  const unit = options.budgetUnit ?? 'tokens';
  const reserve = options.reserve ?? (unit === 'tokens' ? DEFAULT_TOKEN_RESERVE : 0);
  return options.maxTokens - reserve;
}

export function effectiveOverlapWords(options: ChunkOptions): number {
  const requested = options.overlapWords ?? 0;
  if (requested <= 0) return 0;
  const ratio = options.maxOverlapRatio ?? DEFAULT_OVERLAP_RATIO;
  return Math.max(0, Math.min(requested, MAX_OVERLAP_WORDS, Math.floor(contentBudget(options) * ratio)));
}

function validate(options: ChunkOptions): void {
  if (!Number.isFinite(options.maxTokens) || options.maxTokens < 1) {
    throw new ChunkerConfigError(`maxTokens must be a positive number, got ${options.maxTokens}`);
  }
  if (contentBudget(options) < 1) {
    throw new ChunkerConfigError(`reserve leaves no room for content (maxTokens=${options.maxTokens})`);
  }
}

/** Cut one word into pieces that each fit the budget. */
export function splitWordByCharacters(word: string, budget: number, measure: Measure): string[] {
  const pieces: string[] = [];
  let piece = '';
  for (const ch of word) {
    if (piece && measure(piece + ch) > budget) {
      pieces.push(piece);
      piece = ch;
    } else {
      piece += ch;
    }
  }
  if (piece) pieces.push(piece);
  return pieces;
}

/** Word-level split of a sentence that does not fit on its own. */
export function splitOversizedSentence(sentence: string, budget: number, measure: Measure): string[] {
  const words = splitIntoWords(sentence);
  const parts: string[] = [];
  let start = 0;

  while (start < words.length) {
    const first = words[start] ?? '';
    const firstLength = measure(first);
    if (firstLength > budget) {
      parts.push(...splitWordByCharacters(first, budget, measure));
      start++;
      continue;
    }

    let end = start + 1;
    let running = firstLength;
    while (end < words.length) {
      const length = measure(words[end] ?? '');
      if (running + length > budget) break;
      running += length;
      end++;
    }
    // Per-word sums are an estimate; the joined text is the ground truth.
    while (end - start > 1 && measure(words.slice(start, end).join(' ')) > budget) {
      end--;
    }

    parts.push(words.slice(start, end).join(' '));
    start = end;
  }
  return parts;
}

/**
 * Split content into chunks, keeping sentence boundaries where possible.
 *
 * EXAMPLE:
 * ```typescript
 * chunkTextDetailed('One two. Three four. Five six.', {
 *   maxTokens: 4, budgetUnit: 'words',
 * }).chunks;
 * // ['One two. Three four.', 'Five six.']
 * ```
 */
export function chunkTextDetailed(content: string, options: ChunkOptions): ChunkResult {
  validate(options);
  const { measure, failures } = guardMeasure(createMeasure(options.budgetUnit ?? 'tokens', options.tokenizer));
  const budget = contentBudget(options);
  const overlap = effectiveOverlapWords(options);

  const sentences = splitIntoSentences(content);
  const chunks: string[] = [];
  const diagnostics: ChunkDiagnostics = {
    sentences: sentences.length,
    oversizedSentences: 0,
    overlapSeeds: 0,
    measureFailures: failures,
  };

  let current = '';
  const flush = (): void => {
    const trimmed = current.trim();
    if (trimmed) chunks.push(trimmed);
    current = '';
  };

  for (const sentence of sentences) {
    if (measure(sentence) > options.maxTokens) {
      flush();
      diagnostics.oversizedSentences++;
      chunks.push(...splitOversizedSentence(sentence, budget, measure));
      continue;
    }

    const candidate = current ? `${current} ${sentence}` : sentence;
    if (measure(candidate) <= budget) {
      current = candidate;
      continue;
    }

    const flushed = current.trim();
    flush();
    current = sentence;

    if (overlap > 0 && flushed) {
      const seed = trailingWords(flushed, overlap);
      const seeded = `${seed} ${sentence}`;
      if (seed && measure(seeded) <= budget) {
        current = seeded;
        diagnostics.overlapSeeds++;
      }
    }
  }
  flush();

  return { chunks, diagnostics };
}

export function chunkText(content: string, options: ChunkOptions): string[] {
  return chunkTextDetailed(content, options).chunks;
}

/** Chunk one section into numbered chunk records. */
export function chunkSection(section: SectionRecord, options: ChunkOptions): ChunkRecord[] {
  return chunkText(section.content, options).map((content, i) => ({
    section_number: section.section_number,
    chunk_number: i + 1,
    content,
    statute: section.statute,
  }));
}
