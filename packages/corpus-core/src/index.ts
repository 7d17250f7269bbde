/**
 * FILE PURPOSE: Barrel export for the statute corpus core
 *
 * WHY: Single import point for normalization, segmentation, chunking,
 *      source readers and the queue pipeline.
 *      Import: `import { normalize, segment, chunkText } from '@statute-corpus/corpus-core'`
 */

export { SourceReadError, TokenizerError, ChunkerConfigError, describeError } from './errors.js';

// ─── Normalization ──────────────────────────────────────────────────────────
export * from './normalize/index.js';

// ─── Segmentation ───────────────────────────────────────────────────────────
export * from './segmentation/index.js';

// ─── Tokenizers + chunking ──────────────────────────────────────────────────
export {
  countTokens,
  createTiktokenTokenizer,
  isTiktokenEncoding,
  whitespaceTokenizer,
  DEFAULT_ENCODING,
} from './tokenizer/index.js';
export type { Tokenizer } from './tokenizer/index.js';
export * from './chunking/index.js';

// ─── Glossaries + judgments ─────────────────────────────────────────────────
export * from './extraction/index.js';

// ─── Sources ────────────────────────────────────────────────────────────────
export * from './sources/index.js';

// ─── Pipeline (per-document processing + BullMQ) ────────────────────────────
export * from './pipeline/index.js';
