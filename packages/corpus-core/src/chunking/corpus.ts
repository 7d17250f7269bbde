/**
 * FILE PURPOSE: Paragraph-level chunking for general legal corpora
 *
 * WHY: Not every input is a cleanly numbered statute. For commentaries,
 *      glossaries and mixed dumps the unit is the paragraph, labelled with the
 *      most recent chapter/section heading seen, and long paragraphs go
 *      through the sentence-aware chunker with overlap on.
 * HOW: Tables extracted as `[TABLE] … [/TABLE]` stay whole. Fragments of
 *      `minWords` words or fewer are dropped as headings and page debris.
 */

import type { CorpusRecord } from '@statute-corpus/shared-types';
import { chunkText } from './chunker.js';
import type { ChunkOptions } from './chunker.js';
import { createMeasure, guardMeasure } from './measure.js';
import { CORPUS_CHUNKING } from './presets.js';
import { splitIntoWords } from './sentences.js';

export interface CorpusChunkOptions {
  /** Overrides applied on top of CORPUS_CHUNKING. */
  chunk?: Partial<ChunkOptions>;
  minWords?: number;
  /** First record id; lets callers number records across several sources. */
  startId?: number;
}

const DEFAULT_MIN_WORDS = 20;
const UNKNOWN_LABEL = 'Unknown';

const CHAPTER_LABEL_RE = /\b(?:CHAPTER|Chapter|CHP)\s+([IVXLCDM]+|\d+)\b/g;
const SECTION_LABEL_RE = /\b(?:Section|SECTION|Sec\.|SEC\.|Clause|CLAUSE)\s+(\d+[A-Z]?(?:\(\d+\))*(?:\([a-z]\))?)/g;

function lastLabel(text: string, re: RegExp): string | undefined {
  let label: string | undefined;
  for (const match of text.matchAll(re)) {
    label = match[1];
  }
  return label;
}

function cleanParagraph(paragraph: string): string {
  return paragraph.replace(/[^\x00-\x7F]+/g, ' ').replace(/\s+/g, ' ').trim();
}

export function splitParagraphs(text: string): string[] {
  return text
    .replace(/\r\n?/g, '\n')
    .split(/\n{2,}/)
    .map((p) => p.trim())
    .filter(Boolean);
}

export function chunkCorpus(text: string, source: string, options: CorpusChunkOptions = {}): CorpusRecord[] {
  const chunkOptions: ChunkOptions = { ...CORPUS_CHUNKING, ...options.chunk };
  // A failing tokenizer reads as over budget and sends the paragraph to the chunker.
  const { measure } = guardMeasure(createMeasure(chunkOptions.budgetUnit ?? 'tokens', chunkOptions.tokenizer));
  const minWords = options.minWords ?? DEFAULT_MIN_WORDS;
  const docType = source.split('_')[0] || source;

  const records: CorpusRecord[] = [];
  let nextId = options.startId ?? 0;
  let chapter = UNKNOWN_LABEL;
  let section = UNKNOWN_LABEL;

  const emit = (piece: string): void => {
    records.push({
      id: nextId++,
      text: piece,
      source,
      doc_type: docType,
      chapter,
      section,
      length: splitIntoWords(piece).length,
    });
  };

  for (const raw of splitParagraphs(text)) {
    const isTable = raw.includes('[TABLE]');
    const paragraph = isTable ? raw : cleanParagraph(raw);

    chapter = lastLabel(paragraph, CHAPTER_LABEL_RE) ?? chapter;
    section = lastLabel(paragraph, SECTION_LABEL_RE) ?? section;

    if (isTable) {
      emit(paragraph);
      continue;
    }

    const pieces = measure(paragraph) > chunkOptions.maxTokens ? chunkText(paragraph, chunkOptions) : [paragraph];
    for (const piece of pieces) {
      if (splitIntoWords(piece).length > minWords) emit(piece);
    }
  }

  return records;
}
