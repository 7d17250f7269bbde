/**
 * FILE PURPOSE: Run one source document through normalize → segment → chunk
 *
 * WHY: The same sequence backs the sequential CLI run and the queue worker,
 *      so it lives here without any I/O. Callers decide how to persist and log.
 * HOW: Branches on the source kind: raw text is normalized first, cleaned
 *      text starts at segmentation, section files start at chunking.
 */

import type { ChunkRecord, DocumentStats, SectionRecord } from '@statute-corpus/shared-types';
import { normalize } from '../normalize/index.js';
import type { NormalizeOptions } from '../normalize/index.js';
import { segmentWithReport } from '../segmentation/index.js';
import type { SegmentOptions, SegmentationReport } from '../segmentation/index.js';
import { chunkTextDetailed, createMeasure, guardMeasure, measureChunkStats } from '../chunking/index.js';
import type { ChunkOptions } from '../chunking/index.js';
import { TokenizerError } from '../errors.js';
import { computeContentHash } from '../sources/index.js';
import type { SourceDocument, SourceKind } from '../sources/index.js';

export interface ProcessOptions {
  /** Statute name for the records; defaults to the source file name. */
  statute?: string;
  normalize?: NormalizeOptions;
  segment?: SegmentOptions;
  chunk: ChunkOptions;
}

/** A tokenizer failure during chunking, kept for the audit log. */
export interface ChunkingIssue {
  section_number: string;
  error: TokenizerError;
}

export interface DocumentResult {
  name: string;
  kind: SourceKind;
  statute: string;
  /** Normalized text; null when the source was already a section file. */
  cleanedText: string | null;
  contentHash: string;
  sections: SectionRecord[];
  chunks: ChunkRecord[];
  /** Null when segmentation was skipped. */
  report: SegmentationReport | null;
  issues: ChunkingIssue[];
  stats: DocumentStats;
}

function chunkSections(sections: SectionRecord[], options: ChunkOptions): { chunks: ChunkRecord[]; issues: ChunkingIssue[] } {
  const chunks: ChunkRecord[] = [];
  const issues: ChunkingIssue[] = [];

  for (const section of sections) {
    const { chunks: pieces, diagnostics } = chunkTextDetailed(section.content, options);
    pieces.forEach((content, i) => {
      chunks.push({
        section_number: section.section_number,
        chunk_number: i + 1,
        content,
        statute: section.statute,
      });
    });
    for (const failure of diagnostics.measureFailures) {
      issues.push({
        section_number: section.section_number,
        error: new TokenizerError(failure.sample, { cause: failure.error }),
      });
    }
  }
  return { chunks, issues };
}

export function processDocument(source: SourceDocument, options: ProcessOptions): DocumentResult {
  let statute = options.statute ?? source.name;
  let cleanedText: string | null = null;
  let sections: SectionRecord[];
  let report: SegmentationReport | null = null;

  if (source.kind === 'sections') {
    sections = source.sections;
    statute = options.statute ?? sections[0]?.statute ?? source.name;
  } else {
    cleanedText = source.kind === 'raw-text' ? normalize(source.text, options.normalize) : source.text.trim();
    const segmented = segmentWithReport(cleanedText, statute, options.segment);
    sections = segmented.sections;
    report = segmented.report;
  }

  const { chunks, issues } = chunkSections(sections, options.chunk);
  const { measure } = guardMeasure(createMeasure(options.chunk.budgetUnit ?? 'tokens', options.chunk.tokenizer));
  const lengths = measureChunkStats(chunks.map((c) => c.content), measure, options.chunk.maxTokens);

  return {
    name: source.name,
    kind: source.kind,
    statute,
    cleanedText,
    contentHash: computeContentHash(cleanedText ?? JSON.stringify(sections)),
    sections,
    chunks,
    report,
    issues,
    stats: {
      statute,
      chapters: report?.chapters ?? new Set(sections.map((s) => s.chapter ?? '')).size,
      sections: sections.length,
      chunks: chunks.length,
      mergedFragments: report?.merged.length ?? 0,
      discardedMarkers: report?.discarded.length ?? 0,
      emptyChapters: report?.emptyChapters.length ?? 0,
      measureFailures: issues.length,
      lengths,
    },
  };
}
