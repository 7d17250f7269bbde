/**
 * FILE PURPOSE: Persisted record shapes shared across the monorepo
 *
 * WHY: The segmenter, the chunker and the pipeline driver all read and write
 *      the same section/chunk files. Field names are snake_case because they
 *      are the on-disk JSON format.
 */

/** Chapter label used when a document has no chapter marker at all. */
export const ENTIRE_DOCUMENT = 'Entire Document';

/** Chapter label for non-empty text that precedes the first chapter marker. */
export const PRELIMINARY = 'Preliminary';

/** One numbered provision of a statute; maps to an entry of `<name>_sections.json`. */
export interface SectionRecord {
  section_number: string;
  content: string;
  chapter?: string;
  statute: string;
}

/** A budget-bounded slice of one section; maps to an entry of `<name>_chunks.json`. */
export interface ChunkRecord {
  section_number: string;
  /** 1-based, in emission order within the section. */
  chunk_number: number;
  content: string;
  statute: string;
}

/** A paragraph-level record from the general-corpus chunker. */
export interface CorpusRecord {
  id: number;
  text: string;
  source: string;
  doc_type: string;
  chapter: string;
  section: string;
  /** Word count of `text`. */
  length: number;
}

/** One term of a glossary document; one line of `glossary.jsonl`. */
export interface GlossaryEntry {
  term: string;
  definition: string;
}

/** A sentence of a judgment that names one of the statutes. */
export interface StatuteMention {
  /** Statute id, e.g. "BNS". */
  statute: string;
  /** Section reference as written ("302", "221, 132 and 351(3)"); empty when none is given. */
  section: string;
  context: string;
}

/** A judgment that mentions at least one statute; one entry of `cases.json`. */
export interface CaseRecord {
  case_id: string;
  case_title: string;
  /** As written in the judgment; empty when no date was found. */
  judgment_date: string;
  court: string;
  source: string;
  statute_mentions: StatuteMention[];
}

/** Post-hoc length distribution over emitted chunks. */
export interface LengthStats {
  count: number;
  max: number;
  min: number;
  average: number;
  overLimit: number;
}

/** Per-document statistics written to the run manifest. */
export interface DocumentStats {
  statute: string;
  chapters: number;
  sections: number;
  chunks: number;
  mergedFragments: number;
  discardedMarkers: number;
  emptyChapters: number;
  measureFailures: number;
  lengths: LengthStats;
}

export type DocumentStatus = 'processed' | 'skipped' | 'failed';

/** One row of `manifest.json`. */
export interface ManifestEntry {
  source: string;
  status: DocumentStatus;
  statute?: string;
  contentHash?: string;
  stats?: DocumentStats;
  outputs?: string[];
  /** Dataset runs: corpus records, glossary terms or cases taken from the document. */
  records?: number;
  error?: string;
}

/** Summary of one pipeline run; the whole of `manifest.json`. */
export interface RunManifest {
  startedAt: string;
  finishedAt: string;
  maxTokens: number;
  encoding: string;
  /** True when the run stopped early on an abort signal. */
  aborted: boolean;
  documents: ManifestEntry[];
  totals: {
    processed: number;
    skipped: number;
    failed: number;
    /** Sum of the stats of every processed document. */
    stats: DocumentStats;
  };
}

export type DatasetMode = 'corpus' | 'judgments';

/** Summary of a dataset run; the whole of `<mode>_manifest.json`. */
export interface DatasetManifest {
  mode: DatasetMode;
  startedAt: string;
  finishedAt: string;
  aborted: boolean;
  documents: ManifestEntry[];
  totals: {
    processed: number;
    skipped: number;
    failed: number;
    /** Corpus records or cases written. */
    records: number;
    glossaryTerms: number;
  };
}
