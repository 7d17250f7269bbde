/**
 * FILE PURPOSE: Core types for source readers
 *
 * WHY: The driver accepts raw extracted text, text that was already
 *      cleaned, and section files from an earlier run. Every reader produces
 *      the same SourceDocument union so the processor can branch on `kind`.
 */

import { createHash } from 'node:crypto';
import type { SectionRecord } from '@statute-corpus/shared-types';

export type SourceKind = 'raw-text' | 'cleaned-text' | 'sections';

/** Text that still needs segmentation (and, for raw text, normalization). */
export interface TextSource {
  kind: 'raw-text' | 'cleaned-text';
  /** File name without the reader's suffix, e.g. "BNS" for "BNS.clean.txt". */
  name: string;
  sourcePath: string;
  text: string;
}

/** Sections persisted by an earlier run; processing resumes at chunking. */
export interface SectionsSource {
  kind: 'sections';
  name: string;
  sourcePath: string;
  sections: SectionRecord[];
}

export type SourceDocument = TextSource | SectionsSource;

/** Reader interface, one per input format, dispatched by file name. */
export interface SourceReader {
  readonly kind: SourceKind;
  readonly suffix: string;
  canHandle(fileName: string): boolean;
  /** Returns null when the file holds nothing to process (empty text). */
  read(sourcePath: string): Promise<SourceDocument | null>;
}

/** SHA-256 of the text, hex. Recorded in the manifest to spot unchanged inputs. */
export function computeContentHash(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

export function stripSuffix(fileName: string, suffix: string): string {
  return fileName.toLowerCase().endsWith(suffix.toLowerCase()) ? fileName.slice(0, -suffix.length) : fileName;
}
