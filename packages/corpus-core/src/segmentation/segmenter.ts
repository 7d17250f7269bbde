/**
 * FILE PURPOSE: Structural segmenter, cleaned statute text to ordered sections
 *
 * WHY: Downstream chunking and retrieval work per numbered section. Chapters
 *      are found first, then each chapter's markers are folded through the
 *      merge policy in text order.
 * HOW: `segmentChapter` is a reduce over markers with an explicit
 *      accumulator (previous section order, emitted count, sections so far). Each
 *      chapter starts from INITIAL_MERGE_STATE.
 */

import type { SectionRecord } from '@statute-corpus/shared-types';
import { splitChapters } from './chapters.js';
import type { Chapter } from './chapters.js';
import { DEFAULT_MARKER_DIGITS, findSectionMarkers } from './markers.js';
import type { SectionMarker } from './markers.js';
import { INITIAL_MERGE_STATE, monotonicPolicy, withSectionCeiling } from './merge-policy.js';
import type { MergePolicy, MergeState } from './merge-policy.js';

export interface SegmentOptions {
  /** Longest digit run accepted as a section number (3 for most codes, 4 for the largest). */
  markerDigits?: number;
  /** Highest valid section number of the statute; larger markers are discarded. */
  maxSectionNumber?: number;
  mergePolicy?: MergePolicy;
}

/** A marker the policy did not turn into a new section. */
export interface MarkerEvent {
  chapter: string;
  label: string;
  /** Offset of the marker within the chapter text. */
  position: number;
  /** Section the fragment was appended to; absent for discarded markers. */
  mergedInto?: string;
}

export interface SegmentationReport {
  chapters: number;
  markers: number;
  merged: MarkerEvent[];
  discarded: MarkerEvent[];
  /** Titles of chapters in which no section marker survived. */
  emptyChapters: string[];
}

export interface SegmentationResult {
  sections: SectionRecord[];
  chapters: Chapter[];
  report: SegmentationReport;
}

interface ChapterScan extends MergeState {
  sections: SectionRecord[];
  merged: MarkerEvent[];
  discarded: MarkerEvent[];
}

function resolvePolicy(options: SegmentOptions): MergePolicy {
  const base = options.mergePolicy ?? monotonicPolicy;
  return options.maxSectionNumber !== undefined ? withSectionCeiling(base, options.maxSectionNumber) : base;
}

function contentAfter(text: string, markers: SectionMarker[], i: number): string {
  const marker = markers[i];
  if (!marker) return '';
  const next = markers[i + 1];
  return text.slice(marker.end, next ? next.start : text.length).trim();
}

function appendContent(section: SectionRecord, fragment: string, joiner: string): SectionRecord {
  if (!fragment) return section;
  return { ...section, content: section.content ? `${section.content}${joiner}${fragment}` : fragment };
}

export function segmentChapter(
  chapter: Chapter,
  statute: string,
  options: SegmentOptions = {},
): { sections: SectionRecord[]; merged: MarkerEvent[]; discarded: MarkerEvent[]; markers: number } {
  const policy = resolvePolicy(options);
  const markers = findSectionMarkers(chapter.text, options.markerDigits ?? DEFAULT_MARKER_DIGITS);

  const initial: ChapterScan = { ...INITIAL_MERGE_STATE, sections: [], merged: [], discarded: [] };

  const scan = markers.reduce<ChapterScan>((state, marker, i) => {
    const content = contentAfter(chapter.text, markers, i);
    const decision = policy.decide(marker, state);

    if (decision === 'discard') {
      return {
        ...state,
        discarded: [...state.discarded, { chapter: chapter.title, label: marker.label, position: marker.start }],
      };
    }

    const opened: SectionRecord = {
      section_number: marker.label,
      content,
      chapter: chapter.title,
      statute,
    };

    if (decision === 'open') {
      return {
        ...state,
        previous: { value: marker.value, suffix: marker.suffix },
        emitted: state.emitted + 1,
        sections: [...state.sections, opened],
      };
    }

    const last = state.sections[state.sections.length - 1];
    if (!last) {
      // Nothing to merge into yet: keep the text, but keep waiting for a later marker.
      return { ...state, emitted: state.emitted + 1, sections: [opened] };
    }
    return {
      ...state,
      sections: [...state.sections.slice(0, -1), appendContent(last, content, policy.joiner)],
      merged: [
        ...state.merged,
        { chapter: chapter.title, label: marker.label, position: marker.start, mergedInto: last.section_number },
      ],
    };
  }, initial);

  return { sections: scan.sections, merged: scan.merged, discarded: scan.discarded, markers: markers.length };
}

/** Segment a whole document, keeping the per-chapter report. */
export function segmentWithReport(text: string, statute: string, options: SegmentOptions = {}): SegmentationResult {
  const chapters = splitChapters(text);
  const sections: SectionRecord[] = [];
  const report: SegmentationReport = {
    chapters: chapters.length,
    markers: 0,
    merged: [],
    discarded: [],
    emptyChapters: [],
  };

  for (const chapter of chapters) {
    const result = segmentChapter(chapter, statute, options);
    sections.push(...result.sections);
    report.markers += result.markers;
    report.merged.push(...result.merged);
    report.discarded.push(...result.discarded);
    if (result.sections.length === 0) {
      report.emptyChapters.push(chapter.title);
    }
  }

  return { sections, chapters, report };
}

/**
 * Segment cleaned statute text into sections, flattened across chapters.
 *
 * EXAMPLE:
 * ```typescript
 * segment('CHAPTER I 1. Short title. 2. Definitions.', 'Test Code')
 * // [{ section_number: '1', content: 'Short title.', chapter: 'CHAPTER I', statute: 'Test Code' },
 * //  { section_number: '2', content: 'Definitions.', chapter: 'CHAPTER I', statute: 'Test Code' }]
 * ```
 */
export function segment(text: string, statute: string, options: SegmentOptions = {}): SectionRecord[] {
  return segmentWithReport(text, statute, options).sections;
}
