/**
 * FILE PURPOSE: Chapter boundary detection
 * WHY: Section numbering restarts its merge accumulator per chapter, so the
 *      segmenter needs chapter spans before it looks for section markers.
 */

import { ENTIRE_DOCUMENT, PRELIMINARY } from '@statute-corpus/shared-types';

export interface Chapter {
  title: string;
  text: string;
}

// Word is case-insensitive; the numeral is checked for upper case below so
// running text such as "chapter did" is not taken for a heading.
const CHAPTER_MARKER_RE = /\bchapter\s*([ivxlcdm]+)/gi;

// Leading numeral of a heading run into its title, I to XXXIX.
const RUN_ON_NUMERAL_RE = /^X{0,3}(?:IX|IV|V?I{0,3})/;

interface ChapterMarker {
  start: number;
  end: number;
  title: string;
}

/**
 * Numeral of a heading, or undefined when the match is not a heading.
 * "CHAPTER XII" and "CHAPTER XLV." take the whole run; "CHAPTER IIPUNISHMENTS"
 * takes the leading "II"; "CHAPTER MAY" and "chapter did" are rejected.
 */
function chapterNumeral(run: string, following: string): string | undefined {
  if (run !== run.toUpperCase()) return undefined;
  if (!/^[A-Za-z]/.test(following)) return run;
  const numeral = RUN_ON_NUMERAL_RE.exec(run)?.[0] ?? '';
  const rest = run.slice(numeral.length) + following;
  return numeral && /^[A-Z]/.test(rest) ? numeral : undefined;
}

export function findChapterMarkers(text: string): ChapterMarker[] {
  const markers: ChapterMarker[] = [];
  for (const match of text.matchAll(CHAPTER_MARKER_RE)) {
    const run = match[1] ?? '';
    const start = match.index ?? 0;
    const matchEnd = start + match[0].length;
    const numeral = chapterNumeral(run, text.slice(matchEnd, matchEnd + 1));
    if (numeral === undefined) continue;
    const heading = match[0].slice(0, match[0].length - (run.length - numeral.length));
    markers.push({
      start,
      end: start + heading.length,
      title: heading.replace(/\s+/g, ' ').trim(),
    });
  }
  return markers;
}

/**
 * Split text into chapters in document order.
 *
 * No marker → a single "Entire Document" chapter spanning the text.
 * Leading text before the first marker → "Preliminary", kept only when non-empty.
 */
export function splitChapters(text: string): Chapter[] {
  const markers = findChapterMarkers(text);
  if (markers.length === 0) {
    return [{ title: ENTIRE_DOCUMENT, text }];
  }

  const chapters: Chapter[] = [];
  const first = markers[0];
  const preliminary = first ? text.slice(0, first.start).trim() : '';
  if (preliminary) {
    chapters.push({ title: PRELIMINARY, text: preliminary });
  }

  markers.forEach((marker, i) => {
    const next = markers[i + 1];
    chapters.push({
      title: marker.title,
      text: text.slice(marker.end, next ? next.start : text.length).trim(),
    });
  });
  return chapters;
}
