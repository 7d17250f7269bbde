/**
 * FILE PURPOSE: Numeric section marker detection ("12.", "36A.")
 * WHY: A marker must stand on its own (start of text or after whitespace)
 *      so a digit inside a word or a longer number is never taken for one.
 *      A digit right after the period makes it a decimal ("12.5"), not a marker.
 */

/** Position of a section in statute order: 304 < 304A < 304B < 305. */
export interface SectionOrder {
  value: number;
  /** Letter suffix, '' for a plain number. */
  suffix: string;
}

export interface SectionMarker extends SectionOrder {
  /** Label as written, e.g. "36A". */
  label: string;
  start: number;
  end: number;
}

export const DEFAULT_MARKER_DIGITS = 3;

/** Order before any section; every real marker compares greater. */
export const ORDER_START: SectionOrder = { value: 0, suffix: '' };

/** Negative, zero or positive as `a` comes before, with or after `b`. */
export function compareSectionOrder(a: SectionOrder, b: SectionOrder): number {
  if (a.value !== b.value) return a.value - b.value;
  if (a.suffix === b.suffix) return 0;
  return a.suffix < b.suffix ? -1 : 1;
}

export function sectionMarkerPattern(maxDigits = DEFAULT_MARKER_DIGITS): RegExp {
  if (!Number.isInteger(maxDigits) || maxDigits < 1) {
    throw new RangeError(`markerDigits must be a positive integer, got ${maxDigits}`);
  }
  return new RegExp(String.raw`(?<!\S)(\d{1,${maxDigits}})([A-Z]?)\.(?!\d)`, 'g');
}

export function findSectionMarkers(text: string, maxDigits = DEFAULT_MARKER_DIGITS): SectionMarker[] {
  const markers: SectionMarker[] = [];
  for (const match of text.matchAll(sectionMarkerPattern(maxDigits))) {
    const digits = match[1] ?? '';
    const suffix = match[2] ?? '';
    const start = match.index ?? 0;
    markers.push({
      label: `${digits}${suffix}`,
      value: parseInt(digits, 10),
      suffix,
      start,
      end: start + match[0].length,
    });
  }
  return markers;
}
