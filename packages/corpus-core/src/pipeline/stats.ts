/**
 * FILE PURPOSE: Additive document statistics
 * WHY: Run totals are folded from per-document stats, whether documents were
 *      processed in-process or by queue workers in any order.
 */

import type { DocumentStats } from '@statute-corpus/shared-types';
import { EMPTY_LENGTH_STATS, mergeLengthStats } from '../chunking/index.js';

export const ALL_STATUTES = 'all';

export function emptyStats(statute: string = ALL_STATUTES): DocumentStats {
  return {
    statute,
    chapters: 0,
    sections: 0,
    chunks: 0,
    mergedFragments: 0,
    discardedMarkers: 0,
    emptyChapters: 0,
    measureFailures: 0,
    lengths: { ...EMPTY_LENGTH_STATS },
  };
}

/** Sum two stats. The statute label is kept only when both sides agree. */
export function mergeStats(a: DocumentStats, b: DocumentStats): DocumentStats {
  return {
    statute: a.statute === b.statute ? a.statute : ALL_STATUTES,
    chapters: a.chapters + b.chapters,
    sections: a.sections + b.sections,
    chunks: a.chunks + b.chunks,
    mergedFragments: a.mergedFragments + b.mergedFragments,
    discardedMarkers: a.discardedMarkers + b.discardedMarkers,
    emptyChapters: a.emptyChapters + b.emptyChapters,
    measureFailures: a.measureFailures + b.measureFailures,
    lengths: mergeLengthStats(a.lengths, b.lengths),
  };
}
