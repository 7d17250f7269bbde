/**
 * FILE PURPOSE: Post-hoc length statistics over emitted chunks
 * WHY: The reserve constant is a heuristic, not a proof. Every run re-measures
 *      its output so a regression past the limit shows up in the manifest.
 */

import type { LengthStats } from '@statute-corpus/shared-types';
import type { Measure } from './measure.js';

export const EMPTY_LENGTH_STATS: LengthStats = { count: 0, max: 0, min: 0, average: 0, overLimit: 0 };

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function measureChunkStats(chunks: readonly string[], measure: Measure, limit: number): LengthStats {
  if (chunks.length === 0) return { ...EMPTY_LENGTH_STATS };

  const lengths = chunks.map((c) => measure(c));
  const total = lengths.reduce((sum, n) => sum + n, 0);
  return {
    count: lengths.length,
    max: lengths.reduce((a, b) => Math.max(a, b)),
    min: lengths.reduce((a, b) => Math.min(a, b)),
    average: round2(total / lengths.length),
    overLimit: lengths.filter((n) => n > limit).length,
  };
}

/** Combine two distributions. Order-independent, so per-document stats can be folded in any order. */
export function mergeLengthStats(a: LengthStats, b: LengthStats): LengthStats {
  if (a.count === 0) return { ...b };
  if (b.count === 0) return { ...a };
  const count = a.count + b.count;
  return {
    count,
    max: Math.max(a.max, b.max),
    min: Math.min(a.min, b.min),
    average: round2((a.average * a.count + b.average * b.count) / count),
    overLimit: a.overLimit + b.overLimit,
  };
}
