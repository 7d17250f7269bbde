/**
 * FILE PURPOSE: Decide whether a section marker opens a section, continues the previous one, or is noise
 *
 * WHY: Cross-references, explanations and tables reuse small numbers
 *      ("under section 2.", "Illustration 1.") that would otherwise fragment a
 *      section. The rule is a heuristic and can misclassify, so it is a
 *      strategy object that can be swapped and tested on its own.
 * HOW: Each policy is a pure function of (marker, accumulator). The
 *      segmenter folds markers through it; nothing is kept between chapters.
 */

import { ORDER_START, compareSectionOrder } from './markers.js';
import type { SectionMarker, SectionOrder } from './markers.js';

export type MergeDecision = 'open' | 'merge' | 'discard';

/** Accumulator threaded through the marker scan of one chapter. */
export interface MergeState {
  /** Order of the last marker that opened a section; ORDER_START before any. */
  previous: SectionOrder;
  /** Sections emitted so far in this chapter. */
  emitted: number;
}

export interface MergePolicy {
  readonly name: string;
  /** Separator used when a fragment is appended to the preceding section. */
  readonly joiner: string;
  decide(marker: SectionMarker, state: MergeState): MergeDecision;
}

export const INITIAL_MERGE_STATE: MergeState = { previous: ORDER_START, emitted: 0 };

/**
 * Strictly-increasing rule: a marker opens a section only when it comes after
 * the last one that did in statute order (number, then letter suffix).
 * Anything else is a continuation.
 */
export const monotonicPolicy: MergePolicy = {
  name: 'monotonic',
  joiner: ' ',
  decide(marker, state) {
    return compareSectionOrder(marker, state.previous) > 0 ? 'open' : 'merge';
  },
};

function isNextLetter(marker: SectionOrder, previous: SectionOrder): boolean {
  if (marker.value !== previous.value || !marker.suffix) return false;
  const expected = previous.suffix ? String.fromCharCode(previous.suffix.charCodeAt(0) + 1) : 'A';
  return marker.suffix === expected;
}

/**
 * Consecutive rule: after the first section, only the next number or the next
 * letter of the same number opens a new section (304, 304A, 304B, 305).
 * Stricter against stray large numbers, but loses sections when the
 * extraction drops one.
 */
export const consecutivePolicy: MergePolicy = {
  name: 'consecutive',
  joiner: '\n\n',
  decide(marker, state) {
    if (state.emitted === 0) return 'open';
    return marker.value === state.previous.value + 1 || isNextLetter(marker, state.previous) ? 'open' : 'merge';
  },
};

export type MergePolicyName = 'monotonic' | 'consecutive';

const POLICIES: Record<MergePolicyName, MergePolicy> = {
  monotonic: monotonicPolicy,
  consecutive: consecutivePolicy,
};

export function selectMergePolicy(name: MergePolicyName): MergePolicy {
  return POLICIES[name];
}

/**
 * Wrap a policy so markers above the statute's last section number are
 * dropped outright (their text is page-number or table noise).
 */
export function withSectionCeiling(policy: MergePolicy, maxSectionNumber: number): MergePolicy {
  return {
    name: `${policy.name}<=${maxSectionNumber}`,
    joiner: policy.joiner,
    decide(marker, state) {
      if (marker.value > maxSectionNumber) return 'discard';
      return policy.decide(marker, state);
    },
  };
}
