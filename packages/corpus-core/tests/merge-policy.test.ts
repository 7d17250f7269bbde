import { describe, it, expect } from 'vitest';
import {
  INITIAL_MERGE_STATE,
  consecutivePolicy,
  monotonicPolicy,
  selectMergePolicy,
  withSectionCeiling,
} from '../src/segmentation/merge-policy.js';
import type { SectionMarker } from '../src/segmentation/markers.js';
import type { MergeState } from '../src/segmentation/merge-policy.js';

function marker(value: number, suffix = ''): SectionMarker {
  const label = `${value}${suffix}`;
  return { label, value, suffix, start: 0, end: label.length + 1 };
}

function after(value: number, emitted: number, suffix = ''): MergeState {
  return { previous: { value, suffix }, emitted };
}

describe('monotonicPolicy', () => {
  it('opens on a strictly larger number', () => {
    expect(monotonicPolicy.decide(marker(4), after(3, 3))).toBe('open');
  });

  it('merges equal and smaller numbers', () => {
    expect(monotonicPolicy.decide(marker(3), after(3, 3))).toBe('merge');
    expect(monotonicPolicy.decide(marker(1), after(3, 3))).toBe('merge');
  });

  it('opens a skipped number', () => {
    expect(monotonicPolicy.decide(marker(9), after(3, 3))).toBe('open');
  });

  it('orders a lettered marker after its plain number', () => {
    expect(monotonicPolicy.decide(marker(304, 'A'), after(304, 1))).toBe('open');
    expect(monotonicPolicy.decide(marker(304, 'B'), after(304, 2, 'A'))).toBe('open');
    expect(monotonicPolicy.decide(marker(305), after(304, 2, 'A'))).toBe('open');
  });

  it('merges a lettered marker that does not move forward', () => {
    expect(monotonicPolicy.decide(marker(304, 'A'), after(304, 2, 'A'))).toBe('merge');
    expect(monotonicPolicy.decide(marker(304, 'A'), after(304, 2, 'B'))).toBe('merge');
    expect(monotonicPolicy.decide(marker(303, 'A'), after(304, 2))).toBe('merge');
  });
});

describe('consecutivePolicy', () => {
  it('always opens the first section', () => {
    expect(consecutivePolicy.decide(marker(7), INITIAL_MERGE_STATE)).toBe('open');
  });

  it('opens only previous + 1 afterwards', () => {
    expect(consecutivePolicy.decide(marker(8), after(7, 1))).toBe('open');
    expect(consecutivePolicy.decide(marker(9), after(7, 1))).toBe('merge');
  });

  it('opens the next letter of the same number', () => {
    expect(consecutivePolicy.decide(marker(304, 'A'), after(304, 1))).toBe('open');
    expect(consecutivePolicy.decide(marker(304, 'B'), after(304, 2, 'A'))).toBe('open');
    expect(consecutivePolicy.decide(marker(304, 'C'), after(304, 2, 'A'))).toBe('merge');
    expect(consecutivePolicy.decide(marker(305), after(304, 3, 'B'))).toBe('open');
  });

  it('joins with a paragraph break', () => {
    expect(consecutivePolicy.joiner).toBe('\n\n');
    expect(monotonicPolicy.joiner).toBe(' ');
  });
});

describe('withSectionCeiling', () => {
  const capped = withSectionCeiling(monotonicPolicy, 358);

  it('discards markers above the ceiling', () => {
    expect(capped.decide(marker(999), after(10, 10))).toBe('discard');
  });

  it('delegates everything else', () => {
    expect(capped.decide(marker(358), after(357, 357))).toBe('open');
    expect(capped.decide(marker(2), after(357, 357))).toBe('merge');
    expect(capped.name).toBe('monotonic<=358');
  });
});

describe('selectMergePolicy', () => {
  it('resolves policies by name', () => {
    expect(selectMergePolicy('monotonic')).toBe(monotonicPolicy);
    expect(selectMergePolicy('consecutive')).toBe(consecutivePolicy);
  });
});
