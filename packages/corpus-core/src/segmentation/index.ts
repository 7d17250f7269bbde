export { splitChapters, findChapterMarkers } from './chapters.js';
export type { Chapter } from './chapters.js';
export { findSectionMarkers, sectionMarkerPattern, compareSectionOrder, DEFAULT_MARKER_DIGITS, ORDER_START } from './markers.js';
export type { SectionMarker, SectionOrder } from './markers.js';
export {
  monotonicPolicy,
  consecutivePolicy,
  selectMergePolicy,
  withSectionCeiling,
  INITIAL_MERGE_STATE,
} from './merge-policy.js';
export type { MergePolicy, MergePolicyName, MergeDecision, MergeState } from './merge-policy.js';
export { segment, segmentWithReport, segmentChapter } from './segmenter.js';
export type { SegmentOptions, SegmentationReport, SegmentationResult, MarkerEvent } from './segmenter.js';
