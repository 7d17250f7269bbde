/**
 * FILE PURPOSE: Job payloads for the statute segmentation queue
 * WHY: A job only carries a path and serializable settings. The worker reads
 *      the file itself so large statutes never pass through Redis.
 */

import type { DocumentStats } from '@statute-corpus/shared-types';
import type { JobTypeValue } from './queue.js';
import type { DocumentSettings } from './settings.js';

/** Job data shape for the BullMQ segmentation queue. */
export interface SegmentationJobData {
  type: JobTypeValue;
  sourcePath: string;
  settings: DocumentSettings;
}

/** Returned by the worker and stored by BullMQ as the job's return value. */
export interface SegmentationJobResult {
  sourcePath: string;
  status: 'processed' | 'skipped';
  statute?: string;
  contentHash?: string;
  stats?: DocumentStats;
  outputs?: string[];
}
