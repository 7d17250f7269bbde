/**
 * FILE PURPOSE: BullMQ queue factory for distributed statute processing
 * WHY: Large batches are fanned out to several worker processes; each job
 *      is one document, so a failure never affects its neighbours.
 */

import { readFile } from 'node:fs/promises';
import { Queue } from 'bullmq';
import type { SegmentationJobData } from './jobs.js';
import { parseRedisConnection } from './connection.js';
import { computeContentHash } from '../sources/index.js';
import { SourceReadError, describeError } from '../errors.js';

export const JobType = {
  /** Raw or cleaned text → sections → chunks. */
  SEGMENT: 'segment',
  /** Existing `_sections.json` → chunks, with new chunk settings. */
  RECHUNK: 'rechunk',
} as const;

export type JobTypeValue = (typeof JobType)[keyof typeof JobType];

export const SEGMENTATION_QUEUE = 'statute-segmentation';

export function createSegmentationQueue(redisUrl?: string): Queue<SegmentationJobData> {
  return new Queue<SegmentationJobData>(SEGMENTATION_QUEUE, {
    connection: parseRedisConnection(redisUrl),
    defaultJobOptions: {
      attempts: 3,
      backoff: { type: 'exponential', delay: 1000 },
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  });
}

/**
 * Job id for one document: type, path, file content and settings. An
 * unchanged file with unchanged settings maps to the same id, so BullMQ
 * drops the repeat; an edited file or a new budget gets a fresh job.
 */
export async function documentJobId(
  type: JobTypeValue,
  sourcePath: string,
  settings: SegmentationJobData['settings'],
): Promise<string> {
  let content: string;
  try {
    content = await readFile(sourcePath, 'utf-8');
  } catch (err) {
    throw new SourceReadError(sourcePath, describeError(err), { cause: err });
  }
  const key = [sourcePath, JSON.stringify(settings), computeContentHash(content)].join('\n');
  return `${type}-${computeContentHash(key).slice(0, 24)}`;
}

/** Enqueue one job per source path, keyed by `documentJobId`. */
export async function enqueueDocuments(
  queue: Queue<SegmentationJobData>,
  sourcePaths: readonly string[],
  settingsFor: (sourcePath: string) => SegmentationJobData['settings'],
  type: JobTypeValue = JobType.SEGMENT,
): Promise<number> {
  const entries = await Promise.all(
    sourcePaths.map(async (sourcePath) => {
      const settings = settingsFor(sourcePath);
      return {
        name: type,
        data: { type, sourcePath, settings },
        opts: { jobId: await documentJobId(type, sourcePath, settings) },
      };
    }),
  );
  const jobs = await queue.addBulk(entries);
  return jobs.length;
}
