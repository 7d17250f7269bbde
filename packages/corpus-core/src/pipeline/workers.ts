/**
 * FILE PURPOSE: BullMQ worker for the statute segmentation queue
 * WHY: Each job reads, processes and persists one document. Processing is a
 *      pure function of the file and settings, so retries are safe.
 *      Persistence is injected so the core stays free of output layout.
 */

import { Worker } from 'bullmq';
import type { Job } from 'bullmq';
import { createDefaultRegistry } from '../sources/index.js';
import type { SourceDocument, SourceRegistry } from '../sources/index.js';
import { processDocument } from './process-document.js';
import type { DocumentResult } from './process-document.js';
import { resolveProcessOptions } from './settings.js';
import type { SegmentationJobData, SegmentationJobResult } from './jobs.js';
import { JobType, SEGMENTATION_QUEUE } from './queue.js';
import { parseRedisConnection } from './connection.js';

/** Persists a processed document and returns the paths it wrote. */
export type DocumentSink = (result: DocumentResult) => Promise<string[]>;

export interface SegmentationWorkerDeps {
  registry?: SourceRegistry;
  sink?: DocumentSink;
}

type JobProcessor = (job: Job<SegmentationJobData>, source: SourceDocument) => DocumentResult;

const processors: Record<string, JobProcessor> = {
  [JobType.SEGMENT]: (job, source) => processDocument(source, resolveProcessOptions(job.data.settings)),
  [JobType.RECHUNK]: (job, source) => {
    if (source.kind !== 'sections') {
      throw new Error(`Rechunk needs a section file, got ${source.kind}: ${job.data.sourcePath}`);
    }
    return processDocument(source, resolveProcessOptions(job.data.settings));
  },
};

export async function processSegmentationJob(
  job: Job<SegmentationJobData>,
  deps: SegmentationWorkerDeps = {},
): Promise<SegmentationJobResult> {
  const processor = processors[job.data.type];
  if (!processor) {
    throw new Error(`Unknown job type: ${job.data.type}`);
  }

  const registry = deps.registry ?? createDefaultRegistry();
  const source = await registry.read(job.data.sourcePath);
  if (!source) {
    await job.log(`Skipped ${job.data.sourcePath}: no reader or empty file`);
    return { sourcePath: job.data.sourcePath, status: 'skipped' };
  }

  const result = processor(job, source);
  for (const issue of result.issues) {
    await job.log(`Tokenizer failure in section ${issue.section_number}: ${issue.error.message}`);
  }

  const outputs = deps.sink ? await deps.sink(result) : [];
  await job.log(
    `Processed ${result.name}: ${result.stats.sections} sections, ${result.stats.chunks} chunks, ` +
      `${result.stats.mergedFragments} merged, ${result.stats.discardedMarkers} discarded`,
  );

  return {
    sourcePath: job.data.sourcePath,
    status: 'processed',
    statute: result.statute,
    contentHash: result.contentHash,
    stats: result.stats,
    outputs,
  };
}

export function createSegmentationWorker(
  deps: SegmentationWorkerDeps = {},
  redisUrl?: string,
  concurrency = 5,
): Worker<SegmentationJobData, SegmentationJobResult> {
  return new Worker<SegmentationJobData, SegmentationJobResult>(
    SEGMENTATION_QUEUE,
    (job) => processSegmentationJob(job, deps),
    {
      connection: parseRedisConnection(redisUrl),
      concurrency,
    },
  );
}
