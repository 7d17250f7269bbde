export { processDocument } from './process-document.js';
export type { ProcessOptions, DocumentResult, ChunkingIssue } from './process-document.js';
export { mergeStats, emptyStats, ALL_STATUTES } from './stats.js';
export {
  documentSettingsSchema,
  noisePatternSchema,
  resolveProcessOptions,
  tokenizerFor,
} from './settings.js';
export type { DocumentSettings, ResolvedDocumentSettings } from './settings.js';
export { parseRedisConnection } from './connection.js';
export type { RedisConnectionOptions } from './connection.js';
export { createSegmentationQueue, documentJobId, enqueueDocuments, JobType, SEGMENTATION_QUEUE } from './queue.js';
export type { JobTypeValue } from './queue.js';
export type { SegmentationJobData, SegmentationJobResult } from './jobs.js';
export { processSegmentationJob, createSegmentationWorker } from './workers.js';
export type { DocumentSink, SegmentationWorkerDeps } from './workers.js';
