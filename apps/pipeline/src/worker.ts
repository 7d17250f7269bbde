/**
 * FILE PURPOSE: Standalone BullMQ worker process for the segmentation queue
 * WHY: Lets several machines share a large batch enqueued with `--queue`.
 *      Outputs go through the same CorpusWriter as a sequential run.
 *      Start via `npm run worker`.
 */

import { createSegmentationWorker, describeError } from '@statute-corpus/corpus-core';
import { loadConfig } from './config.js';
import { flushErrorReporting, initErrorReporting, reportError } from './error-reporting.js';
import { CorpusWriter } from './services/corpus-writer.js';

const config = loadConfig();

if (!config.redisUrl) {
  process.stderr.write('FATAL: REDIS_URL is required to start the worker\n');
  process.exit(1);
}

initErrorReporting(config.sentryDsn);

const writer = new CorpusWriter(config.outputDir);
const worker = createSegmentationWorker(
  { sink: (result) => writer.writeDocument(result) },
  config.redisUrl,
  config.workerConcurrency,
);

worker.on('completed', (job, result) => {
  const summary = result.stats ? `${result.stats.sections} sections, ${result.stats.chunks} chunks` : result.status;
  process.stderr.write(`INFO: Job ${job.id} (${job.data.type}) completed for ${job.data.sourcePath}: ${summary}\n`);
});

worker.on('failed', (job, err) => {
  process.stderr.write(`ERROR: Job ${job?.id} (${job?.data.type}) failed: ${err.message}\n`);
  reportError(err, { source: job?.data.sourcePath ?? 'unknown', jobId: job?.id ?? 'unknown' });
});

worker.on('error', (err) => {
  process.stderr.write(`ERROR: Worker error: ${err.message}\n`);
});

process.stderr.write(
  `INFO: Segmentation worker started (concurrency=${config.workerConcurrency}, output=${config.outputDir})\n`,
);

async function shutdown(): Promise<void> {
  process.stderr.write('INFO: Shutting down worker…\n');
  try {
    await worker.close();
    await flushErrorReporting();
  } catch (err) {
    process.stderr.write(`ERROR: Worker shutdown failed: ${describeError(err)}\n`);
    process.exitCode = 1;
  }
  process.exit();
}

process.on('SIGTERM', () => void shutdown());
process.on('SIGINT', () => void shutdown());
