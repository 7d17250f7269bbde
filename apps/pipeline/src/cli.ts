#!/usr/bin/env npx tsx
/**
 * FILE PURPOSE: Command-line entry point for corpus runs
 *
 * USAGE: npm run corpus -- [sourceDir] [outputDir] [--mode <mode>] [--profiles <file>] [--queue] [--rechunk]
 *
 * - Default (`--mode statutes`): process every source file in-process and write outputs + manifest.
 * - `--mode corpus`: paragraph records to legal_dataset.jsonl, glossary terms to glossary.jsonl.
 * - `--mode judgments`: cases that cite the statutes to cases.json.
 * - `--queue`: enqueue one BullMQ job per file for `npm run worker` to pick up.
 * - `--rechunk`: only `_sections.json` files, chunked again with current settings.
 *   Both flags apply to statute runs only.
 *
 * Exit code 1 when the run could not start or any document failed.
 */

import { basename } from 'node:path';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import {
  JobType,
  SEGMENTATION_QUEUE,
  createDefaultRegistry,
  createSegmentationQueue,
  describeError,
  enqueueDocuments,
  stripSuffix,
} from '@statute-corpus/corpus-core';
import type { SourceRegistry } from '@statute-corpus/corpus-core';
import type { DatasetMode } from '@statute-corpus/shared-types';
import { loadConfig } from './config.js';
import type { PipelineConfig } from './config.js';
import { flushErrorReporting, initErrorReporting, reportError } from './error-reporting.js';
import { loadProfiles, matchProfile, settingsFor } from './profiles.js';
import type { StatuteProfile } from './profiles.js';
import { runDataset } from './run-dataset.js';
import { listSources, runPipeline } from './run-pipeline.js';

export const USAGE =
  'Usage: statute-corpus [sourceDir] [outputDir] [--mode statutes|corpus|judgments] [--profiles <file>] [--queue] [--rechunk]';

export type RunMode = 'statutes' | DatasetMode;

const RUN_MODES: readonly RunMode[] = ['statutes', 'corpus', 'judgments'];

function isRunMode(value: string): value is RunMode {
  return RUN_MODES.some((mode) => mode === value);
}

export interface CliOptions {
  mode: RunMode;
  sourceDir: string;
  outputDir: string;
  profilesPath: string;
  queue: boolean;
  rechunk: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(`${message}\n${USAGE}`);
    this.name = 'UsageError';
  }
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      mode: { type: 'string', default: 'statutes' },
      profiles: { type: 'string' },
      queue: { type: 'boolean', default: false },
      rechunk: { type: 'boolean', default: false },
    },
  });
}

export function parseCliArgs(argv: string[], config: PipelineConfig): CliOptions {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (err) {
    throw new UsageError(describeError(err));
  }

  const { values, positionals } = parsed;
  if (positionals.length > 2) {
    throw new UsageError(`Unexpected argument "${positionals[2]}"`);
  }

  const mode = values.mode ?? 'statutes';
  if (!isRunMode(mode)) {
    throw new UsageError(`Unknown mode "${mode}"`);
  }
  const queue = values.queue ?? false;
  const rechunk = values.rechunk ?? false;
  if (mode !== 'statutes' && (queue || rechunk)) {
    throw new UsageError(`--${queue ? 'queue' : 'rechunk'} applies to statute runs only`);
  }
  return {
    mode,
    sourceDir: positionals[0] ?? config.sourceDir,
    outputDir: positionals[1] ?? config.outputDir,
    profilesPath: values.profiles ?? config.profilesPath,
    queue,
    rechunk,
  };
}

function isSectionFile(sourcePath: string): boolean {
  return sourcePath.endsWith('_sections.json');
}

function sourceName(sourcePath: string, registry: SourceRegistry): string {
  const fileName = basename(sourcePath);
  const reader = registry.getReader(fileName);
  return reader ? stripSuffix(fileName, reader.suffix) : fileName;
}

async function enqueue(
  options: CliOptions,
  config: PipelineConfig,
  profiles: readonly StatuteProfile[],
  redisUrl: string,
): Promise<number> {
  const registry = createDefaultRegistry();
  const all = await listSources(options.sourceDir, registry);
  const paths = options.rechunk ? all.filter(isSectionFile) : all;
  const defaults = { maxTokens: config.maxTokens, encoding: config.encoding };

  const queue = createSegmentationQueue(redisUrl);
  try {
    const count = await enqueueDocuments(
      queue,
      paths,
      (p) => settingsFor(matchProfile(profiles, sourceName(p, registry)), defaults),
      options.rechunk ? JobType.RECHUNK : JobType.SEGMENT,
    );
    process.stdout.write(`Submitted ${count} documents to ${SEGMENTATION_QUEUE}; unchanged files with a retained job are not re-run\n`);
  } finally {
    await queue.close();
  }
  return 0;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const config = loadConfig();
  const options = parseCliArgs(argv, config);
  initErrorReporting(config.sentryDsn);
  const profiles = await loadProfiles(options.profilesPath);
  process.stderr.write(`INFO: Loaded ${profiles.length} statute profiles from ${options.profilesPath}\n`);

  if (options.queue) {
    if (!config.redisUrl) {
      process.stderr.write('FATAL: REDIS_URL is required for --queue\n');
      return 1;
    }
    return enqueue(options, config, profiles, config.redisUrl);
  }

  const controller = new AbortController();
  const abort = (): void => {
    process.stderr.write('WARN: Interrupt received, stopping after the current document\n');
    controller.abort();
  };
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);

  try {
    if (options.mode !== 'statutes') {
      const { manifest, manifestPath, outputs } = await runDataset({
        mode: options.mode,
        sourceDir: options.sourceDir,
        outputDir: options.outputDir,
        profiles,
        signal: controller.signal,
        onError: reportError,
      });
      const { totals } = manifest;
      process.stdout.write(
        `Processed ${totals.processed}, skipped ${totals.skipped}, failed ${totals.failed}: ` +
          `${totals.records} records, ${totals.glossaryTerms} glossary terms → ${outputs.join(', ')} (${manifestPath})\n`,
      );
      return totals.failed > 0 || manifest.aborted ? 1 : 0;
    }

    const { manifest, manifestPath } = await runPipeline({
      sourceDir: options.sourceDir,
      outputDir: options.outputDir,
      profiles,
      include: options.rechunk ? isSectionFile : undefined,
      maxTokens: config.maxTokens,
      encoding: config.encoding,
      signal: controller.signal,
      onError: reportError,
    });
    const { totals } = manifest;
    process.stdout.write(
      `Processed ${totals.processed}, skipped ${totals.skipped}, failed ${totals.failed}: ` +
        `${totals.stats.sections} sections, ${totals.stats.chunks} chunks → ${manifestPath}\n`,
    );
    return totals.failed > 0 || manifest.aborted ? 1 : 0;
  } finally {
    process.off('SIGINT', abort);
    process.off('SIGTERM', abort);
    await flushErrorReporting();
  }
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`FATAL: ${describeError(err)}\n`);
      process.exitCode = 1;
    },
  );
}
