/**
 * FILE PURPOSE: Sequential corpus run over a source directory
 *
 * WHY: A batch of statutes is processed one document at a time. A missing or
 *      broken file is logged, recorded in the manifest and skipped; it never
 *      stops the rest of the batch.
 * HOW: readdir → registry dispatch → profile lookup → processDocument →
 *      CorpusWriter. Totals are folded with mergeStats. The abort signal is
 *      checked between documents only.
 *
 * EDGE CASES:
 * - Files no reader handles (manifest.json, *_chunks.json, PDFs) are ignored without a manifest row
 * - Empty files are `skipped`; read/parse/processing errors are `failed`
 * - An unreadable source directory is the one fatal error
 */

import { readdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import {
  SourceReadError,
  createDefaultRegistry,
  describeError,
  emptyStats,
  mergeStats,
  processDocument,
  resolveProcessOptions,
} from '@statute-corpus/corpus-core';
import type { DocumentResult, SourceRegistry } from '@statute-corpus/corpus-core';
import type { ManifestEntry, RunManifest } from '@statute-corpus/shared-types';
import { matchProfile, settingsFor } from './profiles.js';
import type { StatuteProfile } from './profiles.js';
import { CorpusWriter } from './services/corpus-writer.js';

export interface RunOptions {
  sourceDir: string;
  outputDir: string;
  profiles: readonly StatuteProfile[];
  maxTokens: number;
  encoding: string;
  signal?: AbortSignal;
  /** Narrows the handled files further, e.g. to section files for a rechunk run. */
  include?: (sourcePath: string) => boolean;
  registry?: SourceRegistry;
  writer?: CorpusWriter;
  onError?: (err: unknown, context: Record<string, string>) => void;
}

export interface RunResult {
  manifest: RunManifest;
  manifestPath: string;
}

/** Handled source files in `dir`, sorted by name. */
export async function listSources(dir: string, registry: SourceRegistry): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (err) {
    throw new SourceReadError(dir, describeError(err), { cause: err });
  }
  return names
    .filter((name) => registry.canHandle(name))
    .sort()
    .map((name) => join(dir, name));
}

function logReport(result: DocumentResult): void {
  const { report, name } = result;
  if (report) {
    for (const event of report.merged) {
      process.stderr.write(
        `INFO: ${name} ${event.chapter}: marker "${event.label}" at ${event.position} merged into section ${event.mergedInto}\n`,
      );
    }
    for (const event of report.discarded) {
      process.stderr.write(
        `INFO: ${name} ${event.chapter}: marker "${event.label}" at ${event.position} above section ceiling, discarded\n`,
      );
    }
    for (const chapter of report.emptyChapters) {
      process.stderr.write(`WARN: ${name} ${chapter}: no sections found\n`);
    }
  }
  for (const issue of result.issues) {
    process.stderr.write(`WARN: ${name} section ${issue.section_number}: ${issue.error.message}\n`);
  }
  if (result.stats.lengths.overLimit > 0) {
    process.stderr.write(`WARN: ${name}: ${result.stats.lengths.overLimit} chunks over the length limit\n`);
  }
}

async function processOne(sourcePath: string, options: RunOptions, registry: SourceRegistry, writer: CorpusWriter): Promise<ManifestEntry> {
  const source = await registry.read(sourcePath);
  if (!source) {
    process.stderr.write(`WARN: ${sourcePath}: empty source, skipped\n`);
    return { source: sourcePath, status: 'skipped', error: 'empty source' };
  }

  const profile = matchProfile(options.profiles, source.name);
  if (!profile) {
    process.stderr.write(`WARN: ${source.name}: no statute profile matched, using defaults\n`);
  }
  const settings = settingsFor(profile, { maxTokens: options.maxTokens, encoding: options.encoding });
  const result = processDocument(source, resolveProcessOptions(settings));
  logReport(result);

  const outputs = await writer.writeDocument(result);
  process.stderr.write(
    `INFO: ${result.name} (${result.statute}): ${result.stats.sections} sections, ${result.stats.chunks} chunks\n`,
  );
  return {
    source: sourcePath,
    status: 'processed',
    statute: result.statute,
    contentHash: result.contentHash,
    stats: result.stats,
    outputs,
  };
}

export async function runPipeline(options: RunOptions): Promise<RunResult> {
  const registry = options.registry ?? createDefaultRegistry();
  const writer = options.writer ?? new CorpusWriter(options.outputDir);
  const startedAt = new Date().toISOString();

  const listed = await listSources(options.sourceDir, registry);
  const sources = options.include ? listed.filter(options.include) : listed;
  process.stderr.write(`INFO: ${sources.length} source files in ${options.sourceDir}\n`);

  const documents: ManifestEntry[] = [];
  let aborted = false;

  for (const sourcePath of sources) {
    if (options.signal?.aborted) {
      process.stderr.write(`WARN: Run aborted before ${basename(sourcePath)}\n`);
      aborted = true;
      break;
    }

    try {
      documents.push(await processOne(sourcePath, options, registry, writer));
    } catch (err) {
      const message = describeError(err);
      process.stderr.write(`ERROR: ${sourcePath}: ${message}\n`);
      options.onError?.(err, { source: sourcePath });
      documents.push({ source: sourcePath, status: 'failed', error: message });
    }
  }

  const processed = documents.filter((d) => d.status === 'processed');
  const manifest: RunManifest = {
    startedAt,
    finishedAt: new Date().toISOString(),
    maxTokens: options.maxTokens,
    encoding: options.encoding,
    aborted,
    documents,
    totals: {
      processed: processed.length,
      skipped: documents.filter((d) => d.status === 'skipped').length,
      failed: documents.filter((d) => d.status === 'failed').length,
      stats: processed.reduce((acc, d) => (d.stats ? mergeStats(acc, d.stats) : acc), emptyStats()),
    },
  };

  const manifestPath = await writer.writeManifest(manifest);
  return { manifest, manifestPath };
}
