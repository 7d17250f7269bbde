/**
 * FILE PURPOSE: Dataset runs, a general legal corpus or a set of judgment cases
 *
 * WHY: Commentaries, glossaries and judgments are not numbered statutes. They
 *      feed the same training set, one file per run instead of per document.
 * HOW: Same listing and per-document isolation as runPipeline. Corpus mode
 *      chunks each document by paragraph (record ids run on across documents)
 *      and reads glossary files as term/definition lines. Judgment mode keeps
 *      one case per judgment that names a statute.
 *
 * EDGE CASES:
 * - Section files from statute runs are not listed
 * - A glossary is recognised by "glossary" in its file name and read before normalization,
 *   which would join its term lines into the definitions
 * - Output files are written even when the run aborts, with what was collected
 */

import { basename } from 'node:path';
import {
  chunkCorpus,
  computeContentHash,
  createDefaultRegistry,
  describeError,
  extractCaseRecord,
  extractGlossaryTerms,
  normalize,
} from '@statute-corpus/corpus-core';
import type { SourceRegistry, TextSource } from '@statute-corpus/corpus-core';
import type {
  CaseRecord,
  CorpusRecord,
  DatasetManifest,
  DatasetMode,
  GlossaryEntry,
  ManifestEntry,
} from '@statute-corpus/shared-types';
import { matchProfile } from './profiles.js';
import type { StatuteProfile } from './profiles.js';
import { listSources } from './run-pipeline.js';
import { CorpusWriter } from './services/corpus-writer.js';

export interface DatasetOptions {
  mode: DatasetMode;
  sourceDir: string;
  outputDir: string;
  profiles: readonly StatuteProfile[];
  /** Corpus paragraphs of this many words or fewer are dropped. */
  minWords?: number;
  signal?: AbortSignal;
  registry?: SourceRegistry;
  writer?: CorpusWriter;
  onError?: (err: unknown, context: Record<string, string>) => void;
}

export interface DatasetResult {
  manifest: DatasetManifest;
  manifestPath: string;
  /** Dataset files written, in write order. */
  outputs: string[];
}

const GLOSSARY_NAME_RE = /glossary/i;

interface Collected {
  records: CorpusRecord[];
  glossary: GlossaryEntry[];
  cases: CaseRecord[];
}

function corpusDocument(source: TextSource, options: DatasetOptions, collected: Collected): ManifestEntry {
  const entry: ManifestEntry = {
    source: source.sourcePath,
    status: 'processed',
    contentHash: computeContentHash(source.text),
  };

  if (GLOSSARY_NAME_RE.test(source.name)) {
    const terms = extractGlossaryTerms(source.text);
    collected.glossary.push(...terms);
    process.stderr.write(`INFO: ${source.name}: ${terms.length} glossary terms\n`);
    return { ...entry, records: terms.length };
  }

  const profile = matchProfile(options.profiles, source.name);
  const text =
    source.kind === 'raw-text' ? normalize(source.text, { noisePatterns: profile?.noisePatterns ?? [] }) : source.text;
  const docType = profile?.id ?? 'Unknown';
  const records = chunkCorpus(text, `${docType}_${source.name}`, {
    startId: collected.records.length,
    minWords: options.minWords,
  });
  collected.records.push(...records);
  process.stderr.write(`INFO: ${source.name} (${docType}): ${records.length} corpus records\n`);
  return { ...entry, statute: profile?.name, records: records.length };
}

function judgmentDocument(source: TextSource, collected: Collected): ManifestEntry {
  const text = source.kind === 'raw-text' ? normalize(source.text, { collapseParagraphs: true }) : source.text;
  const record = extractCaseRecord(text, { name: source.name, source: source.sourcePath });
  if (!record) {
    process.stderr.write(`INFO: ${source.name}: no statute mention, skipped\n`);
    return { source: source.sourcePath, status: 'skipped', error: 'no statute mention' };
  }

  collected.cases.push(record);
  process.stderr.write(`INFO: ${source.name}: ${record.statute_mentions.length} statute mentions\n`);
  return {
    source: source.sourcePath,
    status: 'processed',
    contentHash: computeContentHash(source.text),
    records: record.statute_mentions.length,
  };
}

async function processOne(
  sourcePath: string,
  options: DatasetOptions,
  registry: SourceRegistry,
  collected: Collected,
): Promise<ManifestEntry> {
  const source = await registry.read(sourcePath);
  if (!source) {
    process.stderr.write(`WARN: ${sourcePath}: empty source, skipped\n`);
    return { source: sourcePath, status: 'skipped', error: 'empty source' };
  }
  if (source.kind === 'sections') {
    return { source: sourcePath, status: 'skipped', error: 'section files carry no document text' };
  }
  return options.mode === 'corpus' ? corpusDocument(source, options, collected) : judgmentDocument(source, collected);
}

export async function runDataset(options: DatasetOptions): Promise<DatasetResult> {
  const registry = options.registry ?? createDefaultRegistry();
  const writer = options.writer ?? new CorpusWriter(options.outputDir);
  const startedAt = new Date().toISOString();

  const listed = await listSources(options.sourceDir, registry);
  const sources = listed.filter((path) => registry.getReader(basename(path))?.kind !== 'sections');
  process.stderr.write(`INFO: ${sources.length} ${options.mode} source files in ${options.sourceDir}\n`);

  const collected: Collected = { records: [], glossary: [], cases: [] };
  const documents: ManifestEntry[] = [];
  let aborted = false;

  for (const sourcePath of sources) {
    if (options.signal?.aborted) {
      process.stderr.write(`WARN: Run aborted before ${basename(sourcePath)}\n`);
      aborted = true;
      break;
    }

    try {
      documents.push(await processOne(sourcePath, options, registry, collected));
    } catch (err) {
      const message = describeError(err);
      process.stderr.write(`ERROR: ${sourcePath}: ${message}\n`);
      options.onError?.(err, { source: sourcePath });
      documents.push({ source: sourcePath, status: 'failed', error: message });
    }
  }

  const outputs =
    options.mode === 'corpus'
      ? [await writer.writeDataset(collected.records), await writer.writeGlossary(collected.glossary)]
      : [await writer.writeCases(collected.cases)];

  const manifest: DatasetManifest = {
    mode: options.mode,
    startedAt,
    finishedAt: new Date().toISOString(),
    aborted,
    documents,
    totals: {
      processed: documents.filter((d) => d.status === 'processed').length,
      skipped: documents.filter((d) => d.status === 'skipped').length,
      failed: documents.filter((d) => d.status === 'failed').length,
      records: options.mode === 'corpus' ? collected.records.length : collected.cases.length,
      glossaryTerms: collected.glossary.length,
    },
  };

  const manifestPath = await writer.writeDatasetManifest(manifest);
  return { manifest, manifestPath, outputs };
}
