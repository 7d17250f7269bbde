/**
 * FILE PURPOSE: Persist pipeline output to the output directory
 *
 * HOW: Per document: `<name>.clean.txt` (text sources only), `<name>_sections.json`
 *      and `<name>_chunks.json`. Per run: `manifest.json`. JSON is pretty-printed
 *      arrays in emission order so outputs diff cleanly between runs.
 *      The `.clean.txt` name is the one CleanedTextReader accepts, so a later
 *      run can resume from it.
 *      Dataset runs write one file per run instead: JSON Lines for corpus
 *      records and glossary terms, a JSON array for cases.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { DocumentResult } from '@statute-corpus/corpus-core';
import type { CaseRecord, CorpusRecord, DatasetManifest, DatasetMode, GlossaryEntry, RunManifest } from '@statute-corpus/shared-types';

export const MANIFEST_FILE = 'manifest.json';
export const DATASET_FILE = 'legal_dataset.jsonl';
export const GLOSSARY_FILE = 'glossary.jsonl';
export const CASES_FILE = 'cases.json';

export function toJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

/** One compact JSON value per line; empty string for no items. */
export function toJsonLines(items: readonly unknown[]): string {
  return items.map((item) => `${JSON.stringify(item)}\n`).join('');
}

export function datasetManifestFile(mode: DatasetMode): string {
  return `${mode}_manifest.json`;
}

export class CorpusWriter {
  constructor(readonly outputDir: string) {}

  private async write(fileName: string, content: string): Promise<string> {
    await mkdir(this.outputDir, { recursive: true });
    const path = join(this.outputDir, fileName);
    await writeFile(path, content, 'utf-8');
    return path;
  }

  /** Returns the paths written, in write order. */
  async writeDocument(result: DocumentResult): Promise<string[]> {
    const written: string[] = [];
    if (result.cleanedText !== null) {
      written.push(await this.write(`${result.name}.clean.txt`, `${result.cleanedText}\n`));
    }
    written.push(await this.write(`${result.name}_sections.json`, toJson(result.sections)));
    written.push(await this.write(`${result.name}_chunks.json`, toJson(result.chunks)));
    return written;
  }

  async writeManifest(manifest: RunManifest): Promise<string> {
    return this.write(MANIFEST_FILE, toJson(manifest));
  }

  async writeDataset(records: readonly CorpusRecord[]): Promise<string> {
    return this.write(DATASET_FILE, toJsonLines(records));
  }

  async writeGlossary(entries: readonly GlossaryEntry[]): Promise<string> {
    return this.write(GLOSSARY_FILE, toJsonLines(entries));
  }

  async writeCases(cases: readonly CaseRecord[]): Promise<string> {
    return this.write(CASES_FILE, toJson(cases));
  }

  async writeDatasetManifest(manifest: DatasetManifest): Promise<string> {
    return this.write(datasetManifestFile(manifest.mode), toJson(manifest));
  }
}
