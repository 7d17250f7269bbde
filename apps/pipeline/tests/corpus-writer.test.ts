import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { processDocument } from '@statute-corpus/corpus-core';
import { CorpusWriter, DATASET_FILE, GLOSSARY_FILE, MANIFEST_FILE, toJson, toJsonLines } from '../src/services/corpus-writer.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'statute-writer-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

const CHUNKING = { maxTokens: 50, budgetUnit: 'words' as const };

describe('CorpusWriter', () => {
  it('writes cleaned text, sections and chunks for a text source', async () => {
    const result = processDocument(
      { kind: 'raw-text', name: 'TC', sourcePath: '/in/TC.txt', text: '1. Short\ntitle. 2. Definitions.' },
      { statute: 'Test Code', chunk: CHUNKING },
    );
    const out = join(dir, 'nested', 'out');
    const writer = new CorpusWriter(out);

    const written = await writer.writeDocument(result);

    expect(written).toEqual([join(out, 'TC.clean.txt'), join(out, 'TC_sections.json'), join(out, 'TC_chunks.json')]);
    expect(await readFile(join(out, 'TC.clean.txt'), 'utf-8')).toBe('1. Short title. 2. Definitions.\n');
    expect(JSON.parse(await readFile(join(out, 'TC_sections.json'), 'utf-8'))).toEqual([
      { section_number: '1', content: 'Short title.', chapter: 'Entire Document', statute: 'Test Code' },
      { section_number: '2', content: 'Definitions.', chapter: 'Entire Document', statute: 'Test Code' },
    ]);
    expect(JSON.parse(await readFile(join(out, 'TC_chunks.json'), 'utf-8'))).toEqual([
      { section_number: '1', chunk_number: 1, content: 'Short title.', statute: 'Test Code' },
      { section_number: '2', chunk_number: 1, content: 'Definitions.', statute: 'Test Code' },
    ]);
  });

  it('skips the cleaned text file for a section source', async () => {
    const result = processDocument(
      {
        kind: 'sections',
        name: 'TC',
        sourcePath: '/in/TC_sections.json',
        sections: [{ section_number: '1', content: 'Alpha.', statute: 'Test Code' }],
      },
      { chunk: CHUNKING },
    );
    const written = await new CorpusWriter(dir).writeDocument(result);
    expect(written).toEqual([join(dir, 'TC_sections.json'), join(dir, 'TC_chunks.json')]);
  });

  it('pretty-prints JSON with a trailing newline', () => {
    expect(toJson([{ a: 1 }])).toBe('[\n  {\n    "a": 1\n  }\n]\n');
  });

  it('writes the manifest under a fixed name', async () => {
    const path = await new CorpusWriter(dir).writeManifest({
      startedAt: '2026-01-01T00:00:00.000Z',
      finishedAt: '2026-01-01T00:00:01.000Z',
      maxTokens: 510,
      encoding: 'cl100k_base',
      aborted: false,
      documents: [],
      totals: {
        processed: 0,
        skipped: 0,
        failed: 0,
        stats: {
          statute: 'all',
          chapters: 0,
          sections: 0,
          chunks: 0,
          mergedFragments: 0,
          discardedMarkers: 0,
          emptyChapters: 0,
          measureFailures: 0,
          lengths: { count: 0, max: 0, min: 0, average: 0, overLimit: 0 },
        },
      },
    });
    expect(path).toBe(join(dir, MANIFEST_FILE));
    expect(JSON.parse(await readFile(path, 'utf-8'))).toMatchObject({ maxTokens: 510, documents: [] });
  });

  it('writes one compact JSON value per line', () => {
    expect(toJsonLines([{ a: 1 }, { b: 'x y' }])).toBe('{"a":1}\n{"b":"x y"}\n');
    expect(toJsonLines([])).toBe('');
  });

  it('writes corpus records and glossary terms as JSON Lines', async () => {
    const writer = new CorpusWriter(dir);
    const dataset = await writer.writeDataset([
      { id: 0, text: 'Alpha beta.', source: 'BNS_notes', doc_type: 'BNS', chapter: 'I', section: '3', length: 2 },
    ]);
    const glossary = await writer.writeGlossary([{ term: 'BAIL', definition: 'release pending trial.' }]);

    expect(dataset).toBe(join(dir, DATASET_FILE));
    expect(await readFile(dataset, 'utf-8')).toBe(
      '{"id":0,"text":"Alpha beta.","source":"BNS_notes","doc_type":"BNS","chapter":"I","section":"3","length":2}\n',
    );
    expect(glossary).toBe(join(dir, GLOSSARY_FILE));
    expect(await readFile(glossary, 'utf-8')).toBe('{"term":"BAIL","definition":"release pending trial."}\n');
  });

  it('names the dataset manifest after the mode', async () => {
    const path = await new CorpusWriter(dir).writeDatasetManifest({
      mode: 'judgments',
      startedAt: '2026-01-01T00:00:00.000Z',
      finishedAt: '2026-01-01T00:00:01.000Z',
      aborted: false,
      documents: [],
      totals: { processed: 0, skipped: 0, failed: 0, records: 0, glossaryTerms: 0 },
    });
    expect(path).toBe(join(dir, 'judgments_manifest.json'));
  });
});
