import { describe, it, expect } from 'vitest';
import { processDocument } from '../src/pipeline/process-document.js';
import type { ProcessOptions } from '../src/pipeline/process-document.js';
import { computeContentHash } from '../src/sources/types.js';
import type { SourceDocument } from '../src/sources/types.js';
import type { Tokenizer } from '../src/tokenizer/index.js';
import { whitespaceTokenizer } from '../src/tokenizer/index.js';

const RAW =
  '[PAGE 1]\nCHAPTER I\n1. Short title.\n2. Definitions.\nCHAPTER II\n3. Offences.\n3. (Explanation) further detail.';
const CLEANED =
  'CHAPTER I 1. Short title. 2. Definitions. CHAPTER II 3. Offences. 3. (Explanation) further detail.';

const WORDS: ProcessOptions = { statute: 'Test Code', chunk: { maxTokens: 50, budgetUnit: 'words' } };

describe('processDocument', () => {
  it('normalizes, segments and chunks raw text', () => {
    const source: SourceDocument = { kind: 'raw-text', name: 'TEST', sourcePath: '/in/TEST.txt', text: RAW };
    const result = processDocument(source, WORDS);

    expect(result.cleanedText).toBe(CLEANED);
    expect(result.contentHash).toBe(computeContentHash(CLEANED));
    expect(result.sections.map((s) => [s.chapter, s.section_number, s.content])).toEqual([
      ['CHAPTER I', '1', 'Short title.'],
      ['CHAPTER I', '2', 'Definitions.'],
      ['CHAPTER II', '3', 'Offences. (Explanation) further detail.'],
    ]);
    expect(result.chunks.map((c) => [c.section_number, c.chunk_number, c.statute])).toEqual([
      ['1', 1, 'Test Code'],
      ['2', 1, 'Test Code'],
      ['3', 1, 'Test Code'],
    ]);
    expect(result.stats).toEqual({
      statute: 'Test Code',
      chapters: 2,
      sections: 3,
      chunks: 3,
      mergedFragments: 1,
      discardedMarkers: 0,
      emptyChapters: 0,
      measureFailures: 0,
      lengths: { count: 3, max: 4, min: 1, average: 2.33, overLimit: 0 },
    });
  });

  it('skips normalization for cleaned text and names the statute after the file by default', () => {
    const source: SourceDocument = {
      kind: 'cleaned-text',
      name: 'BNS',
      sourcePath: '/in/BNS.clean.txt',
      text: '[PAGE 1] 1. Alpha.\n',
    };
    const result = processDocument(source, { chunk: { maxTokens: 50, budgetUnit: 'words' } });
    expect(result.cleanedText).toBe('[PAGE 1] 1. Alpha.');
    expect(result.statute).toBe('BNS');
    expect(result.sections).toEqual([
      { section_number: '1', content: 'Alpha.', chapter: 'Entire Document', statute: 'BNS' },
    ]);
  });

  it('resumes at chunking for section files', () => {
    const source: SourceDocument = {
      kind: 'sections',
      name: 'BSA',
      sourcePath: '/in/BSA_sections.json',
      sections: [
        { section_number: '1', content: 'One two. Three four. Five six.', chapter: 'CHAPTER I', statute: 'Evidence Code' },
        { section_number: '2', content: 'Seven.', chapter: 'CHAPTER I', statute: 'Evidence Code' },
      ],
    };
    const result = processDocument(source, { chunk: { maxTokens: 4, budgetUnit: 'words' } });

    expect(result.cleanedText).toBeNull();
    expect(result.report).toBeNull();
    expect(result.statute).toBe('Evidence Code');
    expect(result.chunks.map((c) => [c.section_number, c.chunk_number, c.content])).toEqual([
      ['1', 1, 'One two. Three four.'],
      ['1', 2, 'Five six.'],
      ['2', 1, 'Seven.'],
    ]);
    expect(result.stats.chapters).toBe(1);
    expect(result.stats.mergedFragments).toBe(0);
  });

  it('records tokenizer failures per section', () => {
    const flaky: Tokenizer = {
      tokenize(text) {
        if (text.includes('Definitions.')) throw new Error('unsupported input');
        return whitespaceTokenizer.tokenize(text);
      },
    };
    const source: SourceDocument = { kind: 'cleaned-text', name: 'TEST', sourcePath: '/in/TEST.clean.txt', text: CLEANED };
    const result = processDocument(source, { statute: 'Test Code', chunk: { maxTokens: 50, tokenizer: flaky } });

    expect(result.issues.map((i) => i.section_number)).toEqual(['2', '2', '2']);
    expect(result.issues[0]?.error.name).toBe('TokenizerError');
    expect(result.stats.measureFailures).toBe(3);
    // A failed measurement counts as over budget, so the lone word is cut where the failure starts.
    expect(result.chunks.filter((c) => c.section_number === '2').map((c) => c.content)).toEqual(['Definitions', '.']);
  });
});
