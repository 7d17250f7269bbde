import { describe, it, expect } from 'vitest';
import {
  chunkText,
  chunkTextDetailed,
  chunkSection,
  contentBudget,
  effectiveOverlapWords,
  splitOversizedSentence,
  splitWordByCharacters,
} from '../src/chunking/chunker.js';
import { createMeasure } from '../src/chunking/measure.js';
import { SECTION_CHUNKING } from '../src/chunking/presets.js';
import { selectChunkOptions } from '../src/chunking/index.js';
import { countTokens, createTiktokenTokenizer, whitespaceTokenizer } from '../src/tokenizer/index.js';
import type { Tokenizer } from '../src/tokenizer/index.js';
import { ChunkerConfigError } from '../src/errors.js';

const VOCAB = [
  'the', 'accused', 'shall', 'be', 'punished', 'with', 'imprisonment', 'of', 'either', 'description',
  'for', 'a', 'term', 'which', 'may', 'extend', 'to', 'seven', 'years', 'and', 'liable', 'fine',
];

function sentence(words: number, offset: number): string {
  const body = Array.from({ length: words }, (_, i) => VOCAB[(i + offset) % VOCAB.length]).join(' ');
  return `${body}.`;
}

function words(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

describe('chunkText', () => {
  it('groups sentences up to the budget', () => {
    expect(chunkText('One two. Three four. Five six.', { maxTokens: 4, budgetUnit: 'words' })).toEqual([
      'One two. Three four.',
      'Five six.',
    ]);
  });

  it('keeps two tokens of headroom by default for token budgets', () => {
    expect(chunkText('One two. Three four. Five six.', { maxTokens: 6, tokenizer: whitespaceTokenizer })).toEqual([
      'One two. Three four.',
      'Five six.',
    ]);
  });

  it('returns no chunks for empty content', () => {
    expect(chunkText('', { maxTokens: 10, budgetUnit: 'words' })).toEqual([]);
    expect(chunkText('   ', { maxTokens: 10, budgetUnit: 'words' })).toEqual([]);
  });

  it('falls back to words for a sentence over the limit', () => {
    const result = chunkTextDetailed('Short one. a b c d e f g. End.', { maxTokens: 3, budgetUnit: 'words' });
    expect(result.chunks).toEqual(['Short one.', 'a b c', 'd e f', 'g.', 'End.']);
    expect(result.diagnostics.oversizedSentences).toBe(1);
    expect(result.diagnostics.sentences).toBe(3);
  });

  it('emits a sentence between the content budget and the limit on its own', () => {
    expect(chunkText('a b c d. e.', { maxTokens: 5, tokenizer: whitespaceTokenizer })).toEqual(['a b c d.', 'e.']);
  });

  it('cuts a single word longer than the budget by characters', () => {
    expect(chunkText('abcdefghij.', { maxTokens: 4, budgetUnit: 'characters' })).toEqual(['abcd', 'efgh', 'ij.']);
  });

  it('seeds the next chunk with trailing words in overlap mode', () => {
    const result = chunkTextDetailed('a1 a2 a3. b1 b2 b3. c1 c2 c3.', {
      maxTokens: 8,
      budgetUnit: 'words',
      overlapWords: 2,
    });
    expect(result.chunks).toEqual(['a1 a2 a3. b1 b2 b3.', 'b2 b3. c1 c2 c3.']);
    expect(result.diagnostics.overlapSeeds).toBe(1);
  });

  it('drops the overlap seed when it would not fit', () => {
    const result = chunkTextDetailed('a1 a2 a3 a4 a5. b1 b2 b3 b4 b5 b6 b7.', {
      maxTokens: 8,
      budgetUnit: 'words',
      overlapWords: 2,
    });
    expect(result.chunks).toEqual(['a1 a2 a3 a4 a5.', 'b1 b2 b3 b4 b5 b6 b7.']);
    expect(result.diagnostics.overlapSeeds).toBe(0);
  });

  it('loses no words when overlap is off', () => {
    const content = [sentence(12, 0), sentence(30, 3), sentence(5, 7), sentence(9, 1)].join(' ');
    const chunks = chunkText(content, { maxTokens: 10, budgetUnit: 'words' });
    expect(words(chunks.join(' '))).toEqual(words(content));
    expect(chunks.every((c) => words(c).length <= 10)).toBe(true);
  });

  it('counts a tokenizer failure as over budget and records it', () => {
    const flaky: Tokenizer = {
      tokenize(text) {
        if (text.includes('Bad sentence here.')) throw new Error('unsupported input');
        return whitespaceTokenizer.tokenize(text);
      },
    };
    const result = chunkTextDetailed('Alpha beta. Bad sentence here. Gamma.', { maxTokens: 10, tokenizer: flaky });
    expect(result.chunks).toEqual(['Alpha beta.', 'Bad sentence', 'here.', 'Gamma.']);
    expect(result.diagnostics.measureFailures.map((f) => f.sample)).toEqual([
      'Bad sentence here.',
      'Bad sentence here.',
    ]);
  });

  it('rejects invalid configuration', () => {
    expect(() => chunkText('a.', { maxTokens: 0, budgetUnit: 'words' })).toThrow(ChunkerConfigError);
    expect(() => chunkText('a.', { maxTokens: 2, tokenizer: whitespaceTokenizer })).toThrow(ChunkerConfigError);
    expect(() => chunkText('a.', { maxTokens: 10 })).toThrow(ChunkerConfigError);
  });
});

describe('chunk budget with a BPE tokenizer', () => {
  const tokenizer = createTiktokenTokenizer();

  it('keeps every chunk of a long section within 510 tokens', () => {
    const parts: string[] = [];
    for (let i = 0; i < 400; i++) {
      parts.push(sentence(12, i));
      if (i === 200) parts.push(sentence(900, 5));
    }
    const content = parts.join(' ');
    expect(words(content).length).toBeGreaterThan(5000);

    const result = chunkTextDetailed(content, { ...SECTION_CHUNKING, tokenizer });

    expect(result.diagnostics.oversizedSentences).toBe(1);
    expect(result.diagnostics.measureFailures).toEqual([]);
    for (const chunk of result.chunks) {
      expect(countTokens(tokenizer, chunk)).toBeLessThanOrEqual(510);
    }
    expect(words(result.chunks.join(' '))).toEqual(words(content));
  });
});

describe('budget helpers', () => {
  it('contentBudget subtracts the reserve', () => {
    expect(contentBudget({ maxTokens: 510 })).toBe(508);
    expect(contentBudget({ maxTokens: 510, reserve: 0 })).toBe(510);
    expect(contentBudget({ maxTokens: 1000, budgetUnit: 'characters' })).toBe(1000);
  });

  it('effectiveOverlapWords caps the request', () => {
    expect(effectiveOverlapWords({ maxTokens: 1000, budgetUnit: 'characters', overlapWords: 80 })).toBe(50);
    expect(effectiveOverlapWords({ maxTokens: 20, budgetUnit: 'words', overlapWords: 30 })).toBe(5);
    expect(effectiveOverlapWords({ maxTokens: 20, budgetUnit: 'words' })).toBe(0);
  });

  it('splitOversizedSentence shrinks a group whose joined length exceeds the sum', () => {
    // Joining adds one unit per gap, so "ab cd" measures 5 while the words sum to 4.
    const measure = createMeasure('characters');
    expect(splitOversizedSentence('ab cd ef', 4, measure)).toEqual(['ab', 'cd', 'ef']);
  });

  it('splitWordByCharacters keeps each piece within budget', () => {
    expect(splitWordByCharacters('abcdefg', 3, createMeasure('characters'))).toEqual(['abc', 'def', 'g']);
  });

  it('selectChunkOptions applies overrides over the preset', () => {
    const options = selectChunkOptions('corpus', undefined, { overlapWords: 10 });
    expect(options).toEqual({
      maxTokens: 1000,
      budgetUnit: 'characters',
      reserve: 0,
      overlapWords: 10,
      tokenizer: undefined,
    });
  });
});

describe('chunkSection', () => {
  it('numbers chunks from 1 and carries section identity', () => {
    const chunks = chunkSection(
      { section_number: '36A', content: 'One two. Three four. Five six.', chapter: 'CHAPTER IV', statute: 'Test Code' },
      { maxTokens: 4, budgetUnit: 'words' },
    );
    expect(chunks).toEqual([
      { section_number: '36A', chunk_number: 1, content: 'One two. Three four.', statute: 'Test Code' },
      { section_number: '36A', chunk_number: 2, content: 'Five six.', statute: 'Test Code' },
    ]);
  });
});
