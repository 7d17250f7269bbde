import { describe, it, expect } from 'vitest';
import { chunkCorpus, splitParagraphs } from '../src/chunking/corpus.js';
import { whitespaceTokenizer } from '../src/tokenizer/index.js';
import type { Tokenizer } from '../src/tokenizer/index.js';

const SECTION_84 =
  'Section 84 states that nothing is an offence which is done by a person who, at the time of doing it, ' +
  'by reason of unsoundness of mind, is incapable of knowing the nature of the act.';

function sentenceOf(prefix: string): string {
  return `${Array.from({ length: 10 }, (_, i) => `${prefix}${i + 1}`).join(' ')}.`;
}

describe('splitParagraphs', () => {
  it('splits on blank lines and drops empty paragraphs', () => {
    expect(splitParagraphs('one\r\n\r\ntwo\n\n\n\n three \n\n')).toEqual(['one', 'two', 'three']);
  });
});

describe('chunkCorpus', () => {
  it('labels paragraphs with the latest chapter and section and drops short fragments', () => {
    const text = ['CHAPTER II General Exceptions', SECTION_84, '[TABLE] a | b [/TABLE]'].join('\n\n');
    expect(chunkCorpus(text, 'BNS_commentary')).toEqual([
      {
        id: 0,
        text: SECTION_84,
        source: 'BNS_commentary',
        doc_type: 'BNS',
        chapter: 'II',
        section: '84',
        length: 36,
      },
      {
        id: 1,
        text: '[TABLE] a | b [/TABLE]',
        source: 'BNS_commentary',
        doc_type: 'BNS',
        chapter: 'II',
        section: '84',
        length: 5,
      },
    ]);
  });

  it('uses Unknown labels before any heading', () => {
    const [record] = chunkCorpus(SECTION_84.replace('Section 84', 'This rule'), 'notes');
    expect(record?.chapter).toBe('Unknown');
    expect(record?.section).toBe('Unknown');
    expect(record?.doc_type).toBe('notes');
  });

  it('splits long paragraphs with the sentence chunker', () => {
    const paragraph = [sentenceOf('a'), sentenceOf('b'), sentenceOf('c')].join(' ');
    const records = chunkCorpus(paragraph, 'BSA_notes', {
      chunk: { budgetUnit: 'words', maxTokens: 25, overlapWords: 0 },
      minWords: 5,
      startId: 7,
    });
    expect(records.map((r) => [r.id, r.length])).toEqual([
      [7, 20],
      [8, 10],
    ]);
    expect(records[1]?.text).toBe(sentenceOf('c'));
  });

  it('sends a paragraph the tokenizer rejects to the chunker instead of throwing', () => {
    const flaky: Tokenizer = {
      tokenize(text) {
        if (text.includes('Bad sentence here.')) throw new Error('unsupported input');
        return whitespaceTokenizer.tokenize(text);
      },
    };
    const records = chunkCorpus('Alpha beta. Bad sentence here. Gamma.', 'notes', {
      chunk: { budgetUnit: 'tokens', tokenizer: flaky, maxTokens: 10, overlapWords: 0 },
      minWords: 0,
    });
    expect(records.map((r) => r.text)).toEqual(['Alpha beta.', 'Bad sentence', 'here.', 'Gamma.']);
  });
});
