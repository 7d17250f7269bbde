import { describe, it, expect } from 'vitest';
import { ENTIRE_DOCUMENT, PRELIMINARY } from '../src/index.js';
import type { SectionRecord, ChunkRecord, DocumentStatus, ManifestEntry } from '../src/index.js';

describe('shared-types', () => {
  it('SectionRecord interface is importable and usable', () => {
    const section: SectionRecord = {
      section_number: '36A',
      content: 'Punishment for abetment.',
      chapter: 'CHAPTER IV',
      statute: 'Test Code',
    };
    expect(section.section_number).toBe('36A');
    expect(section.chapter).toBe('CHAPTER IV');
  });

  it('ChunkRecord carries a 1-based chunk number', () => {
    const chunk: ChunkRecord = {
      section_number: '2',
      chunk_number: 1,
      content: 'Definitions.',
      statute: 'Test Code',
    };
    expect(chunk.chunk_number).toBe(1);
  });

  it('chapter sentinels have their on-disk spelling', () => {
    expect(ENTIRE_DOCUMENT).toBe('Entire Document');
    expect(PRELIMINARY).toBe('Preliminary');
  });

  it('DocumentStatus constrains manifest rows', () => {
    const status: DocumentStatus = 'skipped';
    const entry: ManifestEntry = { source: 'missing.txt', status, error: 'ENOENT' };
    expect(['processed', 'skipped', 'failed']).toContain(entry.status);
  });
});
