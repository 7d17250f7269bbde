/**
 * FILE PURPOSE: Statute mentions and case metadata from judgment text
 *
 * WHY: Judgments that cite the statutes link sections to real cases. Only
 *      cases that name one of the statutes are kept.
 * HOW: Sentence split, then per sentence a test against each statute's
 *      abbreviations and full names. The first section reference in a
 *      matching sentence is recorded with it. Case number, date and court
 *      come from the first match in the whole text.
 *
 * EDGE CASES:
 * - "BNS" never matches inside "BNSS"; "B.N.S." never matches the start of "B.N.S.S."
 * - A sentence naming two statutes yields two mentions with the same context
 * - Case numbers right after "Citation:" are skipped (they are report citations)
 */

import type { CaseRecord, StatuteMention } from '@statute-corpus/shared-types';
import { splitIntoSentences } from '../chunking/sentences.js';

export interface StatuteAlias {
  statute: string;
  /** Case-sensitive, never inside a longer word. */
  abbreviations: string[];
  /** Case-insensitive, any whitespace between words. */
  names: string[];
}

export const DEFAULT_STATUTE_ALIASES: readonly StatuteAlias[] = [
  {
    statute: 'BNS',
    abbreviations: ['BNS', 'B.N.S.'],
    names: ['Bharatiya Nyaya Sanhita', 'Bhartiya Nyaya Sanhita'],
  },
  {
    statute: 'BNSS',
    abbreviations: ['BNSS', 'B.N.S.S.'],
    names: ['Bharatiya Nagarik Suraksha Sanhita', 'Bhartiya Nagrik Suraksha Sanhita', 'Bhariya Nagrik Suraksha Sanhita'],
  },
  {
    statute: 'BSA',
    abbreviations: ['BSA', 'B.S.A.'],
    names: ['Bharatiya Sakshya Adhiniyam', 'Bhartiya Sakshya Adhiniyam', 'Bhartiya Shakshya Adhiniyam'],
  },
];

export interface CompiledStatuteAlias {
  statute: string;
  patterns: RegExp[];
}

export interface JudgmentMetadata {
  /** Empty when the text has no recognisable date. */
  judgmentDate: string;
  court: string;
}

const SECTION_REF_RE =
  /\b(?:sections?|sec\.?)\s*(\d+[A-Z]?(?:\([^)]+\))*(?:\s*,\s*\d+[A-Z]?(?:\([^)]+\))*)*(?:\s+and\s+\d+[A-Z]?(?:\([^)]+\))*)?)/i;

const CASE_NUMBER_RE = /\b((?:[A-Z0-9]+(?:\s*[/-]\s*[A-Z0-9]+)?\s+))?No\.?\s*-?\s*(\d+)(?:\s+of\s+(\d{4}))?\b/gi;
const CITATION_TAIL_RE = /Citation\s*:?\s*$/i;

const MONTHS = 'January|February|March|April|May|June|July|August|September|October|November|December';
const DATE_RE = new RegExp(
  String.raw`\b\d{1,2}[/-]\d{1,2}[/-]\d{2,4}\b|\b(?:${MONTHS})\s+\d{1,2},?\s+\d{4}\b|\b\d{1,2}\s+(?:${MONTHS}),?\s+\d{4}\b`,
);
const COURT_RE = /\b(?:Supreme Court|High Court|District Court)[^,.;\n]*/;

const STATUTE_TAG_RE = /_(?:BNSS|BNS|BSA)(?![A-Za-z])/g;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function compileStatuteAliases(aliases: readonly StatuteAlias[]): CompiledStatuteAlias[] {
  return aliases.map((alias) => {
    const patterns: RegExp[] = [];
    if (alias.abbreviations.length > 0) {
      const abbreviations = alias.abbreviations.map(escapeRegExp).join('|');
      patterns.push(new RegExp(`(?<![A-Za-z.])(?:${abbreviations})(?![A-Za-z])`));
    }
    if (alias.names.length > 0) {
      const names = alias.names.map((name) => name.trim().split(/\s+/).map(escapeRegExp).join('\\s+')).join('|');
      patterns.push(new RegExp(`\\b(?:${names})\\b`, 'i'));
    }
    return { statute: alias.statute, patterns };
  });
}

const DEFAULT_COMPILED = compileStatuteAliases(DEFAULT_STATUTE_ALIASES);

/** First section reference in a sentence, e.g. "221, 132 and 351(3)"; '' when none. */
export function findSectionReference(sentence: string): string {
  return SECTION_REF_RE.exec(sentence)?.[1] ?? '';
}

export function findStatuteMentions(
  text: string,
  aliases: readonly CompiledStatuteAlias[] = DEFAULT_COMPILED,
): StatuteMention[] {
  const mentions: StatuteMention[] = [];
  for (const sentence of splitIntoSentences(text)) {
    for (const alias of aliases) {
      if (!alias.patterns.some((pattern) => pattern.test(sentence))) continue;
      mentions.push({ statute: alias.statute, section: findSectionReference(sentence), context: sentence.trim() });
    }
  }
  return mentions;
}

/**
 * Case number in the form the court writes it, normalised to "<prefix> No. - <n> of <year>".
 *
 * EXAMPLE:
 * ```typescript
 * extractCaseId('BAIL APPLICATION No.2007 of 2024', 'fallback') // 'APPLICATION No. - 2007 of 2024'
 * ```
 */
export function extractCaseId(text: string, fallback: string): string {
  for (const match of text.matchAll(CASE_NUMBER_RE)) {
    const start = match.index ?? 0;
    if (CITATION_TAIL_RE.test(text.slice(Math.max(0, start - 50), start))) continue;
    const prefix = (match[1] ?? '').trim();
    const year = match[3] ? ` of ${match[3]}` : '';
    return `${prefix ? `${prefix} ` : ''}No. - ${match[2] ?? ''}${year}`;
  }
  return fallback;
}

export function extractJudgmentMetadata(text: string): JudgmentMetadata {
  return {
    judgmentDate: DATE_RE.exec(text)?.[0] ?? '',
    court: COURT_RE.exec(text)?.[0].trim() ?? '',
  };
}

/** "Sharma_vs_State_on_12_March_2024_BNS" → "Sharma vs State". */
export function caseTitleFromName(name: string): string {
  return name.replace(/_on_.*$/, '').replace(STATUTE_TAG_RE, '').replace(/_+/g, ' ').trim();
}

export interface CaseRecordOptions {
  /** Document name without its file suffix; fallback case id and title source. */
  name: string;
  source: string;
  aliases?: readonly CompiledStatuteAlias[];
}

/** Null when the judgment names none of the statutes. */
export function extractCaseRecord(text: string, options: CaseRecordOptions): CaseRecord | null {
  const mentions = findStatuteMentions(text, options.aliases);
  if (mentions.length === 0) return null;

  const metadata = extractJudgmentMetadata(text);
  return {
    case_id: extractCaseId(text, options.name),
    case_title: caseTitleFromName(options.name),
    judgment_date: metadata.judgmentDate,
    court: metadata.court,
    source: options.source,
    statute_mentions: mentions,
  };
}
