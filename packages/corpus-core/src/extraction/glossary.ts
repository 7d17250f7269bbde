/**
 * FILE PURPOSE: Term/definition extraction from glossary documents
 *
 * HOW: Line-based. A term is a run of capitalised lines made of letters,
 *      spaces, hyphens, parentheses and slashes. Its definition is the lines
 *      that follow, up to the next line that starts with a capital letter.
 *
 * EDGE CASES:
 * - A definition must start with something other than a capital letter
 *   ("the act of ...", "1. release of ..."); a term followed by a capitalised line is dropped
 * - A capitalised line with digits or punctuation resets the pending term
 * - Blank lines are ignored, so a definition may span paragraphs
 */

import type { GlossaryEntry } from '@statute-corpus/shared-types';

const TERM_LINE_RE = /^[A-Z][A-Za-z\s\-()/]*$/;

function collapse(parts: readonly string[]): string {
  return parts.join(' ').replace(/\s+/g, ' ').trim();
}

export function extractGlossaryTerms(text: string): GlossaryEntry[] {
  const entries: GlossaryEntry[] = [];
  let term: string[] = [];
  let definition: string[] = [];

  const close = (): void => {
    if (term.length > 0 && definition.length > 0) {
      entries.push({ term: collapse(term), definition: collapse(definition) });
    }
    term = [];
    definition = [];
  };

  for (const raw of text.replace(/\r\n?/g, '\n').split('\n')) {
    const line = raw.trim();
    if (!line) continue;

    if (/^[A-Z]/.test(line)) {
      if (definition.length > 0) close();
      if (TERM_LINE_RE.test(line)) {
        term.push(line);
      } else {
        term = [];
      }
      continue;
    }

    // Text before the first term has nothing to attach to.
    if (term.length > 0) definition.push(line);
  }
  close();

  return entries;
}
