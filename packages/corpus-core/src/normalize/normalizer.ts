/**
 * FILE PURPOSE: Text normalizer, raw extracted statute text to cleaned text
 *
 * WHY: The segmenter's marker regexes assume page furniture, rules and soft
 *      line wraps are gone. Passes run in a fixed order because each one
 *      relies on the noise removed by the previous ones.
 * HOW: Pure function. A pass that finds nothing leaves the text unchanged.
 *      Removing one artifact can expose another (a digit-only line left
 *      behind once a stray glyph is dropped), so the pass sequence repeats
 *      until the output is stable, which keeps normalize() idempotent.
 */

import { compileNoisePatterns, DEFAULT_NOISE_PATTERNS } from './noise-patterns.js';
import type { CompiledNoisePattern, NoisePattern } from './noise-patterns.js';

export interface NormalizeOptions {
  /** Extra patterns appended to the defaults (statute-specific headers etc). */
  noisePatterns?: readonly NoisePattern[];
  /** Replace the default pattern table instead of extending it. */
  replaceDefaultPatterns?: boolean;
  /** Fold paragraph breaks into single spaces as well. */
  collapseParagraphs?: boolean;
}

const SEPARATOR_RUN_RE = /[-_=*~—–]{4,}/g;
const HYPHEN_WRAP_RE = /([A-Za-z])-\n(?=[a-z])/g;
const SOFT_WRAP_RE = /(?<!\n)\n(?!\n)/g;
const NON_ASCII_RE = /[^\x00-\x7F]+/g;

export function removeNoise(text: string, patterns: readonly CompiledNoisePattern[]): string {
  let out = text;
  for (const { regex, replacement } of patterns) {
    regex.lastIndex = 0;
    out = out.replace(regex, replacement);
  }
  return out;
}

export function removeSeparators(text: string): string {
  return text.replace(SEPARATOR_RUN_RE, ' ');
}

export function collapseWhitespace(text: string): string {
  return text
    .replace(/[^\S\n]+/g, ' ')
    .replace(/ ?\n ?/g, '\n')
    .replace(/\n{3,}/g, '\n\n');
}

export function repairLineBreaks(text: string): string {
  return text.replace(HYPHEN_WRAP_RE, '$1').replace(SOFT_WRAP_RE, ' ');
}

export function stripNonAscii(text: string): string {
  return text
    .replace(NON_ASCII_RE, '')
    .replace(/ {2,}/g, ' ')
    .replace(/ ?\n ?/g, '\n');
}

function runPasses(text: string, patterns: readonly CompiledNoisePattern[], collapseParagraphs: boolean): string {
  let out = removeNoise(text, patterns);
  out = removeSeparators(out);
  out = collapseWhitespace(out);
  out = repairLineBreaks(out);
  out = stripNonAscii(out);
  if (collapseParagraphs) {
    out = out.replace(/\s+/g, ' ');
  }
  return out.trim();
}

/**
 * Clean raw statute text.
 *
 * EXAMPLE:
 * ```typescript
 * normalize('[PAGE 3]\n1. Short ti-\ntle of the\nCode.')
 * // '1. Short title of the Code.'
 * ```
 */
export function normalize(raw: string, options: NormalizeOptions = {}): string {
  const table = options.replaceDefaultPatterns
    ? [...(options.noisePatterns ?? [])]
    : [...DEFAULT_NOISE_PATTERNS, ...(options.noisePatterns ?? [])];
  const patterns = compileNoisePatterns(table);
  const collapseParagraphs = options.collapseParagraphs ?? false;

  // Fixed point: removing one noise match can expose another ("[PA[PAGE 1]GE 2]").
  // The length bound only stops a profile pattern whose replacement never settles.
  let current = raw.replace(/\r\n?/g, '\n');
  for (let round = 0; round <= raw.length; round++) {
    const next = runPasses(current, patterns, collapseParagraphs);
    if (next === current) break;
    current = next;
  }
  return current;
}
