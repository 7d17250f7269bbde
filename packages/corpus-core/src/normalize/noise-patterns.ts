/**
 * FILE PURPOSE: Noise pattern table for the text normalizer
 *
 * WHY: Statute PDFs differ in their headers, watermarks and page furniture.
 *      Keeping the patterns as data lets a statute profile add its own
 *      entries without forking the normalizer.
 */

/** One removal rule. `pattern` is a regex source; `flags` default to `gi`. */
export interface NoisePattern {
  name: string;
  pattern: string;
  flags?: string;
  replacement?: string;
}

export const DEFAULT_NOISE_PATTERNS: readonly NoisePattern[] = [
  { name: 'page-marker', pattern: String.raw`\[PAGE\s*\d+\]` },
  // Gazette masthead runs up to the first digit (the page or section number that follows it).
  { name: 'gazette-header', pattern: String.raw`THE\s+GAZETTE\s+OF\s+INDIA\s+EXTRAORDINARY.*?(?=\d)` },
  { name: 'watermark-url', pattern: String.raw`https?://\S*indiankanoon\S*` },
  { name: 'watermark-name', pattern: String.raw`\bindian\s*kanoon\b` },
  { name: 'page-number-line', pattern: String.raw`^[ \t]*\d+[ \t]*$`, flags: 'gm' },
];

export interface CompiledNoisePattern {
  name: string;
  regex: RegExp;
  replacement: string;
}

export function compileNoisePatterns(patterns: readonly NoisePattern[]): CompiledNoisePattern[] {
  return patterns.map((p) => {
    const flags = p.flags ?? 'gi';
    return {
      name: p.name,
      regex: new RegExp(p.pattern, flags.includes('g') ? flags : `${flags}g`),
      replacement: p.replacement ?? '',
    };
  });
}
