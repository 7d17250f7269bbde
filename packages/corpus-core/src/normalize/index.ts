export { normalize, removeNoise, removeSeparators, collapseWhitespace, repairLineBreaks, stripNonAscii } from './normalizer.js';
export type { NormalizeOptions } from './normalizer.js';
export { DEFAULT_NOISE_PATTERNS, compileNoisePatterns } from './noise-patterns.js';
export type { NoisePattern, CompiledNoisePattern } from './noise-patterns.js';
