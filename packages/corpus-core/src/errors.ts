/**
 * FILE PURPOSE: Error types raised at the edges of the corpus pipeline
 *
 * WHY: The core itself is total (normalize/segment/chunk never throw on odd
 *      input). Errors only come from I/O, configuration and the tokenizer,
 *      and the driver needs to tell them apart to decide skip vs. fail.
 */

export class SourceReadError extends Error {
  readonly sourcePath: string;

  constructor(sourcePath: string, reason: string, options?: { cause?: unknown }) {
    super(`Cannot read source ${sourcePath}: ${reason}`, options);
    this.name = 'SourceReadError';
    this.sourcePath = sourcePath;
  }
}

export class TokenizerError extends Error {
  constructor(sample: string, options?: { cause?: unknown }) {
    const preview = sample.length > 40 ? `${sample.slice(0, 40)}…` : sample;
    super(`Tokenizer failed on "${preview}"`, options);
    this.name = 'TokenizerError';
  }
}

export class ChunkerConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChunkerConfigError';
  }
}

/** Message of an unknown thrown value, for log lines and manifest rows. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
