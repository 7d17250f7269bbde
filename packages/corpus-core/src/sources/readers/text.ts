/**
 * FILE PURPOSE: Plain-text source readers (raw extraction output and pre-cleaned text)
 * WHY: Same file format, different starting stage. Cleaned text skips the normalizer.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { SourceReadError, describeError } from '../../errors.js';
import type { SourceKind, SourceReader, TextSource } from '../types.js';
import { stripSuffix } from '../types.js';

abstract class TextFileReader implements SourceReader {
  abstract readonly kind: Extract<SourceKind, 'raw-text' | 'cleaned-text'>;
  abstract readonly suffix: string;

  canHandle(fileName: string): boolean {
    return fileName.toLowerCase().endsWith(this.suffix);
  }

  async read(sourcePath: string): Promise<TextSource | null> {
    let text: string;
    try {
      text = await readFile(sourcePath, 'utf-8');
    } catch (err) {
      throw new SourceReadError(sourcePath, describeError(err), { cause: err });
    }
    if (!text.trim()) return null;

    return {
      kind: this.kind,
      name: stripSuffix(basename(sourcePath), this.suffix),
      sourcePath,
      text,
    };
  }
}

/** `*.txt` straight from the page-text extractor. */
export class RawTextReader extends TextFileReader {
  readonly kind = 'raw-text' as const;
  readonly suffix = '.txt';
}

/** `*.clean.txt` written by a previous run or cleaned by hand. */
export class CleanedTextReader extends TextFileReader {
  readonly kind = 'cleaned-text' as const;
  readonly suffix = '.clean.txt';
}
