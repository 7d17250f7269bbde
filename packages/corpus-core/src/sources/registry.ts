/**
 * FILE PURPOSE: Registry that dispatches a source file to the matching reader
 *
 * WHY: New input formats plug in without touching the driver.
 * HOW: First reader whose canHandle() accepts the file name wins, so more
 *      specific suffixes (`.clean.txt`) must be registered before generic ones (`.txt`).
 */

import { basename } from 'node:path';
import { CleanedTextReader, RawTextReader } from './readers/text.js';
import { SectionJsonReader } from './readers/sections.js';
import type { SourceDocument, SourceReader } from './types.js';

export class SourceRegistry {
  private readers: SourceReader[] = [];

  register(reader: SourceReader): void {
    this.readers.push(reader);
  }

  getReader(fileName: string): SourceReader | undefined {
    return this.readers.find((r) => r.canHandle(fileName));
  }

  canHandle(fileName: string): boolean {
    return this.getReader(fileName) !== undefined;
  }

  /** Null when no reader handles the file or the file is empty. */
  async read(sourcePath: string): Promise<SourceDocument | null> {
    const reader = this.getReader(basename(sourcePath));
    if (!reader) return null;
    return reader.read(sourcePath);
  }

  supportedSuffixes(): string[] {
    return [...new Set(this.readers.map((r) => r.suffix))];
  }
}

export function createDefaultRegistry(): SourceRegistry {
  const registry = new SourceRegistry();
  registry.register(new SectionJsonReader());
  registry.register(new CleanedTextReader());
  registry.register(new RawTextReader());
  return registry;
}
