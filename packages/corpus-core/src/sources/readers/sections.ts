/**
 * FILE PURPOSE: Reader for `*_sections.json` files from an earlier segmentation run
 * WHY: Re-chunking with a new budget or tokenizer should not re-run
 *      segmentation. The file is validated because it may have been edited by hand.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { z } from 'zod';
import { SourceReadError, describeError } from '../../errors.js';
import type { SectionsSource, SourceReader } from '../types.js';
import { stripSuffix } from '../types.js';

export const sectionRecordSchema = z.object({
  // Older files stored the number as an integer.
  section_number: z.union([z.string(), z.number().int()]).transform(String),
  content: z.string(),
  chapter: z.string().optional(),
  statute: z.string(),
});

export const sectionFileSchema = z.array(sectionRecordSchema);

export class SectionJsonReader implements SourceReader {
  readonly kind = 'sections' as const;
  readonly suffix = '_sections.json';

  canHandle(fileName: string): boolean {
    return fileName.toLowerCase().endsWith(this.suffix);
  }

  async read(sourcePath: string): Promise<SectionsSource | null> {
    let raw: string;
    try {
      raw = await readFile(sourcePath, 'utf-8');
    } catch (err) {
      throw new SourceReadError(sourcePath, describeError(err), { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new SourceReadError(sourcePath, `invalid JSON (${describeError(err)})`, { cause: err });
    }

    const parsed = sectionFileSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown shape';
      throw new SourceReadError(sourcePath, `not a section list (${where})`);
    }
    if (parsed.data.length === 0) return null;

    return {
      kind: 'sections',
      name: stripSuffix(basename(sourcePath), this.suffix),
      sourcePath,
      sections: parsed.data,
    };
  }
}
