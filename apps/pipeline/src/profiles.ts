/**
 * FILE PURPOSE: Statute profiles: per-statute segmentation settings loaded from JSON
 *
 * WHY: Each code has its own last section number and page furniture. Profiles
 *      keep those quirks in data so adding a statute needs no code change.
 * HOW: `config/statutes.json` is validated with zod. A source file picks the
 *      first profile whose `match` regex (case-insensitive) accepts its name.
 *
 * EXAMPLE:
 * ```typescript
 * const profiles = await loadProfiles(DEFAULT_PROFILES_PATH);
 * matchProfile(profiles, 'BNSS_2023')?.name; // 'Bharatiya Nagarik Suraksha Sanhita'
 * ```
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { describeError, noisePatternSchema } from '@statute-corpus/corpus-core';
import type { DocumentSettings } from '@statute-corpus/corpus-core';

export const DEFAULT_PROFILES_PATH = fileURLToPath(new URL('../config/statutes.json', import.meta.url));

export class ProfileConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProfileConfigError';
  }
}

function isValidRegex(source: string): boolean {
  try {
    new RegExp(source, 'i');
    return true;
  } catch {
    return false;
  }
}

export const statuteProfileSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  match: z.string().min(1).refine(isValidRegex, { message: 'not a valid regular expression' }),
  maxTokens: z.number().int().positive().optional(),
  maxSectionNumber: z.number().int().positive().optional(),
  markerDigits: z.number().int().min(1).max(6).optional(),
  mergePolicy: z.enum(['monotonic', 'consecutive']).optional(),
  noisePatterns: z.array(noisePatternSchema).default([]),
});

export const profileFileSchema = z.object({
  profiles: z.array(statuteProfileSchema),
});

export type StatuteProfile = z.output<typeof statuteProfileSchema>;

export async function loadProfiles(path: string): Promise<StatuteProfile[]> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ProfileConfigError(`Cannot read statute profiles at ${path}: ${describeError(err)}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ProfileConfigError(`Statute profiles at ${path} are not valid JSON: ${describeError(err)}`, { cause: err });
  }

  const parsed = profileFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ProfileConfigError(`Invalid statute profiles at ${path}: ${issues}`);
  }

  const seen = new Set<string>();
  for (const profile of parsed.data.profiles) {
    if (seen.has(profile.id)) {
      throw new ProfileConfigError(`Duplicate statute profile id "${profile.id}" in ${path}`);
    }
    seen.add(profile.id);
  }
  return parsed.data.profiles;
}

export function matchProfile(profiles: readonly StatuteProfile[], sourceName: string): StatuteProfile | undefined {
  return profiles.find((p) => new RegExp(p.match, 'i').test(sourceName));
}

export interface SettingDefaults {
  maxTokens: number;
  encoding: string;
}

/** Job settings for one document; without a profile the statute is named after the file. */
export function settingsFor(profile: StatuteProfile | undefined, defaults: SettingDefaults): DocumentSettings {
  return {
    statute: profile?.name,
    maxTokens: profile?.maxTokens ?? defaults.maxTokens,
    encoding: defaults.encoding,
    markerDigits: profile?.markerDigits,
    maxSectionNumber: profile?.maxSectionNumber,
    mergePolicy: profile?.mergePolicy,
    noisePatterns: profile?.noisePatterns ?? [],
  };
}
