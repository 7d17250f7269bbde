/**
 * FILE PURPOSE: Environment configuration for the corpus pipeline app
 *
 * HOW: Every setting has a default so a local run needs no environment.
 *      CLI arguments override SOURCE_DIR / OUTPUT_DIR / STATUTE_PROFILES.
 */

import { DEFAULT_ENCODING, SECTION_CHUNKING } from '@statute-corpus/corpus-core';
import { DEFAULT_PROFILES_PATH } from './profiles.js';

export interface PipelineConfig {
  sourceDir: string;
  outputDir: string;
  maxTokens: number;
  encoding: string;
  profilesPath: string;
  redisUrl: string | undefined;
  workerConcurrency: number;
  sentryDsn: string | undefined;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function positiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  return {
    sourceDir: env.SOURCE_DIR ?? 'data/statutes',
    outputDir: env.OUTPUT_DIR ?? 'data/corpus',
    maxTokens: positiveInt(env, 'MAX_TOKENS', SECTION_CHUNKING.maxTokens),
    encoding: env.TOKENIZER_ENCODING ?? DEFAULT_ENCODING,
    profilesPath: env.STATUTE_PROFILES ?? DEFAULT_PROFILES_PATH,
    redisUrl: env.REDIS_URL || undefined,
    workerConcurrency: positiveInt(env, 'WORKER_CONCURRENCY', 5),
    sentryDsn: env.SENTRY_DSN || undefined,
  };
}
