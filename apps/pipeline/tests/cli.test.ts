import { describe, it, expect } from 'vitest';
import { UsageError, parseCliArgs } from '../src/cli.js';
import { loadConfig } from '../src/config.js';

const config = loadConfig({ SOURCE_DIR: '/env/in', OUTPUT_DIR: '/env/out', STATUTE_PROFILES: '/env/profiles.json' });

describe('parseCliArgs', () => {
  it('falls back to the environment for directories and profiles', () => {
    expect(parseCliArgs([], config)).toEqual({
      mode: 'statutes',
      sourceDir: '/env/in',
      outputDir: '/env/out',
      profilesPath: '/env/profiles.json',
      queue: false,
      rechunk: false,
    });
  });

  it('takes positional directories and flags', () => {
    expect(parseCliArgs(['in', 'out', '--profiles', 'p.json', '--queue', '--rechunk'], config)).toEqual({
      mode: 'statutes',
      sourceDir: 'in',
      outputDir: 'out',
      profilesPath: 'p.json',
      queue: true,
      rechunk: true,
    });
  });

  it('rejects unknown flags and extra positionals', () => {
    expect(() => parseCliArgs(['--verbose'], config)).toThrow(UsageError);
    expect(() => parseCliArgs(['a', 'b', 'c'], config)).toThrow('Unexpected argument "c"');
  });

  it('selects a dataset mode', () => {
    expect(parseCliArgs(['--mode', 'corpus'], config).mode).toBe('corpus');
    expect(parseCliArgs(['in', '--mode=judgments'], config)).toMatchObject({ mode: 'judgments', sourceDir: 'in' });
  });

  it('rejects unknown modes and statute-only flags in dataset modes', () => {
    expect(() => parseCliArgs(['--mode', 'cases'], config)).toThrow('Unknown mode "cases"');
    expect(() => parseCliArgs(['--mode', 'corpus', '--queue'], config)).toThrow('--queue applies to statute runs only');
    expect(() => parseCliArgs(['--mode', 'judgments', '--rechunk'], config)).toThrow(UsageError);
  });
});
