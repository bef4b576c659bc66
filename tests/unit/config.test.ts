import { describe, it, expect, afterEach, vi } from 'vitest';
import { loadConfig, resolveCombineOptions, CONFIG_TEMPLATE } from '../../src/config.js';
import type { CombineCliOptions } from '../../src/config.js';
import { writeFileSync, mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

// ── Helpers ─────────────────────────────────────────────────────────────────

const TEST_DIR = join(tmpdir(), 'combine-tree-config-test-' + Date.now());

function writeConfig(filename: string, content: unknown): string {
  mkdirSync(TEST_DIR, { recursive: true });
  const filepath = join(TEST_DIR, filename);
  writeFileSync(filepath, typeof content === 'string' ? content : JSON.stringify(content), 'utf-8');
  return filepath;
}

const CLI_DEFAULTS: CombineCliOptions = {
  maxSize: '10',
  exclude: [],
  fallback: true,
  tree: true,
};

// ── loadConfig ──────────────────────────────────────────────────────────────

describe('loadConfig', () => {
  afterEach(() => {
    try { rmSync(TEST_DIR, { recursive: true, force: true }); } catch { /* ignore */ }
    vi.restoreAllMocks();
  });

  it('throws if config file does not exist', () => {
    expect(() => loadConfig('/nonexistent/path/config.json'))
      .toThrow('Config file not found');
  });

  it('throws on invalid JSON', () => {
    const path = writeConfig('bad.json', '{ not valid json }');
    expect(() => loadConfig(path)).toThrow('Invalid JSON');
  });

  it('throws if config is an array', () => {
    const path = writeConfig('array.json', [1, 2, 3]);
    expect(() => loadConfig(path)).toThrow('must contain a JSON object');
  });

  it('loads a valid empty config', () => {
    const path = writeConfig('empty.json', {});
    expect(loadConfig(path)).toEqual({});
  });

  it('loads every field', () => {
    const path = writeConfig('full.json', {
      output: 'out.txt',
      noTree: true,
      exclude: ['dist', '!dist/keep.txt'],
      excludeFile: '/etc/combine/excludes.txt',
      maxSize: 2.5,
      encoding: 'utf-8',
      fallbackEncoding: 'windows-1252',
      quiet: true,
      verbose: false,
    });

    expect(loadConfig(path)).toEqual({
      output: 'out.txt',
      noTree: true,
      exclude: ['dist', '!dist/keep.txt'],
      excludeFile: '/etc/combine/excludes.txt',
      maxSize: 2.5,
      encoding: 'utf-8',
      fallbackEncoding: 'windows-1252',
      quiet: true,
      verbose: false,
    });
  });

  it('resolves a relative excludeFile from the config directory', () => {
    const path = writeConfig('rel.json', { excludeFile: 'patterns/excludes.txt' });
    expect(loadConfig(path).excludeFile).toBe(join(TEST_DIR, 'patterns', 'excludes.txt'));
  });

  it('accepts false to disable the fallback encoding', () => {
    const path = writeConfig('nofallback.json', { fallbackEncoding: false });
    expect(loadConfig(path).fallbackEncoding).toBe(false);
  });

  it('rejects wrongly typed values', () => {
    expect(() => loadConfig(writeConfig('a.json', { exclude: 'dist' }))).toThrow('Config "exclude" must be an array of strings');
    expect(() => loadConfig(writeConfig('b.json', { maxSize: '10' }))).toThrow('Config "maxSize" must be a number');
    expect(() => loadConfig(writeConfig('c.json', { noTree: 'yes' }))).toThrow('Config "noTree" must be a boolean');
    expect(() => loadConfig(writeConfig('d.json', { fallbackEncoding: true }))).toThrow('Config "fallbackEncoding" must be a string or false');
  });

  it('rejects a non-positive maxSize', () => {
    const path = writeConfig('zero.json', { maxSize: 0 });
    expect(() => loadConfig(path)).toThrow('Config "maxSize" must be greater than 0. Got: 0');
  });

  it('warns about unknown keys', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const path = writeConfig('unknown.json', { output: 'x.txt', colour: 'blue' });

    expect(loadConfig(path)).toEqual({ output: 'x.txt' });
    expect(warn).toHaveBeenCalledWith('Warning: Unknown config keys ignored: colour');
  });

  it('accepts its own template', () => {
    const path = writeConfig('template.json', CONFIG_TEMPLATE);
    expect(loadConfig(path)).toEqual(CONFIG_TEMPLATE);
  });
});

// ── resolveCombineOptions ───────────────────────────────────────────────────

describe('resolveCombineOptions', () => {
  it('uses hardcoded defaults with no config', () => {
    expect(resolveCombineOptions('.', undefined, CLI_DEFAULTS, {}, () => false)).toEqual({
      rootDir: '.',
      outputPath: 'combined_files.txt',
      configExclude: [],
      exclude: [],
      excludeFile: undefined,
      maxFileSize: 10 * 1024 * 1024,
      encoding: undefined,
      fallbackEncoding: undefined,
      noTree: false,
      quiet: false,
      verbose: false,
    });
  });

  it('lets config values fill in flags left at their defaults', () => {
    const options = resolveCombineOptions(
      'project',
      undefined,
      { ...CLI_DEFAULTS, exclude: ['*.tmp'] },
      { output: 'out.txt', maxSize: 2, exclude: ['dist'], noTree: true, fallbackEncoding: false, quiet: true },
      () => false
    );

    expect(options).toMatchObject({
      rootDir: 'project',
      outputPath: 'out.txt',
      configExclude: ['dist'],
      exclude: ['*.tmp'],
      maxFileSize: 2 * 1024 * 1024,
      noTree: true,
      fallbackEncoding: null,
      quiet: true,
    });
  });

  it('prefers flags given on the command line', () => {
    const options = resolveCombineOptions(
      'project',
      'explicit.txt',
      { ...CLI_DEFAULTS, maxSize: '1', encoding: 'utf-16le', fallbackEncoding: 'windows-1252' },
      { output: 'out.txt', maxSize: 2, encoding: 'utf-8', fallbackEncoding: false },
      name => ['maxSize', 'encoding', 'fallbackEncoding'].includes(name)
    );

    expect(options).toMatchObject({
      outputPath: 'explicit.txt',
      maxFileSize: 1024 * 1024,
      encoding: 'utf-16le',
      fallbackEncoding: 'windows-1252',
    });
  });

  it('rejects a non-positive --max-size like the config file does', () => {
    const fromCli = (name: string) => name === 'maxSize';
    expect(() => resolveCombineOptions('.', undefined, { ...CLI_DEFAULTS, maxSize: '0' }, {}, fromCli)).toThrow(
      '--max-size must be a number greater than 0. Got: 0'
    );
    expect(() => resolveCombineOptions('.', undefined, { ...CLI_DEFAULTS, maxSize: 'big' }, {}, fromCli)).toThrow(
      '--max-size must be a number greater than 0. Got: big'
    );
  });

  it('disables the fallback with --no-fallback', () => {
    const options = resolveCombineOptions(
      '.',
      undefined,
      { ...CLI_DEFAULTS, fallback: false, fallbackEncoding: 'latin1' },
      {},
      name => name === 'fallback' || name === 'fallbackEncoding'
    );
    expect(options.fallbackEncoding).toBeNull();
  });

  it('maps --no-tree to noTree', () => {
    const options = resolveCombineOptions('.', undefined, { ...CLI_DEFAULTS, tree: false }, { noTree: false }, name => name === 'tree');
    expect(options.noTree).toBe(true);
  });
});
