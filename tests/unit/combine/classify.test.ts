import { describe, it, expect } from 'vitest';
import {
  createClassifier,
  looksBinary,
  decodeBytes,
  assertEncoding,
  BINARY_SAMPLE_BYTES,
  ConfigError,
} from '../../../src/combine/index.js';
import type { TreeEntry } from '../../../src/combine/index.js';
import { createMemoryFileSystem } from '../../helpers/memory-fs.js';

const ROOT = '/proj';

function entry(path: string): TreeEntry {
  return { path, name: path.split('/').pop() ?? path, kind: 'file', depth: path.split('/').length - 1 };
}

const bytes = (...values: number[]) => new Uint8Array(values);

describe('looksBinary', () => {
  it('treats empty input as text', () => {
    expect(looksBinary(bytes())).toBe(false);
  });

  it('flags a NUL byte', () => {
    expect(looksBinary(bytes(0x68, 0x69, 0x00, 0x21))).toBe(true);
  });

  it('accepts ordinary text with tabs and newlines', () => {
    expect(looksBinary(new TextEncoder().encode('a\tb\r\nc\f\u001b[0m'))).toBe(false);
  });

  it('flags a high ratio of control bytes', () => {
    expect(looksBinary(bytes(0x01, 0x02, 0x03, 0x04, 0x61))).toBe(true);
  });

  it('keeps exactly 30% control bytes as text', () => {
    expect(looksBinary(bytes(0x01, 0x02, 0x7f, 0x61, 0x62, 0x63, 0x64, 0x65, 0x66, 0x67))).toBe(false);
  });

  it('treats high bytes as printable', () => {
    expect(looksBinary(bytes(0x63, 0x61, 0x66, 0xe9))).toBe(false);
  });
});

describe('decodeBytes', () => {
  it('decodes valid UTF-8', () => {
    expect(decodeBytes(new TextEncoder().encode('héllo'), ['utf-8'])).toEqual({
      ok: true,
      content: 'héllo',
      encoding: 'utf-8',
    });
  });

  it('falls through to the next encoding', () => {
    expect(decodeBytes(bytes(0x63, 0x61, 0x66, 0xe9), ['utf-8', 'latin1'])).toEqual({
      ok: true,
      content: 'café',
      encoding: 'latin1',
    });
  });

  it('reports every encoding tried', () => {
    expect(decodeBytes(bytes(0xff), ['utf-8'])).toEqual({ ok: false, reason: 'not valid utf-8' });
  });
});

describe('assertEncoding', () => {
  it('accepts known labels', () => {
    expect(assertEncoding('utf8')).toBe('utf-8');
  });

  it('rejects unknown labels', () => {
    expect(() => assertEncoding('klingon')).toThrow(ConfigError);
    expect(() => assertEncoding('klingon')).toThrow('Unsupported encoding: klingon');
  });
});

describe('createClassifier', () => {
  const fs = createMemoryFileSystem(ROOT, {
    'hello.txt': 'hello',
    'bom.txt': bytes(0xef, 0xbb, 0xbf, 0x68, 0x69),
    'image.bin': bytes(0x89, 0x50, 0x4e, 0x47, 0x00, 0x01),
    'latin.txt': bytes(0x63, 0x61, 0x66, 0xe9),
    'empty.txt': '',
    'late-nul.txt': new Uint8Array([...new Array<number>(BINARY_SAMPLE_BYTES).fill(0x61), 0x00]),
    dir: {},
  });

  const classifier = createClassifier({ fs, maxFileSize: 1024 });

  it('classifies text and binary files', () => {
    expect(classifier.classify(`${ROOT}/hello.txt`)).toBe('text');
    expect(classifier.classify(`${ROOT}/image.bin`)).toBe('binary');
    expect(classifier.classify(`${ROOT}/missing.txt`)).toBe('unreadable');
  });

  it('reads text content', () => {
    expect(classifier.inspect(entry('hello.txt'), `${ROOT}/hello.txt`)).toEqual({
      entry: entry('hello.txt'),
      kind: 'text',
      size: 5,
      content: 'hello',
      encoding: 'utf-8',
    });
  });

  it('strips a UTF-8 byte order mark', () => {
    expect(classifier.inspect(entry('bom.txt'), `${ROOT}/bom.txt`).content).toBe('hi');
  });

  it('treats an empty file as text', () => {
    const record = classifier.inspect(entry('empty.txt'), `${ROOT}/empty.txt`);
    expect(record.kind).toBe('text');
    expect(record.content).toBe('');
  });

  it('never reads binary content', () => {
    const record = classifier.inspect(entry('image.bin'), `${ROOT}/image.bin`);
    expect(record).toEqual({ entry: entry('image.bin'), kind: 'binary', size: 6 });
  });

  it('only samples the start of the file', () => {
    const record = classifier.inspect(entry('late-nul.txt'), `${ROOT}/late-nul.txt`);
    expect(record.kind).toBe('too-large');

    const roomy = createClassifier({ fs, maxFileSize: BINARY_SAMPLE_BYTES * 2 });
    expect(roomy.classify(`${ROOT}/late-nul.txt`)).toBe('text');
  });

  it('falls back to latin1 by default', () => {
    const record = classifier.inspect(entry('latin.txt'), `${ROOT}/latin.txt`);
    expect(record.kind).toBe('text');
    expect(record.content).toBe('café');
    expect(record.encoding).toBe('latin1');
  });

  it('marks undecodable files unreadable when the fallback is disabled', () => {
    const strict = createClassifier({ fs, maxFileSize: 1024, fallbackEncoding: null });
    expect(strict.inspect(entry('latin.txt'), `${ROOT}/latin.txt`)).toEqual({
      entry: entry('latin.txt'),
      kind: 'unreadable',
      size: 4,
      reason: 'not valid utf-8',
    });
  });

  it('agrees with inspect when a file cannot be decoded', () => {
    const strict = createClassifier({ fs, maxFileSize: 1024, fallbackEncoding: null });
    expect(strict.classify(`${ROOT}/latin.txt`)).toBe('unreadable');
    expect(classifier.classify(`${ROOT}/latin.txt`)).toBe('text');
  });

  it('honours a custom preferred encoding', () => {
    const utf16 = createMemoryFileSystem(ROOT, { 'wide.txt': bytes(0x68, 0x00, 0x69, 0x00) });
    const custom = createClassifier({ fs: utf16, maxFileSize: 1024, encoding: 'utf-16le' });
    expect(custom.read(`${ROOT}/wide.txt`)).toEqual({ ok: true, content: 'hi', encoding: 'utf-16le' });
  });

  it('marks files above the ceiling too-large without reading them', () => {
    const small = createClassifier({ fs, maxFileSize: 4 });
    expect(small.inspect(entry('hello.txt'), `${ROOT}/hello.txt`)).toEqual({
      entry: entry('hello.txt'),
      kind: 'too-large',
      size: 5,
    });
  });

  it('keeps files exactly at the ceiling', () => {
    const exact = createClassifier({ fs, maxFileSize: 5 });
    expect(exact.inspect(entry('hello.txt'), `${ROOT}/hello.txt`).kind).toBe('text');
  });

  it('records the reason for read failures', () => {
    const record = classifier.inspect(entry('missing.txt'), `${ROOT}/missing.txt`);
    expect(record.kind).toBe('unreadable');
    expect(record.reason).toBe(`ENOENT: no such file or directory, stat '${ROOT}/missing.txt'`);
  });

  it('rejects unknown encodings up front', () => {
    expect(() => createClassifier({ fs, maxFileSize: 1, encoding: 'nope' })).toThrow(ConfigError);
    expect(() => createClassifier({ fs, maxFileSize: 1, fallbackEncoding: 'nope' })).toThrow(ConfigError);
  });
});
