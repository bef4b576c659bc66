/**
 * Content Classifier - Decides text vs binary and decodes text files.
 *
 * Binary heuristic (fixed so results are reproducible):
 *   - sample the first BINARY_SAMPLE_BYTES bytes
 *   - any NUL byte => binary
 *   - more than CONTROL_BYTE_RATIO of the sample being control bytes
 *     (other than \t \n \r \f \b and ESC) => binary
 *   - otherwise text; empty files are text
 */

import type { FileSystem } from './fs.js';
import type { TreeEntry } from './walker.js';
import { ConfigError, errorMessage } from './errors.js';

export const BINARY_SAMPLE_BYTES = 8000;
export const CONTROL_BYTE_RATIO = 0.3;

export type FileKind = 'text' | 'binary' | 'unreadable' | 'too-large';

export interface FileRecord {
    entry: TreeEntry;
    kind: FileKind;
    size: number;
    /** Decoded content, only for kind 'text' */
    content?: string;
    /** Encoding that decoded the content */
    encoding?: string;
    /** Why the file is unreadable */
    reason?: string;
}

export type DecodeResult =
    | { ok: true; content: string; encoding: string }
    | { ok: false; reason: string };

export interface ClassifierOptions {
    fs: FileSystem;
    maxFileSize: number;
    /** Tried first (default utf-8) */
    encoding?: string;
    /** Tried when the preferred encoding fails; null disables the fallback */
    fallbackEncoding?: string | null;
}

export interface ContentClassifier {
    classify(absolutePath: string): FileKind;
    read(absolutePath: string): DecodeResult;
    inspect(entry: TreeEntry, absolutePath: string): FileRecord;
}

const ALLOWED_CONTROL = new Set([0x08, 0x09, 0x0a, 0x0c, 0x0d, 0x1b]);

export function looksBinary(sample: Uint8Array): boolean {
    if (sample.length === 0) return false;

    let control = 0;
    for (const byte of sample) {
        if (byte === 0) return true;
        if ((byte < 0x20 && !ALLOWED_CONTROL.has(byte)) || byte === 0x7f) control++;
    }
    return control / sample.length > CONTROL_BYTE_RATIO;
}

/** Throws ConfigError for labels the runtime decoder does not know */
export function assertEncoding(label: string): string {
    try {
        return new TextDecoder(label).encoding;
    } catch {
        throw new ConfigError(`Unsupported encoding: ${label}`);
    }
}

export function decodeBytes(bytes: Uint8Array, encodings: readonly string[]): DecodeResult {
    for (const label of encodings) {
        try {
            const content = new TextDecoder(label, { fatal: true }).decode(bytes);
            return { ok: true, content, encoding: label };
        } catch {
            continue;
        }
    }
    return { ok: false, reason: `not valid ${encodings.join(' or ')}` };
}

export function createClassifier(options: ClassifierOptions): ContentClassifier {
    const { fs, maxFileSize } = options;
    const encoding = options.encoding ?? 'utf-8';
    const fallback = options.fallbackEncoding === undefined ? 'latin1' : options.fallbackEncoding;

    assertEncoding(encoding);
    if (fallback !== null) assertEncoding(fallback);

    const encodings = fallback !== null && fallback !== encoding ? [encoding, fallback] : [encoding];

    function read(absolutePath: string): DecodeResult {
        let bytes: Uint8Array;
        try {
            bytes = fs.readFile(absolutePath);
        } catch (error) {
            return { ok: false, reason: errorMessage(error) };
        }
        return decodeBytes(bytes, encodings);
    }

    function examine(absolutePath: string): Omit<FileRecord, 'entry'> {
        let size: number;
        try {
            size = fs.stat(absolutePath).size;
        } catch (error) {
            return { kind: 'unreadable', size: 0, reason: errorMessage(error) };
        }

        if (size > maxFileSize) return { kind: 'too-large', size };

        let sample: Uint8Array;
        try {
            sample = fs.readPrefix(absolutePath, BINARY_SAMPLE_BYTES);
        } catch (error) {
            return { kind: 'unreadable', size, reason: errorMessage(error) };
        }
        if (looksBinary(sample)) return { kind: 'binary', size };

        const decoded = read(absolutePath);
        if (!decoded.ok) return { kind: 'unreadable', size, reason: decoded.reason };

        return { kind: 'text', size, content: decoded.content, encoding: decoded.encoding };
    }

    return {
        classify: absolutePath => examine(absolutePath).kind,
        read,
        inspect: (entry, absolutePath) => ({ entry, ...examine(absolutePath) }),
    };
}
