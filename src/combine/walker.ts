/**
 * Tree Walker - Lazy depth-first enumeration of the input directory.
 *
 * Children are ordered by code-unit comparison of their names (case-sensitive,
 * directories and files interleaved). Excluded directories are pruned before
 * they are read.
 */

import { join } from 'path';
import type { FileSystem } from './fs.js';
import type { PatternMatcher } from './patterns.js';

export type EntryKind = 'directory' | 'file';

export interface TreeEntry {
  /** Root-relative, slash-separated */
  readonly path: string;
  readonly name: string;
  readonly kind: EntryKind;
  /** 0 for direct children of the root */
  readonly depth: number;
}

export interface WalkOptions {
  fs: FileSystem;
  /** Called for directories that cannot be listed; the walk continues */
  onWarning?: (message: string, path: string) => void;
}

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function* walkTree(
  rootDir: string,
  matcher: PatternMatcher,
  options: WalkOptions
): Generator<TreeEntry, void, undefined> {
  yield* walkDir(rootDir, '', 0, matcher, options);
}

function* walkDir(
  absoluteDir: string,
  relativeDir: string,
  depth: number,
  matcher: PatternMatcher,
  options: WalkOptions
): Generator<TreeEntry, void, undefined> {
  let children;
  try {
    children = options.fs.readDir(absoluteDir);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    options.onWarning?.(`Cannot read directory ${relativeDir || '.'}: ${reason}`, relativeDir);
    return;
  }

  const sorted = [...children].sort((a, b) => compareNames(a.name, b.name));

  for (const child of sorted) {
    if (child.kind === 'other') continue;

    const path = relativeDir ? `${relativeDir}/${child.name}` : child.name;
    const isDir = child.kind === 'directory';

    if (!matcher.included(path, isDir)) continue;

    yield Object.freeze({ path, name: child.name, kind: child.kind, depth });

    // Linked directories are listed but never entered
    if (isDir && !child.symlink) {
      yield* walkDir(join(absoluteDir, child.name), path, depth + 1, matcher, options);
    }
  }
}

/** Drain a walk into an array so it can be iterated more than once */
export function collectEntries(entries: Iterable<TreeEntry>): TreeEntry[] {
  return Array.from(entries);
}
