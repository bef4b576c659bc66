/**
 * Renderer - Tree diagram + per-file content sections.
 *
 * Document layout:
 *
 *   # File Tree - Generated on 2024-05-01 09:30:00
 *
 *   ├── README.md
 *   └── src
 *       └── main.ts
 *
 *   # Combined Files Content
 *
 *
 *   ### File: README.md
 *   <content>
 *
 *   ### File: src/main.ts
 *   <content>
 */

import { join } from 'path';
import type { ContentClassifier, FileRecord } from './classify.js';
import type { Reporter } from './reporter.js';
import type { ExclusionRule } from './patterns.js';
import type { TreeEntry } from './walker.js';

export interface RenderConfig {
  /** Absolute input directory */
  readonly rootDir: string;
  /** Absolute output file path */
  readonly outputPath: string;
  readonly rules: readonly ExclusionRule[];
  /** Bytes */
  readonly maxFileSize: number;
  readonly encoding: string;
  readonly fallbackEncoding: string | null;
  readonly quiet: boolean;
  readonly verbose: boolean;
  /** Skip the tree block and the content heading */
  readonly noTree: boolean;
}

export interface OutputSink {
  write(chunk: string): void;
}

export interface SkippedFile {
  path: string;
  reason: string;
}

export interface RenderSummary {
  /** Files written as content sections */
  filesIncluded: number;
  /** Binary and too-large files */
  filesSkipped: number;
  /** Unreadable files */
  filesFailed: number;
  bytesWritten: number;
  skipped: SkippedFile[];
}

export const TREE_HEADER = '# File Tree - Generated on';
export const CONTENT_HEADER = '# Combined Files Content';
export const FILE_HEADER = '### File:';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as YYYY-MM-DD HH:MM:SS */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Box-drawing lines for an entry list in walk order.
 * An entry is the last of its siblings when no later entry at the same depth
 * appears before the walk climbs back above it.
 */
export function renderTree(entries: readonly TreeEntry[]): string[] {
  const isLast: boolean[] = new Array<boolean>(entries.length);
  const seenAtDepth: boolean[] = [];

  for (let i = entries.length - 1; i >= 0; i--) {
    const depth = entries[i].depth;
    isLast[i] = !seenAtDepth[depth];
    seenAtDepth[depth] = true;
    seenAtDepth.length = depth + 1;
  }

  const lines: string[] = [];
  const ancestorLast: boolean[] = [];

  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    ancestorLast.length = entry.depth;

    const prefix = ancestorLast.map(last => (last ? '    ' : '│   ')).join('');
    const connector = isLast[i] ? '└── ' : '├── ';
    lines.push(`${prefix}${connector}${entry.name}`);

    ancestorLast[entry.depth] = isLast[i];
  }

  return lines;
}

export function fileSection(relativePath: string, content: string): string {
  return `\n\n${FILE_HEADER} ${relativePath}\n${content}`;
}

function describeSkip(record: FileRecord): string {
  if (record.kind === 'unreadable') return `unreadable (${record.reason ?? 'unknown error'})`;
  if (record.kind === 'too-large') return `too large (${record.size} bytes)`;
  return 'binary';
}

/**
 * Write the whole document to the sink. Only one file's content is held at a time.
 */
export function renderDocument(
  entries: readonly TreeEntry[],
  classifier: ContentClassifier,
  config: RenderConfig,
  sink: OutputSink,
  reporter: Reporter,
  now: Date = new Date()
): RenderSummary {
  const summary: RenderSummary = {
    filesIncluded: 0,
    filesSkipped: 0,
    filesFailed: 0,
    bytesWritten: 0,
    skipped: [],
  };

  const emit = (chunk: string) => {
    sink.write(chunk);
    summary.bytesWritten += Buffer.byteLength(chunk, 'utf-8');
  };

  if (!config.noTree) {
    const treeLines = renderTree(entries);
    emit([`${TREE_HEADER} ${formatTimestamp(now)}\n`, ...treeLines].join('\n'));
    emit(`\n\n${CONTENT_HEADER}\n`);
  }

  const files = entries.filter(entry => entry.kind === 'file');
  let processed = 0;

  for (const entry of files) {
    processed++;
    reporter.progress(processed, files.length);

    const record = classifier.inspect(entry, join(config.rootDir, entry.path));

    if (record.kind === 'text' && record.content !== undefined) {
      emit(fileSection(entry.path, record.content));
      summary.filesIncluded++;
      if (record.encoding && record.encoding !== config.encoding) {
        reporter.debug(`${entry.path}: decoded as ${record.encoding}`);
      }
      continue;
    }

    const reason = describeSkip(record);
    summary.skipped.push({ path: entry.path, reason });

    if (record.kind === 'unreadable') summary.filesFailed++;
    else summary.filesSkipped++;

    if (record.kind === 'binary') reporter.info(`Skipping ${entry.path}: ${reason}`);
    else reporter.warn(`Skipping ${entry.path}: ${reason}`);
  }

  reporter.done();
  return summary;
}
