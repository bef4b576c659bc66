/**
 * Combine pipeline:
 *
 * 1. Validate the input directory: it must exist and be listable (nothing is written if this fails)
 * 2. Merge rules: default pattern file, then config-file patterns, then --exclude
 * 3. Keep the output file out of its own input, comparing symlink-free paths
 * 4. Walk once, keep the entry list
 * 5. Render tree + content sections straight into the output file
 */

import { closeSync, mkdirSync, openSync, writeSync } from 'fs';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'path';
import { assertEncoding, createClassifier } from './classify.js';
import {
  ConfigError,
  NotADirectoryError,
  OutputWriteError,
  RootNotFoundError,
  RootUnreadableError,
  errorMessage,
} from './errors.js';
import { nodeFileSystem, type DirEntryKind, type FileSystem } from './fs.js';
import {
  DEFAULT_EXCLUDE_FILE,
  compileRules,
  formatRule,
  loadPatternFile,
  parseRules,
  type ExclusionRule,
  type PatternMatcher,
} from './patterns.js';
import { renderDocument, type OutputSink, type RenderConfig, type RenderSummary } from './render.js';
import { createConsoleReporter, type Reporter } from './reporter.js';
import { collectEntries, walkTree } from './walker.js';

export const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;
export const DEFAULT_OUTPUT_FILE = 'combined_files.txt';

export interface CombineOptions {
  rootDir: string;
  outputPath: string;
  /** User patterns, applied after every other rule */
  exclude?: string[];
  /** Patterns from a JSON config file, applied after the defaults */
  configExclude?: string[];
  /** Default pattern file; null disables default rules (default: bundled file) */
  excludeFile?: string | null;
  /** Bytes (default: 10MB) */
  maxFileSize?: number;
  /** Preferred encoding (default: utf-8) */
  encoding?: string;
  /** Second encoding to try; null marks undecodable files unreadable (default: latin1) */
  fallbackEncoding?: string | null;
  noTree?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export interface FileOutputSink extends OutputSink {
  close(): void;
}

export interface CombineDeps {
  fs?: FileSystem;
  reporter?: Reporter;
  now?: () => Date;
  openSink?: (outputPath: string) => FileOutputSink;
}

/**
 * Resolve paths, merge rules and validate settings.
 * Throws ConfigError for bad sizes, encodings or pattern files.
 */
export function buildRenderConfig(options: CombineOptions): RenderConfig {
  const maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
  if (!Number.isFinite(maxFileSize) || maxFileSize < 0) {
    throw new ConfigError(`Max file size must be a non-negative number. Got: ${maxFileSize}`);
  }

  const encoding = options.encoding ?? 'utf-8';
  const fallbackEncoding = options.fallbackEncoding === undefined ? 'latin1' : options.fallbackEncoding;
  assertEncoding(encoding);
  if (fallbackEncoding !== null) assertEncoding(fallbackEncoding);

  const excludeFile = options.excludeFile === undefined ? DEFAULT_EXCLUDE_FILE : options.excludeFile;
  const rules: ExclusionRule[] = [
    ...(excludeFile !== null ? loadPatternFile(resolve(excludeFile), 'default') : []),
    ...parseRules(options.configExclude ?? [], 'config'),
    ...parseRules(options.exclude ?? [], 'user'),
  ];

  return Object.freeze({
    rootDir: resolve(options.rootDir),
    outputPath: resolve(options.outputPath),
    rules: Object.freeze(rules),
    maxFileSize,
    encoding,
    fallbackEncoding,
    quiet: options.quiet ?? false,
    verbose: options.verbose ?? false,
    noTree: options.noTree ?? false,
  });
}

export function validateRoot(rootDir: string, fs: FileSystem = nodeFileSystem): void {
  let kind: DirEntryKind;
  try {
    kind = fs.stat(rootDir).kind;
  } catch {
    throw new RootNotFoundError(rootDir);
  }
  if (kind !== 'directory') throw new NotADirectoryError(rootDir);

  try {
    fs.readDir(rootDir);
  } catch (error) {
    throw new RootUnreadableError(rootDir, error);
  }
}

/**
 * Resolve symlinks in an absolute path. Missing trailing components (an output
 * file not written yet) are kept as given below their nearest existing parent.
 */
export function canonicalPath(absolutePath: string, fs: FileSystem = nodeFileSystem): string {
  try {
    return fs.realPath(absolutePath);
  } catch {
    const parent = dirname(absolutePath);
    if (parent === absolutePath) return absolutePath;
    return join(canonicalPath(parent, fs), basename(absolutePath));
  }
}

/** Root-relative slash path of the output file, or null when it lies outside the root */
export function outputPathInsideRoot(rootDir: string, outputPath: string): string | null {
  const rel = relative(rootDir, outputPath);
  if (!rel || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) return null;
  return rel.split(sep).join('/');
}

/**
 * Wrap the compiled rules: the output file is always excluded (no rule can
 * rescue it), and exclusions are logged in verbose mode.
 */
function withRunExclusions(matcher: PatternMatcher, outputRel: string | null, reporter: Reporter): PatternMatcher {
  return {
    rules: matcher.rules,
    match: matcher.match,
    included(relativePath, isDir) {
      if (outputRel !== null && relativePath === outputRel) {
        reporter.debug(`Excluded ${relativePath} (output file)`);
        return false;
      }
      const rule = matcher.match(relativePath, isDir);
      if (rule && !rule.negated) {
        reporter.debug(`Excluded ${relativePath}${isDir ? '/' : ''} (rule: ${formatRule(rule)})`);
        return false;
      }
      return true;
    },
  };
}

export function openFileSink(outputPath: string): FileOutputSink {
  let fd: number;
  try {
    mkdirSync(dirname(outputPath), { recursive: true });
    fd = openSync(outputPath, 'w');
  } catch (error) {
    throw new OutputWriteError(outputPath, error);
  }

  return {
    write(chunk) {
      try {
        writeSync(fd, chunk, null, 'utf-8');
      } catch (error) {
        throw new OutputWriteError(outputPath, error);
      }
    },
    close() {
      try {
        closeSync(fd);
      } catch (error) {
        throw new OutputWriteError(outputPath, error);
      }
    },
  };
}

/**
 * Run the whole pipeline and return the summary.
 * Throws CombineError subclasses for fatal failures.
 */
export function combineFiles(options: CombineOptions, deps: CombineDeps = {}): RenderSummary {
  const fs = deps.fs ?? nodeFileSystem;
  const openSink = deps.openSink ?? openFileSink;

  const config = buildRenderConfig(options);
  const reporter = deps.reporter ?? createConsoleReporter({ quiet: config.quiet, verbose: config.verbose });
  validateRoot(config.rootDir, fs);

  reporter.info(`Processing directory: ${config.rootDir}`);
  reporter.info(`Output file: ${config.outputPath}`);
  reporter.info(`Maximum file size: ${(config.maxFileSize / (1024 * 1024)).toFixed(1)}MB`);
  reporter.info(`Exclusion rules: ${config.rules.length > 0 ? config.rules.map(formatRule).join(', ') : '(none)'}`);

  const matcher = withRunExclusions(
    compileRules(config.rules),
    outputPathInsideRoot(canonicalPath(config.rootDir, fs), canonicalPath(config.outputPath, fs)),
    reporter
  );

  const entries = collectEntries(
    walkTree(config.rootDir, matcher, {
      fs,
      onWarning: message => reporter.warn(message),
    })
  );
  reporter.debug(`Walked ${entries.length} entries`);

  const classifier = createClassifier({
    fs,
    maxFileSize: config.maxFileSize,
    encoding: config.encoding,
    fallbackEncoding: config.fallbackEncoding,
  });

  const sink = openSink(config.outputPath);
  let summary: RenderSummary;
  try {
    summary = renderDocument(entries, classifier, config, sink, reporter, deps.now?.() ?? new Date());
  } finally {
    sink.close();
  }

  return summary;
}

/**
 * Invocation entry point: 0 on success, 1 on any fatal failure.
 */
export function combine(options: CombineOptions, deps: CombineDeps = {}): number {
  const reporter = deps.reporter ?? createConsoleReporter({ quiet: options.quiet, verbose: options.verbose });

  try {
    const summary = combineFiles(options, { ...deps, reporter });
    reporter.info(`✅ Done! Combined files written to ${resolve(options.outputPath)}`);
    reporter.info(
      `📦 ${summary.filesIncluded} file(s) included, ${summary.filesSkipped} skipped, ` +
        `${summary.filesFailed} failed (${(summary.bytesWritten / 1024).toFixed(1)}KB)`
    );
    return 0;
  } catch (error) {
    reporter.error(errorMessage(error));
    return 1;
  }
}
