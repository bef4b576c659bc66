export { combine, combineFiles, buildRenderConfig, validateRoot, canonicalPath, outputPathInsideRoot, openFileSink, DEFAULT_MAX_FILE_SIZE, DEFAULT_OUTPUT_FILE } from './combine.js';
export type { CombineOptions, CombineDeps, FileOutputSink } from './combine.js';

// Rules
export { parseRule, parseRules, parsePatternFile, loadPatternFile, compileRules, formatRule, DEFAULT_EXCLUDE_FILE } from './patterns.js';
export type { ExclusionRule, PatternMatcher, RuleSource } from './patterns.js';

// Walking
export { walkTree, collectEntries, compareNames } from './walker.js';
export type { TreeEntry, EntryKind, WalkOptions } from './walker.js';
export { nodeFileSystem } from './fs.js';
export type { FileSystem, DirEntry, DirEntryKind, FileStat } from './fs.js';

// Classification
export { createClassifier, looksBinary, decodeBytes, assertEncoding, BINARY_SAMPLE_BYTES, CONTROL_BYTE_RATIO } from './classify.js';
export type { ContentClassifier, FileRecord, FileKind, DecodeResult, ClassifierOptions } from './classify.js';

// Rendering
export { renderDocument, renderTree, formatTimestamp, fileSection, TREE_HEADER, CONTENT_HEADER, FILE_HEADER } from './render.js';
export type { RenderConfig, RenderSummary, OutputSink, SkippedFile } from './render.js';

// Reporting and errors
export { createConsoleReporter, silentReporter } from './reporter.js';
export type { Reporter, ConsoleReporterOptions } from './reporter.js';
export { CombineError, RootNotFoundError, NotADirectoryError, RootUnreadableError, OutputWriteError, ConfigError } from './errors.js';
export type { CombineErrorCode } from './errors.js';
