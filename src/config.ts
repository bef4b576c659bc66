/**
 * CLI Config File Support
 *
 * One JSON file for the settings you would otherwise repeat on every run:
 * - Output (output, noTree)
 * - Exclusions (exclude, excludeFile)
 * - Reading (maxSize, encoding, fallbackEncoding)
 * - Misc (quiet, verbose)
 *
 * All fields optional. Priority: CLI flags > config file > hardcoded defaults.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve, dirname, isAbsolute } from 'path';
import { ConfigError } from './combine/errors.js';
import { DEFAULT_OUTPUT_FILE, type CombineOptions } from './combine/combine.js';

export interface CliConfig {
    // Output
    output?: string;
    noTree?: boolean;

    // Exclusions
    /** Extra patterns, applied after the default pattern file */
    exclude?: string[];
    /** Replaces the bundled default pattern file */
    excludeFile?: string;

    // Reading
    /** Max file size in MB */
    maxSize?: number;
    encoding?: string;
    /** false disables the fallback */
    fallbackEncoding?: string | false;

    // Misc
    quiet?: boolean;
    verbose?: boolean;
}

export const CONFIG_FILE_NAME = 'combine-tree.config.json';

// ── Validation helpers ──────────────────────────────────────────────────────

const KNOWN_KEYS = new Set<string>([
    'output', 'noTree',
    'exclude', 'excludeFile',
    'maxSize', 'encoding', 'fallbackEncoding',
    'quiet', 'verbose',
]);

function assertString(obj: Record<string, unknown>, key: string): string {
    const val = obj[key];
    if (typeof val !== 'string') throw new ConfigError(`Config "${key}" must be a string`);
    return val;
}

function assertNumber(obj: Record<string, unknown>, key: string): number {
    const val = obj[key];
    if (typeof val !== 'number') throw new ConfigError(`Config "${key}" must be a number`);
    return val;
}

function assertBoolean(obj: Record<string, unknown>, key: string): boolean {
    const val = obj[key];
    if (typeof val !== 'boolean') throw new ConfigError(`Config "${key}" must be a boolean`);
    return val;
}

function assertStringArray(obj: Record<string, unknown>, key: string): string[] {
    const val = obj[key];
    if (!Array.isArray(val) || !val.every((v): v is string => typeof v === 'string')) {
        throw new ConfigError(`Config "${key}" must be an array of strings`);
    }
    return val;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Main loader ─────────────────────────────────────────────────────────────

/**
 * Load and validate a CLI config file.
 *
 * - Resolves configPath relative to CWD
 * - A relative excludeFile resolves from the config file's directory
 * - Throws on missing file, invalid JSON or wrongly typed values
 */
export function loadConfig(configPath: string): CliConfig {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new ConfigError(`Config file not found: ${absolutePath}`);
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch {
        throw new ConfigError(`Failed to read config file: ${absolutePath}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new ConfigError(`Invalid JSON in config file: ${absolutePath}`);
    }

    if (!isRecord(parsed)) {
        throw new ConfigError(`Config file must contain a JSON object: ${absolutePath}`);
    }

    const obj = parsed;

    const unknownKeys = Object.keys(obj).filter(k => !KNOWN_KEYS.has(k));
    if (unknownKeys.length > 0) {
        console.warn(`Warning: Unknown config keys ignored: ${unknownKeys.join(', ')}`);
    }

    const config: CliConfig = {};
    const configDir = dirname(absolutePath);

    // Output
    if (obj.output !== undefined) config.output = assertString(obj, 'output');
    if (obj.noTree !== undefined) config.noTree = assertBoolean(obj, 'noTree');

    // Exclusions
    if (obj.exclude !== undefined) config.exclude = assertStringArray(obj, 'exclude');
    if (obj.excludeFile !== undefined) {
        const p = assertString(obj, 'excludeFile');
        config.excludeFile = isAbsolute(p) ? p : resolve(configDir, p);
    }

    // Reading
    if (obj.maxSize !== undefined) {
        const mb = assertNumber(obj, 'maxSize');
        if (mb <= 0) throw new ConfigError(`Config "maxSize" must be greater than 0. Got: ${mb}`);
        config.maxSize = mb;
    }
    if (obj.encoding !== undefined) config.encoding = assertString(obj, 'encoding');
    if (obj.fallbackEncoding !== undefined) {
        if (obj.fallbackEncoding === false) config.fallbackEncoding = false;
        else if (typeof obj.fallbackEncoding === 'string') config.fallbackEncoding = obj.fallbackEncoding;
        else throw new ConfigError('Config "fallbackEncoding" must be a string or false');
    }

    // Misc
    if (obj.quiet !== undefined) config.quiet = assertBoolean(obj, 'quiet');
    if (obj.verbose !== undefined) config.verbose = assertBoolean(obj, 'verbose');

    return config;
}

// ── CLI merge ───────────────────────────────────────────────────────────────

/** Option values as commander hands them to the combine action */
export interface CombineCliOptions {
    maxSize: string;
    exclude: string[];
    excludeFile?: string;
    encoding?: string;
    fallbackEncoding?: string;
    /** false when --no-fallback is given */
    fallback: boolean;
    /** false when --no-tree is given */
    tree: boolean;
    quiet?: boolean;
    verbose?: boolean;
    configPath?: string;
}

/**
 * Merge CLI flags over config file values.
 * Priority: CLI flags > config file > hardcoded defaults.
 * Exclusions are not overridden but stacked: config patterns first, then --exclude.
 * Throws ConfigError for a --max-size that is not a positive number.
 */
export function resolveCombineOptions(
    inputDir: string,
    outputFile: string | undefined,
    options: CombineCliOptions,
    config: CliConfig,
    fromCli: (name: string) => boolean
): CombineOptions {
    const pick = <T>(name: string, cliValue: T, configValue: T | undefined): T =>
        !fromCli(name) && configValue !== undefined ? configValue : cliValue;

    const maxSizeMb = pick('maxSize', parseFloat(options.maxSize), config.maxSize);
    if (!Number.isFinite(maxSizeMb) || maxSizeMb <= 0) {
        throw new ConfigError(`--max-size must be a number greater than 0. Got: ${options.maxSize}`);
    }

    let fallbackEncoding: string | null | undefined = options.fallbackEncoding;
    if (!fromCli('fallbackEncoding') && config.fallbackEncoding !== undefined) {
        fallbackEncoding = config.fallbackEncoding === false ? null : config.fallbackEncoding;
    }
    if (!options.fallback) fallbackEncoding = null;

    return {
        rootDir: inputDir,
        outputPath: outputFile ?? config.output ?? DEFAULT_OUTPUT_FILE,
        configExclude: config.exclude ?? [],
        exclude: options.exclude,
        excludeFile: pick('excludeFile', options.excludeFile, config.excludeFile),
        maxFileSize: Math.floor(maxSizeMb * 1024 * 1024),
        encoding: pick('encoding', options.encoding, config.encoding),
        fallbackEncoding,
        noTree: pick('tree', !options.tree, config.noTree),
        quiet: pick('quiet', options.quiet ?? false, config.quiet),
        verbose: pick('verbose', options.verbose ?? false, config.verbose),
    };
}

// ── Default template ────────────────────────────────────────────────────────

/**
 * Default config template for `init` command.
 */
export const CONFIG_TEMPLATE: CliConfig = {
    output: 'combined_files.txt',
    noTree: false,

    exclude: ['dist', 'coverage', '*.lock'],

    maxSize: 10,
    encoding: 'utf-8',
    fallbackEncoding: 'latin1',

    quiet: false,
    verbose: false,
};
