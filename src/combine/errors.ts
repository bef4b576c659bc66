/**
 * Fatal errors for a combine run. Per-file and per-directory problems are
 * not errors: they end up in the render summary as skipped/failed entries.
 */

export type CombineErrorCode =
    | 'ROOT_NOT_FOUND'
    | 'NOT_A_DIRECTORY'
    | 'ROOT_UNREADABLE'
    | 'OUTPUT_WRITE_FAILED'
    | 'CONFIG_INVALID';

export class CombineError extends Error {
    readonly code: CombineErrorCode;

    constructor(code: CombineErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'CombineError';
        this.code = code;
    }
}

export class RootNotFoundError extends CombineError {
    constructor(readonly rootDir: string) {
        super('ROOT_NOT_FOUND', `Input directory does not exist: ${rootDir}`);
        this.name = 'RootNotFoundError';
    }
}

export class NotADirectoryError extends CombineError {
    constructor(readonly rootDir: string) {
        super('NOT_A_DIRECTORY', `Input path is not a directory: ${rootDir}`);
        this.name = 'NotADirectoryError';
    }
}

export class RootUnreadableError extends CombineError {
    constructor(readonly rootDir: string, cause: unknown) {
        super('ROOT_UNREADABLE', `Cannot read input directory ${rootDir}: ${errorMessage(cause)}`, { cause });
        this.name = 'RootUnreadableError';
    }
}

export class OutputWriteError extends CombineError {
    constructor(readonly outputPath: string, cause: unknown) {
        super('OUTPUT_WRITE_FAILED', `Failed to write output file ${outputPath}: ${errorMessage(cause)}`, { cause });
        this.name = 'OutputWriteError';
    }
}

export class ConfigError extends CombineError {
    constructor(message: string) {
        super('CONFIG_INVALID', message);
        this.name = 'ConfigError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
