/**
 * Progress / status side channel. The pipeline only talks to a Reporter,
 * the CLI plugs in the console one.
 */

export interface Reporter {
    /** Status line (suppressed when quiet) */
    info(message: string): void;
    /** Extra detail (only when verbose) */
    debug(message: string): void;
    /** Recoverable problem (always shown) */
    warn(message: string): void;
    /** Fatal problem (always shown) */
    error(message: string): void;
    progress(processed: number, total: number): void;
    /** Finish any in-place progress line */
    done(): void;
}

export interface ConsoleReporterOptions {
    quiet?: boolean;
    verbose?: boolean;
    /** Where the progress line goes (default: process.stdout) */
    stream?: { write(chunk: string): unknown };
}

export function createConsoleReporter(options: ConsoleReporterOptions = {}): Reporter {
    const { quiet = false, verbose = false } = options;
    const stream = options.stream ?? process.stdout;
    let progressActive = false;

    // Keep the progress line intact: break it before printing anything else
    const breakLine = () => {
        if (progressActive) {
            stream.write('\n');
            progressActive = false;
        }
    };

    return {
        info(message) {
            if (quiet) return;
            breakLine();
            console.log(message);
        },
        debug(message) {
            if (quiet || !verbose) return;
            breakLine();
            console.log(`  ${message}`);
        },
        warn(message) {
            breakLine();
            console.warn(`⚠️  ${message}`);
        },
        error(message) {
            breakLine();
            console.error(`❌ ${message}`);
        },
        progress(processed, total) {
            if (quiet) return;
            const percent = total === 0 ? 100 : (processed / total) * 100;
            stream.write(`\rProcessing files... ${processed}/${total} (${percent.toFixed(1)}%)`);
            progressActive = true;
        },
        done() {
            breakLine();
        },
    };
}

/** Reporter that drops everything */
export const silentReporter: Reporter = {
    info() {},
    debug() {},
    warn() {},
    error() {},
    progress() {},
    done() {},
};
