#!/usr/bin/env node

/**
 * combine-tree CLI
 *
 * Combine a directory's text files into one document, preceded by a file tree.
 */

import { Command } from 'commander';
import { existsSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import { createRequire } from 'module';
import { combine, DEFAULT_OUTPUT_FILE, type CombineOptions } from './combine/index.js';
import {
    loadConfig,
    resolveCombineOptions,
    CONFIG_FILE_NAME,
    CONFIG_TEMPLATE,
    type CliConfig,
    type CombineCliOptions,
} from './config.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();

program
    .name('combine-tree')
    .description('Combine directory contents into a single text file')
    .version(pkg.version);

/**
 * Combine command - default
 */
program
    .command('combine', { isDefault: true })
    .description('Write a file tree and the contents of every text file into one document')
    .argument('[input_dir]', 'Input directory path', '.')
    .argument('[output_file]', `Output file path (default: ${DEFAULT_OUTPUT_FILE})`)
    .option('--max-size <mb>', 'Maximum file size in MB to process', '10')
    .option('-e, --exclude <pattern>', 'Exclude pattern, "!pattern" to force-include (can be used multiple times)', (value: string, previous: string[]) => previous.concat([value]), [] as string[])
    .option('--exclude-file <path>', 'Pattern file replacing the default exclusions')
    .option('--encoding <label>', 'Preferred text encoding (default: utf-8)')
    .option('--fallback-encoding <label>', 'Encoding to try when the preferred one fails (default: latin1)')
    .option('--no-fallback', 'Mark files that fail to decode as unreadable')
    .option('--no-tree', 'Skip generating the file tree at the beginning of the output')
    .option('-q, --quiet', 'Suppress progress output and non-error messages')
    .option('--verbose', 'Verbose output')
    .option('--config-path <path>', `Path to config JSON file (e.g. ${CONFIG_FILE_NAME})`)
    .action((inputDir: string, outputFile: string | undefined, options: CombineCliOptions, command: Command) => {
        let config: CliConfig = {};
        let combineOptions: CombineOptions;
        try {
            if (options.configPath) config = loadConfig(options.configPath);
            combineOptions = resolveCombineOptions(
                inputDir,
                outputFile,
                options,
                config,
                name => command.getOptionValueSource(name) === 'cli'
            );
        } catch (error) {
            console.error('Error:', error instanceof Error ? error.message : error);
            process.exit(1);
        }

        if (combineOptions.verbose && options.configPath) {
            console.log(`📄 Config loaded from: ${resolve(options.configPath)}`);
        }

        process.exitCode = combine(combineOptions);
    });

/**
 * Init command - create a starter config file
 */
program
    .command('init')
    .description('Create a starter config file')
    .argument('[path]', 'Output path for config file', CONFIG_FILE_NAME)
    .action((outputPath: string) => {
        try {
            const absolutePath = resolve(outputPath);
            if (existsSync(absolutePath)) {
                console.error(`Error: File already exists: ${absolutePath}`);
                console.error('Delete it first or choose a different path.');
                process.exit(1);
            }
            const content = JSON.stringify(CONFIG_TEMPLATE, null, 2) + '\n';
            writeFileSync(absolutePath, content, 'utf-8');
            console.log(`Created config file: ${absolutePath}`);
            console.log(`Use it with: combine-tree <input_dir> --config-path ${outputPath}`);
        } catch (error) {
            console.error('Error:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

// Parse arguments and run
program.parse();
