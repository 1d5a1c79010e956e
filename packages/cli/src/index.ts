#!/usr/bin/env -S node --import tsx
/**
 * Keyword Classifier CLI
 *
 * The CLI owns all file I/O and console output. Core receives bytes and
 * dictionaries and returns results plus warnings.
 */

import { COLUMN_NAMING, SEED_NAMES, VERSION } from '@keyword-classifier/shared';
import type { ColumnNaming, SeedName } from '@keyword-classifier/shared';
import { classifyFile } from './commands/classify.js';
import { exportDictionary, showDictionary } from './commands/dict.js';
import { initWorkspace } from './commands/init.js';
import { startSession } from './commands/session.js';
import { parseArgs } from './utils/args.js';
import { log, error, errorMessage } from './utils/console.js';

const USAGE = `Keyword Classifier CLI v${VERSION}

Usage:
  kwclass classify <input.csv> [options]   Classify statements in a CSV file
      --dictionary <file>    JSON dictionary (default: config, then seed)
      --column <name>        Statement column (skips auto-detection)
      --naming <convention>  ${COLUMN_NAMING.join(' | ')}
      --filter <category>    Only write rows where the category is present
      --out <dir>            Output directory (default: outputs/<input name>)
      --dry-run              Classify without writing files
      --force                Overwrite existing outputs
      --yes                  Answer yes to prompts
  kwclass dict show [--dictionary <file>]  List categories and keywords
  kwclass dict export [file]               Write the dictionary as JSON
  kwclass session [input.csv]              Interactive editing session
  kwclass init [--seed <name>]             Create keyword-classifier.yaml
                                           seeds: ${SEED_NAMES.join(', ')}

All commands accept --workspace <dir>.

Example:
  kwclass classify campaign_statements.csv --filter urgency_marketing`;

async function main(argv: string[]): Promise<number> {
    const [command, ...rest] = argv;

    switch (command) {
        case undefined:
        case 'help':
        case '--help':
            log(USAGE);
            return 0;
        case '--version':
            log(VERSION);
            return 0;
        case 'classify': {
            const args = parseArgs(
                rest,
                ['dictionary', 'column', 'naming', 'filter', 'out', 'workspace'],
                ['dry-run', 'force', 'yes']
            );
            const input = args.positionals[0];
            if (!input) {
                throw new Error('Missing input file. Usage: kwclass classify <input.csv>');
            }
            return classifyFile(input, {
                dryRun: args.flags.has('dry-run'),
                force: args.flags.has('force'),
                yes: args.flags.has('yes'),
                dictionary: args.values.get('dictionary'),
                column: args.values.get('column'),
                naming: parseNaming(args.values.get('naming')),
                filter: args.values.get('filter'),
                out: args.values.get('out'),
                workspace: args.values.get('workspace'),
            });
        }
        case 'dict': {
            const args = parseArgs(rest, ['dictionary', 'workspace']);
            const [sub, file] = args.positionals;
            const options = {
                dictionary: args.values.get('dictionary'),
                workspace: args.values.get('workspace'),
            };
            if (sub === 'show') return showDictionary(options);
            if (sub === 'export') return exportDictionary(file, options);
            throw new Error('Usage: kwclass dict show | kwclass dict export [file]');
        }
        case 'session': {
            const args = parseArgs(rest, ['dictionary', 'workspace']);
            return startSession(args.positionals[0], {
                dictionary: args.values.get('dictionary'),
                workspace: args.values.get('workspace'),
            });
        }
        case 'init': {
            const args = parseArgs(rest, ['seed', 'workspace']);
            return initWorkspace({
                seed: parseSeed(args.values.get('seed')),
                workspace: args.values.get('workspace'),
            });
        }
        default:
            throw new Error(`Unknown command "${command}". Run "kwclass help" for usage.`);
    }
}

function parseNaming(value: string | undefined): ColumnNaming | undefined {
    if (value === undefined) return undefined;
    const naming = COLUMN_NAMING.find((n) => n === value);
    if (!naming) {
        throw new Error(`Invalid --naming "${value}". Expected one of: ${COLUMN_NAMING.join(', ')}`);
    }
    return naming;
}

function parseSeed(value: string | undefined): SeedName | undefined {
    if (value === undefined) return undefined;
    const seed = SEED_NAMES.find((s) => s === value);
    if (!seed) {
        throw new Error(`Invalid --seed "${value}". Expected one of: ${SEED_NAMES.join(', ')}`);
    }
    return seed;
}

main(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        error(errorMessage(err));
        process.exitCode = 1;
    });
