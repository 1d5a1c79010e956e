import { readFile, writeFile } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import {
    classifyDataset,
    decodeDataset,
    DictionaryStore,
    encodeDataset,
    filterByCategory,
    isClassifierError,
    parseKeywordBlock,
    type ClassifiedDataset,
    type Dataset,
} from '@keyword-classifier/core';
import { SEED_NAMES, type SeedName } from '@keyword-classifier/shared';
import type { Workspace } from '../types.js';
import { log, success, warn, info, error, errorMessage } from '../utils/console.js';

/**
 * Usage lines shown by `help`, in display order.
 */
export const SESSION_COMMANDS: readonly [string, string][] = [
    ['list', 'List categories with keyword counts'],
    ['show <category>', 'List the keywords of a category'],
    ['add-category <name>', 'Add an empty category'],
    ['delete-category <name>', 'Delete a category and its keywords'],
    ['add-keyword <category> <keyword>', 'Append a keyword'],
    ['remove-keyword <category> <keyword>', 'Remove a keyword'],
    ['set-keywords <category> <kw>; <kw>; ...', 'Replace all keywords of a category'],
    ['import <file.json>', 'Replace the dictionary from a JSON file'],
    ['export [file.json]', 'Write the dictionary as JSON (stdout without a file)'],
    ['reset [seed]', `Restore a seed dictionary (${SEED_NAMES.join(', ')})`],
    ['load <input.csv>', 'Load a dataset to classify'],
    ['column [name|auto]', 'Show or set the statement column'],
    ['classify', 'Classify the loaded dataset'],
    ['stats', 'Show statistics of the last classification'],
    ['filter <category>', 'Show statements where a category is present'],
    ['save <file.csv> [category]', 'Write the last classification as CSV'],
    ['help', 'Show this list'],
    ['quit', 'Leave the session'],
];

/**
 * One interactive editing session: a single dictionary store plus the
 * dataset and classification it is working on. Dictionary edits take effect
 * at the next `classify`.
 */
export class ClassifierSession {
    readonly store: DictionaryStore;
    private dataset: Dataset | null = null;
    private datasetName: string | null = null;
    private column: string | undefined;
    private lastResult: ClassifiedDataset | null = null;

    constructor(private readonly workspace: Workspace, store?: DictionaryStore) {
        this.store = store ?? DictionaryStore.fromSeed(workspace.config.seed);
        this.column = workspace.config.statement_field;
    }

    get result(): ClassifiedDataset | null {
        return this.lastResult;
    }

    /**
     * Runs one command line. Errors are printed and the session carries on.
     *
     * @returns false when the session should end
     */
    async execute(line: string): Promise<boolean> {
        const [command, ...args] = tokenize(line);
        if (command === undefined) return true;

        try {
            return await this.dispatch(command, args);
        } catch (err) {
            if (isClassifierError(err)) {
                error(`${err.name}: ${err.message}`);
            } else {
                error(`Error: ${errorMessage(err)}`);
            }
            return true;
        }
    }

    /**
     * Loads a dataset file, replacing the previous one.
     */
    async load(path: string): Promise<void> {
        const dataset = decodeDataset(await readFile(resolve(path)));
        this.dataset = dataset;
        this.datasetName = basename(path);
        this.lastResult = null;
        success(`Loaded ${this.datasetName}: ${dataset.rows.length} rows, columns: ${dataset.columns.join(', ')}`);
        if (dataset.rows.length === 0) {
            warn('Dataset has no data rows.');
        }
    }

    private async dispatch(command: string, args: string[]): Promise<boolean> {
        switch (command) {
            case 'list':
                this.list();
                break;
            case 'show':
                this.show(requireArg(args, 0, 'show <category>'));
                break;
            case 'add-category': {
                const name = requireArg(args, 0, 'add-category <name>');
                this.store.addCategory(name);
                success(`Added category "${name}"`);
                break;
            }
            case 'delete-category': {
                const name = requireArg(args, 0, 'delete-category <name>');
                this.store.deleteCategory(name);
                success(`Deleted category "${name}"`);
                break;
            }
            case 'add-keyword': {
                const category = requireArg(args, 0, 'add-keyword <category> <keyword>');
                const keyword = args.slice(1).join(' ');
                this.store.addKeyword(category, keyword);
                success(`Added "${keyword}" to "${category}"`);
                break;
            }
            case 'remove-keyword': {
                const category = requireArg(args, 0, 'remove-keyword <category> <keyword>');
                const keyword = args.slice(1).join(' ');
                this.store.removeKeyword(category, keyword);
                success(`Removed "${keyword}" from "${category}"`);
                break;
            }
            case 'set-keywords': {
                const category = requireArg(args, 0, 'set-keywords <category> <kw>; <kw>; ...');
                const block = args.slice(1).join(' ').split(';').join('\n');
                const result = this.store.setKeywords(category, parseKeywordBlock(block));
                success(`"${category}" now has ${result.keywords.length} keywords`);
                if (result.droppedDuplicates.length > 0) {
                    warn(`Dropped duplicates: ${result.droppedDuplicates.join(', ')}`);
                }
                break;
            }
            case 'import': {
                const file = requireArg(args, 0, 'import <file.json>');
                this.store.importJson(await readFile(resolve(file), 'utf-8'));
                success(`Imported ${this.store.size} categories from ${file}`);
                break;
            }
            case 'export':
                await this.exportDictionary(args[0]);
                break;
            case 'reset': {
                const seed = parseSeed(args[0] ?? this.workspace.config.seed);
                this.store.replaceAll(DictionaryStore.fromSeed(seed).export());
                success(`Dictionary reset to seed "${seed}"`);
                break;
            }
            case 'load':
                await this.load(requireArg(args, 0, 'load <input.csv>'));
                break;
            case 'column':
                this.setColumn(args[0]);
                break;
            case 'classify':
                this.classify();
                break;
            case 'stats':
                this.stats();
                break;
            case 'filter':
                this.filter(requireArg(args, 0, 'filter <category>'));
                break;
            case 'save':
                await this.save(requireArg(args, 0, 'save <file.csv> [category]'), args[1]);
                break;
            case 'help':
                for (const [usage, description] of SESSION_COMMANDS) {
                    log(`  ${usage.padEnd(42)} ${description}`);
                }
                break;
            case 'quit':
            case 'exit':
                return false;
            default:
                error(`Unknown command "${command}". Type "help" for the list.`);
        }
        return true;
    }

    private list(): void {
        if (this.store.size === 0) {
            log('(no categories)');
            return;
        }
        for (const category of this.store.categories()) {
            log(`  ${category} (${this.store.keywords(category).length})`);
        }
    }

    private show(category: string): void {
        const keywords = this.store.keywords(category);
        log(`${category}:`);
        for (const keyword of keywords) {
            log(`  - ${keyword}`);
        }
    }

    private async exportDictionary(file: string | undefined): Promise<void> {
        const json = this.store.exportJson();
        if (!file) {
            log(json);
            return;
        }
        await writeFile(resolve(file), `${json}\n`);
        success(`Dictionary exported to ${file}`);
    }

    private setColumn(name: string | undefined): void {
        if (name === 'auto') {
            this.column = undefined;
        } else if (name !== undefined) {
            this.column = name;
        }
        info(`Statement column: ${this.column ?? '(auto-detect)'}`);
    }

    private classify(): void {
        if (!this.dataset) {
            error('No dataset loaded. Use "load <input.csv>" first.');
            return;
        }
        const config = this.workspace.config;
        const result = classifyDataset(this.dataset, this.store, {
            resolution: { field: this.column, order: config.resolution },
            naming: config.column_naming,
            separator: config.match_separator,
        });
        this.lastResult = result;

        info(`Statement column: "${result.statementField.field}" (${result.statementField.strategy})`);
        for (const w of result.warnings) {
            warn(w);
        }
        success(`Classified ${result.stats.total_rows} rows against ${result.categories.length} categories`);
        this.stats();
    }

    private stats(): void {
        const result = this.requireResult();
        if (!result) return;
        const { stats } = result;
        log(`  Total rows: ${stats.total_rows}`);
        log(`  Rows with any category: ${stats.any_category_rows}`);
        for (const c of stats.categories) {
            log(`  ${c.category}: ${c.present_count} (${c.present_percentage.toFixed(1)}%)`);
        }
    }

    private filter(category: string): void {
        const result = this.requireResult();
        if (!result) return;
        const filtered = filterByCategory(result, category);
        const field = result.statementField.field;
        filtered.rows.forEach((row, i) => {
            const matches = filtered.results[i].get(category)?.matches ?? [];
            log(`  ${String(row[field] ?? '')}  [${matches.join(', ')}]`);
        });
        info(`${filtered.rows.length} of ${result.rows.length} rows match "${category}"`);
    }

    private async save(file: string, category: string | undefined): Promise<void> {
        const result = this.requireResult();
        if (!result) return;
        const output = category ? filterByCategory(result, category) : result;
        await writeFile(resolve(file), encodeDataset(output.columns, output.rows));
        success(`Saved ${output.rows.length} rows to ${file}`);
    }

    private requireResult(): ClassifiedDataset | null {
        if (!this.lastResult) {
            error('Nothing classified yet. Use "classify" first.');
        }
        return this.lastResult;
    }
}

/**
 * Split a command line on whitespace; double or single quotes group words.
 */
export function tokenize(line: string): string[] {
    const tokens: string[] = [];
    const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
    for (const match of line.matchAll(pattern)) {
        tokens.push(match[1] ?? match[2] ?? match[3] ?? '');
    }
    return tokens;
}

function requireArg(args: readonly string[], index: number, usage: string): string {
    const value = args[index];
    if (value === undefined || value === '') {
        throw new Error(`Usage: ${usage}`);
    }
    return value;
}

function parseSeed(value: string): SeedName {
    const seed = SEED_NAMES.find((name) => name === value);
    if (!seed) {
        throw new Error(`Unknown seed "${value}". Expected one of: ${SEED_NAMES.join(', ')}`);
    }
    return seed;
}
