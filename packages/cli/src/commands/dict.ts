import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { openWorkspace, loadDictionary } from '../workspace/config.js';
import { log, success, info, error, errorMessage } from '../utils/console.js';
import type { DictOptions } from '../types.js';

/**
 * `kwclass dict export [file]`: writes the starting dictionary as JSON.
 * Without a file the JSON goes to stdout.
 */
export async function exportDictionary(file: string | undefined, options: DictOptions): Promise<number> {
    try {
        const { store } = loadDictionary(openWorkspace(options.workspace), options.dictionary);
        const json = store.exportJson();
        if (!file) {
            process.stdout.write(`${json}\n`);
            return 0;
        }
        const target = resolve(file);
        await writeFile(target, `${json}\n`);
        success(`Dictionary exported to ${target}`);
        return 0;
    } catch (err) {
        error(`Error: ${errorMessage(err)}`);
        return 1;
    }
}

/**
 * `kwclass dict show`: lists categories and their keywords.
 */
export function showDictionary(options: DictOptions): number {
    try {
        const { store, source } = loadDictionary(openWorkspace(options.workspace), options.dictionary);
        info(`Dictionary: ${source}`);
        if (store.size === 0) {
            log('(no categories)');
            return 0;
        }
        for (const category of store.categories()) {
            const keywords = store.keywords(category);
            log(`\n${category} (${keywords.length})`);
            for (const keyword of keywords) {
                log(`  - ${keyword}`);
            }
        }
        return 0;
    } catch (err) {
        error(`Error: ${errorMessage(err)}`);
        return 1;
    }
}
