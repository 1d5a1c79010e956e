import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import {
    ClassifierConfigSchema,
    CONFIG_FILENAME,
    type ClassifierConfig,
} from '@keyword-classifier/shared';
import { DictionaryStore } from '@keyword-classifier/core';
import { detectWorkspaceRoot } from './detect.js';
import { resolveWorkspace, resolveFromRoot } from './paths.js';
import type { Workspace } from '../types.js';

/**
 * Loads keyword-classifier.yaml from the workspace root.
 * A missing or empty file yields the defaults.
 */
export function loadConfig(root: string): ClassifierConfig {
    const path = resolve(root, CONFIG_FILENAME);
    if (!existsSync(path)) {
        return ClassifierConfigSchema.parse({});
    }

    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content) ?? {};

    const result = ClassifierConfigSchema.safeParse(data);
    if (!result.success) {
        const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw new Error(`Invalid config ${path}:\n  ${issues.join('\n  ')}`);
    }
    return result.data;
}

/**
 * Finds the workspace (explicit root, detected root, or the cwd) and loads its config.
 */
export function openWorkspace(explicitRoot?: string): Workspace {
    const root = resolve(explicitRoot || detectWorkspaceRoot() || process.cwd());
    return resolveWorkspace(root, loadConfig(root));
}

export interface LoadedDictionary {
    store: DictionaryStore;
    /** File the dictionary came from, or "seed:<name>". */
    source: string;
}

/**
 * Builds the session's dictionary store.
 *
 * Priority:
 * 1. `override` (a --dictionary path, relative to the cwd)
 * 2. config `dictionary_path` (relative to the workspace root)
 * 3. config `seed`
 *
 * @throws InvalidFormatError if the dictionary file is malformed
 */
export function loadDictionary(workspace: Workspace, override?: string): LoadedDictionary {
    const path = override
        ? resolve(override)
        : workspace.config.dictionary_path
            ? resolveFromRoot(workspace.root, workspace.config.dictionary_path)
            : null;

    if (path === null) {
        return {
            store: DictionaryStore.fromSeed(workspace.config.seed),
            source: `seed:${workspace.config.seed}`,
        };
    }

    if (!existsSync(path)) {
        throw new Error(`Dictionary file not found: ${path}`);
    }
    const store = new DictionaryStore();
    store.importJson(readFileSync(path, 'utf-8'));
    return { store, source: path };
}
