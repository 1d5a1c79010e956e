import { basename, extname, isAbsolute, join, resolve } from 'node:path';
import { CONFIG_FILENAME } from '@keyword-classifier/shared';
import type { ClassifierConfig } from '@keyword-classifier/shared';
import type { Workspace } from '../types.js';

/**
 * Constructs a Workspace object from a root path and its loaded config.
 */
export function resolveWorkspace(root: string, config: ClassifierConfig): Workspace {
    return {
        root,
        configPath: join(root, CONFIG_FILENAME),
        outputs: resolveFromRoot(root, config.output_dir),
        config,
    };
}

/**
 * Resolve a config- or user-supplied path against the workspace root.
 */
export function resolveFromRoot(root: string, path: string): string {
    return isAbsolute(path) ? path : resolve(root, path);
}

/**
 * Run name for an input file: its base name without extension.
 * statements.csv -> statements
 */
export function getRunName(inputPath: string): string {
    const name = basename(inputPath);
    return name.slice(0, name.length - extname(name).length) || name;
}

export function getOutputsPath(workspace: Workspace, runName: string): string {
    return join(workspace.outputs, runName);
}
