/**
 * Keyword Classifier CLI - Core Types
 */

import type { ClassifierConfig, ColumnNaming, SeedName } from '@keyword-classifier/shared';

export interface ClassifyOptions {
    dryRun: boolean;
    force: boolean;
    yes: boolean;
    dictionary?: string;
    column?: string;
    naming?: ColumnNaming;
    filter?: string;
    out?: string;
    workspace?: string;
}

export interface DictOptions {
    dictionary?: string;
    workspace?: string;
}

export interface InitOptions {
    seed?: SeedName;
    workspace?: string;
}

export interface SessionOptions {
    dictionary?: string;
    workspace?: string;
}

export interface Workspace {
    root: string;
    /** Path of keyword-classifier.yaml (may not exist yet). */
    configPath: string;
    outputs: string;
    config: ClassifierConfig;
}
