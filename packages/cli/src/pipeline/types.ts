import type { RunManifest } from '@keyword-classifier/shared';
import type { ClassifiedDataset, Dataset, DictionaryStore } from '@keyword-classifier/core';
import type { Workspace, ClassifyOptions } from '../types.js';

/**
 * Metadata for the input file being classified.
 */
export interface InputFile {
    path: string;
    filename: string;
    hash: string;
}

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Central state object passed through the classification pipeline.
 */
export interface PipelineState {
    inputPath: string;
    runName: string;
    outputPath: string;
    workspace: Workspace;
    options: ClassifyOptions;

    // Accumulated during pipeline execution
    dictionary?: DictionaryStore;
    dictionarySource?: string;
    input?: InputFile;
    dataset?: Dataset;
    classified?: ClassifiedDataset;
    manifest?: RunManifest;
    writtenFiles: string[];

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
