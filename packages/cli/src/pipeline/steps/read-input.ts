import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { decodeDataset } from '@keyword-classifier/core';
import type { PipelineStep } from '../types.js';
import { hashBuffer } from '../../utils/hash.js';
import { errorMessage } from '../../utils/console.js';

/**
 * Step 3: Read Input
 * Reads the CSV once, hashes it for the manifest, and decodes it in core.
 */
export const readInput: PipelineStep = async (state) => {
    let fileBuffer: Buffer;
    try {
        fileBuffer = await readFile(state.inputPath);
    } catch (err) {
        state.errors.push({
            step: 'read-input',
            message: `Error reading ${state.inputPath}: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
        return state;
    }

    state.input = {
        path: state.inputPath,
        filename: basename(state.inputPath),
        hash: hashBuffer(fileBuffer),
    };

    // Core receives bytes (no I/O in core)
    try {
        state.dataset = decodeDataset(fileBuffer);
    } catch (err) {
        state.errors.push({
            step: 'read-input',
            message: `Error parsing ${state.input.filename}: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
        return state;
    }

    if (state.dataset.rows.length === 0) {
        state.warnings.push(`${state.input.filename} has no data rows.`);
    }

    return state;
};
