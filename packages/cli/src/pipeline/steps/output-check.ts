import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { PipelineStep } from '../types.js';
import { OUTPUT_FILES } from './export.js';
import { promptContinue } from '../../utils/prompt.js';

/**
 * Step 1: Output Check
 * Prevents accidental overwrite of a previous run's outputs unless --force
 * is used or the user confirms.
 */
export const outputCheck: PipelineStep = async (state) => {
    // If we're in a dry run, nothing will be written.
    if (state.options.dryRun || state.options.force) {
        return state;
    }

    const existingFiles = Object.values(OUTPUT_FILES).filter(f => existsSync(join(state.outputPath, f)));

    if (existingFiles.length > 0) {
        const overwrite = await promptContinue(
            `Output for "${state.runName}" already exists (found: ${existingFiles.join(', ')}). Overwrite?`,
            state.options
        );
        if (!overwrite) {
            state.errors.push({
                step: 'output-check',
                message: `Output for "${state.runName}" already exists in ${state.outputPath}. Use --force to overwrite.`,
                fatal: true,
            });
        }
    }

    return state;
};
