import { basename } from 'node:path';
import { openWorkspace } from '../workspace/config.js';
import { runPipeline } from '../pipeline/runner.js';
import { log, success, warn, arrow, error, errorMessage } from '../utils/console.js';
import { VERSION } from '@keyword-classifier/shared';
import type { ClassifyOptions, Workspace } from '../types.js';

/**
 * `kwclass classify <input>`: runs the classification pipeline on one file.
 *
 * @returns Process exit code
 */
export async function classifyFile(inputPath: string, options: ClassifyOptions): Promise<number> {
    log(`\nKeyword Classifier ${VERSION} - Classifying ${basename(inputPath)}`);

    arrow('Detecting workspace...');
    let workspace: Workspace;
    try {
        workspace = openWorkspace(options.workspace);
    } catch (err) {
        error(`Error: ${errorMessage(err)}`);
        return 1;
    }
    success(`Workspace: ${workspace.root}`);

    const state = await runPipeline(inputPath, workspace, options);

    log('\n--- Classification Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            error(`ERROR [${e.step}]: ${e.message}`);
        }
        if (state.errors.some(e => e.fatal)) {
            log('\n✖ Classification failed with fatal errors.');
            return 1;
        }
    }

    success(`Classification complete for ${state.runName}.`);
    if (state.classified) {
        const { stats } = state.classified;
        arrow(`Total rows: ${stats.total_rows}`);
        arrow(`Rows with any category: ${stats.any_category_rows}`);
        for (const c of stats.categories) {
            arrow(`${c.category}: ${c.present_count} (${c.present_percentage.toFixed(1)}%)`);
        }
    }

    if (!state.options.dryRun) {
        arrow(`Outputs saved to: ${state.outputPath}`);
    } else {
        log('\n[DRY RUN] No files were written.');
    }
    return 0;
}
