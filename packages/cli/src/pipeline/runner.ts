import type { PipelineState, PipelineStep } from './types.js';
import { outputCheck } from './steps/output-check.js';
import { loadDictionaryStep } from './steps/load-dictionary.js';
import { readInput } from './steps/read-input.js';
import { classifyRows } from './steps/classify.js';
import { exportResults } from './steps/export.js';
import { getOutputsPath, getRunName, resolveFromRoot } from '../workspace/paths.js';
import { arrow } from '../utils/console.js';
import type { Workspace, ClassifyOptions } from '../types.js';

/**
 * Orchestrates the execution of the classification pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(
    inputPath: string,
    workspace: Workspace,
    options: ClassifyOptions
): Promise<PipelineState> {
    const runName = getRunName(inputPath);
    let state: PipelineState = {
        inputPath,
        runName,
        outputPath: options.out ? resolveFromRoot(process.cwd(), options.out) : getOutputsPath(workspace, runName),
        workspace,
        options,
        writtenFiles: [],
        warnings: [],
        errors: [],
    };

    const steps: { name: string; fn: PipelineStep }[] = [
        { name: 'Output Check', fn: outputCheck },
        { name: 'Load Dictionary', fn: loadDictionaryStep },
        { name: 'Read Input', fn: readInput },
        { name: 'Classification', fn: classifyRows },
        { name: 'Export Results', fn: exportResults },
    ];

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        arrow(`Step ${i + 1}/${steps.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            console.error(`\n✖ Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
