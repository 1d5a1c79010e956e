import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { encodeDataset, filterByCategory, fingerprintDictionary } from '@keyword-classifier/core';
import { RunManifestSchema, VERSION } from '@keyword-classifier/shared';
import type { RunManifest } from '@keyword-classifier/shared';
import type { PipelineStep } from '../types.js';
import { generateResultsExcel } from '../../excel/results.js';
import { errorMessage } from '../../utils/console.js';

export const OUTPUT_FILES = {
    CSV: 'classified.csv',
    EXCEL: 'classified.xlsx',
    MANIFEST: 'run_manifest.json',
} as const;

/**
 * Step 5: Export
 * Writes the classified CSV (optionally filtered to one category), the Excel
 * report and the run manifest.
 */
export const exportResults: PipelineStep = async (state) => {
    const { classified, dictionary, input } = state;
    if (!classified || !dictionary || !input) {
        state.errors.push({ step: 'export', message: 'No classification result to export.', fatal: true });
        return state;
    }

    const manifest: RunManifest = RunManifestSchema.parse({
        input_file: input.filename,
        input_hash: input.hash,
        dictionary_fingerprint: fingerprintDictionary(dictionary.snapshot()),
        statement_field: classified.statementField.field,
        resolution_strategy: classified.statementField.strategy,
        column_naming: state.options.naming ?? state.workspace.config.column_naming,
        filter: state.options.filter,
        stats: classified.stats,
        run_timestamp: new Date().toISOString(),
        version: VERSION,
    });
    state.manifest = manifest;

    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping file export.');
        return state;
    }

    const output = state.options.filter ? filterByCategory(classified, state.options.filter) : classified;

    try {
        await mkdir(state.outputPath, { recursive: true });

        const csvPath = join(state.outputPath, OUTPUT_FILES.CSV);
        await writeFile(csvPath, encodeDataset(output.columns, output.rows));
        state.writtenFiles.push(csvPath);

        const excelPath = join(state.outputPath, OUTPUT_FILES.EXCEL);
        const workbook = await generateResultsExcel(output);
        await workbook.xlsx.writeFile(excelPath);
        state.writtenFiles.push(excelPath);

        const manifestPath = join(state.outputPath, OUTPUT_FILES.MANIFEST);
        await writeFile(manifestPath, JSON.stringify(manifest, null, 2));
        state.writtenFiles.push(manifestPath);
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to export results to ${state.outputPath}: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
