import { classifyDataset, isClassifierError } from '@keyword-classifier/core';
import type { PipelineStep } from '../types.js';
import { info, errorMessage } from '../../utils/console.js';

/**
 * Step 4: Classification
 * Resolves the statement column, classifies every row against a snapshot of
 * the dictionary, and reports which column was used.
 */
export const classifyRows: PipelineStep = async (state) => {
    const { dataset, dictionary } = state;
    if (!dataset || !dictionary) {
        state.errors.push({
            step: 'classify',
            message: 'Nothing to classify: input or dictionary missing.',
            fatal: true,
        });
        return state;
    }

    const config = state.workspace.config;
    try {
        state.classified = classifyDataset(dataset, dictionary, {
            resolution: {
                field: state.options.column ?? config.statement_field,
                order: config.resolution,
            },
            naming: state.options.naming ?? config.column_naming,
            separator: config.match_separator,
        });
    } catch (err) {
        state.errors.push({
            step: 'classify',
            message: isClassifierError(err) ? err.message : `Classification failed: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
        return state;
    }

    const { field, strategy } = state.classified.statementField;
    info(`Statement column: "${field}" (${strategy})`);

    if (state.options.filter && !state.classified.categories.includes(state.options.filter)) {
        state.errors.push({
            step: 'classify',
            message: `Cannot filter by "${state.options.filter}": not a dictionary category.`,
            fatal: true,
        });
        return state;
    }

    for (const warning of state.classified.warnings) {
        state.warnings.push(warning);
    }

    return state;
};
