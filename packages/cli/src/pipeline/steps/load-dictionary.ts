import type { PipelineStep } from '../types.js';
import { loadDictionary } from '../../workspace/config.js';
import { errorMessage } from '../../utils/console.js';

/**
 * Step 2: Load Dictionary
 * Imports the dictionary file (--dictionary or config) or falls back to the seed.
 */
export const loadDictionaryStep: PipelineStep = async (state) => {
    try {
        const { store, source } = loadDictionary(state.workspace, state.options.dictionary);
        state.dictionary = store;
        state.dictionarySource = source;

        if (store.size === 0) {
            state.warnings.push('Dictionary has no categories; no derived columns will be produced.');
        }
        for (const category of store.categories()) {
            if (store.keywords(category).length === 0) {
                state.warnings.push(`Category "${category}" has no keywords and will match nothing.`);
            }
        }
    } catch (err) {
        state.errors.push({
            step: 'load-dictionary',
            message: `Failed to load dictionary: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
