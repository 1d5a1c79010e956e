/**
 * Dataset classification: resolve the statement field, classify every row,
 * append derived columns, summarize.
 *
 * The call is all-or-nothing. The statement field is resolved before any row
 * is touched, so a MissingColumnError means no output at all.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Warnings returned in result.
 */

import { classifyWith, toDictionary } from './classify.js';
import { resolveStatementField } from './resolve-field.js';
import { derivedColumns, flattenClassification } from './columns.js';
import { computeStats } from './stats.js';
import { NotFoundError } from '../errors.js';
import type { Dataset, Row } from '../types/index.js';
import type {
    ClassifiedDataset,
    ClassifyDatasetOptions,
    Classification,
    DictionarySource,
} from './types.js';

/**
 * Classify every row of a dataset.
 *
 * The dictionary is snapshotted once up front; the pass reads only that copy.
 *
 * @param dataset - Columns and rows to classify (not mutated)
 * @param source - Store or snapshot to classify against
 * @param options - Statement-field resolution and column naming
 * @throws MissingColumnError if the statement field cannot be resolved
 */
export function classifyDataset(
    dataset: Dataset,
    source: DictionarySource,
    options: ClassifyDatasetOptions = {}
): ClassifiedDataset {
    const statementField = resolveStatementField(dataset.columns, options.resolution);
    const dictionary = toDictionary(source);
    const categories = [...dictionary.keys()];
    const warnings: string[] = [];

    const derived = derivedColumns(categories, options.naming);
    const shadowed = derived.filter((col) => dataset.columns.includes(col));
    if (shadowed.length > 0) {
        warnings.push(`Derived columns overwrite input columns: ${shadowed.join(', ')}`);
    }
    // one-hot with a category named "labels": the category column wins.
    const collisions = [...new Set(derived.filter((col, i) => derived.indexOf(col) !== i))];
    if (collisions.length > 0) {
        warnings.push(`Derived columns collide with each other: ${collisions.join(', ')}`);
    }

    const results: Classification[] = [];
    const rows: Row[] = [];
    for (const row of dataset.rows) {
        const classification = classifyWith(row[statementField.field], dictionary);
        results.push(classification);
        rows.push({ ...row, ...flattenClassification(classification, categories, options) });
    }

    const inputColumns = dataset.columns.filter((col) => !derived.includes(col));

    return {
        columns: [...inputColumns, ...new Set(derived)],
        rows,
        results,
        categories,
        statementField,
        stats: computeStats(results, categories),
        warnings,
    };
}

/**
 * Keep only the rows where a category is present.
 * Statistics are left as computed over the full dataset.
 *
 * @throws NotFoundError if the category was not part of the classification
 */
export function filterByCategory(classified: ClassifiedDataset, category: string): ClassifiedDataset {
    if (!classified.categories.includes(category)) {
        throw new NotFoundError(`Category "${category}" was not classified`);
    }

    const rows: Row[] = [];
    const results: Classification[] = [];
    classified.results.forEach((classification, index) => {
        if (classification.get(category)?.present) {
            rows.push(classified.rows[index]);
            results.push(classification);
        }
    });

    return { ...classified, rows, results };
}
