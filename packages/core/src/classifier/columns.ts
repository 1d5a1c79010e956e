/**
 * Derived-column naming and flattening.
 *
 * Conventions:
 * - detailed: {c}_present (boolean), {c}_count (number), {c}_matches (joined string)
 * - flag:     {c}_flag (1 or 0)
 * - one-hot:  labels (present categories, joined) then {c} (boolean)
 *
 * Columns for each category are emitted in category order.
 */

import { COLUMN_SUFFIX, LABELS_COLUMN, MATCH_SEPARATOR } from '../types/index.js';
import type { CellValue, ColumnNaming, MatchResult } from '../types/index.js';
import type { Classification, NamingOptions } from './types.js';

const EMPTY_RESULT: MatchResult = { present: false, count: 0, matches: [] };

/**
 * Names of the derived columns for a list of categories.
 */
export function derivedColumns(categories: readonly string[], naming: ColumnNaming = 'detailed'): string[] {
    switch (naming) {
        case 'detailed':
            return categories.flatMap((c) => [
                `${c}${COLUMN_SUFFIX.PRESENT}`,
                `${c}${COLUMN_SUFFIX.COUNT}`,
                `${c}${COLUMN_SUFFIX.MATCHES}`,
            ]);
        case 'flag':
            return categories.map((c) => `${c}${COLUMN_SUFFIX.FLAG}`);
        case 'one-hot':
            return [LABELS_COLUMN, ...categories];
    }
}

/**
 * Flatten one row's classification into derived-column cells.
 * Keys come out in the same order as derivedColumns().
 */
export function flattenClassification(
    classification: Classification,
    categories: readonly string[],
    options: NamingOptions = {}
): Record<string, CellValue> {
    const naming = options.naming ?? 'detailed';
    const separator = options.separator ?? MATCH_SEPARATOR;
    const cells: Record<string, CellValue> = {};
    const resultFor = (c: string): MatchResult => classification.get(c) ?? EMPTY_RESULT;

    switch (naming) {
        case 'detailed':
            for (const c of categories) {
                const r = resultFor(c);
                cells[`${c}${COLUMN_SUFFIX.PRESENT}`] = r.present;
                cells[`${c}${COLUMN_SUFFIX.COUNT}`] = r.count;
                cells[`${c}${COLUMN_SUFFIX.MATCHES}`] = r.matches.join(separator);
            }
            break;
        case 'flag':
            for (const c of categories) {
                cells[`${c}${COLUMN_SUFFIX.FLAG}`] = resultFor(c).present ? 1 : 0;
            }
            break;
        case 'one-hot':
            cells[LABELS_COLUMN] = categories.filter((c) => resultFor(c).present).join(separator);
            for (const c of categories) {
                cells[c] = resultFor(c).present;
            }
            break;
    }

    return cells;
}
