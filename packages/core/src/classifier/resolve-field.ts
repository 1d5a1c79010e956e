/**
 * Statement-field resolution.
 *
 * Order (first hit wins, unless the caller names a field):
 * 1. exact      - column named "statement", case-insensitive
 * 2. contains   - first column whose name contains "statement" or "text"
 * 3. positional - second column, or the first if there is only one
 *
 * The resolved name and the strategy that found it are always returned so
 * the caller can report which column was used.
 */

import { RESOLUTION_ORDER, STATEMENT_FIELD } from '../types/index.js';
import type { ResolutionStrategy, ResolvedField } from '../types/index.js';
import { MissingColumnError } from '../errors.js';
import type { ResolutionPolicy } from './types.js';

type Strategy = (columns: readonly string[]) => string | null;

const STRATEGIES: Record<ResolutionStrategy, Strategy> = {
    exact: (columns) =>
        columns.find((col) => col.toLowerCase() === STATEMENT_FIELD.EXACT_NAME) ?? null,

    contains: (columns) =>
        columns.find((col) => {
            const lower = col.toLowerCase();
            return STATEMENT_FIELD.CONTAINS.some((needle) => lower.includes(needle));
        }) ?? null,

    positional: (columns) => {
        if (columns.length === 0) return null;
        return columns.length > STATEMENT_FIELD.POSITIONAL_INDEX
            ? columns[STATEMENT_FIELD.POSITIONAL_INDEX]
            : columns[0];
    },
};

/**
 * Resolve which column holds the statement text.
 *
 * @param columns - Dataset column names, in order
 * @param policy - Explicit field and/or strategy order
 * @returns Resolved field name and the strategy that produced it
 * @throws MissingColumnError if the explicit field is absent or no strategy resolves
 */
export function resolveStatementField(
    columns: readonly string[],
    policy: ResolutionPolicy = {}
): ResolvedField {
    if (policy.field !== undefined) {
        if (!columns.includes(policy.field)) {
            throw new MissingColumnError(
                `Statement column "${policy.field}" not found. Available: ${describe(columns)}`,
                [...columns]
            );
        }
        return { field: policy.field, strategy: 'explicit' };
    }

    const order = policy.order ?? RESOLUTION_ORDER;
    for (const strategy of order) {
        const field = STRATEGIES[strategy](columns);
        if (field !== null) {
            return { field, strategy };
        }
    }

    throw new MissingColumnError(
        `No statement column found (tried: ${order.join(', ')}). Available: ${describe(columns)}`,
        [...columns]
    );
}

function describe(columns: readonly string[]): string {
    return columns.length > 0 ? columns.join(', ') : '(no columns)';
}
