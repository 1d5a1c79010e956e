/**
 * Statement normalization for keyword matching.
 */

import type { CellValue } from '../types/index.js';

/**
 * True for values that classify as "no statement": null, undefined,
 * empty string and NaN.
 */
export function isMissingStatement(value: CellValue): boolean {
    if (value === null || value === undefined || value === '') return true;
    return typeof value === 'number' && Number.isNaN(value);
}

/**
 * Normalize a statement for case-insensitive substring matching.
 *
 * Non-string cells are stringified first. Only case is folded: whitespace and
 * punctuation are left alone so that a keyword matches exactly the text the
 * analyst sees.
 *
 * @returns Lower-cased statement, or null for a missing value
 */
export function normalizeStatement(value: CellValue): string | null {
    if (isMissingStatement(value)) return null;
    return String(value).toLowerCase();
}

/**
 * Normalize a keyword the same way as a statement.
 */
export function normalizeKeyword(keyword: string): string {
    return keyword.toLowerCase();
}
