/**
 * Keyword classification of a single statement.
 *
 * Matching is case-insensitive substring containment, not word-boundary
 * matching: "vip" matches inside "pavilion". Callers rely on this; do not
 * tighten it here.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Pure function of its inputs.
 */

import { normalizeKeyword, normalizeStatement } from '../utils/normalize.js';
import { DictionaryStore } from '../dictionary/store.js';
import type { CellValue, MatchResult } from '../types/index.js';
import type { Dictionary } from '../dictionary/types.js';
import type { Classification, DictionarySource } from './types.js';

/**
 * Read-only dictionary for a classification call. A store is snapshotted so
 * that nothing done to it afterwards affects the pass.
 */
export function toDictionary(source: DictionarySource): Dictionary {
    return source instanceof DictionaryStore ? source.snapshot() : source;
}

/**
 * Match one category's keywords against an already lower-cased statement.
 *
 * @param normalizedStatement - Output of normalizeStatement, or null if missing
 * @param keywords - Category keywords in dictionary order
 */
export function matchKeywords(
    normalizedStatement: string | null,
    keywords: readonly string[]
): MatchResult {
    if (normalizedStatement === null) {
        return { present: false, count: 0, matches: [] };
    }

    const matches = keywords.filter((kw) => normalizedStatement.includes(normalizeKeyword(kw)));
    return {
        present: matches.length > 0,
        count: matches.length,
        matches,
    };
}

/**
 * Classify a statement against every category of a dictionary.
 *
 * A missing statement (null, undefined, '' or NaN) yields
 * { present: false, count: 0, matches: [] } for every category.
 *
 * @param statement - Cell value holding the statement text
 * @param source - Store or snapshot to read keywords from
 * @returns category -> MatchResult, in dictionary order
 */
export function classify(statement: CellValue, source: DictionarySource): Classification {
    return classifyWith(statement, toDictionary(source));
}

/**
 * classify() against a dictionary that is already a snapshot.
 * Used by the dataset pass so the store is copied once, not once per row.
 */
export function classifyWith(statement: CellValue, dictionary: Dictionary): Classification {
    const normalized = normalizeStatement(statement);
    const result: Classification = new Map();
    for (const [category, keywords] of dictionary) {
        result.set(category, matchKeywords(normalized, keywords));
    }
    return result;
}
