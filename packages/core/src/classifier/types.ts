/**
 * Internal types for classifier module.
 */

import type {
    MatchResult,
    ResolutionStrategy,
    ColumnNaming,
    ResolvedField,
    DatasetStats,
    Row,
} from '../types/index.js';
import type { DictionaryStore } from '../dictionary/store.js';
import type { Dictionary } from '../dictionary/types.js';

/**
 * Anything classify() can read keywords from.
 */
export type DictionarySource = DictionaryStore | Dictionary;

/**
 * Per-statement outcome: category -> MatchResult, in dictionary order.
 */
export type Classification = Map<string, MatchResult>;

/**
 * How the statement field is found when the caller did not name one.
 */
export interface ResolutionPolicy {
    /** Column to use as-is. Must exist; no fallback is tried. */
    field?: string;
    /** Strategies tried in order when `field` is absent. */
    order?: readonly ResolutionStrategy[];
}

/**
 * Derived-column naming options.
 */
export interface NamingOptions {
    naming?: ColumnNaming;
    /** Separator for the joined matches (and labels) column. */
    separator?: string;
}

/**
 * Options for classifyDataset().
 */
export interface ClassifyDatasetOptions extends NamingOptions {
    resolution?: ResolutionPolicy;
}

/**
 * Result of classifying a whole dataset.
 * Input rows are copied; derived columns follow the input columns.
 */
export interface ClassifiedDataset {
    columns: string[];
    rows: Row[];
    /** One entry per row, aligned with `rows`. */
    results: Classification[];
    /** Categories in the order they were classified. */
    categories: string[];
    statementField: ResolvedField;
    stats: DatasetStats;
    warnings: string[];
}
