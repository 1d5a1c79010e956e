/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    KeywordList,
    DictionaryPayload,
    MatchResult,
    ResolutionStrategy,
    ColumnNaming,
    ResolvedField,
    CategoryStats,
    DatasetStats,
    SeedName,
} from '@keyword-classifier/shared';

export {
    DictionaryPayloadSchema,
    MatchResultSchema,
    DEFAULT_DICTIONARIES,
    STATEMENT_FIELD,
    RESOLUTION_ORDER,
    COLUMN_SUFFIX,
    LABELS_COLUMN,
    RESERVED_CATEGORY_NAMES,
    MATCH_SEPARATOR,
    FINGERPRINT_LENGTH,
} from '@keyword-classifier/shared';

/**
 * A single cell as decoded from tabular input.
 */
export type CellValue = string | number | boolean | null | undefined;

export type Row = Record<string, CellValue>;

/**
 * Tabular input: ordered column names plus one record per row.
 */
export interface Dataset {
    columns: string[];
    rows: Row[];
}
