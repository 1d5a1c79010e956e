// Types (re-exported from shared)
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
    CellValue,
    Row,
    Dataset,
} from './types/index.js';

export {
    DictionaryPayloadSchema,
    MatchResultSchema,
    DEFAULT_DICTIONARIES,
} from './types/index.js';

// Errors
export {
    ClassifierError,
    NotFoundError,
    DuplicateCategoryError,
    DuplicateKeywordError,
    InvalidFormatError,
    MissingColumnError,
    isClassifierError,
} from './errors.js';
export type { ClassifierErrorCode } from './errors.js';

// Utils
export { normalizeStatement, isMissingStatement } from './utils/normalize.js';

// Dictionary
export {
    DictionaryStore,
    parseDictionaryPayload,
    parseDictionaryJson,
    parseKeywordBlock,
    fingerprintDictionary,
} from './dictionary/index.js';
export type { Dictionary, SetKeywordsResult } from './dictionary/index.js';

// Classifier
export {
    classify,
    classifyDataset,
    filterByCategory,
    resolveStatementField,
    derivedColumns,
    flattenClassification,
    computeStats,
} from './classifier/index.js';
export type {
    Classification,
    ClassifiedDataset,
    ClassifyDatasetOptions,
    DictionarySource,
    NamingOptions,
    ResolutionPolicy,
} from './classifier/index.js';

// Dataset codec
export { decodeDataset, decodeDatasetText, encodeDataset } from './dataset/index.js';
