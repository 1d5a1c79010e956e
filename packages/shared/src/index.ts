// Schemas
export {
    KeywordListSchema,
    DictionaryPayloadSchema,
    MatchResultSchema,
    ResolutionStrategySchema,
    ColumnNamingSchema,
    ResolvedFieldSchema,
    CategoryStatsSchema,
    DatasetStatsSchema,
    ClassifierConfigSchema,
    RunManifestSchema,
} from './schemas.js';

// Types
export type {
    KeywordList,
    DictionaryPayload,
    MatchResult,
    ResolutionStrategy,
    ColumnNaming,
    ResolvedField,
    CategoryStats,
    DatasetStats,
    ClassifierConfig,
    RunManifest,
} from './schemas.js';

// Constants
export {
    DEFAULT_DICTIONARIES,
    SEED_NAMES,
    STATEMENT_FIELD,
    RESOLUTION_STRATEGIES,
    RESOLUTION_ORDER,
    COLUMN_NAMING,
    COLUMN_SUFFIX,
    LABELS_COLUMN,
    RESERVED_CATEGORY_NAMES,
    MATCH_SEPARATOR,
    FINGERPRINT_LENGTH,
    CONFIG_FILENAME,
    VERSION,
} from './constants.js';
export type { SeedName } from './constants.js';
