/**
 * Constants for Keyword Classifier.
 */

/**
 * Seed dictionaries a fresh store starts from.
 *
 * `marketing` is the full urgency/exclusive vocabulary.
 * `marketing-compact` is the shorter list used when a lighter pass is wanted.
 */
export const DEFAULT_DICTIONARIES = {
    marketing: {
        urgency_marketing: [
            'limited', 'limited time', 'limited run', 'limited edition', 'order now',
            'last chance', 'hurry', 'while supplies last', "before they're gone",
            'selling out', 'selling fast', 'act now', "don't wait", 'today only',
            'expires soon', 'final hours', 'almost gone',
        ],
        exclusive_marketing: [
            'exclusive', 'exclusively', 'exclusive offer', 'exclusive deal',
            'members only', 'vip', 'special access', 'invitation only',
            'premium', 'privileged', 'limited access', 'select customers',
            'insider', 'private sale', 'early access',
        ],
    },
    'marketing-compact': {
        urgency_marketing: [
            'limited time', 'last chance', 'hurry', 'act now',
            'today only', 'expires soon', 'final hours',
        ],
        exclusive_marketing: [
            'exclusive', 'members only', 'vip', 'special access',
            'invitation only', 'early access',
        ],
    },
    empty: {},
} as const satisfies Record<string, Record<string, readonly string[]>>;

export type SeedName = keyof typeof DEFAULT_DICTIONARIES;

export const SEED_NAMES = ['marketing', 'marketing-compact', 'empty'] as const satisfies readonly SeedName[];

/**
 * Statement-field resolution.
 * Strategies are tried in RESOLUTION_ORDER unless the config overrides it.
 */
export const STATEMENT_FIELD = {
    EXACT_NAME: 'statement',
    CONTAINS: ['statement', 'text'],
    POSITIONAL_INDEX: 1,
} as const;

export const RESOLUTION_STRATEGIES = ['exact', 'contains', 'positional'] as const;

export const RESOLUTION_ORDER = RESOLUTION_STRATEGIES;

/**
 * Derived-column naming conventions.
 */
export const COLUMN_NAMING = ['detailed', 'flag', 'one-hot'] as const;

export const COLUMN_SUFFIX = {
    PRESENT: '_present',
    COUNT: '_count',
    MATCHES: '_matches',
    FLAG: '_flag',
} as const;

export const LABELS_COLUMN = 'labels';

/**
 * Category names a plain JSON object cannot carry as an own key.
 */
export const RESERVED_CATEGORY_NAMES = ['__proto__'] as const;

export const MATCH_SEPARATOR = ', ';

/**
 * Dictionary fingerprint length (hex chars of SHA-256).
 */
export const FINGERPRINT_LENGTH = 16;

export const CONFIG_FILENAME = 'keyword-classifier.yaml';

export const VERSION = '1.0.0';
