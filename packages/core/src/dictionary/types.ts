/**
 * Internal types for dictionary module.
 */

/**
 * Read-only view of a dictionary: category -> keywords, both in insertion order.
 * This is what the classifier consumes.
 */
export type Dictionary = ReadonlyMap<string, readonly string[]>;

/**
 * Result of replacing a category's keywords from free text.
 */
export interface SetKeywordsResult {
    keywords: string[];
    droppedDuplicates: string[];
}
