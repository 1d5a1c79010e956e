/**
 * Zod schemas for Keyword Classifier data structures.
 *
 * Wire shapes (dictionary import/export, config, run manifest) are validated
 * at the boundary; everything inside core works on the inferred types.
 */

import { z } from 'zod';
import {
    SEED_NAMES,
    RESOLUTION_STRATEGIES,
    RESOLUTION_ORDER,
    COLUMN_NAMING,
    MATCH_SEPARATOR,
    RESERVED_CATEGORY_NAMES,
} from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

const nonBlank = (label: string) =>
    z.string().refine((v) => v.trim() !== '', { message: `${label} cannot be empty` });

const categoryName = nonBlank('Category name').refine(
    (v) => !RESERVED_CATEGORY_NAMES.some((name) => name === v),
    (v) => ({ message: `Category name "${v}" is reserved` })
);

const keyword = nonBlank('Keyword');

/**
 * Hash string: "sha256:" followed by 64 hex chars.
 */
const sha256Tag = z.string().regex(/^sha256:[0-9a-f]{64}$/, 'Must be sha256:<hex>');

// ============================================================================
// Dictionary Schemas
// ============================================================================

/**
 * Keyword list for one category. Order is significant, duplicates are not allowed.
 */
export const KeywordListSchema = z.array(keyword).superRefine((keywords, ctx) => {
    const seen = new Set<string>();
    keywords.forEach((kw, index) => {
        if (seen.has(kw)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: [index],
                message: `Duplicate keyword "${kw}"`,
            });
        }
        seen.add(kw);
    });
});

export type KeywordList = z.infer<typeof KeywordListSchema>;

/**
 * Serialized dictionary: category name -> keyword list.
 * Used for import and export.
 */
export const DictionaryPayloadSchema = z.record(categoryName, KeywordListSchema);

export type DictionaryPayload = z.infer<typeof DictionaryPayloadSchema>;

// ============================================================================
// Classification Schemas
// ============================================================================

/**
 * Per-statement, per-category outcome.
 * present == (count > 0) == (matches.length > 0)
 */
export const MatchResultSchema = z
    .object({
        present: z.boolean(),
        count: z.number().int().min(0),
        matches: z.array(z.string()),
    })
    .refine((r) => r.count === r.matches.length && r.present === r.count > 0, {
        message: 'present, count and matches disagree',
    });

export type MatchResult = z.infer<typeof MatchResultSchema>;

export const ResolutionStrategySchema = z.enum(RESOLUTION_STRATEGIES);

export type ResolutionStrategy = z.infer<typeof ResolutionStrategySchema>;

export const ColumnNamingSchema = z.enum(COLUMN_NAMING);

export type ColumnNaming = z.infer<typeof ColumnNamingSchema>;

/**
 * Statement field as resolved for one dataset, with how it was found.
 */
export const ResolvedFieldSchema = z.object({
    field: z.string(),
    strategy: z.union([z.literal('explicit'), ResolutionStrategySchema]),
});

export type ResolvedField = z.infer<typeof ResolvedFieldSchema>;

// ============================================================================
// Statistics Schemas
// ============================================================================

export const CategoryStatsSchema = z.object({
    category: z.string(),
    present_count: z.number().int().min(0),
    present_percentage: z.number().min(0).max(100),
});

export type CategoryStats = z.infer<typeof CategoryStatsSchema>;

export const DatasetStatsSchema = z.object({
    total_rows: z.number().int().min(0),
    any_category_rows: z.number().int().min(0),
    categories_analyzed: z.number().int().min(0),
    categories: z.array(CategoryStatsSchema),
});

export type DatasetStats = z.infer<typeof DatasetStatsSchema>;

// ============================================================================
// Configuration Schema
// ============================================================================

/**
 * keyword-classifier.yaml
 */
export const ClassifierConfigSchema = z.object({
    seed: z.enum(SEED_NAMES).default('marketing'),
    dictionary_path: z.string().min(1).optional(),
    statement_field: z.string().min(1).optional(),
    resolution: z.array(ResolutionStrategySchema).min(1).default([...RESOLUTION_ORDER]),
    column_naming: ColumnNamingSchema.default('detailed'),
    match_separator: z.string().default(MATCH_SEPARATOR),
    output_dir: z.string().min(1).default('outputs'),
});

export type ClassifierConfig = z.infer<typeof ClassifierConfigSchema>;

// ============================================================================
// Run Manifest Schema
// ============================================================================

/**
 * Written next to the outputs of every classification run.
 */
export const RunManifestSchema = z.object({
    input_file: z.string(),
    input_hash: sha256Tag,
    dictionary_fingerprint: z.string().regex(/^[0-9a-f]+$/),
    statement_field: z.string(),
    resolution_strategy: ResolvedFieldSchema.shape.strategy,
    column_naming: ColumnNamingSchema,
    filter: z.string().optional(),
    stats: DatasetStatsSchema,
    run_timestamp: z.string(),
    version: z.string(),
});

export type RunManifest = z.infer<typeof RunManifestSchema>;
