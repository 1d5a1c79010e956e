/**
 * Dataset-level statistics from per-row classifications.
 */

import type { CategoryStats, DatasetStats } from '../types/index.js';
import type { Classification } from './types.js';

/**
 * Share of rows, as a percentage. 0 for an empty dataset, never NaN.
 */
export function percentage(count: number, total: number): number {
    if (total === 0) return 0;
    return (count / total) * 100;
}

/**
 * Compute dataset statistics.
 *
 * - total_rows: number of classified rows
 * - any_category_rows: rows where at least one category is present
 * - per category: present_count and present_percentage
 *
 * @param results - One classification per row
 * @param categories - Categories to report, in output order
 */
export function computeStats(results: readonly Classification[], categories: readonly string[]): DatasetStats {
    const totalRows = results.length;
    const presentCounts = new Map<string, number>(categories.map((c) => [c, 0]));
    let anyCategoryRows = 0;

    for (const classification of results) {
        let any = false;
        for (const category of categories) {
            if (classification.get(category)?.present) {
                presentCounts.set(category, (presentCounts.get(category) ?? 0) + 1);
                any = true;
            }
        }
        if (any) anyCategoryRows++;
    }

    const categoryStats: CategoryStats[] = categories.map((category) => {
        const presentCount = presentCounts.get(category) ?? 0;
        return {
            category,
            present_count: presentCount,
            present_percentage: percentage(presentCount, totalRows),
        };
    });

    return {
        total_rows: totalRows,
        any_category_rows: anyCategoryRows,
        categories_analyzed: categories.length,
        categories: categoryStats,
    };
}
