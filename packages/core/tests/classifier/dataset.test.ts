import { describe, it, expect } from 'vitest';
import { classifyDataset, filterByCategory } from '../../src/classifier/dataset.js';
import { DictionaryStore } from '../../src/dictionary/store.js';
import { MissingColumnError, NotFoundError } from '../../src/errors.js';
import type { Dataset } from '../../src/types/index.js';

function makeDataset(statements: (string | null)[]): Dataset {
    return {
        columns: ['id', 'Statement'],
        rows: statements.map((s, i) => ({ id: String(i + 1), Statement: s })),
    };
}

const store = () =>
    DictionaryStore.fromPayload({
        urgency_marketing: ['limited time', 'hurry'],
        exclusive_marketing: ['vip', 'members only'],
    });

describe('classifyDataset', () => {
    describe('derived columns', () => {
        it('appends present/count/matches per category in category order', () => {
            const result = classifyDataset(makeDataset(['Hurry! Limited time offer']), store());

            expect(result.columns).toEqual([
                'id',
                'Statement',
                'urgency_marketing_present',
                'urgency_marketing_count',
                'urgency_marketing_matches',
                'exclusive_marketing_present',
                'exclusive_marketing_count',
                'exclusive_marketing_matches',
            ]);
            expect(result.rows[0]).toEqual({
                id: '1',
                Statement: 'Hurry! Limited time offer',
                urgency_marketing_present: true,
                urgency_marketing_count: 2,
                urgency_marketing_matches: 'limited time, hurry',
                exclusive_marketing_present: false,
                exclusive_marketing_count: 0,
                exclusive_marketing_matches: '',
            });
        });

        it('supports the flag convention', () => {
            const result = classifyDataset(makeDataset(['VIP night', 'quiet']), store(), { naming: 'flag' });
            expect(result.columns).toEqual(['id', 'Statement', 'urgency_marketing_flag', 'exclusive_marketing_flag']);
            expect(result.rows.map((r) => r.exclusive_marketing_flag)).toEqual([1, 0]);
        });

        it('supports the one-hot convention with a labels column', () => {
            const result = classifyDataset(makeDataset(['Hurry, VIP members only']), store(), {
                naming: 'one-hot',
                separator: '|',
            });
            expect(result.columns).toEqual(['id', 'Statement', 'labels', 'urgency_marketing', 'exclusive_marketing']);
            expect(result.rows[0].labels).toBe('urgency_marketing|exclusive_marketing');
            expect(result.rows[0].urgency_marketing).toBe(true);
        });

        it('uses the configured separator for matches', () => {
            const result = classifyDataset(makeDataset(['VIP, members only']), store(), { separator: ';' });
            expect(result.rows[0].exclusive_marketing_matches).toBe('vip;members only');
        });

        it('warns when a derived column overwrites an input column', () => {
            const dataset: Dataset = {
                columns: ['Statement', 'urgency_marketing_count'],
                rows: [{ Statement: 'hurry', urgency_marketing_count: 'old' }],
            };
            const result = classifyDataset(dataset, store());
            expect(result.warnings).toEqual(['Derived columns overwrite input columns: urgency_marketing_count']);
            expect(result.rows[0].urgency_marketing_count).toBe(1);
            expect(result.columns.filter((c) => c === 'urgency_marketing_count')).toHaveLength(1);
        });

        it('warns when a category column collides with the one-hot labels column', () => {
            const dictionary = DictionaryStore.fromPayload({ labels: ['hurry'], exclusive_marketing: ['vip'] });
            const result = classifyDataset(makeDataset(['Hurry, VIP']), dictionary, { naming: 'one-hot' });

            expect(result.warnings).toEqual(['Derived columns collide with each other: labels']);
            expect(result.columns).toEqual(['id', 'Statement', 'labels', 'exclusive_marketing']);
            expect(result.rows[0].labels).toBe(true);
        });

        it('does not mutate input rows', () => {
            const dataset = makeDataset(['hurry']);
            classifyDataset(dataset, store());
            expect(dataset.rows[0]).toEqual({ id: '1', Statement: 'hurry' });
            expect(dataset.columns).toEqual(['id', 'Statement']);
        });

        it('classifies missing statements as no match', () => {
            const result = classifyDataset(makeDataset([null]), store());
            expect(result.rows[0].urgency_marketing_present).toBe(false);
            expect(result.rows[0].urgency_marketing_count).toBe(0);
        });
    });

    describe('statement field', () => {
        it('reports the resolved field', () => {
            const result = classifyDataset(makeDataset(['hurry']), store());
            expect(result.statementField).toEqual({ field: 'Statement', strategy: 'exact' });
        });

        it('fails with MissingColumnError and no output when the field cannot be resolved', () => {
            const dataset: Dataset = { columns: ['id', 'copy'], rows: [{ id: '1', copy: 'hurry' }] };
            expect(() => classifyDataset(dataset, store(), { resolution: { order: ['exact', 'contains'] } })).toThrow(
                MissingColumnError
            );
        });

        it('fails when an explicit field is absent', () => {
            expect(() => classifyDataset(makeDataset(['hurry']), store(), { resolution: { field: 'body' } })).toThrow(
                MissingColumnError
            );
        });
    });

    describe('statistics', () => {
        it('computes counts and percentages', () => {
            const result = classifyDataset(
                makeDataset(['Hurry while stocks last', 'A calm day', 'Nothing here', 'Just browsing']),
                store()
            );
            expect(result.stats).toEqual({
                total_rows: 4,
                any_category_rows: 1,
                categories_analyzed: 2,
                categories: [
                    { category: 'urgency_marketing', present_count: 1, present_percentage: 25 },
                    { category: 'exclusive_marketing', present_count: 0, present_percentage: 0 },
                ],
            });
        });

        it('counts a row once in any_category_rows even if several categories match', () => {
            const result = classifyDataset(makeDataset(['Hurry, VIP', 'VIP only', 'none']), store());
            expect(result.stats.any_category_rows).toBe(2);
        });

        it('reports 0% for an empty dataset', () => {
            const result = classifyDataset(makeDataset([]), store());
            expect(result.rows).toEqual([]);
            expect(result.stats.total_rows).toBe(0);
            expect(result.stats.categories.map((c) => c.present_percentage)).toEqual([0, 0]);
        });
    });

    describe('dictionary snapshot', () => {
        it('uses the dictionary as it was when the pass started', () => {
            const s = store();
            const result = classifyDataset(makeDataset(['hurry']), s);
            s.deleteCategory('urgency_marketing');
            expect(result.categories).toEqual(['urgency_marketing', 'exclusive_marketing']);
            expect(result.results[0].get('urgency_marketing')?.present).toBe(true);
        });
    });
});

describe('filterByCategory', () => {
    it('keeps rows where the category is present', () => {
        const classified = classifyDataset(makeDataset(['hurry', 'vip', 'hurry vip']), store());
        const filtered = filterByCategory(classified, 'exclusive_marketing');
        expect(filtered.rows.map((r) => r.id)).toEqual(['2', '3']);
        expect(filtered.results).toHaveLength(2);
        expect(filtered.stats).toEqual(classified.stats);
    });

    it('throws NotFoundError for an unknown category', () => {
        const classified = classifyDataset(makeDataset(['hurry']), store());
        expect(() => filterByCategory(classified, 'seasonal')).toThrow(NotFoundError);
    });
});
