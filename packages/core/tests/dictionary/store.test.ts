import { describe, it, expect, beforeEach } from 'vitest';
import { DictionaryStore } from '../../src/dictionary/store.js';
import {
    DuplicateCategoryError,
    DuplicateKeywordError,
    InvalidFormatError,
    NotFoundError,
} from '../../src/errors.js';
import { DEFAULT_DICTIONARIES } from '../../src/types/index.js';

describe('DictionaryStore', () => {
    let store: DictionaryStore;

    beforeEach(() => {
        store = DictionaryStore.fromPayload({
            urgency_marketing: ['limited time', 'hurry'],
            exclusive_marketing: ['vip'],
        });
    });

    describe('seeding', () => {
        it('starts from the marketing seed by default', () => {
            const seeded = DictionaryStore.fromSeed();
            expect(seeded.categories()).toEqual(['urgency_marketing', 'exclusive_marketing']);
            expect(seeded.keywords('urgency_marketing')).toEqual([...DEFAULT_DICTIONARIES.marketing.urgency_marketing]);
            expect(seeded.keywords('exclusive_marketing')).toHaveLength(15);
        });

        it('supports the compact seed', () => {
            const seeded = DictionaryStore.fromSeed('marketing-compact');
            expect(seeded.keywords('urgency_marketing')).toEqual([
                'limited time', 'last chance', 'hurry', 'act now',
                'today only', 'expires soon', 'final hours',
            ]);
        });

        it('supports an empty seed', () => {
            expect(DictionaryStore.fromSeed('empty').size).toBe(0);
        });

        it('gives each seeded store its own state', () => {
            const a = DictionaryStore.fromSeed();
            const b = DictionaryStore.fromSeed();
            a.addKeyword('urgency_marketing', 'flash sale');
            expect(b.keywords('urgency_marketing')).not.toContain('flash sale');
        });
    });

    describe('addCategory', () => {
        it('inserts an empty category at the end', () => {
            store.addCategory('scarcity_marketing');
            expect(store.categories()).toEqual(['urgency_marketing', 'exclusive_marketing', 'scarcity_marketing']);
            expect(store.keywords('scarcity_marketing')).toEqual([]);
        });

        it('rejects an existing name', () => {
            expect(() => store.addCategory('urgency_marketing')).toThrow(DuplicateCategoryError);
        });

        it('rejects an empty or blank name', () => {
            expect(() => store.addCategory('')).toThrow(DuplicateCategoryError);
            expect(() => store.addCategory('   ')).toThrow(DuplicateCategoryError);
        });

        it('rejects a name that cannot be exported as an object key', () => {
            expect(() => store.addCategory('__proto__')).toThrow(InvalidFormatError);
            expect(store.categories()).toEqual(['urgency_marketing', 'exclusive_marketing']);
        });

        it('treats names differing only in case as distinct', () => {
            store.addCategory('Urgency_Marketing');
            expect(store.size).toBe(3);
        });
    });

    describe('deleteCategory', () => {
        it('removes the category and its keywords', () => {
            store.deleteCategory('urgency_marketing');
            expect(store.categories()).toEqual(['exclusive_marketing']);
            expect(store.has('urgency_marketing')).toBe(false);
        });

        it('throws NotFoundError for an unknown category', () => {
            expect(() => store.deleteCategory('missing')).toThrow(NotFoundError);
        });
    });

    describe('addKeyword', () => {
        it('appends in insertion order', () => {
            store.addKeyword('urgency_marketing', 'act now');
            expect(store.keywords('urgency_marketing')).toEqual(['limited time', 'hurry', 'act now']);
        });

        it('throws NotFoundError for an unknown category', () => {
            expect(() => store.addKeyword('missing', 'hurry')).toThrow(NotFoundError);
        });

        it('throws DuplicateKeywordError for an exact duplicate', () => {
            expect(() => store.addKeyword('urgency_marketing', 'hurry')).toThrow(DuplicateKeywordError);
            expect(store.keywords('urgency_marketing')).toEqual(['limited time', 'hurry']);
        });

        it('accepts a keyword differing only in case', () => {
            store.addKeyword('urgency_marketing', 'Hurry');
            expect(store.keywords('urgency_marketing')).toEqual(['limited time', 'hurry', 'Hurry']);
        });

        it('rejects a blank keyword', () => {
            expect(() => store.addKeyword('urgency_marketing', ' ')).toThrow(InvalidFormatError);
        });
    });

    describe('removeKeyword', () => {
        it('removes the keyword', () => {
            store.removeKeyword('urgency_marketing', 'limited time');
            expect(store.keywords('urgency_marketing')).toEqual(['hurry']);
        });

        it('throws NotFoundError for an unknown category or keyword', () => {
            expect(() => store.removeKeyword('missing', 'hurry')).toThrow(NotFoundError);
            expect(() => store.removeKeyword('urgency_marketing', 'act now')).toThrow(NotFoundError);
        });
    });

    describe('setKeywords', () => {
        it('replaces the list, dropping blanks and later duplicates', () => {
            const result = store.setKeywords('urgency_marketing', ['act now', '', 'hurry', 'act now']);
            expect(result).toEqual({ keywords: ['act now', 'hurry'], droppedDuplicates: ['act now'] });
            expect(store.keywords('urgency_marketing')).toEqual(['act now', 'hurry']);
        });

        it('throws NotFoundError for an unknown category', () => {
            expect(() => store.setKeywords('missing', ['hurry'])).toThrow(NotFoundError);
        });
    });

    describe('replaceAll', () => {
        it('replaces the whole mapping', () => {
            store.replaceAll({ seasonal: ['holiday', 'summer'] });
            expect(store.export()).toEqual({ seasonal: ['holiday', 'summer'] });
        });

        it.each([
            ['a string', 'urgency'],
            ['null', null],
            ['an array', [['hurry']]],
            ['a non-list value', { urgency: 'hurry' }],
            ['a non-string keyword', { urgency: ['hurry', 42] }],
            ['a duplicate keyword', { urgency: ['hurry', 'hurry'] }],
        ])('rejects %s and leaves the store untouched', (_label, payload) => {
            const before = store.export();
            expect(() => store.replaceAll(payload)).toThrow(InvalidFormatError);
            expect(store.export()).toEqual(before);
        });
    });

    describe('import/export', () => {
        it('export returns a copy', () => {
            const exported = store.export();
            exported.urgency_marketing.push('act now');
            expect(store.keywords('urgency_marketing')).toEqual(['limited time', 'hurry']);
        });

        it('round-trips with category and keyword order preserved', () => {
            store.addCategory('seasonal');
            store.addKeyword('seasonal', 'summer');
            store.addKeyword('seasonal', 'holiday');

            const copy = DictionaryStore.fromPayload(store.export());
            expect(copy.categories()).toEqual(store.categories());
            expect(copy.export()).toEqual(store.export());
            expect(copy.keywords('seasonal')).toEqual(['summer', 'holiday']);
        });

        it('round-trips through JSON text', () => {
            const copy = new DictionaryStore();
            copy.importJson(store.exportJson());
            expect(copy.export()).toEqual(store.export());
        });

        it('rejects an imported __proto__ category without changing the store', () => {
            expect(() => store.importJson('{"__proto__": ["hurry"], "seasonal": ["summer"]}')).toThrow(
                'Category name "__proto__" is reserved'
            );
            expect(store.categories()).toEqual(['urgency_marketing', 'exclusive_marketing']);
        });

        it('moves integer-like category names to the front on round-trip', () => {
            const s = DictionaryStore.fromPayload({ urgency: ['hurry'] });
            s.addCategory('2024');
            expect(s.categories()).toEqual(['urgency', '2024']);

            const copy = new DictionaryStore();
            copy.importJson(s.exportJson());
            expect(copy.categories()).toEqual(['2024', 'urgency']);
            expect(copy.keywords('urgency')).toEqual(['hurry']);
        });

        it('exports JSON with 2-space indentation', () => {
            const small = DictionaryStore.fromPayload({ a: ['x'] });
            expect(small.exportJson()).toBe('{\n  "a": [\n    "x"\n  ]\n}');
        });

        it('rejects malformed JSON text without changing the store', () => {
            expect(() => store.importJson('{not json')).toThrow(InvalidFormatError);
            expect(store.categories()).toEqual(['urgency_marketing', 'exclusive_marketing']);
        });
    });

    describe('snapshot', () => {
        it('is not affected by later mutations', () => {
            const snap = store.snapshot();
            store.addKeyword('urgency_marketing', 'act now');
            store.deleteCategory('exclusive_marketing');

            expect(snap.get('urgency_marketing')).toEqual(['limited time', 'hurry']);
            expect(snap.has('exclusive_marketing')).toBe(true);
        });

        it('freezes keyword lists', () => {
            const snap = store.snapshot();
            expect(Object.isFrozen(snap.get('urgency_marketing'))).toBe(true);
        });
    });
});
