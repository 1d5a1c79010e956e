/**
 * In-memory keyword dictionary: category name -> ordered, unique keywords.
 *
 * One store per session. There is no shared or global instance; whoever holds
 * the object owns its state. Duplicate checks for both category names and
 * keywords are exact (case-sensitive).
 *
 * ARCHITECTURAL NOTE: No console.* calls, no I/O.
 */

import { DEFAULT_DICTIONARIES, RESERVED_CATEGORY_NAMES } from '../types/index.js';
import type { DictionaryPayload, SeedName } from '../types/index.js';
import {
    DuplicateCategoryError,
    DuplicateKeywordError,
    InvalidFormatError,
    NotFoundError,
} from '../errors.js';
import { parseDictionaryJson, parseDictionaryPayload } from './parse.js';
import type { Dictionary, SetKeywordsResult } from './types.js';

export class DictionaryStore {
    private categoryMap = new Map<string, string[]>();

    /**
     * Create a store seeded with one of the built-in dictionaries.
     */
    static fromSeed(seed: SeedName = 'marketing'): DictionaryStore {
        const store = new DictionaryStore();
        store.load(DEFAULT_DICTIONARIES[seed]);
        return store;
    }

    /**
     * Create a store from an untrusted payload.
     *
     * @throws InvalidFormatError if the payload is malformed
     */
    static fromPayload(payload: unknown): DictionaryStore {
        const store = new DictionaryStore();
        store.replaceAll(payload);
        return store;
    }

    get size(): number {
        return this.categoryMap.size;
    }

    has(category: string): boolean {
        return this.categoryMap.has(category);
    }

    categories(): string[] {
        return [...this.categoryMap.keys()];
    }

    /**
     * @throws NotFoundError if the category does not exist
     */
    keywords(category: string): string[] {
        return [...this.require(category)];
    }

    /**
     * @throws DuplicateCategoryError if name is empty or already present
     * @throws InvalidFormatError if name is reserved (it would not survive export)
     */
    addCategory(name: string): void {
        if (name.trim() === '') {
            throw new DuplicateCategoryError('Category name is empty');
        }
        if (RESERVED_CATEGORY_NAMES.some((reserved) => reserved === name)) {
            throw new InvalidFormatError(`Category name "${name}" is reserved`);
        }
        if (this.categoryMap.has(name)) {
            throw new DuplicateCategoryError(`Category "${name}" already exists`);
        }
        this.categoryMap.set(name, []);
    }

    /**
     * Remove a category and all its keywords.
     *
     * @throws NotFoundError if the category does not exist
     */
    deleteCategory(name: string): void {
        this.require(name);
        this.categoryMap.delete(name);
    }

    /**
     * Append a keyword to a category.
     *
     * @throws NotFoundError if the category does not exist
     * @throws InvalidFormatError if the keyword is blank
     * @throws DuplicateKeywordError if the category already holds this exact keyword
     */
    addKeyword(category: string, keyword: string): void {
        const keywords = this.require(category);
        if (keyword.trim() === '') {
            throw new InvalidFormatError('Keyword cannot be empty');
        }
        if (keywords.includes(keyword)) {
            throw new DuplicateKeywordError(`Keyword "${keyword}" already exists in "${category}"`);
        }
        keywords.push(keyword);
    }

    /**
     * @throws NotFoundError if the category or the keyword does not exist
     */
    removeKeyword(category: string, keyword: string): void {
        const keywords = this.require(category);
        const index = keywords.indexOf(keyword);
        if (index === -1) {
            throw new NotFoundError(`Keyword "${keyword}" not found in "${category}"`);
        }
        keywords.splice(index, 1);
    }

    /**
     * Replace a category's keywords wholesale (text-area editing).
     * Later duplicates are dropped and reported; first occurrence wins.
     *
     * @throws NotFoundError if the category does not exist
     */
    setKeywords(category: string, keywords: readonly string[]): SetKeywordsResult {
        this.require(category);
        const kept: string[] = [];
        const droppedDuplicates: string[] = [];
        for (const keyword of keywords) {
            if (keyword.trim() === '') continue;
            if (kept.includes(keyword)) {
                droppedDuplicates.push(keyword);
            } else {
                kept.push(keyword);
            }
        }
        this.categoryMap.set(category, kept);
        return { keywords: [...kept], droppedDuplicates };
    }

    /**
     * Replace the whole mapping. Validation happens before anything changes,
     * so a rejected payload leaves the store as it was.
     *
     * @throws InvalidFormatError if payload is not an object of string -> unique string list
     */
    replaceAll(payload: unknown): void {
        this.load(parseDictionaryPayload(payload));
    }

    /**
     * Replace the whole mapping from JSON text.
     *
     * @throws InvalidFormatError for malformed JSON or payload
     */
    importJson(text: string): void {
        this.load(parseDictionaryJson(text));
    }

    /**
     * Current mapping as a fresh plain object, in insertion order.
     *
     * Object key order puts integer-like names ("2024") first, so such
     * categories come back ahead of the others after an import.
     */
    export(): DictionaryPayload {
        return Object.fromEntries(
            [...this.categoryMap].map(([category, keywords]) => [category, [...keywords]])
        );
    }

    exportJson(): string {
        return JSON.stringify(this.export(), null, 2);
    }

    /**
     * Deep copy for one classification pass, keyword lists frozen. Later
     * mutations of the store do not show through.
     */
    snapshot(): Dictionary {
        const copy = new Map<string, readonly string[]>();
        for (const [category, keywords] of this.categoryMap) {
            copy.set(category, Object.freeze([...keywords]));
        }
        return copy;
    }

    private load(payload: Readonly<Record<string, readonly string[]>>): void {
        const next = new Map<string, string[]>();
        for (const [category, keywords] of Object.entries(payload)) {
            next.set(category, [...keywords]);
        }
        this.categoryMap = next;
    }

    private require(category: string): string[] {
        const keywords = this.categoryMap.get(category);
        if (!keywords) {
            throw new NotFoundError(`Category "${category}" not found`);
        }
        return keywords;
    }
}
