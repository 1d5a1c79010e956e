/**
 * Dictionary payload parsing and validation.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Problems are raised as InvalidFormatError.
 */

import type { ZodError } from 'zod';
import { DictionaryPayloadSchema } from '../types/index.js';
import type { DictionaryPayload } from '../types/index.js';
import { InvalidFormatError } from '../errors.js';

/**
 * Render zod issues as "path: message" strings.
 */
export function formatIssues(error: ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.map(String).join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}

/**
 * Validate an already-deserialized payload.
 *
 * @throws InvalidFormatError unless payload is an object of string -> unique string list
 */
export function parseDictionaryPayload(payload: unknown): DictionaryPayload {
    const result = DictionaryPayloadSchema.safeParse(payload);
    if (!result.success) {
        throw new InvalidFormatError('Invalid dictionary format', formatIssues(result.error));
    }
    return result.data;
}

/**
 * Parse dictionary JSON text.
 *
 * @throws InvalidFormatError for malformed JSON or a payload of the wrong shape
 */
export function parseDictionaryJson(text: string): DictionaryPayload {
    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (e) {
        const errorMsg = e instanceof Error ? e.message : String(e);
        throw new InvalidFormatError('Dictionary is not valid JSON', [errorMsg]);
    }
    return parseDictionaryPayload(data);
}

/**
 * Convert newline-delimited input (one keyword per line) into a keyword list.
 * Lines are trimmed and blank lines dropped. Duplicates are kept here;
 * DictionaryStore.setKeywords decides what to do with them.
 */
export function parseKeywordBlock(block: string): string[] {
    if (!block) return [];
    return block
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line !== '');
}
