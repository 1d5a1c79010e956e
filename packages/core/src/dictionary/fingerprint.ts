/**
 * Dictionary fingerprint for run manifests.
 *
 * ARCHITECTURAL NOTE: Uses js-sha256 for cross-platform compatibility.
 * Node's crypto module is not available in browser.
 */

import { sha256 } from 'js-sha256';
import { FINGERPRINT_LENGTH } from '../types/index.js';
import type { Dictionary } from './types.js';

/**
 * Deterministic hash of a dictionary's content and order.
 *
 * Payload: JSON array of [category, keywords] pairs. An array is used rather
 * than an object so integer-like category names keep their position.
 *
 * @returns FINGERPRINT_LENGTH-character hex string
 */
export function fingerprintDictionary(dictionary: Dictionary): string {
    const payload = JSON.stringify([...dictionary.entries()]);
    return sha256(payload).slice(0, FINGERPRINT_LENGTH);
}
