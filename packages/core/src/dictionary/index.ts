/**
 * Dictionary module: editable category -> keyword store.
 */

export { DictionaryStore } from './store.js';
export { parseDictionaryPayload, parseDictionaryJson, parseKeywordBlock, formatIssues } from './parse.js';
export { fingerprintDictionary } from './fingerprint.js';
export type { Dictionary, SetKeywordsResult } from './types.js';
