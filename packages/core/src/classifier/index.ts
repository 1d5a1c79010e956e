/**
 * Classifier module: keyword matching per statement and per dataset.
 */

export { classify, classifyWith, matchKeywords, toDictionary } from './classify.js';
export { classifyDataset, filterByCategory } from './dataset.js';
export { resolveStatementField } from './resolve-field.js';
export { derivedColumns, flattenClassification } from './columns.js';
export { computeStats, percentage } from './stats.js';
export type {
    Classification,
    ClassifiedDataset,
    ClassifyDatasetOptions,
    DictionarySource,
    NamingOptions,
    ResolutionPolicy,
} from './types.js';
