/**
 * Dataset module: tabular input/output as in-memory buffers.
 */

export { decodeDataset, decodeDatasetText, encodeDataset } from './codec.js';
