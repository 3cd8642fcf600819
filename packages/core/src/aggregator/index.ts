/**
 * Aggregator module: per-side multi-document deduplication.
 */

export { aggregateDocuments, mergeRows } from './aggregate.js';
export { validateRow } from './validate-row.js';
export { identityKey } from './identity.js';
export type { AggregateOptions, MergedItem } from './types.js';
