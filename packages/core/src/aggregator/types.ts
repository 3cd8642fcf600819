import type { LineItem } from '../types/index.js';

/**
 * Options for aggregateDocuments().
 */
export interface AggregateOptions {
    currencySymbol?: string;
}

/**
 * Outcome of merging the rows of one identity.
 */
export interface MergedItem {
    item: LineItem;
    /** Distinct non-null unit prices, ascending */
    distinctPrices: number[];
}
