import type { LineItem } from '../types/index.js';
import { normalizeName } from '../utils/normalize.js';

/**
 * Deduplication key for a line item within one side.
 *
 * Code keys and name keys use separate prefixes, so an item coded
 * "widget" never merges with an uncoded item named "Widget".
 */
export function identityKey(item: LineItem): string {
    if (item.item_code !== null && item.item_code !== '') {
        return `code:${item.item_code}`;
    }
    return `name:${normalizeName(item.item_name)}`;
}
