/**
 * Parser module: CSV/XLSX exports → raw line items.
 */

export { parseLineItems } from './parse-line-items.js';
export {
    CANONICAL_FIELDS,
    COLUMN_SYNONYMS,
    mapColumns,
    normalizeHeader,
} from './columns.js';
export type { CanonicalField, ColumnMapping } from './columns.js';
