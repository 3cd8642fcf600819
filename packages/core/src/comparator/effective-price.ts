import { Decimal } from 'decimal.js';
import type { LineItem } from '../types/index.js';

/**
 * Effective per-unit price of one side.
 *
 * Priority:
 * 1. Explicit unit_price
 * 2. line_total / quantity, when both are present and quantity > 0
 * 3. Undefined (null)
 *
 * Gross price, discounts and line totals are never compared on their own;
 * only this single price decides acceptability.
 */
export function effectivePrice(item: LineItem): Decimal | null {
    if (item.unit_price !== null) {
        return new Decimal(item.unit_price);
    }
    if (item.line_total !== null && item.quantity !== null && item.quantity > 0) {
        return new Decimal(item.line_total).dividedBy(item.quantity);
    }
    return null;
}
