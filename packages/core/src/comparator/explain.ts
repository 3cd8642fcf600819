/**
 * Human-readable explanation clauses.
 * Clauses are joined with "; " in the order quantity, then price.
 */

import type { Side } from '../types/index.js';
import { SIDE_LABELS } from '../types/index.js';
import { formatMoney, formatQuantity } from '../utils/format.js';
import type { Decimal } from 'decimal.js';

export const EXPLANATION_SEPARATOR = '; ';

export const EXPLANATIONS = {
    OK: 'Quantity and price match',
    QUANTITY_UNAVAILABLE: 'Quantity could not be compared (missing data)',
    PRICE_UNAVAILABLE: 'Price could not be determined (missing data)',
    MISSING_FROM_SUPPLIER: 'Line is in system data but not on the supplier invoice',
    MISSING_FROM_SYSTEM: 'Line is on the supplier invoice but not in system data',
} as const;

export function quantityDiffers(expected: number, actual: number): string {
    return `Quantity differs (expected ${formatQuantity(expected)}, got ${formatQuantity(actual)})`;
}

export function priceDiffers(
    expected: Decimal,
    actual: Decimal,
    currencySymbol: string
): string {
    const difference = actual.minus(expected).abs();
    return `Price differs (expected ${formatMoney(expected, currencySymbol)}, ` +
        `got ${formatMoney(actual, currencySymbol)}, ` +
        `difference ${formatMoney(difference, currencySymbol)})`;
}

export function duplicateCode(code: string | null, side: Side): string {
    return `Duplicate item code "${code ?? ''}" in ${SIDE_LABELS[side].toLowerCase()} data`;
}
