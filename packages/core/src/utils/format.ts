import { Decimal } from 'decimal.js';

/**
 * Format an amount with two decimals, e.g. "€15.25".
 */
export function formatMoney(value: Decimal.Value, currencySymbol: string): string {
    return `${currencySymbol}${new Decimal(value).toFixed(2)}`;
}

/**
 * Format a quantity without trailing zeros, e.g. "10" or "2.5".
 */
export function formatQuantity(value: Decimal.Value): string {
    return new Decimal(value).toString();
}
