import type { LineItem, RawLineItem } from '../types/index.js';
import { LineItemSchema } from '../types/index.js';
import { cleanCode, cleanText } from '../utils/normalize.js';

/**
 * Validate one raw row against the canonical line item schema.
 *
 * Text fields are cleaned first so that "" and whitespace-only cells
 * become null. Names have their whitespace collapsed; codes are only
 * trimmed. Missing numeric fields become null.
 *
 * @returns The canonical line item, or null when the row is unusable
 */
export function validateRow(raw: RawLineItem): LineItem | null {
    const candidate = {
        item_code: cleanCode(raw.item_code),
        item_name: cleanText(raw.item_name) ?? '',
        quantity: raw.quantity ?? null,
        unit_price: raw.unit_price ?? null,
        line_total: raw.line_total ?? null,
        tax_rate: raw.tax_rate ?? null,
    };

    const parsed = LineItemSchema.safeParse(candidate);
    return parsed.success ? parsed.data : null;
}
