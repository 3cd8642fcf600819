/**
 * Column detection: header synonyms → canonical line item fields.
 *
 * Keys are lowercase with internal whitespace replaced by "_".
 * English and Dutch headers are both common in supplier exports.
 */

export const CANONICAL_FIELDS = [
    'item_code',
    'item_name',
    'quantity',
    'unit_price',
    'line_total',
    'tax_rate',
] as const;

export type CanonicalField = typeof CANONICAL_FIELDS[number];

export const COLUMN_SYNONYMS: Readonly<Record<string, CanonicalField>> = {
    // item_code
    item_code: 'item_code',
    code: 'item_code',
    sku: 'item_code',
    product_code: 'item_code',
    productcode: 'item_code',
    artikel: 'item_code',
    artikelcode: 'item_code',

    // item_name
    item_name: 'item_name',
    name: 'item_name',
    description: 'item_name',
    product: 'item_name',
    omschrijving: 'item_name',
    artikelnaam: 'item_name',
    beschrijving: 'item_name',
    naam: 'item_name',

    // quantity
    quantity: 'quantity',
    qty: 'quantity',
    aantal: 'quantity',
    aant: 'quantity',
    hoeveelheid: 'quantity',

    // unit_price
    unit_price: 'unit_price',
    price: 'unit_price',
    prijs: 'unit_price',
    prijs_per_stuk: 'unit_price',
    stukprijs: 'unit_price',
    eenheidsprijs: 'unit_price',

    // line_total
    line_total: 'line_total',
    total: 'line_total',
    amount: 'line_total',
    totaal: 'line_total',
    totaalbedrag: 'line_total',
    bedrag: 'line_total',

    // tax_rate
    tax_rate: 'tax_rate',
    tax: 'tax_rate',
    vat: 'tax_rate',
    btw: 'tax_rate',
    'btw%': 'tax_rate',
    btw_percentage: 'tax_rate',
};

export interface ColumnMapping {
    /** Column index per canonical field */
    mapping: Partial<Record<CanonicalField, number>>;
    /** Headers that did not map to any field (or mapped to an already-taken field) */
    unmapped: string[];
}

export function normalizeHeader(header: string): string {
    return header.trim().toLowerCase().replace(/\s+/g, '_');
}

/**
 * Map header cells to canonical fields. The first header for a field wins.
 */
export function mapColumns(headers: string[]): ColumnMapping {
    const mapping: Partial<Record<CanonicalField, number>> = {};
    const unmapped: string[] = [];

    headers.forEach((header, index) => {
        if (header.trim() === '') return;

        const field = COLUMN_SYNONYMS[normalizeHeader(header)];
        if (field === undefined || mapping[field] !== undefined) {
            unmapped.push(header);
            return;
        }
        mapping[field] = index;
    });

    return { mapping, unmapped };
}
