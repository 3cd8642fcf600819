/**
 * Generic line item parser for CSV and XLSX exports.
 *
 * Reads the first sheet, detects columns through the synonym table and
 * turns each non-blank row into a raw line item. Numeric cells that cannot
 * be read become null and are reported once per field.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Warnings returned in result.
 */

import * as XLSX from 'xlsx';
import type { DocumentParseResult, RawLineItem } from '../types/index.js';
import { parseNumber } from '../utils/number.js';
import { stripBom } from '../utils/normalize.js';
import { mapColumns } from './columns.js';
import type { CanonicalField } from './columns.js';

const NUMERIC_FIELDS = ['quantity', 'unit_price', 'line_total', 'tax_rate'] as const;

type NumericField = typeof NUMERIC_FIELDS[number];

/**
 * Parse a document into raw line items.
 *
 * @param data - File contents as ArrayBuffer
 * @param sourceFile - Original filename, used as document name
 * @returns DocumentParseResult with the document and warnings
 * @throws Error when no item name column can be found
 */
export function parseLineItems(data: ArrayBuffer, sourceFile: string): DocumentParseResult {
    // raw: keep CSV cells as text so codes like "00123" survive
    const workbook = XLSX.read(data, { type: 'array', raw: true });
    const warnings: string[] = [];

    const sheetName = workbook.SheetNames[0];
    if (sheetName === undefined) {
        warnings.push('No sheets found');
        return { document: { name: sourceFile, rows: [] }, warnings };
    }

    const table = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName], {
        header: 1,
        defval: null,
        blankrows: false,
    });

    const [headerRow, ...dataRows] = table;
    if (!headerRow) {
        return { document: { name: sourceFile, rows: [] }, warnings };
    }

    const headers = headerRow.map(cell => stripBom(textValue(cell) ?? ''));
    const { mapping, unmapped } = mapColumns(headers);

    if (mapping.item_name === undefined) {
        throw new Error(
            `Missing required column: item_name. Found: ${headers.filter(h => h !== '').join(', ')}`
        );
    }
    if (unmapped.length > 0) {
        warnings.push(`Ignored unrecognized columns: ${unmapped.join(', ')}`);
    }

    const unreadable: Record<NumericField, number> = {
        quantity: 0,
        unit_price: 0,
        line_total: 0,
        tax_rate: 0,
    };

    const cell = (row: unknown[], field: CanonicalField): unknown => {
        const index = mapping[field];
        return index === undefined ? null : row[index] ?? null;
    };

    const rows: RawLineItem[] = [];
    for (const row of dataRows) {
        if (row.every(value => textValue(value) === null)) {
            continue;
        }

        const item: RawLineItem = {
            item_code: textValue(cell(row, 'item_code')),
            item_name: textValue(cell(row, 'item_name')),
        };

        for (const field of NUMERIC_FIELDS) {
            const value = cell(row, field);
            const parsed = parseNumber(value);
            if (parsed === null && textValue(value) !== null) {
                unreadable[field]++;
            }
            item[field] = parsed;
        }

        rows.push(item);
    }

    for (const field of NUMERIC_FIELDS) {
        if (unreadable[field] > 0) {
            warnings.push(`${unreadable[field]} unreadable ${field} value(s) treated as missing`);
        }
    }

    return { document: { name: sourceFile, rows }, warnings };
}

/**
 * Cell → trimmed text, or null when empty.
 */
function textValue(value: unknown): string | null {
    if (value === null || value === undefined) {
        return null;
    }
    const text = typeof value === 'string' ? value.trim() : String(value).trim();
    return text === '' ? null : text;
}
