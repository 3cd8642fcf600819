import exceljs from 'exceljs';
import type { Worksheet, Workbook } from 'exceljs';

const HEADER_FILL = 'FF4472C4';
const MIN_WIDTH = 8;
const MAX_WIDTH = 60;

export interface SheetColumn {
    header: string;
    key: string;
    /** Money columns get the run's currency format and right alignment. */
    money?: boolean;
    /** Fixed width; long text wraps instead of widening the column. */
    width?: number;
}

export interface SheetRow {
    values: Record<string, unknown>;
    /** ARGB fill for the whole row. */
    fill?: string | null;
}

export interface TableSheetOptions {
    currencySymbol?: string;
}

export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Invoice Reconciler';
    workbook.created = new Date();
    return workbook;
}

/**
 * Adds one table sheet: styled frozen header, one line per row,
 * optional row fills, currency columns and sized widths.
 */
export function addTableSheet(
    workbook: Workbook,
    name: string,
    columns: SheetColumn[],
    rows: SheetRow[],
    options: TableSheetOptions = {}
): Worksheet {
    const sheet = workbook.addWorksheet(name, {
        views: [{ state: 'frozen', xSplit: 0, ySplit: 1 }],
    });
    sheet.columns = columns.map(({ header, key }) => ({ header, key }));

    for (const row of rows) {
        const added = sheet.addRow(row.values);
        if (row.fill) {
            added.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: row.fill } };
        }
    }

    for (const spec of columns) {
        const column = sheet.getColumn(spec.key);
        if (spec.money) {
            column.numFmt = currencyFormat(options.currencySymbol ?? '');
            column.alignment = { horizontal: 'right' };
        }
        if (spec.width !== undefined) {
            column.width = spec.width;
            column.alignment = { wrapText: true, vertical: 'top' };
        } else {
            column.width = fitWidth(spec.header, rows.map(r => r.values[spec.key]));
        }
    }

    // Column styles reach the header cells too, so the header goes last
    const header = sheet.getRow(1);
    header.font = { bold: true, color: { argb: 'FFFFFFFF' }, size: 11 };
    header.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_FILL } };
    header.alignment = { vertical: 'middle', horizontal: 'center' };

    return sheet;
}

/**
 * Two-section number format: negatives in red. Quotes in the symbol
 * would end the literal early, so they are dropped.
 */
export function currencyFormat(currencySymbol: string): string {
    const symbol = currencySymbol.replace(/"/g, '');
    if (symbol === '') {
        return '#,##0.00;[Red]-#,##0.00';
    }
    return `"${symbol}"#,##0.00;[Red]-"${symbol}"#,##0.00`;
}

/**
 * Width from the longest header or cell text, with padding, clamped.
 */
export function fitWidth(header: string, values: unknown[]): number {
    let longest = header.length;
    for (const value of values) {
        if (value === null || value === undefined) continue;
        longest = Math.max(longest, String(value).length);
    }
    return Math.min(Math.max(longest + 2, MIN_WIDTH), MAX_WIDTH);
}
