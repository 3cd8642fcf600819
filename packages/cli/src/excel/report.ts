import type { Workbook } from 'exceljs';
import { isFullyReconciled, sortByStatusPriority, REPORT_STATUS_ORDER } from '@invoice-recon/core';
import type { LineStatus, ReconciliationResult, Side, SideReport } from '@invoice-recon/shared';
import { SIDE_LABELS } from '@invoice-recon/shared';
import { createWorkbook, addTableSheet } from './utils.js';
import type { SheetColumn, SheetRow } from './utils.js';

const STATUS_FILLS: Record<LineStatus, string | null> = {
    deviation: 'FFF8CBAD',
    missing_from_supplier: 'FFFFE699',
    missing_from_system: 'FFFFE699',
    partial: 'FFDDEBF7',
    duplicate_code: 'FFD9D9D9',
    ok: null,
};

const MATCH_LABELS = {
    by_code: 'Code',
    by_name: 'Name',
    none: '',
} as const;

const RECONCILIATION_COLUMNS: SheetColumn[] = [
    { header: 'Status', key: 'status' },
    { header: 'Item code', key: 'item_code' },
    { header: 'Item name', key: 'item_name' },
    { header: 'Matched on', key: 'match_method' },
    { header: 'System qty', key: 'system_quantity' },
    { header: 'Supplier qty', key: 'supplier_quantity' },
    { header: 'System price', key: 'system_price', money: true },
    { header: 'Supplier price', key: 'supplier_price', money: true },
    { header: 'Price difference', key: 'price_difference', money: true },
    { header: 'System total', key: 'system_line_total', money: true },
    { header: 'Supplier total', key: 'supplier_line_total', money: true },
    { header: 'System VAT %', key: 'system_tax_rate' },
    { header: 'Supplier VAT %', key: 'supplier_tax_rate' },
    { header: 'Explanation', key: 'explanation', width: 60 },
];

/**
 * Generates the reconciliation workbook:
 * Reconciliation, Summary, Documents and Warnings sheets.
 *
 * Statuses are written with the configured display labels.
 */
export async function generateReconciliationExcel(result: ReconciliationResult): Promise<Workbook> {
    const workbook = createWorkbook();

    addReconciliationSheet(workbook, result);
    addSummarySheet(workbook, result);
    addDocumentsSheet(workbook, result);
    addWarningsSheet(workbook, result);

    return workbook;
}

/**
 * Sheet: Reconciliation
 * One row per result line, lines needing attention first.
 */
function addReconciliationSheet(workbook: Workbook, result: ReconciliationResult): void {
    const { status_labels: labels, currency_symbol: currencySymbol } = result.config;

    const rows: SheetRow[] = sortByStatusPriority(result.rows).map(row => ({
        values: {
            ...row,
            status: labels[row.status],
            match_method: MATCH_LABELS[row.match_method],
        },
        fill: STATUS_FILLS[row.status],
    }));

    addTableSheet(workbook, 'Reconciliation', RECONCILIATION_COLUMNS, rows, { currencySymbol });
}

/**
 * Sheet: Summary
 * Columns: metric, value
 */
function addSummarySheet(workbook: Workbook, result: ReconciliationResult): void {
    const { summary, config } = result;

    const metrics: [string, string | number][] = [
        ...REPORT_STATUS_ORDER.map((status): [string, number] => [config.status_labels[status], summary.tally[status]]),
        ['Total lines', summary.total],
        ['Matched by code', summary.matches.by_code],
        ['Matched by name', summary.matches.by_name],
        ['Unmatched', summary.matches.none],
        ['Quantity tolerance', config.quantity_tolerance],
        ['Price tolerance', config.price_tolerance],
        ['Fully reconciled', isFullyReconciled(summary) ? 'Yes' : 'No'],
    ];

    addTableSheet(
        workbook,
        'Summary',
        [{ header: 'Metric', key: 'metric' }, { header: 'Value', key: 'value' }],
        metrics.map(([metric, value]) => ({ values: { metric, value } }))
    );
}

/**
 * Sheet: Documents
 * One row per side with aggregation counts.
 */
function addDocumentsSheet(workbook: Workbook, result: ReconciliationResult): void {
    const sides: [Side, SideReport][] = [['system', result.system], ['supplier', result.supplier]];

    const rows = sides.map(([side, { stats }]) => ({
        values: {
            side: SIDE_LABELS[side],
            documents: stats.document_count,
            processed: stats.processed_document_count,
            empty: stats.empty_document_count,
            rows: stats.input_row_count,
            skipped: stats.skipped_row_count,
            items: stats.output_item_count,
            names: stats.document_names.join(', '),
        },
    }));

    addTableSheet(workbook, 'Documents', [
        { header: 'Side', key: 'side' },
        { header: 'Documents', key: 'documents' },
        { header: 'Processed', key: 'processed' },
        { header: 'Empty', key: 'empty' },
        { header: 'Rows', key: 'rows' },
        { header: 'Skipped rows', key: 'skipped' },
        { header: 'Items', key: 'items' },
        { header: 'Document names', key: 'names' },
    ], rows);
}

/**
 * Sheet: Warnings
 * Aggregation warnings per side, then matcher warnings.
 */
function addWarningsSheet(workbook: Workbook, result: ReconciliationResult): void {
    const sourced: [string, string[]][] = [
        [SIDE_LABELS.system, result.system.warnings],
        [SIDE_LABELS.supplier, result.supplier.warnings],
        ['Matching', result.match_warnings],
    ];

    const rows = sourced.flatMap(([source, warnings]) =>
        warnings.map(warning => ({ values: { source, warning } }))
    );

    addTableSheet(workbook, 'Warnings', [
        { header: 'Source', key: 'source' },
        { header: 'Warning', key: 'warning', width: 100 },
    ], rows);
}
