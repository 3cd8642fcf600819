/**
 * Multi-document aggregation: N documents on one side → 1 canonical dataset.
 *
 * Merge rules for lines sharing an identity:
 * - quantity → sum
 * - unit_price → unweighted arithmetic mean of the contributing prices
 * - line_total → quantity × mean price (null if either is missing)
 * - item_name → first seen, item_code → first non-null, tax_rate → first non-null
 *
 * ARCHITECTURAL NOTE: No console.* calls. Never throws; anomalies are
 * returned as warnings. Zero processed documents is reported through the
 * stats and handled by the caller.
 */

import { Decimal } from 'decimal.js';
import type { AggregationResult, LineItem, Side, SourceDocument } from '../types/index.js';
import { DEFAULT_CURRENCY_SYMBOL, SIDE_LABELS } from '../types/index.js';
import { formatMoney } from '../utils/format.js';
import { identityKey } from './identity.js';
import { validateRow } from './validate-row.js';
import type { AggregateOptions, MergedItem } from './types.js';

/**
 * Aggregate the documents of one side into a deduplicated item list.
 *
 * @param documents - Documents in the order they were supplied
 * @param side - Which side these documents belong to (messages only)
 * @param options - Optional currency symbol for warning text
 * @returns AggregationResult with items, warnings and stats
 */
export function aggregateDocuments(
    documents: SourceDocument[],
    side: Side,
    options: AggregateOptions = {}
): AggregationResult {
    const currencySymbol = options.currencySymbol ?? DEFAULT_CURRENCY_SYMBOL;
    const warnings: string[] = [];
    const groups = new Map<string, LineItem[]>();
    const documentNames: string[] = [];
    let inputRowCount = 0;
    let skippedRowCount = 0;
    let emptyDocumentCount = 0;

    for (const document of documents) {
        let validRows = 0;
        let invalidRows = 0;

        for (const raw of document.rows) {
            const item = validateRow(raw);
            if (!item) {
                invalidRows++;
                continue;
            }

            validRows++;
            const key = identityKey(item);
            const group = groups.get(key);
            if (group) {
                group.push(item);
            } else {
                groups.set(key, [item]);
            }
        }

        if (invalidRows > 0) {
            warnings.push(
                `Document "${document.name}": ${invalidRows} row(s) failed validation and were skipped`
            );
        }

        skippedRowCount += invalidRows;
        if (validRows === 0) {
            emptyDocumentCount++;
            continue;
        }

        inputRowCount += validRows;
        documentNames.push(document.name);
    }

    if (emptyDocumentCount > 0) {
        warnings.push(`${emptyDocumentCount} document(s) were empty and were skipped`);
    }

    const items: LineItem[] = [];
    for (const rows of groups.values()) {
        const merged = mergeRows(rows);
        items.push(merged.item);

        if (merged.distinctPrices.length > 1) {
            warnings.push(priceConflictWarning(side, merged.item, merged.distinctPrices, currencySymbol));
        }
    }

    return {
        side,
        items,
        warnings,
        stats: {
            document_count: documents.length,
            processed_document_count: documentNames.length,
            empty_document_count: emptyDocumentCount,
            input_row_count: inputRowCount,
            skipped_row_count: skippedRowCount,
            output_item_count: items.length,
            document_names: documentNames,
        },
    };
}

/**
 * Merge all rows sharing one identity.
 * A single row passes through unchanged.
 */
export function mergeRows(rows: LineItem[]): MergedItem {
    const [first, ...rest] = rows;
    if (!first) {
        throw new Error('mergeRows requires at least one row');
    }

    const prices = rows
        .map(r => r.unit_price)
        .filter((p): p is number => p !== null);
    const distinctPrices = [...new Set(prices)].sort((a, b) => a - b);

    if (rest.length === 0) {
        return { item: { ...first }, distinctPrices };
    }

    const quantities = rows
        .map(r => r.quantity)
        .filter((q): q is number => q !== null);
    const quantity = quantities.length > 0
        ? quantities.reduce((sum, q) => sum.plus(q), new Decimal(0))
        : null;

    const meanPrice = prices.length > 0
        ? prices.reduce((sum, p) => sum.plus(p), new Decimal(0)).dividedBy(prices.length)
        : null;

    const lineTotal = quantity !== null && meanPrice !== null
        ? quantity.times(meanPrice).toNumber()
        : null;

    return {
        item: {
            item_code: rows.find(r => r.item_code !== null)?.item_code ?? null,
            item_name: first.item_name,
            quantity: quantity?.toNumber() ?? null,
            unit_price: meanPrice?.toNumber() ?? null,
            line_total: lineTotal,
            tax_rate: rows.find(r => r.tax_rate !== null)?.tax_rate ?? null,
        },
        distinctPrices,
    };
}

function priceConflictWarning(
    side: Side,
    item: LineItem,
    prices: number[],
    currencySymbol: string
): string {
    const identity = item.item_code !== null
        ? `${item.item_code} (${item.item_name})`
        : `without code (${item.item_name})`;
    const priceList = prices.map(p => formatMoney(p, currencySymbol)).join(', ');

    return `${SIDE_LABELS[side]} item ${identity} has differing prices across documents ` +
        `(${priceList}); mean price used.`;
}
