/**
 * Field comparison and status classification for one match pair.
 *
 * Status precedence (first applicable wins):
 * duplicate_code → missing_from_supplier → missing_from_system →
 * partial → deviation → ok
 *
 * Only quantity and effective price decide the status. Name, code, tax
 * rate and line total differences are carried as context only.
 */

import { Decimal } from 'decimal.js';
import type { LineItem, LineStatus, MatchPair, ReconcileConfig, ResultRow } from '../types/index.js';
import { effectivePrice } from './effective-price.js';
import {
    EXPLANATIONS,
    EXPLANATION_SEPARATOR,
    duplicateCode,
    priceDiffers,
    quantityDiffers,
} from './explain.js';

type ComparisonSettings = Pick<ReconcileConfig, 'quantity_tolerance' | 'price_tolerance' | 'currency_symbol'>;

/**
 * Compare one match pair and produce its result row.
 *
 * @param pair - Output of the matcher
 * @param config - Tolerances and currency symbol
 * @returns Result row with status and explanation
 */
export function comparePair(pair: MatchPair, config: ComparisonSettings): ResultRow {
    const { system, supplier } = pair;
    const primary = system ?? supplier;
    if (!primary) {
        throw new Error('Match pair has neither a system nor a supplier item');
    }

    const systemPrice = system ? effectivePrice(system) : null;
    const supplierPrice = supplier ? effectivePrice(supplier) : null;

    const base: Omit<ResultRow, 'status' | 'explanation'> = {
        item_code: system?.item_code ?? supplier?.item_code ?? null,
        item_name: primary.item_name,
        match_method: pair.method,
        system_quantity: system?.quantity ?? null,
        supplier_quantity: supplier?.quantity ?? null,
        system_price: systemPrice?.toNumber() ?? null,
        supplier_price: supplierPrice?.toNumber() ?? null,
        price_difference: systemPrice && supplierPrice
            ? supplierPrice.minus(systemPrice).toNumber()
            : null,
        system_line_total: system?.line_total ?? null,
        supplier_line_total: supplier?.line_total ?? null,
        system_tax_rate: system?.tax_rate ?? null,
        supplier_tax_rate: supplier?.tax_rate ?? null,
    };

    if (pair.duplicate_of) {
        return { ...base, status: 'duplicate_code', explanation: duplicateCode(primary.item_code, pair.duplicate_of) };
    }
    if (!supplier) {
        return { ...base, status: 'missing_from_supplier', explanation: EXPLANATIONS.MISSING_FROM_SUPPLIER };
    }
    if (!system) {
        return { ...base, status: 'missing_from_system', explanation: EXPLANATIONS.MISSING_FROM_SYSTEM };
    }

    const { status, clauses } = compareFields(system, supplier, systemPrice, supplierPrice, config);
    const explanation = status === 'ok'
        ? EXPLANATIONS.OK
        : clauses.join(EXPLANATION_SEPARATOR);

    return { ...base, status, explanation };
}

function compareFields(
    system: LineItem,
    supplier: LineItem,
    systemPrice: Decimal | null,
    supplierPrice: Decimal | null,
    config: ComparisonSettings
): { status: LineStatus; clauses: string[] } {
    const clauses: string[] = [];
    let comparable = true;
    let deviates = false;

    // 1. Quantity
    if (system.quantity === null || supplier.quantity === null) {
        comparable = false;
        clauses.push(EXPLANATIONS.QUANTITY_UNAVAILABLE);
    } else {
        const diff = new Decimal(system.quantity).minus(supplier.quantity).abs();
        if (diff.greaterThan(config.quantity_tolerance)) {
            deviates = true;
            clauses.push(quantityDiffers(system.quantity, supplier.quantity));
        }
    }

    // 2. Effective price
    if (systemPrice === null || supplierPrice === null) {
        comparable = false;
        clauses.push(EXPLANATIONS.PRICE_UNAVAILABLE);
    } else {
        const diff = systemPrice.minus(supplierPrice).abs();
        if (diff.greaterThan(config.price_tolerance)) {
            deviates = true;
            clauses.push(priceDiffers(systemPrice, supplierPrice, config.currency_symbol));
        }
    }

    if (!comparable) return { status: 'partial', clauses };
    if (deviates) return { status: 'deviation', clauses };
    return { status: 'ok', clauses };
}
