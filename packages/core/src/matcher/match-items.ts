import type { LineItem, MatchOutput, MatchPair } from '@invoice-recon/shared';
import { findByCode, findByName } from './find-candidate.js';

/**
 * Pair system items with supplier items.
 *
 * PURE FUNCTION: Does not mutate items. Consumed supplier items are
 * tracked in a set scoped to this call.
 *
 * Strategy per system item, in system order:
 * 1. Repeated non-empty code → duplicate-code pair, consumes nothing
 * 2. Exact code match against unconsumed supplier items → by_code
 * 3. Normalized name match, first in supplier order → by_name
 * 4. Otherwise → missing from supplier
 * Leftover supplier items follow in supplier order → missing from system.
 *
 * @param systemItems - Aggregated system dataset
 * @param supplierItems - Aggregated supplier dataset
 * @returns MatchOutput with pairs, warnings and stats
 */
export function matchItems(systemItems: LineItem[], supplierItems: LineItem[]): MatchOutput {
    const warnings: string[] = [];
    const pairs: MatchPair[] = [];
    const consumed = new Set<number>();
    const supplierDuplicates = findRepeatedCodes(supplierItems);

    const isAvailable = (index: number): boolean =>
        !consumed.has(index) && !supplierDuplicates.has(index);

    const seenSystemCodes = new Set<string>();
    let byCode = 0;
    let byName = 0;
    let unmatchedSystem = 0;
    let duplicateCodes = 0;

    for (const item of systemItems) {
        const code = item.item_code;
        const hasCode = code !== null && code !== '';

        if (hasCode) {
            if (seenSystemCodes.has(code)) {
                pairs.push({ system: item, supplier: null, method: 'none', duplicate_of: 'system' });
                duplicateCodes++;
                continue;
            }
            seenSystemCodes.add(code);

            const byCodeResult = findByCode(code, supplierItems, isAvailable);
            if (byCodeResult.index !== null) {
                consumed.add(byCodeResult.index);
                pairs.push({ system: item, supplier: supplierItems[byCodeResult.index], method: 'by_code' });
                byCode++;
                continue;
            }
        }

        const byNameResult = findByName(item.item_name, supplierItems, isAvailable);
        if (byNameResult.index !== null) {
            if (byNameResult.candidateCount > 1) {
                warnings.push(
                    `Multiple supplier lines match name "${item.item_name}"; the first one was used.`
                );
            }
            consumed.add(byNameResult.index);
            pairs.push({ system: item, supplier: supplierItems[byNameResult.index], method: 'by_name' });
            byName++;
            continue;
        }

        pairs.push({ system: item, supplier: null, method: 'none' });
        unmatchedSystem++;
    }

    let unmatchedSupplier = 0;
    for (let i = 0; i < supplierItems.length; i++) {
        if (supplierDuplicates.has(i)) {
            pairs.push({ system: null, supplier: supplierItems[i], method: 'none', duplicate_of: 'supplier' });
            duplicateCodes++;
        } else if (!consumed.has(i)) {
            pairs.push({ system: null, supplier: supplierItems[i], method: 'none' });
            unmatchedSupplier++;
        }
    }

    return {
        pairs,
        warnings,
        stats: {
            by_code: byCode,
            by_name: byName,
            unmatched_system: unmatchedSystem,
            unmatched_supplier: unmatchedSupplier,
            duplicate_codes: duplicateCodes,
        },
    };
}

/**
 * Indices of items whose non-empty code already appeared earlier in the list.
 */
export function findRepeatedCodes(items: LineItem[]): Set<number> {
    const seen = new Set<string>();
    const repeated = new Set<number>();

    items.forEach((item, index) => {
        const code = item.item_code;
        if (code === null || code === '') return;
        if (seen.has(code)) {
            repeated.add(index);
        } else {
            seen.add(code);
        }
    });

    return repeated;
}
