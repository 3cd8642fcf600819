import type { LineItem } from '@invoice-recon/shared';
import type { CandidateResult } from './types.js';
import { normalizeName } from '../utils/normalize.js';

/**
 * Find the first available supplier item with exactly the same code.
 * Comparison is case-sensitive.
 */
export function findByCode(
    code: string,
    supplierItems: LineItem[],
    isAvailable: (index: number) => boolean
): CandidateResult {
    for (let i = 0; i < supplierItems.length; i++) {
        if (!isAvailable(i)) continue;
        if (supplierItems[i].item_code === code) {
            return { index: i, candidateCount: 1 };
        }
    }
    return { index: null, candidateCount: 0 };
}

/**
 * Find available supplier items whose normalized name equals the given name.
 * The first one in supplier order wins; candidateCount tells the caller
 * whether the choice was ambiguous.
 */
export function findByName(
    name: string,
    supplierItems: LineItem[],
    isAvailable: (index: number) => boolean
): CandidateResult {
    const wanted = normalizeName(name);
    if (wanted === '') {
        return { index: null, candidateCount: 0 };
    }

    let first: number | null = null;
    let candidateCount = 0;

    for (let i = 0; i < supplierItems.length; i++) {
        if (!isAvailable(i)) continue;
        if (normalizeName(supplierItems[i].item_name) !== wanted) continue;

        candidateCount++;
        if (first === null) {
            first = i;
        }
    }

    return { index: first, candidateCount };
}
