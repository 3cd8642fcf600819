/**
 * Comparator module: effective price, tolerances and line status.
 */

export { comparePair } from './compare-pair.js';
export { effectivePrice } from './effective-price.js';
export {
    EXPLANATIONS,
    EXPLANATION_SEPARATOR,
    quantityDiffers,
    priceDiffers,
    duplicateCode,
} from './explain.js';
