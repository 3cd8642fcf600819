/**
 * Constants for the invoice reconciler.
 */

/**
 * Line statuses in decision precedence order.
 * The first applicable status wins.
 */
export const LINE_STATUSES = [
    'duplicate_code',
    'missing_from_supplier',
    'missing_from_system',
    'partial',
    'deviation',
    'ok',
] as const;

/**
 * Display labels used verbatim in reports.
 * Downstream tooling keys off these strings, so change them only via config.
 */
export const DEFAULT_STATUS_LABELS = {
    ok: 'OK',
    deviation: 'DEVIATION',
    missing_from_supplier: 'MISSING FROM SUPPLIER',
    missing_from_system: 'MISSING FROM SYSTEM',
    partial: 'PARTIAL',
    duplicate_code: 'DUPLICATE CODE',
} as const;

/**
 * Report ordering: lines that need attention first.
 */
export const STATUS_REPORT_PRIORITY = {
    deviation: 0,
    missing_from_supplier: 1,
    missing_from_system: 2,
    partial: 3,
    duplicate_code: 4,
    ok: 5,
} as const;

/**
 * Comparison tolerances.
 * Quantities must match exactly; prices absorb one cent of rounding.
 */
export const TOLERANCE_DEFAULTS = {
    QUANTITY: 0,
    PRICE: 0.01,
} as const;

export const DEFAULT_CURRENCY_SYMBOL = '€';

export const MATCH_METHODS = ['by_code', 'by_name', 'none'] as const;

export const SIDES = ['system', 'supplier'] as const;

export const SIDE_LABELS = {
    system: 'System',
    supplier: 'Supplier',
} as const;
