/**
 * Numeric cell parsing for supplier and system exports.
 */

const STRIP_PATTERN = /[€$£%\s]/g;
const PLAIN_NUMBER = /^-?\d+(\.\d+)?$/;

/**
 * Parse a spreadsheet or CSV cell into a number.
 *
 * Accepts:
 * - native numbers (must be finite)
 * - "15.50", "15,50", "1.234,56", "1,234.56", "1,234,567"
 * - currency and percent signs, spaces ("€ 10.00", "21%")
 *
 * @returns The number, or null when the cell is empty or not numeric
 */
export function parseNumber(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value !== 'string') {
        return null;
    }

    let cleaned = value.replace(STRIP_PATTERN, '');
    if (cleaned === '') {
        return null;
    }

    const lastComma = cleaned.lastIndexOf(',');
    const lastDot = cleaned.lastIndexOf('.');

    if (lastComma !== -1 && lastDot !== -1) {
        // Whichever separator comes last is the decimal separator
        cleaned = lastComma > lastDot
            ? cleaned.replace(/\./g, '').replace(',', '.')
            : cleaned.replace(/,/g, '');
    } else if (lastComma !== -1) {
        const commaCount = cleaned.split(',').length - 1;
        cleaned = commaCount === 1
            ? cleaned.replace(',', '.')
            : cleaned.replace(/,/g, '');
    }

    if (!PLAIN_NUMBER.test(cleaned)) {
        return null;
    }
    return Number(cleaned);
}
