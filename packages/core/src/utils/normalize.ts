/**
 * Text normalization for identity keys and matching.
 *
 * NOTE: Normalized names are only ever used as keys. Line items keep
 * their original spelling for reports.
 */

/**
 * Normalize an item name for identity comparison.
 *
 * Transformations:
 * - Case-fold to lowercase
 * - Collapse internal whitespace to single spaces
 * - Trim leading/trailing whitespace
 *
 * @param raw - Item name as found in the document
 * @returns Normalized name, empty string for null
 */
export function normalizeName(raw: string | null | undefined): string {
    if (raw === null || raw === undefined) {
        return '';
    }
    return raw
        .toLowerCase()
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Clean a free-text cell: collapse whitespace, trim, and turn
 * empty strings into null so absence is never ambiguous.
 */
export function cleanText(raw: string | null | undefined): string | null {
    if (raw === null || raw === undefined) {
        return null;
    }
    const cleaned = raw.replace(/\s+/g, ' ').trim();
    return cleaned === '' ? null : cleaned;
}

/**
 * Clean an item code. Codes compare exactly, so only the outer
 * whitespace goes; inner spacing and case are kept.
 */
export function cleanCode(raw: string | null | undefined): string | null {
    const trimmed = raw?.trim() ?? '';
    return trimmed === '' ? null : trimmed;
}

/**
 * Drop a leading byte order mark so the first header still maps.
 */
export function stripBom(value: string): string {
    return value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
}
