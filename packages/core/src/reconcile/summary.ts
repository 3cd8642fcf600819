import type { LineStatus, ReconciliationSummary, ResultRow, StatusTally } from '../types/index.js';
import { LINE_STATUSES } from '../types/index.js';

/**
 * Count result rows per status and per match method.
 * Every status key is present, zero when unused.
 */
export function summarizeRows(rows: ResultRow[]): ReconciliationSummary {
    const tally = emptyTally();
    const matches = { by_code: 0, by_name: 0, none: 0 };

    for (const row of rows) {
        tally[row.status]++;
        matches[row.match_method]++;
    }

    return { total: rows.length, tally, matches };
}

export function emptyTally(): StatusTally {
    const tally: Record<LineStatus, number> = {
        duplicate_code: 0,
        missing_from_supplier: 0,
        missing_from_system: 0,
        partial: 0,
        deviation: 0,
        ok: 0,
    };
    return tally;
}

/**
 * True when every line can be approved without review.
 */
export function isFullyReconciled(summary: ReconciliationSummary): boolean {
    return LINE_STATUSES.every(status => status === 'ok' || summary.tally[status] === 0);
}
