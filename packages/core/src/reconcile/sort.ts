import type { LineStatus, ResultRow } from '../types/index.js';
import { LINE_STATUSES, STATUS_REPORT_PRIORITY } from '../types/index.js';

/**
 * Statuses in report order, for summaries and legends.
 */
export const REPORT_STATUS_ORDER: readonly LineStatus[] = [...LINE_STATUSES].sort(
    (a, b) => STATUS_REPORT_PRIORITY[a] - STATUS_REPORT_PRIORITY[b]
);

/**
 * Sort result rows so lines needing attention come first.
 * Stable: rows with the same status keep their match order.
 * Returns a new array.
 */
export function sortByStatusPriority(rows: ResultRow[]): ResultRow[] {
    return [...rows].sort(
        (a, b) => STATUS_REPORT_PRIORITY[a.status] - STATUS_REPORT_PRIORITY[b.status]
    );
}
