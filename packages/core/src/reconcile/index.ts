/**
 * Reconcile module: orchestration, summary and audit.
 */

export { reconcile } from './reconcile.js';
export type { ReconcileInput } from './reconcile.js';
export { resolveConfig } from './config.js';
export { summarizeRows, emptyTally, isFullyReconciled } from './summary.js';
export { sortByStatusPriority, REPORT_STATUS_ORDER } from './sort.js';
export { buildAuditRecord } from './audit.js';
