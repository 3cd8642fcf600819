import type { AuditRecord, ReconciliationResult, SideReport } from '../types/index.js';

/**
 * Build the audit record for one run.
 *
 * Counts only: no item codes, names or monetary amounts leave the engine
 * through this record.
 */
export function buildAuditRecord(
    result: ReconciliationResult,
    elapsedMs: number,
    timestamp: string = new Date().toISOString()
): AuditRecord {
    return {
        timestamp,
        elapsed_ms: elapsedMs,
        system: sideCounts(result.system),
        supplier: sideCounts(result.supplier),
        matches: { ...result.summary.matches },
        tally: { ...result.summary.tally },
        tolerances: {
            quantity: result.config.quantity_tolerance,
            price: result.config.price_tolerance,
        },
    };
}

function sideCounts(report: SideReport): AuditRecord['system'] {
    return {
        documents: report.stats.document_count,
        empty_documents: report.stats.empty_document_count,
        rows: report.stats.input_row_count,
        skipped_rows: report.stats.skipped_row_count,
        items: report.stats.output_item_count,
        warnings: report.warnings.length,
    };
}
