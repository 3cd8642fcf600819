/**
 * Reconciliation orchestrator.
 *
 * Aggregate(system) → Aggregate(supplier) → match → compare every pair → tally.
 *
 * The only fatal condition is a side without any processed document; it is
 * returned as a failure outcome, never thrown. Everything else ends up in
 * warnings or line statuses.
 */

import type {
    AggregationResult,
    ReconcileConfig,
    ReconcileConfigInput,
    ReconciliationFailure,
    ReconciliationOutcome,
    Side,
    SourceDocument,
} from '../types/index.js';
import { SIDE_LABELS } from '../types/index.js';
import { aggregateDocuments } from '../aggregator/aggregate.js';
import { matchItems } from '../matcher/match-items.js';
import { comparePair } from '../comparator/compare-pair.js';
import { resolveConfig } from './config.js';
import { summarizeRows } from './summary.js';

export interface ReconcileInput {
    system: SourceDocument[];
    supplier: SourceDocument[];
}

/**
 * Run one reconciliation.
 *
 * @param input - Ordered documents per side
 * @param config - Tolerances, labels and currency symbol (defaults applied)
 * @returns Outcome with the full result, or the fatal failure
 */
export function reconcile(
    input: ReconcileInput,
    config: ReconcileConfigInput | ReconcileConfig = {}
): ReconciliationOutcome {
    const resolved = resolveConfig(config);
    const options = { currencySymbol: resolved.currency_symbol };

    const system = aggregateDocuments(input.system, 'system', options);
    const supplier = aggregateDocuments(input.supplier, 'supplier', options);

    for (const aggregation of [system, supplier]) {
        if (aggregation.stats.processed_document_count === 0) {
            return { ok: false, error: noDocumentsFailure(aggregation) };
        }
    }

    const matchOutput = matchItems(system.items, supplier.items);
    const rows = matchOutput.pairs.map(pair => comparePair(pair, resolved));

    return {
        ok: true,
        result: {
            rows,
            summary: summarizeRows(rows),
            system: { stats: system.stats, warnings: system.warnings },
            supplier: { stats: supplier.stats, warnings: supplier.warnings },
            match_warnings: matchOutput.warnings,
            config: resolved,
        },
    };
}

function noDocumentsFailure(aggregation: AggregationResult): ReconciliationFailure {
    const side: Side = aggregation.side;
    const label = SIDE_LABELS[side].toLowerCase();
    const supplied = aggregation.stats.document_count;

    const message = supplied === 0
        ? `No ${label} documents were supplied; nothing to reconcile`
        : `All ${supplied} ${label} document(s) were empty; nothing to reconcile`;

    return { code: 'NO_VALID_DOCUMENTS', side, message };
}
