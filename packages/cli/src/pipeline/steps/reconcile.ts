import { reconcile } from '@invoice-recon/core';
import { SIDE_LABELS } from '@invoice-recon/shared';
import type { ReconciliationFailure } from '@invoice-recon/shared';
import type { PipelineState, PipelineStep } from '../types.js';

/**
 * Step 3: Reconcile
 * Runs the engine. A side without valid documents is fatal.
 */
export const reconcileDocuments: PipelineStep = async (state) => {
    const outcome = reconcile(state.documents, state.config);

    if (!outcome.ok) {
        state.errors.push({
            step: 'reconcile',
            message: failureMessage(state, outcome.error),
            fatal: true,
            error: outcome.error,
        });
        return state;
    }

    state.result = outcome.result;
    state.warnings.push(
        ...outcome.result.system.warnings,
        ...outcome.result.supplier.warnings,
        ...outcome.result.match_warnings
    );

    return state;
};

/**
 * The engine only sees documents that were read. When files were given
 * for the side but none could be read, say so instead.
 */
function failureMessage(state: PipelineState, failure: ReconciliationFailure): string {
    const given = state.files.filter(f => f.side === failure.side).length;
    if (given === 0 || state.documents[failure.side].length > 0) {
        return failure.message;
    }
    const label = SIDE_LABELS[failure.side].toLowerCase();
    return `None of the ${given} ${label} file(s) could be read; nothing to reconcile`;
}
