import { isFullyReconciled } from '@invoice-recon/core';
import { runPipeline } from '../pipeline/runner.js';
import { log, success, warn, fail, arrow, tallyLines } from '../utils/console.js';
import type { ReconcileOptions } from '../types.js';

/**
 * Run one reconciliation and report it on the console.
 *
 * @returns Process exit code: 0 on success, 1 on a fatal error
 */
export async function runReconcile(options: ReconcileOptions): Promise<number> {
    log('\nInvoice Reconciler');
    arrow(`System documents: ${options.systemFiles.length}, supplier documents: ${options.supplierFiles.length}`);

    const state = await runPipeline(options);

    log('\n--- Reconciliation Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    for (const e of state.errors) {
        fail(`ERROR [${e.step}]: ${e.message}`);
    }
    if (state.errors.some(e => e.fatal)) {
        log('\n✖ Reconciliation failed with fatal errors.');
        return 1;
    }

    const result = state.result;
    if (!result) {
        return 1;
    }

    const { summary, config } = result;
    for (const line of tallyLines(summary, config.status_labels)) {
        arrow(line);
    }

    if (isFullyReconciled(summary)) {
        success('All lines reconciled.');
    } else {
        warn('Some lines need review.');
    }

    if (options.dryRun) {
        log('\n[DRY RUN] No files were written.');
    } else {
        for (const output of state.outputs) {
            arrow(`Wrote ${output}`);
        }
    }

    return 0;
}
