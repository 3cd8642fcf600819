import type { PipelineState, PipelineStep } from './types.js';
import { loadRunConfig } from './steps/load-config.js';
import { ingestDocuments } from './steps/ingest.js';
import { reconcileDocuments } from './steps/reconcile.js';
import { exportResults } from './steps/export.js';
import { writeAudit } from './steps/audit.js';
import type { ReconcileOptions } from '../types.js';
import { arrow, fail } from '../utils/console.js';

export const PIPELINE_STEPS: { name: string; fn: PipelineStep }[] = [
    { name: 'Load Config', fn: loadRunConfig },
    { name: 'Ingest Documents', fn: ingestDocuments },
    { name: 'Reconcile', fn: reconcileDocuments },
    { name: 'Export Results', fn: exportResults },
    { name: 'Write Audit', fn: writeAudit },
];

/**
 * Orchestrates the execution of the reconciliation pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(options: ReconcileOptions): Promise<PipelineState> {
    let state: PipelineState = {
        options,
        startedAt: Date.now(),
        files: [],
        documents: { system: [], supplier: [] },
        outputs: [],
        warnings: [],
        errors: [],
    };

    for (let i = 0; i < PIPELINE_STEPS.length; i++) {
        const step = PIPELINE_STEPS[i];
        arrow(`Step ${i + 1}/${PIPELINE_STEPS.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            fail(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
