import { writeFile } from 'node:fs/promises';
import { buildAuditRecord } from '@invoice-recon/core';
import { errorMessage } from '../../utils/errors.js';
import type { PipelineStep } from '../types.js';
import { resolveOutputPaths } from '../../workspace/paths.js';

/**
 * Step 5: Write Audit
 * Records counts-only run metadata as audit.json.
 */
export const writeAudit: PipelineStep = async (state) => {
    if (!state.result) {
        return state;
    }

    state.audit = buildAuditRecord(state.result, Date.now() - state.startedAt);
    if (state.options.dryRun) {
        return state;
    }

    const { audit: auditPath } = resolveOutputPaths(state.options.outDir);
    try {
        await writeFile(auditPath, JSON.stringify(state.audit, null, 2));
        state.outputs.push(auditPath);
    } catch (err) {
        state.errors.push({
            step: 'audit',
            message: `Failed to write audit record to ${auditPath}: ${errorMessage(err)}`,
            fatal: false,
            error: err,
        });
    }

    return state;
};
