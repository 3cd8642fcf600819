import { mkdir, writeFile } from 'node:fs/promises';
import { sortByStatusPriority } from '@invoice-recon/core';
import { errorMessage } from '../../utils/errors.js';
import type { PipelineStep } from '../types.js';
import { resolveOutputPaths } from '../../workspace/paths.js';
import { generateReconciliationExcel } from '../../excel/report.js';

/**
 * Step 4: Export Results
 * Writes the Excel report and results.json.
 */
export const exportResults: PipelineStep = async (state) => {
    const result = state.result;
    if (!result) {
        state.errors.push({ step: 'export', message: 'No reconciliation result to export', fatal: true });
        return state;
    }

    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping file export.');
        return state;
    }

    const paths = resolveOutputPaths(state.options.outDir);

    try {
        await mkdir(paths.root, { recursive: true });

        const workbook = await generateReconciliationExcel(result);
        await writeFile(paths.workbook, Buffer.from(await workbook.xlsx.writeBuffer()));

        const labels = result.config.status_labels;
        const results = {
            summary: result.summary,
            rows: sortByStatusPriority(result.rows).map(row => ({ ...row, label: labels[row.status] })),
            system: result.system,
            supplier: result.supplier,
            match_warnings: result.match_warnings,
        };
        await writeFile(paths.results, JSON.stringify(results, null, 2));

        state.outputs.push(paths.workbook, paths.results);
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to export results to ${paths.root}: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
