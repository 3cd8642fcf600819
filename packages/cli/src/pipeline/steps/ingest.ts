import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { parseLineItems } from '@invoice-recon/core';
import type { Side } from '@invoice-recon/shared';
import type { InputFile, PipelineStep } from '../types.js';
import { errorMessage } from '../../utils/errors.js';
import { toArrayBuffer } from '../../utils/buffer.js';

/**
 * Step 2: Ingest Documents
 * Reads every input file and parses it into a source document.
 * A file that cannot be read or parsed is skipped with a non-fatal error.
 */
export const ingestDocuments: PipelineStep = async (state) => {
    state.files = [
        ...toInputFiles(state.options.systemFiles, 'system'),
        ...toInputFiles(state.options.supplierFiles, 'supplier'),
    ];

    for (const file of state.files) {
        try {
            const buffer = await readFile(file.path);
            const result = parseLineItems(toArrayBuffer(buffer), file.filename);

            state.documents[file.side].push(result.document);
            file.parsed = true;

            // Forward parser warnings to pipeline state
            for (const warning of result.warnings) {
                state.warnings.push(`[${file.filename}] ${warning}`);
            }
        } catch (err) {
            state.errors.push({
                step: 'ingest',
                message: `Failed to read ${file.filename}: ${errorMessage(err)}`,
                fatal: false,
                error: err,
            });
        }
    }

    return state;
};

function toInputFiles(paths: string[], side: Side): InputFile[] {
    return paths.map(path => ({ path, filename: basename(path), side, parsed: false }));
}
