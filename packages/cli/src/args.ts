import { parseArgs } from 'node:util';
import type { ReconcileOptions } from './types.js';
import { errorMessage } from './utils/errors.js';

export const DEFAULT_OUT_DIR = 'reconciliation-output';

export const USAGE = [
    'Usage: invrecon --system <file> [--system <file>...] --supplier <file> [--supplier <file>...]',
    '                [--config <reconcile.yaml>] [--out <dir>] [--dry-run]',
    '',
    'Example:',
    '  invrecon --system delivery-01.xlsx --system delivery-02.xlsx --supplier invoice-2026-01.csv',
].join('\n');

export type ParsedArgs =
    | { kind: 'run'; options: ReconcileOptions }
    | { kind: 'help' }
    | { kind: 'invalid'; message: string };

function readArgs(argv: string[]) {
    return parseArgs({
        args: argv,
        options: {
            system: { type: 'string', multiple: true, short: 's' },
            supplier: { type: 'string', multiple: true, short: 'i' },
            config: { type: 'string', short: 'c' },
            out: { type: 'string', short: 'o' },
            'dry-run': { type: 'boolean' },
            help: { type: 'boolean', short: 'h' },
        },
    });
}

/**
 * Parse command-line arguments into run options.
 * Unknown flags and positionals are rejected.
 */
export function parseCliArgs(argv: string[]): ParsedArgs {
    let parsed: ReturnType<typeof readArgs>;
    try {
        parsed = readArgs(argv);
    } catch (err) {
        return { kind: 'invalid', message: errorMessage(err) };
    }

    const { values } = parsed;
    if (values.help) {
        return { kind: 'help' };
    }

    const systemFiles = values.system ?? [];
    const supplierFiles = values.supplier ?? [];
    if (systemFiles.length === 0 || supplierFiles.length === 0) {
        return { kind: 'invalid', message: 'At least one --system and one --supplier file are required.' };
    }

    return {
        kind: 'run',
        options: {
            systemFiles,
            supplierFiles,
            configPath: values.config,
            outDir: values.out ?? DEFAULT_OUT_DIR,
            dryRun: values['dry-run'] ?? false,
        },
    };
}
