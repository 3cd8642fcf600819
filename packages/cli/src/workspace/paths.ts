import { join, resolve } from 'node:path';
import type { OutputPaths } from '../types.js';

export const DEFAULT_CONFIG_FILENAME = 'reconcile.yaml';

/**
 * Constructs the output file locations for one run.
 */
export function resolveOutputPaths(outDir: string): OutputPaths {
    const root = resolve(outDir);
    return {
        root,
        workbook: join(root, 'reconciliation.xlsx'),
        results: join(root, 'results.json'),
        audit: join(root, 'audit.json'),
    };
}

/**
 * Config file to load: the explicit path, or reconcile.yaml in the
 * working directory.
 */
export function resolveConfigPath(explicit: string | undefined, cwd: string = process.cwd()): string {
    return explicit !== undefined ? resolve(explicit) : join(resolve(cwd), DEFAULT_CONFIG_FILENAME);
}
