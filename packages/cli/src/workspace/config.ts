import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { resolveConfig } from '@invoice-recon/core';
import { ReconcileConfigSchema, type ReconcileConfig } from '@invoice-recon/shared';

/**
 * Loads the run configuration from a YAML file.
 *
 * A missing default file means defaults; a missing explicit file is an error.
 * Invalid values surface as the schema's ZodError.
 */
export function loadConfig(path: string, required: boolean): Readonly<ReconcileConfig> {
    if (!existsSync(path)) {
        if (required) {
            throw new Error(`Config file not found: ${path}`);
        }
        return resolveConfig({});
    }

    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);
    if (data === null || data === undefined) {
        return resolveConfig({});
    }

    return resolveConfig(ReconcileConfigSchema.parse(data));
}
