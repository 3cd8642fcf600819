import type { ReconcileConfig, ReconcileConfigInput } from '../types/index.js';
import { ReconcileConfigSchema } from '../types/index.js';

/**
 * Validate a (partial) configuration, fill defaults and freeze it.
 * The frozen value is shared by every step of one run.
 *
 * @throws ZodError when a tolerance is negative or a label is empty
 */
export function resolveConfig(input: ReconcileConfigInput = {}): Readonly<ReconcileConfig> {
    const parsed = ReconcileConfigSchema.parse(input);
    return Object.freeze({
        ...parsed,
        status_labels: Object.freeze({ ...parsed.status_labels }),
    });
}
