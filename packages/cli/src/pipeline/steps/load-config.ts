import { errorMessage } from '../../utils/errors.js';
import type { PipelineStep } from '../types.js';
import { loadConfig } from '../../workspace/config.js';
import { resolveConfigPath } from '../../workspace/paths.js';

/**
 * Step 1: Load Config
 * Reads reconcile.yaml (or --config) and validates it. An invalid file is fatal.
 */
export const loadRunConfig: PipelineStep = async (state) => {
    const path = resolveConfigPath(state.options.configPath);

    try {
        state.config = loadConfig(path, state.options.configPath !== undefined);
    } catch (err) {
        state.errors.push({
            step: 'config',
            message: `Failed to load configuration from ${path}: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
