#!/usr/bin/env node
/**
 * Invoice Reconciler CLI
 *
 * The CLI owns all file I/O and console output; the core receives
 * ArrayBuffers and source documents and returns data.
 */

import { parseCliArgs, USAGE } from './args.js';
import { runReconcile } from './commands/reconcile.js';
import { errorMessage } from './utils/errors.js';
import { log, fail } from './utils/console.js';

async function main(): Promise<number> {
    const parsed = parseCliArgs(process.argv.slice(2));

    if (parsed.kind === 'help') {
        log(USAGE);
        return 0;
    }
    if (parsed.kind === 'invalid') {
        fail(parsed.message);
        log(USAGE);
        return 1;
    }

    return runReconcile(parsed.options);
}

main()
    .then(code => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        fail(`Unexpected error: ${errorMessage(err)}`);
        process.exitCode = 1;
    });
