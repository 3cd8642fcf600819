/**
 * Console output for the CLI. The core never prints; everything the
 * user sees goes through here.
 */

import type { ReconciliationSummary, StatusLabels } from '@invoice-recon/shared';
import { REPORT_STATUS_ORDER } from '@invoice-recon/core';

export type Tone = 'plain' | 'success' | 'warn' | 'fail' | 'step';

const PREFIXES: Record<Tone, string> = {
    plain: '',
    success: '✓ ',
    warn: '⚠️  ',
    fail: '✖ ',
    step: '→ ',
};

export function say(tone: Tone, message: string): void {
    const line = `${PREFIXES[tone]}${message}`;
    if (tone === 'fail') {
        console.error(line);
    } else if (tone === 'warn') {
        console.warn(line);
    } else {
        console.log(line);
    }
}

export const log = (message: string): void => say('plain', message);
export const success = (message: string): void => say('success', message);
export const warn = (message: string): void => say('warn', message);
export const fail = (message: string): void => say('fail', message);
export const arrow = (message: string): void => say('step', message);

/**
 * Tally lines in report order. Statuses with no lines are left out.
 */
export function tallyLines(summary: ReconciliationSummary, labels: StatusLabels): string[] {
    const lines = REPORT_STATUS_ORDER
        .filter(status => summary.tally[status] > 0)
        .map(status => `${labels[status]}: ${summary.tally[status]}`);

    const { by_code: byCode, by_name: byName, none } = summary.matches;
    lines.push(`Total lines: ${summary.total} (by code ${byCode}, by name ${byName}, unmatched ${none})`);
    return lines;
}
