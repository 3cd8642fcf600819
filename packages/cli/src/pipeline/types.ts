import type {
    AuditRecord,
    ReconcileConfig,
    ReconciliationResult,
    Side,
    SourceDocument,
} from '@invoice-recon/shared';
import type { ReconcileOptions } from '../types.js';

/**
 * An input file named on the command line.
 */
export interface InputFile {
    path: string;
    filename: string;
    side: Side;
    parsed: boolean;
}

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Central state object passed through the reconciliation pipeline.
 */
export interface PipelineState {
    options: ReconcileOptions;
    startedAt: number;

    // Accumulated during pipeline execution
    config?: Readonly<ReconcileConfig>;
    files: InputFile[];
    documents: Record<Side, SourceDocument[]>;
    result?: ReconciliationResult;
    audit?: AuditRecord;
    outputs: string[];

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
