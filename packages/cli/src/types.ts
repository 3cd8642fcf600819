/**
 * Invoice Reconciler CLI - Core Types
 */

export interface ReconcileOptions {
    systemFiles: string[];
    supplierFiles: string[];
    configPath?: string;
    outDir: string;
    dryRun: boolean;
}

export interface OutputPaths {
    root: string;
    workbook: string;
    results: string;
    audit: string;
}
