/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    Side,
    LineStatus,
    MatchMethod,
    LineItem,
    RawLineItem,
    SourceDocument,
    AggregationStats,
    AggregationResult,
    MatchPair,
    MatchStats,
    MatchOutput,
    ResultRow,
    StatusTally,
    ReconciliationSummary,
    StatusLabels,
    ReconcileConfig,
    ReconcileConfigInput,
    SideReport,
    ReconciliationResult,
    ReconciliationFailure,
    ReconciliationOutcome,
    AuditRecord,
    DocumentParseResult,
} from '@invoice-recon/shared';

export {
    LineItemSchema,
    RawLineItemSchema,
    SourceDocumentSchema,
    ReconcileConfigSchema,
    ResultRowSchema,
    LINE_STATUSES,
    DEFAULT_STATUS_LABELS,
    STATUS_REPORT_PRIORITY,
    TOLERANCE_DEFAULTS,
    DEFAULT_CURRENCY_SYMBOL,
    SIDE_LABELS,
} from '@invoice-recon/shared';
