// Schemas
export {
    SideSchema,
    LineStatusSchema,
    MatchMethodSchema,
    LineItemSchema,
    RawLineItemSchema,
    SourceDocumentSchema,
    AggregationStatsSchema,
    AggregationResultSchema,
    MatchPairSchema,
    MatchStatsSchema,
    MatchOutputSchema,
    ResultRowSchema,
    StatusTallySchema,
    ReconciliationSummarySchema,
    StatusLabelsSchema,
    ReconcileConfigSchema,
    SideReportSchema,
    ReconciliationResultSchema,
    ReconciliationFailureSchema,
    AuditRecordSchema,
    DocumentParseResultSchema,
} from './schemas.js';

// Types
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
} from './schemas.js';

// Constants
export {
    LINE_STATUSES,
    DEFAULT_STATUS_LABELS,
    STATUS_REPORT_PRIORITY,
    TOLERANCE_DEFAULTS,
    DEFAULT_CURRENCY_SYMBOL,
    MATCH_METHODS,
    SIDES,
    SIDE_LABELS,
} from './constants.js';
