// Types (re-exported from shared)
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
} from './types/index.js';

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
} from './types/index.js';

// Utils
export { normalizeName, cleanText, cleanCode, parseNumber, formatMoney, formatQuantity } from './utils/index.js';

// Parser
export { parseLineItems, mapColumns, COLUMN_SYNONYMS, CANONICAL_FIELDS } from './parser/index.js';
export type { CanonicalField, ColumnMapping } from './parser/index.js';

// Aggregator
export { aggregateDocuments, mergeRows, validateRow, identityKey } from './aggregator/index.js';
export type { AggregateOptions, MergedItem } from './aggregator/index.js';

// Matcher
export { matchItems, findRepeatedCodes, findByCode, findByName } from './matcher/index.js';
export type { CandidateResult } from './matcher/index.js';

// Comparator
export { comparePair, effectivePrice, EXPLANATIONS } from './comparator/index.js';

// Reconcile
export {
    reconcile,
    resolveConfig,
    summarizeRows,
    isFullyReconciled,
    sortByStatusPriority,
    REPORT_STATUS_ORDER,
    emptyTally,
    buildAuditRecord,
} from './reconcile/index.js';
export type { ReconcileInput } from './reconcile/index.js';
