/**
 * Zod schemas for invoice reconciler data structures.
 *
 * IMPORTANT: Absent values are always null, never 0 or "".
 * Monetary values are plain numbers in schemas; the engine converts them to
 * Decimal at computation boundaries and back to number at output.
 */

import { z } from 'zod';
import {
    DEFAULT_CURRENCY_SYMBOL,
    DEFAULT_STATUS_LABELS,
    LINE_STATUSES,
    MATCH_METHODS,
    SIDES,
    TOLERANCE_DEFAULTS,
} from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

const finiteNumber = z.number().finite();

const count = z.number().int().min(0);

const tolerance = z.number().finite().min(0);

export const SideSchema = z.enum(SIDES);

export type Side = z.infer<typeof SideSchema>;

export const LineStatusSchema = z.enum(LINE_STATUSES);

export type LineStatus = z.infer<typeof LineStatusSchema>;

export const MatchMethodSchema = z.enum(MATCH_METHODS);

export type MatchMethod = z.infer<typeof MatchMethodSchema>;

// ============================================================================
// Line Item Schemas
// ============================================================================

/**
 * Canonical line item - the common form both sides are normalized into.
 * quantity may be null when a document carried none; such lines still take
 * part in matching and end up as partial comparisons.
 */
export const LineItemSchema = z.object({
    item_code: z.string().min(1).nullable(),
    item_name: z.string().min(1),
    quantity: finiteNumber.min(0).nullable(),
    unit_price: finiteNumber.nullable(),
    line_total: finiteNumber.nullable(),
    tax_rate: finiteNumber.nullable(),
});

export type LineItem = z.infer<typeof LineItemSchema>;

/**
 * Row as delivered by ingestion, before validation.
 */
export const RawLineItemSchema = z.object({
    item_code: z.string().nullable().optional(),
    item_name: z.string().nullable().optional(),
    quantity: z.number().nullable().optional(),
    unit_price: z.number().nullable().optional(),
    line_total: z.number().nullable().optional(),
    tax_rate: z.number().nullable().optional(),
});

export type RawLineItem = z.infer<typeof RawLineItemSchema>;

/**
 * One source document (delivery note, invoice) on one side.
 */
export const SourceDocumentSchema = z.object({
    name: z.string().min(1),
    rows: z.array(RawLineItemSchema),
});

export type SourceDocument = z.infer<typeof SourceDocumentSchema>;

// ============================================================================
// Aggregation Schemas
// ============================================================================

export const AggregationStatsSchema = z.object({
    document_count: count,
    processed_document_count: count,
    empty_document_count: count,
    input_row_count: count,
    skipped_row_count: count,
    output_item_count: count,
    document_names: z.array(z.string()),
});

export type AggregationStats = z.infer<typeof AggregationStatsSchema>;

/**
 * Result of aggregating one side.
 * Pure function pattern: warnings are returned as data.
 */
export const AggregationResultSchema = z.object({
    side: SideSchema,
    items: z.array(LineItemSchema),
    warnings: z.array(z.string()),
    stats: AggregationStatsSchema,
});

export type AggregationResult = z.infer<typeof AggregationResultSchema>;

// ============================================================================
// Matching Schemas
// ============================================================================

/**
 * Association of at most one item per side.
 * duplicate_of marks a line whose code repeats an earlier line on that side.
 */
export const MatchPairSchema = z.object({
    system: LineItemSchema.nullable(),
    supplier: LineItemSchema.nullable(),
    method: MatchMethodSchema,
    duplicate_of: SideSchema.optional(),
});

export type MatchPair = z.infer<typeof MatchPairSchema>;

export const MatchStatsSchema = z.object({
    by_code: count,
    by_name: count,
    unmatched_system: count,
    unmatched_supplier: count,
    duplicate_codes: count,
});

export type MatchStats = z.infer<typeof MatchStatsSchema>;

export const MatchOutputSchema = z.object({
    pairs: z.array(MatchPairSchema),
    warnings: z.array(z.string()),
    stats: MatchStatsSchema,
});

export type MatchOutput = z.infer<typeof MatchOutputSchema>;

// ============================================================================
// Comparison Schemas
// ============================================================================

/**
 * One reconciled line. Prices are effective prices, not raw unit prices.
 */
export const ResultRowSchema = z.object({
    status: LineStatusSchema,
    item_code: z.string().nullable(),
    item_name: z.string(),
    match_method: MatchMethodSchema,
    system_quantity: finiteNumber.nullable(),
    supplier_quantity: finiteNumber.nullable(),
    system_price: finiteNumber.nullable(),
    supplier_price: finiteNumber.nullable(),
    price_difference: finiteNumber.nullable(),
    system_line_total: finiteNumber.nullable(),
    supplier_line_total: finiteNumber.nullable(),
    system_tax_rate: finiteNumber.nullable(),
    supplier_tax_rate: finiteNumber.nullable(),
    explanation: z.string(),
});

export type ResultRow = z.infer<typeof ResultRowSchema>;

export const StatusTallySchema = z.object({
    duplicate_code: count,
    missing_from_supplier: count,
    missing_from_system: count,
    partial: count,
    deviation: count,
    ok: count,
});

export type StatusTally = z.infer<typeof StatusTallySchema>;

export const ReconciliationSummarySchema = z.object({
    total: count,
    tally: StatusTallySchema,
    matches: z.object({
        by_code: count,
        by_name: count,
        none: count,
    }),
});

export type ReconciliationSummary = z.infer<typeof ReconciliationSummarySchema>;

// ============================================================================
// Configuration Schema
// ============================================================================

export const StatusLabelsSchema = z.object({
    ok: z.string().min(1).default(DEFAULT_STATUS_LABELS.ok),
    deviation: z.string().min(1).default(DEFAULT_STATUS_LABELS.deviation),
    missing_from_supplier: z.string().min(1).default(DEFAULT_STATUS_LABELS.missing_from_supplier),
    missing_from_system: z.string().min(1).default(DEFAULT_STATUS_LABELS.missing_from_system),
    partial: z.string().min(1).default(DEFAULT_STATUS_LABELS.partial),
    duplicate_code: z.string().min(1).default(DEFAULT_STATUS_LABELS.duplicate_code),
});

export type StatusLabels = z.infer<typeof StatusLabelsSchema>;

/**
 * Run configuration. Resolved once per run and never mutated.
 */
export const ReconcileConfigSchema = z.object({
    quantity_tolerance: tolerance.default(TOLERANCE_DEFAULTS.QUANTITY),
    price_tolerance: tolerance.default(TOLERANCE_DEFAULTS.PRICE),
    currency_symbol: z.string().default(DEFAULT_CURRENCY_SYMBOL),
    status_labels: StatusLabelsSchema.default({}),
});

export type ReconcileConfig = z.infer<typeof ReconcileConfigSchema>;

export type ReconcileConfigInput = z.input<typeof ReconcileConfigSchema>;

// ============================================================================
// Reconciliation Result Schemas
// ============================================================================

export const SideReportSchema = z.object({
    stats: AggregationStatsSchema,
    warnings: z.array(z.string()),
});

export type SideReport = z.infer<typeof SideReportSchema>;

export const ReconciliationResultSchema = z.object({
    rows: z.array(ResultRowSchema),
    summary: ReconciliationSummarySchema,
    system: SideReportSchema,
    supplier: SideReportSchema,
    match_warnings: z.array(z.string()),
    config: ReconcileConfigSchema,
});

export type ReconciliationResult = z.infer<typeof ReconciliationResultSchema>;

/**
 * The only fatal condition: one side has nothing to reconcile.
 */
export const ReconciliationFailureSchema = z.object({
    code: z.literal('NO_VALID_DOCUMENTS'),
    side: SideSchema,
    message: z.string(),
});

export type ReconciliationFailure = z.infer<typeof ReconciliationFailureSchema>;

export type ReconciliationOutcome =
    | { ok: true; result: ReconciliationResult }
    | { ok: false; error: ReconciliationFailure };

// ============================================================================
// Audit Schema
// ============================================================================

const AuditSideSchema = z.object({
    documents: count,
    empty_documents: count,
    rows: count,
    skipped_rows: count,
    items: count,
    warnings: count,
});

/**
 * Audit record: counts only. No item codes, names or amounts.
 */
export const AuditRecordSchema = z.object({
    timestamp: z.string(),
    elapsed_ms: z.number().min(0),
    system: AuditSideSchema,
    supplier: AuditSideSchema,
    matches: z.object({
        by_code: count,
        by_name: count,
        none: count,
    }),
    tally: StatusTallySchema,
    tolerances: z.object({
        quantity: tolerance,
        price: tolerance,
    }),
});

export type AuditRecord = z.infer<typeof AuditRecordSchema>;

// ============================================================================
// Parser Result Schema
// ============================================================================

/**
 * Result returned by document parsers.
 * Parsers return data, not side effects. Warnings are returned as data.
 */
export const DocumentParseResultSchema = z.object({
    document: SourceDocumentSchema,
    warnings: z.array(z.string()),
});

export type DocumentParseResult = z.infer<typeof DocumentParseResultSchema>;
