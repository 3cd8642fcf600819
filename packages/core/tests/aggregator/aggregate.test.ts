import { describe, it, expect } from 'vitest';
import { aggregateDocuments, mergeRows } from '../../src/aggregator/aggregate.js';
import { validateRow } from '../../src/aggregator/validate-row.js';
import type { LineItem, RawLineItem, SourceDocument } from '@invoice-recon/shared';

function row(overrides: RawLineItem): RawLineItem {
    return {
        item_code: null,
        item_name: 'Widget Pro',
        quantity: 1,
        unit_price: null,
        line_total: null,
        tax_rate: null,
        ...overrides,
    };
}

function doc(name: string, rows: RawLineItem[]): SourceDocument {
    return { name, rows };
}

function item(overrides: Partial<LineItem>): LineItem {
    return {
        item_code: null,
        item_name: 'Widget Pro',
        quantity: 1,
        unit_price: null,
        line_total: null,
        tax_rate: null,
        ...overrides,
    };
}

describe('aggregateDocuments', () => {
    describe('merging', () => {
        it('sums quantities and averages prices for the same code', () => {
            const result = aggregateDocuments([
                doc('delivery-01.pdf', [row({ item_code: 'A123', quantity: 10, unit_price: 15.0 })]),
                doc('delivery-02.pdf', [row({ item_code: 'A123', quantity: 5, unit_price: 15.5 })]),
            ], 'system');

            expect(result.items).toHaveLength(1);
            expect(result.items[0].item_code).toBe('A123');
            expect(result.items[0].quantity).toBe(15);
            expect(result.items[0].unit_price).toBe(15.25);
            expect(result.items[0].line_total).toBe(228.75);
        });

        it('uses an unweighted mean, not a quantity-weighted one', () => {
            const result = aggregateDocuments([
                doc('a', [row({ item_code: 'A123', quantity: 1, unit_price: 10 })]),
                doc('b', [row({ item_code: 'A123', quantity: 99, unit_price: 20 })]),
            ], 'system');

            expect(result.items[0].unit_price).toBe(15);
            expect(result.items[0].line_total).toBe(1500);
        });

        it('emits exactly one warning naming both differing prices', () => {
            const result = aggregateDocuments([
                doc('delivery-01.pdf', [row({ item_code: 'A123', quantity: 10, unit_price: 15.0 })]),
                doc('delivery-02.pdf', [row({ item_code: 'A123', quantity: 5, unit_price: 15.5 })]),
            ], 'system');

            expect(result.warnings).toEqual([
                'System item A123 (Widget Pro) has differing prices across documents (€15.00, €15.50); mean price used.',
            ]);
        });

        it('does not warn when prices agree', () => {
            const result = aggregateDocuments([
                doc('a', [row({ item_code: 'A123', quantity: 10, unit_price: 5 })]),
                doc('b', [row({ item_code: 'A123', quantity: 5, unit_price: 5 })]),
            ], 'supplier');

            expect(result.warnings).toHaveLength(0);
            expect(result.items[0].unit_price).toBe(5);
            expect(result.items[0].line_total).toBe(75);
        });

        it('lists each distinct price once, ascending, for uncoded items', () => {
            const result = aggregateDocuments([
                doc('a', [row({ item_name: 'Bolt M8', unit_price: 0.12 })]),
                doc('b', [row({ item_name: 'bolt m8', unit_price: 0.1 })]),
                doc('c', [row({ item_name: 'BOLT M8', unit_price: 0.12 })]),
            ], 'supplier');

            expect(result.warnings).toEqual([
                'Supplier item without code (Bolt M8) has differing prices across documents (€0.10, €0.12); mean price used.',
            ]);
        });

        it('merges uncoded items on normalized name and keeps the first spelling', () => {
            const result = aggregateDocuments([
                doc('a', [row({ item_name: '  Widget   PRO ', quantity: 2 })]),
                doc('b', [row({ item_name: 'widget pro', quantity: 3 })]),
            ], 'system');

            expect(result.items).toHaveLength(1);
            expect(result.items[0].item_name).toBe('Widget PRO');
            expect(result.items[0].quantity).toBe(5);
        });

        it('keeps a coded item apart from an uncoded item with the same name', () => {
            const result = aggregateDocuments([
                doc('a', [
                    row({ item_code: 'A1', item_name: 'Bolt' }),
                    row({ item_name: 'Bolt' }),
                ]),
            ], 'system');

            expect(result.items).toHaveLength(2);
            expect(result.items.map(i => i.item_code)).toEqual(['A1', null]);
        });

        it('keeps codes that differ only in inner spacing apart', () => {
            const result = aggregateDocuments([
                doc('a', [
                    row({ item_code: 'AB  1', quantity: 1 }),
                    row({ item_code: 'AB 1', quantity: 1 }),
                ]),
            ], 'system');

            expect(result.items.map(i => [i.item_code, i.quantity])).toEqual([['AB  1', 1], ['AB 1', 1]]);
        });

        it('leaves price and total empty when merged rows carry only totals', () => {
            const result = aggregateDocuments([
                doc('a', [row({ item_code: 'A', quantity: 2, line_total: 20 })]),
                doc('b', [row({ item_code: 'A', quantity: 3, line_total: 30 })]),
            ], 'system');

            expect(result.items).toEqual([{
                item_code: 'A',
                item_name: 'Widget Pro',
                quantity: 5,
                unit_price: null,
                line_total: null,
                tax_rate: null,
            }]);
            expect(result.warnings).toEqual([]);
        });

        it('merges rows within one document as well', () => {
            const result = aggregateDocuments([
                doc('a', [
                    row({ item_code: 'A1', quantity: 2, unit_price: 3 }),
                    row({ item_code: 'A1', quantity: 4, unit_price: 3 }),
                ]),
            ], 'system');

            expect(result.items).toHaveLength(1);
            expect(result.items[0].quantity).toBe(6);
            expect(result.items[0].line_total).toBe(18);
        });

        it('ignores missing prices when averaging', () => {
            const result = aggregateDocuments([
                doc('a', [row({ item_code: 'A1', quantity: 2, unit_price: null })]),
                doc('b', [row({ item_code: 'A1', quantity: 3, unit_price: 12 })]),
            ], 'system');

            expect(result.items[0].unit_price).toBe(12);
            expect(result.items[0].line_total).toBe(60);
            expect(result.warnings).toHaveLength(0);
        });

        it('leaves line_total absent when no merged price exists', () => {
            const result = aggregateDocuments([
                doc('a', [row({ item_code: 'A1', quantity: 2, line_total: 20 })]),
                doc('b', [row({ item_code: 'A1', quantity: 3, line_total: 30 })]),
            ], 'system');

            expect(result.items[0].quantity).toBe(5);
            expect(result.items[0].unit_price).toBeNull();
            expect(result.items[0].line_total).toBeNull();
        });

        it('passes single rows through unchanged', () => {
            const result = aggregateDocuments([
                doc('a', [row({ item_code: 'A1', quantity: 10, line_total: 100.1, tax_rate: 21 })]),
            ], 'supplier');

            expect(result.items).toEqual([{
                item_code: 'A1',
                item_name: 'Widget Pro',
                quantity: 10,
                unit_price: null,
                line_total: 100.1,
                tax_rate: 21,
            }]);
        });

        it('outputs items in first-seen order', () => {
            const result = aggregateDocuments([
                doc('a', [row({ item_code: 'B' }), row({ item_code: 'A' })]),
                doc('b', [row({ item_code: 'C' }), row({ item_code: 'B' })]),
            ], 'system');

            expect(result.items.map(i => i.item_code)).toEqual(['B', 'A', 'C']);
        });
    });

    describe('order independence', () => {
        it('yields the same quantity per identity for any document order', () => {
            const d1 = doc('d1', [row({ item_code: 'A', quantity: 1 }), row({ item_name: 'Nut', quantity: 4 })]);
            const d2 = doc('d2', [row({ item_code: 'A', quantity: 2 }), row({ item_code: 'B', quantity: 7 })]);
            const d3 = doc('d3', [row({ item_name: 'nut', quantity: 6 }), row({ item_code: 'A', quantity: 3 })]);

            const quantities = (docs: SourceDocument[]) => {
                const result = aggregateDocuments(docs, 'system');
                return Object.fromEntries(result.items.map(i => [i.item_code ?? i.item_name.toLowerCase(), i.quantity]));
            };

            const expected = { A: 6, nut: 10, B: 7 };
            expect(quantities([d1, d2, d3])).toEqual(expected);
            expect(quantities([d3, d1, d2])).toEqual(expected);
            expect(quantities([d2, d3, d1])).toEqual(expected);
        });

        it('produces identical output for identical input', () => {
            const docs = [
                doc('a', [row({ item_code: 'A', unit_price: 1 }), row({ item_name: 'Nut' })]),
                doc('b', [row({ item_code: 'A', unit_price: 2 })]),
            ];
            expect(aggregateDocuments(docs, 'system')).toEqual(aggregateDocuments(docs, 'system'));
        });
    });

    describe('empty and invalid documents', () => {
        it('skips an empty document with a warning', () => {
            const result = aggregateDocuments([
                doc('a.csv', []),
                doc('b.csv', [row({ item_code: 'A1' })]),
            ], 'system');

            expect(result.warnings).toEqual(['1 document(s) were empty and were skipped']);
            expect(result.stats.document_count).toBe(2);
            expect(result.stats.processed_document_count).toBe(1);
            expect(result.stats.empty_document_count).toBe(1);
            expect(result.stats.document_names).toEqual(['b.csv']);
            expect(result.items).toHaveLength(1);
        });

        it('skips invalid rows and reports them per document', () => {
            const result = aggregateDocuments([
                doc('a.csv', [
                    row({ item_name: '   ' }),
                    row({ item_name: 'Widget', quantity: -1 }),
                    row({ item_name: 'Gadget', quantity: 2 }),
                ]),
            ], 'supplier');

            expect(result.warnings).toEqual(['Document "a.csv": 2 row(s) failed validation and were skipped']);
            expect(result.stats.skipped_row_count).toBe(2);
            expect(result.stats.input_row_count).toBe(1);
            expect(result.items.map(i => i.item_name)).toEqual(['Gadget']);
        });

        it('treats a document with only invalid rows as empty', () => {
            const result = aggregateDocuments([
                doc('bad.csv', [row({ item_name: null })]),
                doc('good.csv', [row({ item_code: 'A1' })]),
            ], 'system');

            expect(result.warnings).toEqual([
                'Document "bad.csv": 1 row(s) failed validation and were skipped',
                '1 document(s) were empty and were skipped',
            ]);
            expect(result.stats.empty_document_count).toBe(1);
        });

        it('orders validation, empty-document and price warnings deterministically', () => {
            const result = aggregateDocuments([
                doc('a.csv', [row({ item_code: 'A1', unit_price: 1 }), row({ item_name: '' })]),
                doc('b.csv', []),
                doc('c.csv', [row({ item_code: 'A1', unit_price: 2 })]),
            ], 'system');

            expect(result.warnings).toEqual([
                'Document "a.csv": 1 row(s) failed validation and were skipped',
                '1 document(s) were empty and were skipped',
                'System item A1 (Widget Pro) has differing prices across documents (€1.00, €2.00); mean price used.',
            ]);
        });

        it('does not throw when every document is empty', () => {
            const result = aggregateDocuments([doc('a.csv', []), doc('b.csv', [])], 'supplier');

            expect(result.items).toEqual([]);
            expect(result.stats.processed_document_count).toBe(0);
            expect(result.warnings).toEqual(['2 document(s) were empty and were skipped']);
        });

        it('reports counts before and after merging', () => {
            const result = aggregateDocuments([
                doc('a', [row({ item_code: 'A' }), row({ item_code: 'B' })]),
                doc('b', [row({ item_code: 'A' })]),
            ], 'system');

            expect(result.stats).toEqual({
                document_count: 2,
                processed_document_count: 2,
                empty_document_count: 0,
                input_row_count: 3,
                skipped_row_count: 0,
                output_item_count: 2,
                document_names: ['a', 'b'],
            });
        });
    });

    it('uses the configured currency symbol in price warnings', () => {
        const result = aggregateDocuments([
            doc('a', [row({ item_code: 'A1', unit_price: 1 })]),
            doc('b', [row({ item_code: 'A1', unit_price: 1.5 })]),
        ], 'supplier', { currencySymbol: '$' });

        expect(result.warnings).toEqual([
            'Supplier item A1 (Widget Pro) has differing prices across documents ($1.00, $1.50); mean price used.',
        ]);
    });
});

describe('mergeRows', () => {
    it('takes the first non-null code and tax rate', () => {
        const merged = mergeRows([
            item({ item_code: null, tax_rate: null, quantity: 1 }),
            item({ item_code: null, tax_rate: 21, quantity: 1 }),
            item({ item_code: null, tax_rate: 9, quantity: 1 }),
        ]);

        expect(merged.item.tax_rate).toBe(21);
        expect(merged.item.quantity).toBe(3);
    });

    it('keeps quantity null when no row has one', () => {
        const merged = mergeRows([item({ quantity: null }), item({ quantity: null })]);
        expect(merged.item.quantity).toBeNull();
    });

    it('throws on an empty group', () => {
        expect(() => mergeRows([])).toThrow('mergeRows requires at least one row');
    });
});

describe('validateRow', () => {
    it('turns empty strings into null', () => {
        const validated = validateRow({ item_code: '  ', item_name: 'Widget', quantity: 2 });
        expect(validated).toEqual({
            item_code: null,
            item_name: 'Widget',
            quantity: 2,
            unit_price: null,
            line_total: null,
            tax_rate: null,
        });
    });

    it('trims codes without collapsing inner whitespace', () => {
        expect(validateRow({ item_code: ' AB  1 ', item_name: 'Widget' })?.item_code).toBe('AB  1');
    });

    it('accepts a row without quantity', () => {
        expect(validateRow({ item_name: 'Widget' })?.quantity).toBeNull();
    });

    it('rejects rows without a name', () => {
        expect(validateRow({ item_code: 'A1', quantity: 1 })).toBeNull();
    });

    it('rejects non-finite amounts', () => {
        expect(validateRow({ item_name: 'Widget', unit_price: Number.NaN })).toBeNull();
    });
});
