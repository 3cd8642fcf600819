import { describe, it, expect } from 'vitest';
import { effectivePrice } from '../../src/comparator/effective-price.js';
import type { LineItem } from '@invoice-recon/shared';

function makeItem(overrides: Partial<LineItem>): LineItem {
    return {
        item_code: 'A1',
        item_name: 'Widget',
        quantity: 10,
        unit_price: null,
        line_total: null,
        tax_rate: null,
        ...overrides,
    };
}

describe('effectivePrice', () => {
    it('prefers an explicit unit price', () => {
        expect(effectivePrice(makeItem({ unit_price: 15.5, line_total: 999 }))?.toNumber()).toBe(15.5);
    });

    it('derives the price from line total and quantity', () => {
        expect(effectivePrice(makeItem({ quantity: 4, line_total: 10 }))?.toNumber()).toBe(2.5);
    });

    it('derives without float drift', () => {
        expect(effectivePrice(makeItem({ quantity: 3, line_total: 0.3 }))?.toString()).toBe('0.1');
    });

    it('is undefined when quantity is zero', () => {
        expect(effectivePrice(makeItem({ quantity: 0, line_total: 10 }))).toBeNull();
    });

    it('is undefined when quantity is missing', () => {
        expect(effectivePrice(makeItem({ quantity: null, line_total: 10 }))).toBeNull();
    });

    it('is undefined with neither price nor total', () => {
        expect(effectivePrice(makeItem({}))).toBeNull();
    });

    it('keeps a unit price of zero', () => {
        expect(effectivePrice(makeItem({ unit_price: 0, line_total: 50 }))?.toNumber()).toBe(0);
    });
});
