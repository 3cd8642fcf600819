import { describe, it, expect } from 'vitest';
import { parseNumber } from '../../src/utils/number.js';

describe('parseNumber', () => {
    it('passes finite numbers through', () => {
        expect(parseNumber(15.5)).toBe(15.5);
        expect(parseNumber(0)).toBe(0);
    });

    it('rejects non-finite numbers', () => {
        expect(parseNumber(Number.NaN)).toBeNull();
        expect(parseNumber(Infinity)).toBeNull();
    });

    it('parses plain decimal strings', () => {
        expect(parseNumber('15.50')).toBe(15.5);
        expect(parseNumber('-3')).toBe(-3);
    });

    it('treats a single comma as decimal separator', () => {
        expect(parseNumber('15,50')).toBe(15.5);
    });

    it('handles European thousands separators', () => {
        expect(parseNumber('1.234,56')).toBe(1234.56);
    });

    it('handles US thousands separators', () => {
        expect(parseNumber('1,234.56')).toBe(1234.56);
        expect(parseNumber('1,234,567')).toBe(1234567);
    });

    it('strips currency and percent signs', () => {
        expect(parseNumber('€ 10.00')).toBe(10);
        expect(parseNumber('$7.25')).toBe(7.25);
        expect(parseNumber('21%')).toBe(21);
    });

    it('returns null for empty or non-numeric input', () => {
        expect(parseNumber('')).toBeNull();
        expect(parseNumber('   ')).toBeNull();
        expect(parseNumber('abc')).toBeNull();
        expect(parseNumber('12abc')).toBeNull();
        expect(parseNumber(null)).toBeNull();
        expect(parseNumber(undefined)).toBeNull();
    });
});
