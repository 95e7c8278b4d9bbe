import { describe, it, expect } from 'vitest';
import { complex } from 'mathjs';

import {
    coerceOperand,
    formatComplex,
    formatNumber,
    formatResult,
    parseOperand,
    roundNumber,
    toPolarRecord,
} from './helpers.js';
import { ComputationError, ErrorCode, InputConversionError } from '../operations/types.js';

describe('coerceOperand', () => {
    it('passes complex values through unchanged', () => {
        const z = complex(1, 2);
        expect(coerceOperand(z).unwrap()).toBe(z);
    });

    it('promotes finite reals', () => {
        const z = coerceOperand(2).unwrap();
        expect(z.re).toBe(2);
        expect(z.im).toBe(0);
    });

    it('treats numeric strings like the number they spell', () => {
        const z = coerceOperand(' 2.5 ').unwrap();
        expect(z.re).toBe(2.5);
        expect(z.im).toBe(0);
    });

    it('parses complex literals', () => {
        const z = coerceOperand('2+3i').unwrap();
        expect(z.re).toBe(2);
        expect(z.im).toBe(3);

        const w = coerceOperand('-i').unwrap();
        expect(w.re).toBe(0);
        expect(w.im).toBe(-1);
    });

    it('accepts { re, im } objects and [re, im] pairs', () => {
        const fromObject = coerceOperand({ re: 1, im: -2 }).unwrap();
        expect([fromObject.re, fromObject.im]).toEqual([1, -2]);

        const fromPair = coerceOperand([4, 5]).unwrap();
        expect([fromPair.re, fromPair.im]).toEqual([4, 5]);
    });

    it('rejects text that is neither numeric nor complex', () => {
        const result = coerceOperand('abc');
        expect(result.ok).toBe(false);
        expect(() => result.unwrap()).toThrow('Cannot convert "abc" to a complex number');
    });

    it.each([
        ['empty string', ''],
        ['NaN', Number.NaN],
        ['Infinity', Number.POSITIVE_INFINITY],
        ['boolean', true],
        ['null', null],
        ['non-numeric parts', { re: '1', im: 2 }],
        ['short pair', [1]],
    ])('rejects %s', (_label, value) => {
        const result = coerceOperand(value);
        expect(result.ok).toBe(false);
        expect(() => result.unwrap()).toThrow(InputConversionError);
    });
});

describe('parseOperand', () => {
    it('throws an InputConversionError with the matching code', () => {
        let caught: unknown;
        try {
            parseOperand('x');
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(InputConversionError);
        expect(caught instanceof InputConversionError && caught.code).toBe(ErrorCode.InputConversion);
    });
});

describe('formatNumber', () => {
    it('rounds to significant digits without trailing zeros', () => {
        expect(formatNumber(1.85021985907055, 10)).toBe('1.850219859');
        expect(formatNumber(3, 10)).toBe('3');
        expect(formatNumber(0.000123456789, 3)).toBe('0.000123');
    });

    it('prints negative zero as zero', () => {
        expect(formatNumber(-0, 5)).toBe('0');
        expect(Object.is(roundNumber(-0, 5), 0)).toBe(true);
    });

    it('prints non-finite values by name', () => {
        expect(formatNumber(Number.POSITIVE_INFINITY, 4)).toBe('Infinity');
        expect(formatNumber(Number.NaN, 4)).toBe('NaN');
    });
});

describe('formatComplex', () => {
    it('writes the sign of the imaginary part between the components', () => {
        expect(formatComplex(complex(2, 3), 10)).toBe('2 + 3i');
        expect(formatComplex(complex(-2, -3), 10)).toBe('-2 - 3i');
        expect(formatComplex(complex(1.5, -0), 10)).toBe('1.5 + 0i');
    });
});

describe('toPolarRecord', () => {
    it('includes magnitude and phase', () => {
        expect(toPolarRecord(complex(3, 4), 4)).toEqual({
            re: 3,
            im: 4,
            magnitude: 5,
            phase: 0.9273,
        });
    });
});

describe('formatResult', () => {
    it('prints abs results as a bare number', () => {
        const result = { value: 3, operation: 'abs', input: '3', success: true } as const;
        expect(formatResult(result, { precision: 10 })).toBe('3');
        expect(formatResult(result, { precision: 10, json: true })).toBe('3');
    });

    it('prints complex results as text or structured JSON', () => {
        const result = { value: complex(2, 3), operation: 'conjugate', input: '2+3i', success: true } as const;
        expect(formatResult(result, { precision: 4 })).toBe('2 + 3i');
        expect(formatResult(result, { precision: 4, json: true })).toBe(
            '{"re":2,"im":3,"magnitude":3.606,"phase":0.9828}'
        );
    });

    it('prints failures with their error code', () => {
        const result = {
            operation: 'reciprocal',
            input: '0',
            success: false,
            error: new ComputationError('Reciprocal of zero', 'reciprocal'),
        } as const;
        expect(formatResult(result, { precision: 10 })).toBe(
            'Error: ComputationError[COMPUTATION]: Reciprocal of zero'
        );
        expect(formatResult(result, { precision: 10, json: true })).toBe(
            '{"error":{"code":"COMPUTATION","message":"Reciprocal of zero"}}'
        );
    });
});
