import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { complex } from 'mathjs';

import { apply } from './advanced.js';
import type { Complex } from './types.js';

const component = fc.double({ min: -100, max: 100, noNaN: true });

const anyComplex = fc.record({ re: component, im: component }).map(({ re, im }) => complex(re, im));

// Keep clear of the origin, where reciprocal and log are undefined
const nonZeroComplex = anyComplex.filter((z) => Math.hypot(z.re, z.im) > 1e-3);

function distance(a: Complex, b: Complex): number {
    return Math.hypot(a.re - b.re, a.im - b.im);
}

describe('algebraic properties', () => {
    it('conjugate is an involution', () => {
        fc.assert(
            fc.property(anyComplex, (z) => {
                const w = apply(apply(z, { kind: 'conjugate' }), { kind: 'conjugate' });
                return w.re === z.re && w.im === z.im;
            })
        );
    });

    it('negate is an involution', () => {
        fc.assert(
            fc.property(anyComplex, (z) => {
                const w = apply(apply(z, { kind: 'negate' }), { kind: 'negate' });
                return w.re === z.re && w.im === z.im;
            })
        );
    });

    it('reciprocal of reciprocal returns the original value', () => {
        fc.assert(
            fc.property(nonZeroComplex, (z) => {
                const w = apply(apply(z, { kind: 'reciprocal' }), { kind: 'reciprocal' });
                return distance(w, z) <= 1e-9 * Math.hypot(z.re, z.im);
            })
        );
    });

    it('abs matches sqrt(re² + im²)', () => {
        fc.assert(
            fc.property(anyComplex, (z) => {
                const expected = Math.sqrt(z.re * z.re + z.im * z.im);
                return Math.abs(apply(z, { kind: 'abs' }) - expected) <= 1e-9 * (1 + expected);
            })
        );
    });

    it('exp undoes log in base e', () => {
        const e = complex(Math.E, 0);
        fc.assert(
            fc.property(nonZeroComplex, (z) => {
                const w = apply(apply(z, { kind: 'log', argument: e }), { kind: 'exp' });
                return distance(w, z) <= 1e-9 * Math.hypot(z.re, z.im);
            })
        );
    });

    it('pow(z, 2) agrees with z * z', () => {
        fc.assert(
            fc.property(nonZeroComplex, (z) => {
                const squared = complex(z.re * z.re - z.im * z.im, 2 * z.re * z.im);
                const w = apply(z, { kind: 'pow', argument: 2 });
                return distance(w, squared) <= 1e-9 * (1 + z.re * z.re + z.im * z.im);
            })
        );
    });

    it('pow with a numeric string matches pow with the number', () => {
        fc.assert(
            fc.property(nonZeroComplex, fc.integer({ min: -5, max: 5 }), (z, n) => {
                const fromString = apply(z, { kind: 'pow', argument: String(n) });
                const fromNumber = apply(z, { kind: 'pow', argument: n });
                expect(fromString.re).toBe(fromNumber.re);
                expect(fromString.im).toBe(fromNumber.im);
            })
        );
    });
});
