/**
 * Complex-number primitives, one per selector.
 *
 * The arithmetic itself comes from mathjs; this module only binds each
 * selector to a statically referenced function and normalizes the result.
 */

import {
    acos,
    arg,
    asin,
    atan,
    complex,
    conj,
    cos,
    cosh,
    divide,
    exp,
    hypot,
    isComplex,
    log,
    log10,
    pow,
    sin,
    sinh,
    sqrt,
    tan,
    tanh,
    unaryMinus,
} from 'mathjs';

import {
    ComputationError,
    type BinarySelector,
    type Complex,
    type UnarySelector,
} from './types.js';

export type UnaryPrimitive = (z: Complex) => Complex;
export type BinaryPrimitive = (z: Complex, w: Complex) => Complex;

/**
 * Overflow, division by zero inside the library and the like all surface
 * as infinities or NaN; those are computation failures, not results.
 */
export function ensureFinite(value: number, operation: string): number {
    if (!Number.isFinite(value)) {
        throw new ComputationError(`${operation} produced a non-finite result`, operation, [value]);
    }
    return value;
}

/**
 * Normalize whatever the library handed back into a complex value.
 * Reals are promoted; anything else is a computation failure.
 */
export function ensureComplex(value: unknown, operation: string): Complex {
    if (isComplex(value)) {
        ensureFinite(value.re, operation);
        ensureFinite(value.im, operation);
        return value;
    }
    if (typeof value === 'number') {
        return complex(ensureFinite(value, operation), 0);
    }
    throw new ComputationError(
        `${operation} did not produce a complex value`,
        operation,
        [value]
    );
}

export function isZero(z: Complex): boolean {
    return z.re === 0 && z.im === 0;
}

/** Distance from the origin. */
export function magnitude(z: Complex): number {
    return hypot(z.re, z.im);
}

/** Angle from the positive real axis, in (-π, π]. */
export function phase(z: Complex): number {
    return arg(z);
}

export const conjugate: UnaryPrimitive = (z) => ensureComplex(conj(z), 'conjugate');

export const reciprocal: UnaryPrimitive = (z) => {
    if (isZero(z)) {
        throw new ComputationError('Reciprocal of zero', 'reciprocal', [z.toString()]);
    }
    return ensureComplex(divide(1, z), 'reciprocal');
};

export const negate: UnaryPrimitive = (z) => ensureComplex(unaryMinus(z), 'negate');

// Lambda/arrow function expressions
export const complexAcos: UnaryPrimitive = (z) => ensureComplex(acos(z), 'acos');
export const complexAsin: UnaryPrimitive = (z) => ensureComplex(asin(z), 'asin');
export const complexAtan: UnaryPrimitive = (z) => ensureComplex(atan(z), 'atan');
export const complexCos: UnaryPrimitive = (z) => ensureComplex(cos(z), 'cos');
export const complexCosh: UnaryPrimitive = (z) => ensureComplex(cosh(z), 'cosh');
export const complexExp: UnaryPrimitive = (z) => ensureComplex(exp(z), 'exp');
export const complexLog10: UnaryPrimitive = (z) => ensureComplex(log10(z), 'log10');
export const complexSin: UnaryPrimitive = (z) => ensureComplex(sin(z), 'sin');
export const complexSinh: UnaryPrimitive = (z) => ensureComplex(sinh(z), 'sinh');
export const complexSqrt: UnaryPrimitive = (z) => ensureComplex(sqrt(z), 'sqrt');
export const complexTan: UnaryPrimitive = (z) => ensureComplex(tan(z), 'tan');
export const complexTanh: UnaryPrimitive = (z) => ensureComplex(tanh(z), 'tanh');

/** `z` raised to `w`. */
export const power: BinaryPrimitive = (z, w) => ensureComplex(pow(z, w), 'pow');

/** Logarithm of `z` in base `w`. */
export const logBase: BinaryPrimitive = (z, w) => ensureComplex(log(z, w), 'log');

/**
 * Primitives for every unary selector that yields a complex number.
 * `abs` is handled apart because it returns a real.
 */
export const UNARY_OPERATIONS = {
    conjugate,
    reciprocal,
    negate,
    acos: complexAcos,
    asin: complexAsin,
    atan: complexAtan,
    cos: complexCos,
    cosh: complexCosh,
    exp: complexExp,
    log10: complexLog10,
    sin: complexSin,
    sinh: complexSinh,
    sqrt: complexSqrt,
    tan: complexTan,
    tanh: complexTanh,
} as const satisfies Record<Exclude<UnarySelector, 'abs'>, UnaryPrimitive>;

export const BINARY_OPERATIONS = {
    pow: power,
    log: logBase,
} as const satisfies Record<BinarySelector, BinaryPrimitive>;

/**
 * Run a primitive, turning anything the library throws into a
 * ComputationError that keeps the original message.
 */
export function invokePrimitive<T>(operation: string, inputs: readonly Complex[], fn: () => T): T {
    try {
        return fn();
    } catch (error) {
        if (error instanceof ComputationError) {
            throw error;
        }
        throw new ComputationError(
            error instanceof Error ? error.message : String(error),
            operation,
            inputs.map((z) => z.toString())
        );
    }
}
