/**
 * Operations module - barrel export file.
 */

export * from './types.js';

export {
    ensureComplex,
    ensureFinite,
    isZero,
    magnitude,
    phase,
    conjugate,
    reciprocal,
    negate,
    power,
    logBase,
    invokePrimitive,
    UNARY_OPERATIONS,
    BINARY_OPERATIONS,
    type UnaryPrimitive,
    type BinaryPrimitive,
} from './basic.js';

export {
    apply,
    createOperation,
    BaseCalculator,
    ComplexCalculator,
    LoggingCalculator,
    type LogFn,
} from './advanced.js';
