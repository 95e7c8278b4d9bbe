/**
 * Type definitions for the complex-number operations.
 */

import type { Complex } from 'mathjs';

export type { Complex } from 'mathjs';

// Selector literal types
export type UnarySelector =
    | 'conjugate'
    | 'reciprocal'
    | 'negate'
    | 'abs'
    | 'acos'
    | 'asin'
    | 'atan'
    | 'cos'
    | 'cosh'
    | 'exp'
    | 'log10'
    | 'sin'
    | 'sinh'
    | 'sqrt'
    | 'tan'
    | 'tanh';

export type BinarySelector = 'pow' | 'log';

export type Selector = UnarySelector | BinarySelector;

/**
 * Anything that can be turned into a complex number at the boundary:
 * a complex value, a real, a numeric or complex literal, or a structured
 * `{ re, im }` / `[re, im]` pair.
 */
export type Operand =
    | Complex
    | number
    | string
    | { readonly re: number; readonly im: number }
    | readonly [number, number];

// Discriminated union: binary operations carry their second operand
export interface UnaryOperation<K extends UnarySelector = UnarySelector> {
    readonly kind: K;
}

export interface BinaryOperation<K extends BinarySelector = BinarySelector> {
    readonly kind: K;
    readonly argument: Operand;
}

export type Operation = UnaryOperation | BinaryOperation;

/** Every operation except `abs` yields a complex number. */
export type ComplexOperation =
    | UnaryOperation<Exclude<UnarySelector, 'abs'>>
    | BinaryOperation;

export type OperationOutput = Complex | number;

export enum ErrorCode {
    Configuration = 'CONFIGURATION',
    InputConversion = 'INPUT_CONVERSION',
    Computation = 'COMPUTATION',
}

export interface OperationResult {
    readonly value?: OperationOutput;
    readonly operation: Selector;
    readonly input: unknown;
    readonly success: boolean;
    readonly error?: CalculationError;
    readonly duration?: number;
}

export interface CalculatorConfig {
    precision?: number;
    verbose?: boolean;
}

/** Outcome of a conversion that may fail; discriminated on `ok`. */
export type Result<T, E = Error> = Ok<T> | Err<E>;

export class Ok<T> {
    readonly ok = true as const;

    constructor(public readonly value: T) {}

    unwrap(): T {
        return this.value;
    }
}

export class Err<E> {
    readonly ok = false as const;

    constructor(public readonly error: E) {}

    unwrap(): never {
        throw this.error;
    }
}

export class CalculationError extends Error {
    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly operation?: string,
        public readonly inputs?: readonly unknown[]
    ) {
        super(message);
        this.name = 'CalculationError';

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target);
        }
    }

    toString(): string {
        return `${this.name}[${this.code}]: ${this.message}`;
    }
}

/** Selector combination that cannot be run: none, several, or a missing/extra operand. */
export class ConfigurationError extends CalculationError {
    constructor(message: string, operation?: string, inputs?: readonly unknown[]) {
        super(message, ErrorCode.Configuration, operation, inputs);
        this.name = 'ConfigurationError';
    }
}

export class InputConversionError extends CalculationError {
    constructor(message: string, operation?: string, inputs?: readonly unknown[]) {
        super(message, ErrorCode.InputConversion, operation, inputs);
        this.name = 'InputConversionError';
    }
}

/** Raised when the arithmetic primitive itself fails. */
export class ComputationError extends CalculationError {
    constructor(message: string, operation?: string, inputs?: readonly unknown[]) {
        super(message, ErrorCode.Computation, operation, inputs);
        this.name = 'ComputationError';
    }
}

// Observer pattern types
export type Observer<T> = (value: T) => void;
export type Unsubscribe = () => void;

export interface Observable<T> {
    subscribe(observer: Observer<T>): Unsubscribe;
    notify(value: T): void;
}

export type RequiredConfig = Required<CalculatorConfig>;

export const DEFAULT_CONFIG = {
    precision: 10,
    verbose: false,
} as const satisfies RequiredConfig;

export const DEFAULT_SELECTOR: UnarySelector = 'conjugate';

export const UNARY_SELECTORS = [
    'conjugate',
    'reciprocal',
    'negate',
    'abs',
    'acos',
    'asin',
    'atan',
    'cos',
    'cosh',
    'exp',
    'log10',
    'sin',
    'sinh',
    'sqrt',
    'tan',
    'tanh',
] as const satisfies readonly UnarySelector[];

export const BINARY_SELECTORS = ['pow', 'log'] as const satisfies readonly BinarySelector[];

export const SELECTORS: readonly Selector[] = [...UNARY_SELECTORS, ...BINARY_SELECTORS];

const UNARY_SET: ReadonlySet<string> = new Set(UNARY_SELECTORS);
const BINARY_SET: ReadonlySet<string> = new Set(BINARY_SELECTORS);

export function isUnarySelector(value: string): value is UnarySelector {
    return UNARY_SET.has(value);
}

export function isBinarySelector(value: string): value is BinarySelector {
    return BINARY_SET.has(value);
}

export function isBinaryOperation(operation: Operation): operation is BinaryOperation {
    return isBinarySelector(operation.kind);
}
