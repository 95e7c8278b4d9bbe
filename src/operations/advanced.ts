/**
 * Operation dispatch and the calculator built on top of it.
 */

import { isComplex } from 'mathjs';

import type {
    CalculatorConfig,
    Complex,
    ComplexOperation,
    Observable,
    Observer,
    Operand,
    Operation,
    OperationOutput,
    OperationResult,
    UnaryOperation,
    Unsubscribe,
} from './types.js';

import {
    CalculationError,
    ComputationError,
    ConfigurationError,
    DEFAULT_CONFIG,
    DEFAULT_SELECTOR,
    InputConversionError,
    isBinaryOperation,
    isBinarySelector,
    isUnarySelector,
} from './types.js';

import {
    BINARY_OPERATIONS,
    UNARY_OPERATIONS,
    ensureFinite,
    invokePrimitive,
    magnitude,
} from './basic.js';
import { coerceOperand, parseOperand } from '../utils/helpers.js';

/**
 * Apply one operation to a complex number.
 *
 * `abs` is the only operation whose result is a real; all others return
 * a complex value. The second operand of `pow` and `log` is coerced here,
 * before any arithmetic runs.
 */
export function apply(object: Complex, operation: UnaryOperation<'abs'>): number;
export function apply(object: Complex, operation: ComplexOperation): Complex;
export function apply(object: Complex, operation: Operation): OperationOutput;
export function apply(object: Complex, operation: Operation): OperationOutput {
    if (isBinaryOperation(operation)) {
        const { kind } = operation;
        const coerced = coerceOperand(operation.argument);
        if (!coerced.ok) {
            throw new InputConversionError(
                `Invalid argument for ${kind}: ${coerced.error.message}`,
                kind,
                [operation.argument]
            );
        }
        const argument = coerced.value;
        const primitive = BINARY_OPERATIONS[kind];
        return invokePrimitive(kind, [object, argument], () => primitive(object, argument));
    }

    const { kind } = operation;
    if (kind === 'abs') {
        return invokePrimitive(kind, [object], () => ensureFinite(magnitude(object), kind));
    }
    const primitive = UNARY_OPERATIONS[kind];
    return invokePrimitive(kind, [object], () => primitive(object));
}

/**
 * Build an operation from a loosely typed selector, as it arrives from
 * the command line. A missing selector means `conjugate`.
 */
export function createOperation(selector: string | undefined, argument?: Operand): Operation {
    const kind = selector ?? DEFAULT_SELECTOR;

    if (isBinarySelector(kind)) {
        if (argument === undefined) {
            throw new ConfigurationError(`${kind} requires a second operand`, kind);
        }
        return { kind, argument };
    }

    if (isUnarySelector(kind)) {
        if (argument !== undefined) {
            throw new ConfigurationError(`${kind} does not take a second operand`, kind, [argument]);
        }
        return { kind };
    }

    throw new ConfigurationError(`Unknown operation: ${kind}`, kind);
}

function toCalculationError(error: unknown, operation: string): CalculationError {
    if (error instanceof CalculationError) {
        return error;
    }
    return new ComputationError(error instanceof Error ? error.message : String(error), operation);
}

/**
 * Abstract base class for calculators.
 */
export abstract class BaseCalculator {
    protected _precision: number;

    constructor(config: Partial<CalculatorConfig> = {}) {
        this._precision = BaseCalculator.validatePrecision(config.precision ?? DEFAULT_CONFIG.precision);
    }

    abstract calculate(input: unknown, operation: Operation): OperationResult;

    private static validatePrecision(value: number): number {
        if (!Number.isInteger(value) || value < 1) {
            throw new ConfigurationError('Precision must be a positive integer');
        }
        return value;
    }

    /** Significant digits used when results are printed. */
    get precision(): number {
        return this._precision;
    }

    set precision(value: number) {
        this._precision = BaseCalculator.validatePrecision(value);
    }
}

/**
 * Calculator that records each invocation as an OperationResult instead
 * of throwing, so batches report failures per item.
 */
export class ComplexCalculator extends BaseCalculator implements Observable<OperationResult> {
    private _observers: Observer<OperationResult>[] = [];

    /**
     * A logging calculator when `config.verbose` is set, a plain one otherwise.
     */
    static create(config: Partial<CalculatorConfig> = {}, log?: LogFn): ComplexCalculator {
        return config.verbose ? new LoggingCalculator(config, log) : new ComplexCalculator(config);
    }

    calculate(input: unknown, operation: Operation): OperationResult {
        const startTime = performance.now();

        let result: OperationResult;
        try {
            const value = apply(parseOperand(input), operation);
            result = {
                value,
                operation: operation.kind,
                input,
                success: true,
                duration: performance.now() - startTime,
            };
        } catch (error) {
            result = {
                operation: operation.kind,
                input,
                success: false,
                error: toCalculationError(error, operation.kind),
                duration: performance.now() - startTime,
            };
        }

        this.notify(result);
        return result;
    }

    /**
     * One result per input, in input order.
     */
    calculateBatch(inputs: readonly unknown[], operation: Operation): OperationResult[] {
        return inputs.map((input) => this.calculate(input, operation));
    }

    subscribe(observer: Observer<OperationResult>): Unsubscribe {
        this._observers.push(observer);
        return () => {
            const index = this._observers.indexOf(observer);
            if (index > -1) {
                this._observers.splice(index, 1);
            }
        };
    }

    notify(value: OperationResult): void {
        for (const observer of this._observers) {
            try {
                observer(value);
            } catch (e) {
                console.error('Observer error:', e);
            }
        }
    }
}

export type LogFn = (message: string) => void;

/**
 * Writes every calculation and its outcome to the log function
 * (stderr by default, so stdout carries only results).
 */
export class LoggingCalculator extends ComplexCalculator {
    private readonly log: LogFn;

    constructor(config: Partial<CalculatorConfig> = {}, log: LogFn = (message) => console.error(message)) {
        super(config);
        this.log = log;
    }

    calculate(input: unknown, operation: Operation): OperationResult {
        this.log(`Calculating: ${operation.kind}(${describeInput(input, operation)})`);
        const result = super.calculate(input, operation);
        if (result.success) {
            this.log(`Result: ${String(result.value)} (${(result.duration ?? 0).toFixed(3)} ms)`);
        } else {
            this.log(`Failed: ${result.error?.toString() ?? 'unknown error'}`);
        }
        return result;
    }
}

function describeOperand(value: unknown): string {
    if (typeof value === 'string') {
        return value;
    }
    if (isComplex(value)) {
        return value.toString();
    }
    return JSON.stringify(value) ?? String(value);
}

function describeInput(input: unknown, operation: Operation): string {
    const parts = [describeOperand(input)];
    if (isBinaryOperation(operation)) {
        parts.push(describeOperand(operation.argument));
    }
    return parts.join(', ');
}
