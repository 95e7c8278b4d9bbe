/**
 * Operand coercion and output formatting.
 */

import { Decimal } from 'decimal.js';
import { complex, isComplex } from 'mathjs';

import {
    Err,
    InputConversionError,
    Ok,
    type CalculationError,
    type Complex,
    type OperationResult,
    type Result,
} from '../operations/types.js';
import { magnitude, phase } from '../operations/basic.js';

/**
 * Validate that a value is a finite number.
 */
export function isValidNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value);
}

function isPair(value: unknown): value is readonly [unknown, unknown] {
    return Array.isArray(value) && value.length === 2;
}

function hasParts(value: unknown): value is { re: unknown; im: unknown } {
    return typeof value === 'object' && value !== null && 're' in value && 'im' in value;
}

function describeValue(value: unknown): string {
    if (typeof value === 'string') {
        return `"${value}"`;
    }
    if (typeof value === 'object' && value !== null) {
        return JSON.stringify(value) ?? String(value);
    }
    return String(value);
}

function conversionError(value: unknown): Err<InputConversionError> {
    return new Err(
        new InputConversionError(
            `Cannot convert ${describeValue(value)} to a complex number`,
            undefined,
            [value]
        )
    );
}

/**
 * Parse a complex literal such as `2+3i`, `-i` or `4.5`.
 */
function parseComplexLiteral(text: string): Complex | null {
    try {
        const parsed = complex(text);
        return isValidNumber(parsed.re) && isValidNumber(parsed.im) ? parsed : null;
    } catch {
        return null;
    }
}

/**
 * Convert an operand from any accepted shape into a complex number.
 *
 * Accepts a complex value, a finite real, a numeric or complex literal,
 * `{ re, im }` and `[re, im]`. Everything else is an InputConversionError.
 */
export function coerceOperand(value: unknown): Result<Complex, InputConversionError> {
    if (isComplex(value)) {
        return new Ok(value);
    }

    if (typeof value === 'number') {
        return isValidNumber(value) ? new Ok(complex(value, 0)) : conversionError(value);
    }

    if (typeof value === 'string') {
        const text = value.trim();
        if (text === '') {
            return conversionError(value);
        }
        const real = Number(text);
        if (isValidNumber(real)) {
            return new Ok(complex(real, 0));
        }
        const parsed = parseComplexLiteral(text);
        return parsed ? new Ok(parsed) : conversionError(value);
    }

    if (isPair(value)) {
        const [re, im] = value;
        return isValidNumber(re) && isValidNumber(im)
            ? new Ok(complex(re, im))
            : conversionError(value);
    }

    if (hasParts(value)) {
        const { re, im } = value;
        return isValidNumber(re) && isValidNumber(im)
            ? new Ok(complex(re, im))
            : conversionError(value);
    }

    return conversionError(value);
}

/**
 * Throwing variant of {@link coerceOperand}.
 */
export function parseOperand(value: unknown): Complex {
    return coerceOperand(value).unwrap();
}

/**
 * Round to `precision` significant digits and print without trailing zeros.
 */
export function formatNumber(value: number, precision: number): string {
    if (!Number.isFinite(value)) {
        return String(value);
    }
    return new Decimal(value).toSignificantDigits(precision).toString();
}

export function roundNumber(value: number, precision: number): number {
    if (!Number.isFinite(value)) {
        return value;
    }
    const rounded = new Decimal(value).toSignificantDigits(precision).toNumber();
    // -0 prints as 0 everywhere else
    return rounded === 0 ? 0 : rounded;
}

/**
 * Text form: `a + bi` or `a - bi`.
 */
export function formatComplex(z: Complex, precision: number): string {
    const re = formatNumber(z.re, precision);
    const sign = z.im < 0 ? '-' : '+';
    const im = formatNumber(Math.abs(z.im), precision);
    return `${re} ${sign} ${im}i`;
}

export interface PolarRecord {
    re: number;
    im: number;
    magnitude: number;
    phase: number;
}

/**
 * Structured rendering with both cartesian and polar components.
 */
export function toPolarRecord(z: Complex, precision: number): PolarRecord {
    return {
        re: roundNumber(z.re, precision),
        im: roundNumber(z.im, precision),
        magnitude: roundNumber(magnitude(z), precision),
        phase: roundNumber(phase(z), precision),
    };
}

export interface FormatOptions {
    precision: number;
    json?: boolean;
}

function formatError(error: CalculationError | undefined, json: boolean): string {
    if (json) {
        return JSON.stringify({
            error: {
                code: error?.code ?? 'UNKNOWN',
                message: error?.message ?? 'Unknown error',
            },
        });
    }
    return `Error: ${error ? error.toString() : 'Unknown error'}`;
}

/**
 * One output line per result. `abs` prints a bare number in both modes.
 */
export function formatResult(result: OperationResult, options: FormatOptions): string {
    const { precision, json = false } = options;
    const { value } = result;

    if (!result.success || value === undefined) {
        return formatError(result.error, json);
    }

    if (typeof value === 'number') {
        return json ? JSON.stringify(roundNumber(value, precision)) : formatNumber(value, precision);
    }

    return json ? JSON.stringify(toPolarRecord(value, precision)) : formatComplex(value, precision);
}
