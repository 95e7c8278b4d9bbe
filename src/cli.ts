/**
 * Command-line surface: one command, mutually exclusive operation flags.
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { readFile } from 'fs/promises';
import * as readline from 'readline';

import {
    CalculationError,
    ComplexCalculator,
    ConfigurationError,
    DEFAULT_CONFIG,
    InputConversionError,
    SELECTORS,
    createOperation,
    type Selector,
} from './operations/index.js';
import { formatResult } from './utils/helpers.js';

export const VERSION = '1.0.0';
export const APP_NAME = 'complex-calc';

const SELECTOR_DESCRIPTIONS: Record<Selector, string> = {
    conjugate: 'complex conjugate (default)',
    reciprocal: 'multiplicative inverse',
    negate: 'additive inverse',
    abs: 'magnitude, printed as a real number',
    acos: 'inverse cosine',
    asin: 'inverse sine',
    atan: 'inverse tangent',
    cos: 'cosine',
    cosh: 'hyperbolic cosine',
    exp: 'e raised to the operand',
    log10: 'base-10 logarithm',
    sin: 'sine',
    sinh: 'hyperbolic sine',
    sqrt: 'principal square root',
    tan: 'tangent',
    tanh: 'hyperbolic tangent',
    pow: 'operand raised to the second operand',
    log: 'logarithm of the operand in the base given by the second operand',
};

export type CliOptions = Partial<Record<Selector, boolean>> & {
    batch?: boolean;
    input?: string;
    json?: boolean;
    precision: number;
    verbose?: boolean;
};

/**
 * Where the command reads and writes. `out` and `err` receive raw text,
 * newlines included.
 */
export interface CliIO {
    out(text: string): void;
    err(text: string): void;
    readStdin(): Promise<string[]>;
    readFile(path: string): Promise<string>;
}

export async function readLines(input: NodeJS.ReadableStream): Promise<string[]> {
    const rl = readline.createInterface({ input, crlfDelay: Infinity });
    const lines: string[] = [];
    for await (const line of rl) {
        lines.push(line);
    }
    return lines;
}

export function createProcessIO(): CliIO {
    return {
        out: (text) => {
            process.stdout.write(text);
        },
        err: (text) => {
            process.stderr.write(text);
        },
        readStdin: () => readLines(process.stdin),
        readFile: (path) => readFile(path, 'utf8'),
    };
}

function parsePrecision(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Precision must be a positive integer.');
    }
    return parsed;
}

/**
 * Drop blank lines and `#` comments.
 */
export function filterOperandLines(lines: readonly string[]): string[] {
    return lines
        .map((line) => line.trim())
        .filter((line) => line !== '' && !line.startsWith('#'));
}

async function readInputFile(path: string, io: CliIO): Promise<unknown[]> {
    let text: string;
    try {
        text = await io.readFile(path);
    } catch (error) {
        throw new ConfigurationError(
            `Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`
        );
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new InputConversionError(
            `${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
        );
    }

    if (!Array.isArray(parsed)) {
        throw new InputConversionError(`${path} must contain a JSON array of operands`);
    }
    return parsed;
}

function selectedOperation(options: CliOptions): Selector | undefined {
    const selected = SELECTORS.filter((selector) => options[selector] === true);
    if (selected.length > 1) {
        throw new ConfigurationError(
            `Only one operation may be selected, got: ${selected.map((s) => `--${s}`).join(', ')}`
        );
    }
    return selected[0];
}

async function execute(operands: readonly string[], options: CliOptions, io: CliIO): Promise<number> {
    const selector = selectedOperation(options);
    const positional = [...operands];

    let inputs: unknown[];
    if (options.input !== undefined) {
        inputs = await readInputFile(options.input, io);
    } else if (options.batch) {
        inputs = filterOperandLines(await io.readStdin());
    } else {
        const object = positional.shift();
        if (object === undefined) {
            throw new ConfigurationError('Missing operand');
        }
        inputs = [object];
    }

    const argument = positional.shift();
    if (positional.length > 0) {
        throw new ConfigurationError(`Unexpected operand: ${positional[0]}`);
    }

    const operation = createOperation(selector, argument);
    const calculator = ComplexCalculator.create(
        { precision: options.precision, verbose: options.verbose },
        (message) => io.err(`${message}\n`)
    );

    const results = calculator.calculateBatch(inputs, operation);

    for (const result of results) {
        io.out(`${formatResult(result, { precision: calculator.precision, json: options.json })}\n`);
    }

    return results.every((result) => result.success) ? 0 : 1;
}

/**
 * Build the command. Parsing never exits the process; commander's own
 * errors surface as CommanderError.
 */
export function createProgram(io: CliIO, onRun: (operands: string[], options: CliOptions) => Promise<void>): Command {
    const program = new Command()
        .name(APP_NAME)
        .description('Apply a unary or binary operation to a complex number.')
        .version(VERSION)
        .argument('[operands...]', 'primary operand (e.g. 2+3i), then the second operand for --pow and --log')
        .addOption(new Option('--batch', 'read primary operands from stdin, one per line').conflicts('input'))
        .addOption(new Option('--input <file>', 'read primary operands from a JSON array file'))
        .option('--json', 'print { re, im, magnitude, phase } for each result')
        .option('--precision <digits>', 'significant digits in the output', parsePrecision, DEFAULT_CONFIG.precision)
        .option('--verbose', 'log each calculation to stderr')
        .addHelpText('after', "\nUse -- before operands that start with '-', e.g. complex-calc --negate -- -2+3i")
        .exitOverride()
        .configureOutput({
            writeOut: (text) => io.out(text),
            writeErr: (text) => io.err(text),
        });

    for (const selector of SELECTORS) {
        program.addOption(
            new Option(`--${selector}`, SELECTOR_DESCRIPTIONS[selector]).conflicts(
                SELECTORS.filter((other) => other !== selector)
            )
        );
    }

    program.action(onRun);
    return program;
}

/**
 * Run the command against `argv` (without the node and script entries)
 * and resolve to the process exit status.
 */
export async function runCli(argv: readonly string[], io: CliIO = createProcessIO()): Promise<number> {
    let exitCode = 0;

    const program = createProgram(io, async (operands, options) => {
        exitCode = await execute(operands, options, io);
    });

    try {
        await program.parseAsync([...argv], { from: 'user' });
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode;
        }
        if (error instanceof CalculationError) {
            io.err(`error: ${error.message}\n`);
            return 1;
        }
        throw error;
    }

    return exitCode;
}
