import { AuthoringError, type DiagnosticReporter } from './errors';
import type { ObjectId, OutputSink } from './types';

/** Line break. */
export const CR = Symbol('CR');
/** Description of the object id that follows. */
export const D = Symbol('D');
/** Decimal rendering of the number that follows. */
export const N = Symbol('N');
/** The value that follows, as a single character (a code point for numbers). */
export const C = Symbol('C');

export type Directive = typeof CR | typeof D | typeof N | typeof C;

export type OutputToken = Directive | string | number | boolean | bigint | null | undefined;

export interface RenderOptions {
    /**
     * Printable description of an object id, if the object has one.
     */
    describe?: (id: ObjectId) => string | undefined;
    report?: DiagnosticReporter;
}

const DIRECTIVE_NAMES: Record<Exclude<Directive, typeof CR>, string> = {
    [D]: 'D',
    [N]: 'N',
    [C]: 'C'
};

/**
 * Collects everything written to it. Used by tests and simple hosts.
 */
export class BufferSink implements OutputSink {
    private chunks: string[] = [];

    write(text: string): void {
        this.chunks.push(text);
    }

    get text(): string {
        return this.chunks.join('');
    }

    clear(): void {
        this.chunks = [];
    }
}

/**
 * Render a token stream left to right. `D`, `N` and `C` consume the next token;
 * a directive without a usable operand is reported and skipped. A directive
 * is never taken as an operand.
 */
export function renderTokens(tokens: readonly OutputToken[], sink: OutputSink, options: RenderOptions = {}): void {
    const report = options.report ?? (() => undefined);

    for (let i = 0; i < tokens.length; i++) {
        const token = tokens[i];

        if (token === CR) {
            sink.write('\n');
            continue;
        }
        if (token !== D && token !== N && token !== C) {
            sink.write(printable(token));
            continue;
        }

        const operand = tokens[i + 1];
        if (i + 1 >= tokens.length || isDirective(operand)) {
            const where = i + 1 >= tokens.length ? 'at end of output' : `before ${printable(operand)}`;
            report(new AuthoringError('malformed-output', `${DIRECTIVE_NAMES[token]} directive ${where} has no operand`));
            continue;
        }
        i++;

        if (token === D) {
            const id = printable(operand);
            sink.write(options.describe?.(id) ?? id);
        } else if (token === N) {
            const value = typeof operand === 'number' || typeof operand === 'bigint'
                ? operand
                : typeof operand === 'string' && operand.trim() !== '' ? Number(operand) : NaN;
            if (typeof value === 'number' && !Number.isFinite(value)) {
                report(new AuthoringError('malformed-output', `N directive expects a number, got ${printable(operand)}`));
                continue;
            }
            sink.write(value.toString());
        } else if (typeof operand === 'number') {
            if (!Number.isInteger(operand) || operand < 0 || operand > 0x10ffff) {
                report(new AuthoringError('malformed-output', `C directive expects a code point, got ${operand}`));
                continue;
            }
            sink.write(String.fromCodePoint(operand));
        } else {
            sink.write(Array.from(printable(operand))[0] ?? '');
        }
    }
}

function isDirective(token: OutputToken): token is Directive {
    return token === CR || token === D || token === N || token === C;
}

function printable(token: OutputToken): string {
    if (typeof token === 'symbol') {
        return token.description ?? '';
    }
    return String(token);
}
