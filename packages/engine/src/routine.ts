import { isDeepStrictEqual } from 'node:util';
import { isObjectRef } from './game-object';
import type { RoutineValue, TerminationReason } from './types';

/**
 * Distinct third return value for unusual routine outcomes.
 */
export const FATAL = Symbol('FATAL');

/**
 * Base of the non-local control signals. Deliberately not an `Error`:
 * a signal is how routines and games end, not a failure.
 */
export abstract class ControlSignal {
    abstract readonly kind: 'routine-exit' | 'termination';
}

/**
 * Unwinds to the nearest routine invocation boundary carrying the routine's result.
 */
export class RoutineExit extends ControlSignal {
    readonly kind = 'routine-exit';

    constructor(readonly value: RoutineValue) {
        super();
    }
}

/**
 * Unwinds past every routine boundary to the game loop.
 */
export class GameTermination extends ControlSignal {
    readonly kind = 'termination';

    constructor(readonly reason: TerminationReason) {
        super();
    }
}

export function isControlSignal(value: unknown): value is ControlSignal {
    return value instanceof ControlSignal;
}

export function rtrue(): never {
    throw new RoutineExit(true);
}

export function rfalse(): never {
    throw new RoutineExit(false);
}

export function rfatal(): never {
    throw new RoutineExit(FATAL);
}

export function rreturn(value: RoutineValue): never {
    throw new RoutineExit(value);
}

/**
 * Run `fn` inside a routine boundary. A `RoutineExit` raised anywhere below
 * becomes the result; every other throwable keeps propagating.
 */
export function withBoundary<A extends unknown[]>(
    fn: (...args: A) => unknown,
    ...args: A
): RoutineValue {
    try {
        return toRoutineValue(fn(...args));
    } catch (signal) {
        if (signal instanceof RoutineExit) {
            return signal.value;
        }
        throw signal;
    }
}

export function toRoutineValue(value: unknown): RoutineValue {
    if (value === null) return null;
    if (value === FATAL) return FATAL;
    switch (typeof value) {
        case 'string':
        case 'number':
        case 'boolean':
            return value;
        default:
            return isObjectRef(value) ? value : undefined;
    }
}

/**
 * A COND clause: a test alone yields the test's value when it passes,
 * a test with a body yields the body's value.
 */
export type CondClause<T> =
    | readonly [test: () => T | false | null | undefined]
    | readonly [test: () => unknown, body: () => T];

/**
 * First-match-wins branching. Returns `false` when no clause matches.
 */
export function cond<T>(...clauses: CondClause<T>[]): T | false {
    for (const clause of clauses) {
        if (clause.length === 2) {
            if (clause[0]()) return clause[1]();
            continue;
        }
        const outcome = clause[0]();
        if (outcome) return outcome;
    }
    return false;
}

/**
 * True when every value is structurally equal to the first.
 */
export function equal(...values: unknown[]): boolean {
    if (values.length < 2) return true;
    const [first, ...rest] = values;
    return rest.every(value => isDeepStrictEqual(first, value));
}
