import type { Game } from './game';
import type { FATAL } from './routine';

export type ObjectId = string;
export type FlagId = string;
export type VerbTag = string;
export type TerminationReason = 'died' | 'won';

/**
 * Reference to another object stored inside a property or global.
 */
export interface ObjectRef {
    readonly ref: ObjectId;
}

/**
 * Author-extensible property value. Objects are referenced, never embedded.
 */
export type PropertyValue = string | number | boolean | ObjectRef;

export type GlobalValue = PropertyValue | null;

/**
 * What a routine or action handler may yield. `FATAL` is the third signalling
 * value next to true and false.
 */
export type RoutineValue = GlobalValue | typeof FATAL | undefined;

/**
 * Event hook on a room or object. Receives a message such as `M-LOOK`.
 * Runs inside its own routine boundary, so it may call `rtrue()` and friends.
 */
export type ActionHandler = (message: string, game: Game) => unknown;

/**
 * Routines may return anything; results outside `RoutineValue` read as `undefined`.
 */
export type Routine = (game: Game, ...args: GlobalValue[]) => unknown;

/**
 * Options accepted by `ObjectStore.define`.
 */
export interface ObjectConfig {
    parent?: ObjectId | null;
    desc?: string;
    ldesc?: string;
    fdesc?: string;
    synonyms?: string[];
    adjectives?: string[];
    flags?: FlagId[];
    action?: ActionHandler;
    size?: number;
    properties?: Record<string, PropertyValue>;
}

export interface OutputSink {
    write(text: string): void;
}

/**
 * Host-owned line source. `null` means the input is exhausted.
 */
export interface InputSource {
    readLine(prompt: string): string | null | Promise<string | null>;
}

/**
 * A player command after the host has resolved words to a verb and objects.
 */
export interface ResolvedCommand {
    verb: string;
    direct?: ObjectId | null;
    indirect?: ObjectId | null;
}

export type CommandResolver = (line: string, game: Game) => ResolvedCommand | null;

export type TurnOutcome =
    | { status: 'continue'; handled: RoutineValue }
    | { status: 'ended'; reason: TerminationReason };
