// Main Game class
export { Game, PROMPT } from './game';
export type { GameOptions, GameSetup } from './game';

// All TypeScript types
export type {
    ObjectId,
    FlagId,
    VerbTag,
    TerminationReason,
    ObjectRef,
    PropertyValue,
    GlobalValue,
    RoutineValue,
    ActionHandler,
    Routine,
    ObjectConfig,
    OutputSink,
    InputSource,
    ResolvedCommand,
    CommandResolver,
    TurnOutcome
} from './types';

// State containers
export { GameObject, objectConfigSchema, ref, isObjectRef } from './game-object';
export { ObjectStore } from './object-store';
export { Environment } from './environment';
export { VerbTable } from './verb-table';
export { RoutineRegistry } from './routine-registry';
export { Dispatch } from './dispatch';
export { Random } from './random';

// Output
export { renderTokens, BufferSink, CR, D, N, C } from './output';
export type { OutputToken, Directive, RenderOptions } from './output';

// Routine execution model
export {
    FATAL,
    ControlSignal,
    RoutineExit,
    GameTermination,
    isControlSignal,
    rtrue,
    rfalse,
    rfatal,
    rreturn,
    withBoundary,
    toRoutineValue,
    cond,
    equal
} from './routine';
export type { CondClause } from './routine';

// Errors
export { AuthoringError } from './errors';
export type { AuthoringErrorKind, DiagnosticReporter } from './errors';

// Reserved names, flags and messages
export {
    PLAYER_ID,
    OPENBIT,
    TRANSBIT,
    M_LOOK,
    M_BEG,
    M_END,
    M_OBJECT,
    DEATH_BANNER,
    VICTORY_BANNER,
    ENGINE_RESERVED_GLOBALS
} from './globals';

// Configuration and logging
export { loadConfig, LOG_LEVELS } from './config';
export type { EngineConfig, LogLevel } from './config';
export { logger, Logger } from './logger';
