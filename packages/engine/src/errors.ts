export type AuthoringErrorKind = 'malformed-output' | 'containment-cycle' | 'stray-exit';

/**
 * A bug in game content rather than in the engine. Reported and collected,
 * never fatal to the running game.
 */
export class AuthoringError extends Error {
    readonly kind: AuthoringErrorKind;

    constructor(kind: AuthoringErrorKind, message: string) {
        super(message);
        this.name = 'AuthoringError';
        this.kind = kind;
    }
}

export type DiagnosticReporter = (error: AuthoringError) => void;
