import type { GlobalValue, ObjectId } from './types';

export const PLAYER_ID: ObjectId = 'PLAYER';

/** Container is open; its contents are in scope from outside. */
export const OPENBIT = 'OPENBIT';
/** Container is see-through even when closed. */
export const TRANSBIT = 'TRANSBIT';

// Messages passed to room and object action handlers
export const M_LOOK = 'M-LOOK';
export const M_BEG = 'M-BEG';
export const M_END = 'M-END';
export const M_OBJECT = 'M-OBJECT';

export const DEATH_BANNER = '****  You have died  ****';
export const VICTORY_BANNER = '****  You have won  ****';

/**
 * Reserved environment names and the value each holds after a reset.
 * `LOAD-MAX` and `LOAD-ALLOWED` are overridden from configuration.
 */
export const ENGINE_RESERVED_GLOBALS: ReadonlyArray<readonly [name: string, value: GlobalValue]> = [
    ['PRSO', null],
    ['PRSI', null],
    ['PRSA', null],
    ['WINNER', PLAYER_ID],
    ['HERE', null],
    ['PLAYER', PLAYER_ID],
    ['SCORE', 0],
    ['MOVES', 0],
    ['VERBOSE', false],
    ['SUPER-BRIEF', false],
    ['WON-FLAG', false],
    ['DEAD-FLAG', false],
    ['P-CONT', null],
    ['QUOTE-FLAG', false],
    ['P-OFLAG', null],
    ['LOAD-MAX', 100],
    ['LOAD-ALLOWED', 100]
];
