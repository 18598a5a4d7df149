import type { Environment } from './environment';
import type { VerbTable } from './verb-table';
import type { ObjectId } from './types';

/**
 * Side-effect free predicates over the parser pointers held in the environment.
 * Meant to be composed inside routine conditionals.
 */
export class Dispatch {
    constructor(
        private readonly env: () => Environment,
        private readonly verbs: () => VerbTable
    ) {}

    /**
     * True when PRSA equals the tag of any of the given verb names.
     */
    verbMatches(...names: string[]): boolean {
        const action = this.env().getg('PRSA');
        const table = this.verbs();
        return names.some(name => table.verbTag(name) === action);
    }

    directObjectIs(...ids: ObjectId[]): boolean {
        return this.pointerIs('PRSO', ids);
    }

    indirectObjectIs(...ids: ObjectId[]): boolean {
        return this.pointerIs('PRSI', ids);
    }

    roomIs(...ids: ObjectId[]): boolean {
        return this.pointerIs('HERE', ids);
    }

    private pointerIs(name: string, ids: ObjectId[]): boolean {
        const current = this.env().getg(name);
        return typeof current === 'string' && ids.includes(current);
    }
}
