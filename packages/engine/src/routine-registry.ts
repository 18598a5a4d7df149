import type { Routine } from './types';

/**
 * Registry that maps routine names to their callables.
 */
export class RoutineRegistry {
    private routines: Map<string, Routine> = new Map();

    /**
     * Register a routine. A second registration under the same name replaces the first.
     */
    registerRoutine(name: string, routine: Routine): void {
        this.routines.set(name, routine);
    }

    /**
     * Get a routine by name.
     */
    getRoutine(name: string): Routine | undefined {
        return this.routines.get(name);
    }

    /**
     * Check if a routine name is registered.
     */
    hasRoutine(name: string): boolean {
        return this.routines.has(name);
    }

    /**
     * Get all registered routine names.
     */
    routineNames(): string[] {
        return Array.from(this.routines.keys());
    }
}
