import type { VerbTag } from './types';

/**
 * Maps author-facing verb names to the canonical action tags stored in PRSA.
 */
export class VerbTable {
    private verbs: Map<string, VerbTag> = new Map();

    /**
     * Register a verb name. Re-registering a name replaces its tag.
     */
    registerVerb(name: string, tag: VerbTag): void {
        this.verbs.set(name, tag);
    }

    /**
     * Resolve a verb name to its tag. Unregistered names stand for themselves.
     */
    verbTag(name: string): VerbTag {
        return this.verbs.get(name) ?? name;
    }

    hasVerb(name: string): boolean {
        return this.verbs.has(name);
    }

    /**
     * Get all registered verb names.
     */
    verbNames(): string[] {
        return Array.from(this.verbs.keys());
    }
}
