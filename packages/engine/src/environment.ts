import { ENGINE_RESERVED_GLOBALS } from './globals';
import type { GlobalValue } from './types';

/**
 * The global variable environment: one untyped mapping from names to values,
 * seeded with the engine's reserved slots.
 */
export class Environment {
    private values: Map<string, GlobalValue> = new Map();
    private readonly overrides: Record<string, GlobalValue>;

    constructor(overrides: Record<string, GlobalValue> = {}) {
        this.overrides = { ...overrides };
        this.reset();
    }

    /**
     * Wipe every value and re-seed the reserved names.
     */
    reset(): void {
        const seeded = new Map<string, GlobalValue>(ENGINE_RESERVED_GLOBALS);
        for (const [name, value] of Object.entries(this.overrides)) {
            seeded.set(name, value);
        }
        this.values = seeded;
    }

    setg(name: string, value: GlobalValue): void {
        this.values.set(name, value);
    }

    getg(name: string): GlobalValue | undefined {
        return this.values.get(name);
    }

    has(name: string): boolean {
        return this.values.has(name);
    }

    names(): string[] {
        return Array.from(this.values.keys());
    }
}
