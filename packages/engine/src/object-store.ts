import { GameObject } from './game-object';
import { AuthoringError, type DiagnosticReporter } from './errors';
import { OPENBIT, TRANSBIT } from './globals';
import { logger } from './logger';
import type { FlagId, ObjectConfig, ObjectId, PropertyValue } from './types';

/**
 * Registry of every object plus the containment graph between them.
 * Containment is stored by identity; each container keeps an
 * insertion-ordered list of its contents so sibling traversal is stable.
 */
export class ObjectStore {
    private records: Map<ObjectId, GameObject> = new Map();
    private contents: Map<ObjectId | null, ObjectId[]> = new Map();
    private readonly report: DiagnosticReporter;

    constructor(report: DiagnosticReporter = () => undefined) {
        this.report = report;
    }

    /**
     * Create or replace the record for `id`. Replacing is allowed during setup.
     */
    define(id: ObjectId, config: ObjectConfig = {}): GameObject {
        const record = new GameObject(id, config);
        const previous = this.records.get(id);
        if (previous) {
            logger.debug(`[ObjectStore] Redefining ${id}`);
            this.detach(id, previous.parent);
        }
        this.records.set(id, record);

        const parent = record.parent;
        if (parent !== null && this.wouldCycle(id, parent)) {
            this.reportCycle(id, parent);
            record.reparent(null);
        }
        this.attach(id, record.parent);
        return record;
    }

    get(id: ObjectId): GameObject | undefined {
        return this.records.get(id);
    }

    has(id: ObjectId): boolean {
        return this.records.has(id);
    }

    /**
     * Every defined id in definition order.
     */
    ids(): ObjectId[] {
        return Array.from(this.records.keys());
    }

    parent(id: ObjectId): ObjectId | null {
        return this.records.get(id)?.parent ?? null;
    }

    /**
     * Walk `levels` containment steps upward. A shorter chain yields the
     * last ancestor reached; no parent at all yields `null`.
     */
    locate(id: ObjectId, levels: number = 1): ObjectId | null {
        let current = this.parent(id);
        if (current === null) return null;

        const seen = new Set<ObjectId>([id, current]);
        for (let step = 1; step < levels; step++) {
            const up = this.parent(current);
            if (up === null || seen.has(up)) break;
            seen.add(up);
            current = up;
        }
        return current;
    }

    /**
     * Reparent `id`. Refuses, with a `containment-cycle` diagnostic, a move
     * that would put an object inside itself. Moving to the current parent
     * keeps the sibling order. Returns whether the object ends up in `newParent`.
     */
    move(id: ObjectId, newParent: ObjectId | null): boolean {
        const record = this.records.get(id);
        if (!record) {
            logger.debug(`[ObjectStore] move: unknown object ${id}`);
            return false;
        }
        if (record.parent === newParent) return true;
        if (newParent !== null && this.wouldCycle(id, newParent)) {
            this.reportCycle(id, newParent);
            return false;
        }

        this.detach(id, record.parent);
        record.reparent(newParent);
        this.attach(id, newParent);
        return true;
    }

    remove(id: ObjectId): boolean {
        return this.move(id, null);
    }

    hasFlag(id: ObjectId, flag: FlagId): boolean {
        return this.records.get(id)?.hasFlag(flag) ?? false;
    }

    setFlag(id: ObjectId, flag: FlagId): void {
        const record = this.records.get(id);
        if (!record) {
            logger.debug(`[ObjectStore] setFlag: unknown object ${id}`);
            return;
        }
        record.setFlag(flag);
    }

    clearFlag(id: ObjectId, flag: FlagId): void {
        this.records.get(id)?.clearFlag(flag);
    }

    getProperty(id: ObjectId, key: string): PropertyValue | undefined;
    getProperty(id: ObjectId, key: string, fallback: PropertyValue): PropertyValue;
    getProperty(id: ObjectId, key: string, fallback?: PropertyValue): PropertyValue | undefined {
        return this.records.get(id)?.getProperty(key) ?? fallback;
    }

    setProperty(id: ObjectId, key: string, value: PropertyValue): void {
        const record = this.records.get(id);
        if (!record) {
            logger.debug(`[ObjectStore] setProperty: unknown object ${id}`);
            return;
        }
        record.setProperty(key, value);
    }

    /**
     * Contents of `parentId` in the order they were put there.
     * `null` lists the objects that have no container.
     */
    children(parentId: ObjectId | null): ObjectId[] {
        return [...(this.contents.get(parentId) ?? [])];
    }

    first(parentId: ObjectId | null): ObjectId | null {
        return this.contents.get(parentId)?.[0] ?? null;
    }

    next(id: ObjectId): ObjectId | null {
        const parent = this.parent(id);
        if (parent === null) return null;

        const siblings = this.contents.get(parent) ?? [];
        const index = siblings.indexOf(id);
        if (index < 0) return null;
        return siblings[index + 1] ?? null;
    }

    /**
     * In scope from `location` when directly inside it, or inside a container
     * that is itself directly inside it and is open or transparent.
     * Carried objects get no special treatment.
     */
    visible(id: ObjectId, location: ObjectId): boolean {
        const container = this.parent(id);
        if (container === null) return false;
        if (container === location) return true;

        return this.parent(container) === location
            && (this.hasFlag(container, OPENBIT) || this.hasFlag(container, TRANSBIT));
    }

    /**
     * True when `ancestor` appears anywhere above `id` in the containment chain.
     */
    isIn(id: ObjectId, ancestor: ObjectId): boolean {
        const seen = new Set<ObjectId>([id]);
        let current = this.parent(id);
        while (current !== null && !seen.has(current)) {
            if (current === ancestor) return true;
            seen.add(current);
            current = this.parent(current);
        }
        return false;
    }

    /**
     * Size of the object plus everything inside it.
     */
    weight(id: ObjectId): number {
        return this.weightOf(id, new Set());
    }

    private weightOf(id: ObjectId, seen: Set<ObjectId>): number {
        if (seen.has(id)) return 0;
        seen.add(id);

        let total = this.records.get(id)?.size ?? 0;
        for (const child of this.contents.get(id) ?? []) {
            total += this.weightOf(child, seen);
        }
        return total;
    }

    private wouldCycle(id: ObjectId, newParent: ObjectId): boolean {
        return newParent === id || this.isIn(newParent, id);
    }

    private reportCycle(id: ObjectId, newParent: ObjectId): void {
        this.report(new AuthoringError(
            'containment-cycle',
            `Cannot move ${id} into ${newParent}: ${newParent} is ${newParent === id ? 'the object itself' : `inside ${id}`}`
        ));
    }

    private attach(id: ObjectId, parent: ObjectId | null): void {
        const siblings = this.contents.get(parent);
        if (siblings) {
            siblings.push(id);
        } else {
            this.contents.set(parent, [id]);
        }
    }

    private detach(id: ObjectId, parent: ObjectId | null): void {
        const siblings = this.contents.get(parent);
        if (!siblings) return;
        const index = siblings.indexOf(id);
        if (index >= 0) {
            siblings.splice(index, 1);
        }
    }
}
