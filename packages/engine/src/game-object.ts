import { z } from 'zod';
import type { ActionHandler, FlagId, ObjectConfig, ObjectId, ObjectRef, PropertyValue } from './types';

const propertyValueSchema = z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.object({ ref: z.string().min(1) })
]);

/**
 * Reference another object from a property or global.
 */
export function ref(id: ObjectId): ObjectRef {
    return { ref: id };
}

export function isObjectRef(value: unknown): value is ObjectRef {
    return typeof value === 'object' && value !== null && 'ref' in value && typeof value.ref === 'string';
}

/**
 * Validates the options an author passes when defining an object.
 */
export const objectConfigSchema = z.object({
    parent: z.string().min(1).nullable().optional(),
    desc: z.string().optional(),
    ldesc: z.string().optional(),
    fdesc: z.string().optional(),
    synonyms: z.array(z.string()).optional(),
    adjectives: z.array(z.string()).optional(),
    flags: z.array(z.string().min(1)).optional(),
    action: z.custom<ActionHandler>(value => typeof value === 'function', {
        message: 'action must be a function'
    }).optional(),
    size: z.number().nonnegative().default(0),
    properties: z.record(propertyValueSchema).optional()
});

/**
 * Runtime record of one object in the containment graph.
 * Descriptive fields are fixed at definition time; parent, flags and
 * properties change as the game runs.
 */
export class GameObject {
    private readonly _id: ObjectId;
    private readonly _desc?: string;
    private readonly _ldesc?: string;
    private readonly _fdesc?: string;
    private readonly _synonyms: string[];
    private readonly _adjectives: string[];
    private readonly _size: number;
    private readonly _action?: ActionHandler;
    private _parent: ObjectId | null;
    private readonly _flags: Set<FlagId>;
    private readonly _properties: Map<string, PropertyValue>;

    constructor(id: ObjectId, config: ObjectConfig = {}) {
        const data = objectConfigSchema.parse(config);
        this._id = id;
        this._desc = data.desc;
        this._ldesc = data.ldesc;
        this._fdesc = data.fdesc;
        this._synonyms = data.synonyms ? [...data.synonyms] : [];
        this._adjectives = data.adjectives ? [...data.adjectives] : [];
        this._size = data.size;
        this._action = data.action;
        this._parent = data.parent ?? null;
        this._flags = new Set(data.flags ?? []);
        this._properties = new Map(Object.entries(data.properties ?? {}));
    }

    get id(): ObjectId { return this._id; }
    get desc(): string | undefined { return this._desc; }
    get ldesc(): string | undefined { return this._ldesc; }
    get fdesc(): string | undefined { return this._fdesc; }
    get synonyms(): string[] { return [...this._synonyms]; }
    get adjectives(): string[] { return [...this._adjectives]; }
    get size(): number { return this._size; }
    get action(): ActionHandler | undefined { return this._action; }
    get parent(): ObjectId | null { return this._parent; }
    get flags(): FlagId[] { return Array.from(this._flags); }

    /**
     * Printable name: the short description, or the id when none is set.
     */
    get name(): string {
        return this._desc ?? this._id;
    }

    /**
     * Only the object store calls this; it keeps the sibling lists in step.
     */
    reparent(parent: ObjectId | null): void {
        this._parent = parent;
    }

    hasFlag(flag: FlagId): boolean {
        return this._flags.has(flag);
    }

    setFlag(flag: FlagId): void {
        this._flags.add(flag);
    }

    clearFlag(flag: FlagId): void {
        this._flags.delete(flag);
    }

    getProperty(key: string): PropertyValue | undefined {
        return this._properties.get(key);
    }

    setProperty(key: string, value: PropertyValue): void {
        this._properties.set(key, value);
    }

    properties(): Record<string, PropertyValue> {
        return Object.fromEntries(this._properties);
    }
}
