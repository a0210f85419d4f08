import { DuplicateObjectError, ObjectNotFoundError, ValidationError, describeValue } from '../Common/Errors.js';
import { MultiMatch, type MultiMatchOptions } from '../Common/Match.js';
import type { UniqueClass, UniqueObject } from '../Domain/UniqueObject.js';

/** Lookup key: a name, an id, or a `[name, id]` pair that must point at the same object. */
export type ObjectKey = string | number | readonly [string, number];

export interface RemoveOptions {
    /** Return undefined instead of raising when nothing matches. */
    soft?: boolean;
}

/**
 * In-memory index of the objects of one class within one context.
 * Objects are kept in insertion order and reachable by name and by id.
 */
export class UniqueObjectIndex {
    public readonly cls: UniqueClass;
    public readonly context: string;
    private _byId: Map<number, UniqueObject> = new Map(); // id -> object, insertion ordered
    private _idByName: Map<string, number> = new Map(); // name -> id
    private _highestId: number | undefined; // high-water mark, survives removals

    constructor(cls: UniqueClass, context: string) {
        this.cls = cls;
        this.context = context;
    }

    /** Number of indexed objects. */
    public get Size(): number {
        return this._byId.size;
    }

    /**
     * Raises DuplicateObjectError if obj cannot be added. Nothing is modified.
     */
    public CheckAdd(obj: UniqueObject): void {
        if (this._idByName.has(obj.name)) {
            throw new DuplicateObjectError(
                `${this.cls.name} with name '${obj.name}' already exists in context '${this.context}'`,
                { className: this.cls.name, context: this.context, name: obj.name },
            );
        }
        if (this._byId.has(obj.id)) {
            throw new DuplicateObjectError(
                `${this.cls.name} with id ${obj.id} already exists in context '${this.context}'`,
                { className: this.cls.name, context: this.context, id: obj.id },
            );
        }
    }

    /**
     * Adds obj after checking name and id uniqueness.
     * @throws DuplicateObjectError when the name or id is taken
     */
    public Add(obj: UniqueObject): void {
        this.CheckAdd(obj);
        this._byId.set(obj.id, obj);
        this._idByName.set(obj.name, obj.id);
        this._highestId = this._highestId === undefined ? obj.id : Math.max(this._highestId, obj.id);
    }

    /**
     * Next id for auto-assignment: one above the highest id ever added, or start for an index that
     * never held an object (or was cleared).
     */
    public NextId(start: number): number {
        return this._highestId === undefined ? start : Math.max(start, this._highestId + 1);
    }

    /**
     * Resolves a key without raising.
     */
    public Find(key: ObjectKey): UniqueObject | undefined {
        if (typeof key === `string`) {
            const id = this._idByName.get(key);
            return id === undefined ? undefined : this._byId.get(id);
        }
        if (typeof key === `number`) {
            return this._byId.get(key);
        }
        if (IsPair(key)) {
            const [name, id] = key;
            const byName = this.Find(name);
            return byName !== undefined && byName.id === id ? byName : undefined;
        }
        throw new ValidationError(`invalid lookup key: ${describeValue(key)}`, { kind: `type` });
    }

    /**
     * Returns the object for a name, id or `[name, id]` pair.
     * @throws ObjectNotFoundError when nothing matches
     * @example
     * index.Get('pt'); index.Get(3); index.Get(['pt', 3]);
     */
    public Get(key: ObjectKey): UniqueObject {
        const found = this.Find(key);

        if (!found) {
            throw new ObjectNotFoundError(
                `no ${this.cls.name} ${describeValue(key)} in context '${this.context}'`,
                { className: this.cls.name, context: this.context, key },
            );
        }
        return found;
    }

    /** First object in insertion order; default (when given) for an empty index. */
    public GetFirst(): UniqueObject;
    public GetFirst<D>(defaultValue: D): UniqueObject | D;
    public GetFirst<D>(...defaultValue: [D] | []): UniqueObject | D {
        const first = this._byId.values().next();

        if (!first.done) {
            return first.value;
        }
        return this._emptyResult(`first`, defaultValue);
    }

    /** Last object in insertion order; default (when given) for an empty index. */
    public GetLast(): UniqueObject;
    public GetLast<D>(defaultValue: D): UniqueObject | D;
    public GetLast<D>(...defaultValue: [D] | []): UniqueObject | D {
        const values = this.Values();

        if (values.length > 0) {
            return values[values.length - 1];
        }
        return this._emptyResult(`last`, defaultValue);
    }

    private _emptyResult<D>(which: string, defaultValue: [D] | []): D {
        if (defaultValue.length === 1) {
            return defaultValue[0];
        }
        throw new ObjectNotFoundError(
            `cannot get ${which} ${this.cls.name}, context '${this.context}' is empty`,
            { className: this.cls.name, context: this.context },
        );
    }

    /** Whether the index holds the object itself, or an object with that name, id or pair. */
    public Has(target: ObjectKey | UniqueObject): boolean {
        if (IsKey(target)) {
            return this.Find(target) !== undefined;
        }
        return this._byId.get(target.id) === target;
    }

    /**
     * Removes an object by key or reference.
     * @throws ObjectNotFoundError when nothing matches and soft is not set
     */
    public Remove(target: ObjectKey | UniqueObject): UniqueObject;
    public Remove(target: ObjectKey | UniqueObject, options: RemoveOptions): UniqueObject | undefined;
    public Remove(target: ObjectKey | UniqueObject, options: RemoveOptions = {}): UniqueObject | undefined {
        const found = IsKey(target) ? this.Find(target) : this.Has(target) ? target : undefined;

        if (!found) {
            if (options.soft) {
                return undefined;
            }
            throw new ObjectNotFoundError(
                `cannot remove ${this.cls.name} ${IsKey(target) ? describeValue(target) : `'${target.name}'`}` +
                ` from context '${this.context}', not registered`,
                { className: this.cls.name, context: this.context },
            );
        }
        this._byId.delete(found.id);
        this._idByName.delete(found.name);
        return found;
    }

    /** Snapshot of names in insertion order. */
    public Names(): string[] {
        return this.Values().map(obj => obj.name);
    }

    /** Snapshot of ids in insertion order. */
    public Ids(): number[] {
        return [...this._byId.keys()];
    }

    /** Snapshot of objects in insertion order. */
    public Values(): UniqueObject[] {
        return [...this._byId.values()];
    }

    /**
     * Objects whose name matches the patterns.
     * @example
     * index.Match(['jet*', 'muon_pt']);
     * index.Match('^mu', { dialect: 'regex' });
     */
    public Match(patterns: string | readonly string[], options: MultiMatchOptions = {}): UniqueObject[] {
        return this.Values().filter(obj => MultiMatch(obj.name, patterns, options));
    }

    /**
     * Drops all objects and resets auto-id numbering.
     * @returns UniqueObject[] - The objects that were indexed
     */
    public Clear(): UniqueObject[] {
        const removed = this.Values();
        this._byId.clear();
        this._idByName.clear();
        this._highestId = undefined;
        return removed;
    }
}

function IsPair(key: unknown): key is readonly [string, number] {
    return Array.isArray(key) && key.length === 2 && typeof key[0] === `string` && typeof key[1] === `number`;
}

function IsKey(target: ObjectKey | UniqueObject): target is ObjectKey {
    return typeof target === `string` || typeof target === `number` || Array.isArray(target);
}
