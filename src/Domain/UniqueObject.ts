/**
 * Identity core: every UniqueObject carries an immutable (name, id) pair and is registered in one
 * or more contexts of a ContextRegistry on construction.
 */
import Joi from 'joi';
import { ObjectNotFoundError, ValidationError, describeValue } from '../Common/Errors.js';
import type { MultiMatchOptions } from '../Common/Match.js';
import { SchemaParser, TypedProperty } from '../Common/TypedProperty.js';
import type { ObjectKey, UniqueObjectIndex } from '../Repository/UniqueObjectIndex.js';
import { ContextRegistry, DEFAULT_REGISTRY } from '../Services/ContextRegistry.js';

/** Id marker requesting the next unused id of the class in the target contexts. */
export const AUTO_ID = `+`;
export type AutoId = typeof AUTO_ID;

/** Any UniqueObject class, used as the per-class key of registry indexes. */
export type UniqueClass<T extends UniqueObject = UniqueObject> = abstract new (...args: never[]) => T;

export interface UniqueObjectOptions {
    /** Non-empty, immutable name. */
    name: string;
    /** Non-negative integer, or AUTO_ID (default). */
    id?: number | AutoId;
    /** One context name or several; default is the registry's default context. */
    context?: string | readonly string[];
    /** Registry to join; default is DEFAULT_REGISTRY. */
    registry?: ContextRegistry;
}

/** Where a class-level lookup searches. */
export interface LookupOptions {
    context?: string;
    registry?: ContextRegistry;
}

const nameProperty = new TypedProperty<string, UniqueObject>(
    `name`,
    SchemaParser(`name`, Joi.string().min(1)),
    { setter: false, deleter: false },
);

const parseExplicitId = SchemaParser(`id`, Joi.number().strict().integer().min(0));

const idProperty = new TypedProperty<number, UniqueObject>(
    `id`,
    (owner, raw) => (raw === AUTO_ID ? owner.registry.NextId(owner.uniqueClass, owner.contexts) : parseExplicitId(owner, raw)),
    { setter: false, deleter: false },
);

function LookupIndex(cls: UniqueClass, options: LookupOptions): UniqueObjectIndex | undefined {
    const registry = options.registry ?? DEFAULT_REGISTRY;
    return registry.Index(cls, options.context ?? registry.DefaultContext);
}

/**
 * Base class of identity-bearing entities.
 *
 * Uniqueness is per (class, context): two objects of the same class may not share a name or an id
 * in one context, while different contexts number their objects independently. Registration is
 * all-or-nothing across the requested contexts.
 *
 * @example
 * const a = new UniqueObject({ name: 'a' }); // id 0 in 'default'
 * const b = new UniqueObject({ name: 'b', context: ['default', 'study'] }); // id 1 in both
 * UniqueObject.Get('b', { context: 'study' }) === b; // true
 */
export class UniqueObject {
    /** Exact class the object was constructed as; selects the registry index. */
    public readonly uniqueClass: UniqueClass;
    public readonly registry: ContextRegistry;
    /** Contexts requested at construction. */
    public readonly contexts: readonly string[];

    /**
     * Whether the base constructor registers the object. Entities with fields of their own turn it
     * off and call Register() once those fields are set, so a rejected field leaves the registry
     * untouched and listeners never see a half-built object.
     */
    protected static readonly registerOnConstruction: boolean = true;

    /**
     * @throws ValidationError for an empty or non-string name, or an invalid id
     * @throws ConfigurationError for invalid context names
     * @throws DuplicateObjectError when the name or id is taken in one of the contexts
     */
    constructor(options: UniqueObjectOptions) {
        this.uniqueClass = new.target;
        this.registry = options.registry ?? DEFAULT_REGISTRY;
        this.contexts = Object.freeze(this.registry.ResolveContexts(options.context));
        nameProperty.Init(this, options.name);
        idProperty.Init(this, options.id ?? AUTO_ID);

        if (new.target.registerOnConstruction) {
            this.Register();
        }
    }

    public get name(): string {
        return nameProperty.Get(this);
    }

    public get id(): number {
        return idProperty.Get(this);
    }

    /** The first requested context, the one used when a single context is needed. */
    public get context(): string {
        return this.contexts[0];
    }

    /** Contexts the object is still registered in. */
    public RegisteredContexts(): string[] {
        return this.contexts.filter(context => this.registry.Index(this.uniqueClass, context)?.Has(this) ?? false);
    }

    /** Whether the object is registered in context, or in any of its contexts when omitted. */
    public IsRegistered(context?: string): boolean {
        if (context === undefined) {
            return this.RegisteredContexts().length > 0;
        }
        return this.registry.Index(this.uniqueClass, context)?.Has(this) ?? false;
    }

    /**
     * Unregisters the object. The instance stays usable but is no longer found by lookups.
     * @param context string | string[] - Contexts to leave; default is every context still holding it,
     * which does nothing once the object is gone from all of them
     * @throws ObjectNotFoundError when the object is missing from a requested context (nothing is removed)
     */
    public Remove(context?: string | readonly string[]): void {
        if (context !== undefined) {
            this.registry.Unregister(this, context);
            return;
        }
        const remaining = this.RegisteredContexts();

        if (remaining.length > 0) {
            this.registry.Unregister(this, remaining);
        }
    }

    /** Same class, same id, and at least one context in common. */
    public Equals(other: unknown): boolean {
        if (!(other instanceof UniqueObject)) {
            return false;
        }
        return other.uniqueClass === this.uniqueClass
            && other.registry === this.registry
            && other.id === this.id
            && other.contexts.some(context => this.contexts.includes(context));
    }

    public toString(): string {
        return `${this.uniqueClass.name}(name=${this.name}, id=${this.id}, context=${this.contexts.join(`,`)})`;
    }

    /**
     * Registers the object in every requested context, or in none.
     * @throws DuplicateObjectError when the name or id is taken in one of the contexts
     */
    protected Register(): void {
        this.registry.Register(this, this.contexts);
    }

    /**
     * Looks up an object of the calling class.
     * @throws ObjectNotFoundError when nothing matches
     * @example
     * const pt = Variable.Get('pt');
     * const sameVar = Variable.Get(['pt', 0], { context: 'default' });
     */
    public static Get<T extends UniqueObject>(this: UniqueClass<T>, key: ObjectKey, options: LookupOptions = {}): T {
        const found = LookupIndex(this, options)?.Find(key);

        if (found instanceof this) {
            return found;
        }
        throw new ObjectNotFoundError(
            `no ${this.name} ${describeValue(key)} in context '${options.context ?? (options.registry ?? DEFAULT_REGISTRY).DefaultContext}'`,
            { className: this.name, key },
        );
    }

    /** Index of the calling class in the lookup context, if any object was ever registered there. */
    public static Index(this: UniqueClass, options: LookupOptions = {}): UniqueObjectIndex | undefined {
        return LookupIndex(this, options);
    }

    /** Whether an object of the calling class matches key. */
    public static Has<T extends UniqueObject>(this: UniqueClass<T>, key: ObjectKey, options: LookupOptions = {}): boolean {
        return LookupIndex(this, options)?.Has(key) ?? false;
    }

    /** All objects of the calling class in insertion order. */
    public static Values<T extends UniqueObject>(this: UniqueClass<T>, options: LookupOptions = {}): T[] {
        return (LookupIndex(this, options)?.Values() ?? []).filter((obj): obj is T => obj instanceof this);
    }

    /** Objects of the calling class whose name matches the patterns. */
    public static Match<T extends UniqueObject>(
        this: UniqueClass<T>,
        patterns: string | readonly string[],
        options: LookupOptions & MultiMatchOptions = {},
    ): T[] {
        return (LookupIndex(this, options)?.Match(patterns, options) ?? []).filter((obj): obj is T => obj instanceof this);
    }
}

/**
 * Narrows a copy draft to options with a name, as entity constructors require.
 * @throws ValidationError when no name was copied, derived or given
 */
export function RequireName<T extends { name?: unknown }>(draft: T): T & { name: string } {
    const name = draft.name;

    if (typeof name !== `string`) {
        throw new ValidationError(`copy needs a name, got ${describeValue(name)}`, { property: `name`, kind: `type` });
    }
    return { ...draft, name };
}
