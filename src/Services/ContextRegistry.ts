import { CreateConfig } from '../Config.js';
import { ConfigurationError, ObjectNotFoundError, describeValue } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { EVENT_NAMES } from '../Domain/Utility.js';
import type { UniqueClass, UniqueObject } from '../Domain/UniqueObject.js';
import { RegistryEventBus } from '../Events/RegistryEventBus.js';
import { UniqueObjectIndex } from '../Repository/UniqueObjectIndex.js';
import type { FrameworkConfig } from '../Types/Config.js';

const SOURCE = `ContextRegistry`;

/**
 * ContextRegistry owns every uniqueness scope: `context name -> class -> index`.
 * Indexes are created lazily on first registration and only go away through ClearContext,
 * RemoveContext or Clear.
 *
 * Not thread-safe; callers that share a registry across workers must serialise access.
 *
 * @example
 * const registry = new ContextRegistry({ defaultContext: 'analysis' });
 * const pt = new Variable({ name: 'pt', registry });
 * registry.Index(Variable, 'analysis')?.Get('pt') === pt; // true
 */
export class ContextRegistry {
    public readonly Events: RegistryEventBus = new RegistryEventBus();
    private readonly _config: FrameworkConfig;
    private _contexts: Map<string, Map<UniqueClass, UniqueObjectIndex>> = new Map(); // context -> class -> index

    /**
     * @param config Partial<FrameworkConfig> - Settings; missing keys use the framework defaults
     * @throws ConfigurationError when a setting is invalid
     */
    constructor(config: Partial<FrameworkConfig> = {}) {
        this._config = CreateConfig(config);
    }

    public get DefaultContext(): string {
        return this._config.defaultContext;
    }

    public get AutoIdStart(): number {
        return this._config.autoIdStart;
    }

    /**
     * Normalises a context argument to a non-empty, duplicate-free list.
     * @param context string | string[] | undefined - undefined means the default context
     * @throws ConfigurationError for empty lists, empty names and non-strings
     */
    public ResolveContexts(context?: string | readonly string[]): string[] {
        if (context === undefined) {
            return [this.DefaultContext];
        }
        const names: readonly unknown[] = typeof context === `string` ? [context] : context;

        if (!Array.isArray(names) || names.length === 0) {
            throw new ConfigurationError(`invalid context: ${describeValue(context)}`, { context });
        }
        const resolved: string[] = [];

        for (const name of names) {
            if (typeof name !== `string` || name.length === 0) {
                throw new ConfigurationError(`invalid context name: ${describeValue(name)}`, { context });
            }
            if (!resolved.includes(name)) {
                resolved.push(name);
            }
        }
        return resolved;
    }

    /** Index of cls in context, if one was created. */
    public Index(cls: UniqueClass, context: string = this.DefaultContext): UniqueObjectIndex | undefined {
        return this._contexts.get(context)?.get(cls);
    }

    /** Index of cls in context, created when missing. */
    public EnsureIndex(cls: UniqueClass, context: string = this.DefaultContext): UniqueObjectIndex {
        let byClass = this._contexts.get(context);

        if (!byClass) {
            byClass = new Map();
            this._contexts.set(context, byClass);
        }
        let index = byClass.get(cls);

        if (!index) {
            index = new UniqueObjectIndex(cls, context);
            byClass.set(cls, index);
            log.debug(`Created index for ${cls.name}`, SOURCE, context);
        }
        return index;
    }

    /** All indexes of a context, one per class seen there. */
    public Indexes(context: string = this.DefaultContext): UniqueObjectIndex[] {
        return [...(this._contexts.get(context)?.values() ?? [])];
    }

    /** Names of all known contexts in creation order. */
    public Contexts(): string[] {
        return [...this._contexts.keys()];
    }

    public HasContext(context: string): boolean {
        return this._contexts.has(context);
    }

    /**
     * Next auto id for cls across the given contexts: the largest per-index next id, so the new
     * id is free in every one of them.
     */
    public NextId(cls: UniqueClass, contexts: readonly string[]): number {
        return contexts.reduce(
            (next, context) => Math.max(next, this.Index(cls, context)?.NextId(this.AutoIdStart) ?? this.AutoIdStart),
            this.AutoIdStart,
        );
    }

    /**
     * Registers obj in every context, or in none. Listeners are notified once every index holds
     * the object.
     * @throws DuplicateObjectError when the name or id is taken in any of the contexts
     */
    public Register(obj: UniqueObject, contexts: string | readonly string[]): void {
        const targets = this.ResolveContexts(contexts);

        for (const context of targets) {
            this.Index(obj.uniqueClass, context)?.CheckAdd(obj);
        }
        for (const context of targets) {
            this.EnsureIndex(obj.uniqueClass, context).Add(obj);
            log.debug(`Registered ${obj.uniqueClass.name} '${obj.name}' (id ${obj.id})`, SOURCE, context);
        }
        for (const context of targets) {
            this.Events.Emit(EVENT_NAMES.objectRegistered, this._payload(obj, context));
        }
    }

    /**
     * Removes obj from every context, or from none. Listeners are notified once every index has
     * dropped the object.
     * @throws ObjectNotFoundError when obj is missing from any of the contexts
     */
    public Unregister(obj: UniqueObject, contexts: string | readonly string[]): void {
        const targets = this.ResolveContexts(contexts);
        const indexes = targets.map(context => {
            const index = this.Index(obj.uniqueClass, context);

            if (!index?.Has(obj)) {
                throw new ObjectNotFoundError(
                    `${obj.uniqueClass.name} '${obj.name}' is not registered in context '${context}'`,
                    { className: obj.uniqueClass.name, name: obj.name, context },
                );
            }
            return index;
        });

        for (const index of indexes) {
            index.Remove(obj);
            log.debug(`Removed ${obj.uniqueClass.name} '${obj.name}' (id ${obj.id})`, SOURCE, index.context);
        }
        for (const context of targets) {
            this.Events.Emit(EVENT_NAMES.objectRemoved, this._payload(obj, context));
        }
    }

    /**
     * Empties every index of a context and resets its id numbering. The context stays known.
     * @returns number - Number of objects removed
     */
    public ClearContext(context: string): number {
        const removed = this.Indexes(context).reduce((count, index) => count + index.Clear().length, 0);

        if (this._contexts.has(context)) {
            log.info(`Cleared context (${removed} objects)`, SOURCE, context);
            this.Events.Emit(EVENT_NAMES.contextCleared, { context, removed });
        }
        return removed;
    }

    /**
     * Empties and forgets a context.
     * @throws ObjectNotFoundError when the context is unknown
     */
    public RemoveContext(context: string): number {
        if (!this._contexts.has(context)) {
            throw new ObjectNotFoundError(`unknown context '${context}'`, { context });
        }
        const removed = this.Indexes(context).reduce((count, index) => count + index.Clear().length, 0);
        this._contexts.delete(context);
        log.info(`Removed context (${removed} objects)`, SOURCE, context);
        this.Events.Emit(EVENT_NAMES.contextRemoved, { context, removed });
        return removed;
    }

    /** Removes every context. */
    public Clear(): void {
        for (const context of this.Contexts()) {
            this.RemoveContext(context);
        }
    }

    private _payload(obj: UniqueObject, context: string) {
        return { className: obj.uniqueClass.name, name: obj.name, id: obj.id, context };
    }
}

/** Process-wide registry used when an object is created without an explicit one. */
export const DEFAULT_REGISTRY = new ContextRegistry();
