import { ValidationError, describeValue } from '../../Common/Errors.js';

/**
 * Runs before the copy is built. It receives the source and the draft options and may change the
 * draft in place, e.g. to derive a new name.
 */
export type CopyCallback<TSource, TOptions extends object> = (source: TSource, draft: Partial<TOptions>) => void;

/** Per-call copy settings. */
export interface CopyRequest<TSource, TOptions extends object> {
    /** Attributes deep-copied from the source; default is the class list. */
    attrs?: readonly (keyof TOptions)[];
    /** Callbacks run in order after copying; default is the class list. */
    callbacks?: readonly CopyCallback<TSource, TOptions>[];
    /** Values applied last, replacing copied or derived ones. */
    overrides?: Partial<TOptions>;
}

/** Class-level copy defaults and the way to read the source's current options. */
export interface CopyPlan<TSource, TOptions extends object> {
    attrs: readonly (keyof TOptions)[];
    callbacks: readonly CopyCallback<TSource, TOptions>[];
    snapshot: (source: TSource) => TOptions;
}

/** Capability of copyable objects. */
export interface Copyable<TSelf, TOptions extends object> {
    Copy(request?: CopyRequest<TSelf, TOptions>): TSelf;
    CopyAs<TTarget>(target: (draft: Partial<TOptions>) => TTarget, request?: CopyRequest<TSelf, TOptions>): TTarget;
}

/**
 * Builds the constructor options of a copy. Copied values are deep clones (see DeepClone), so
 * mutating the copy never reaches the source.
 * @throws ValidationError when a callback is not a function
 * @example
 * const draft = CopyDraft(variable, VARIABLE_COPY_PLAN, { overrides: { name: 'pt2' } });
 */
export function CopyDraft<TSource, TOptions extends object>(
    source: TSource,
    plan: CopyPlan<TSource, TOptions>,
    request: CopyRequest<TSource, TOptions> = {},
): Partial<TOptions> {
    const attrs = request.attrs ?? plan.attrs;
    const callbacks = request.callbacks ?? plan.callbacks;
    const overrides = request.overrides ?? {};
    const snapshot = plan.snapshot(source);
    const draft: Partial<TOptions> = {};

    for (const attr of attrs) {
        if (!(attr in overrides)) {
            draft[attr] = DeepClone(snapshot[attr]);
        }
    }
    for (const callback of callbacks) {
        if (typeof callback !== `function`) {
            throw new ValidationError(`invalid callback type: ${describeValue(callback)}`, { kind: `type` });
        }
        callback(source, draft);
    }
    return { ...draft, ...overrides };
}

/**
 * Recursive copy for arbitrary attribute values. Arrays, maps, sets, dates and regular expressions
 * are rebuilt; other objects are recreated on their own prototype with every own property copied,
 * so class instances keep their methods and getters. Functions and primitives are shared. Shared
 * and cyclic references are preserved.
 * @example
 * const aux = DeepClone(new Map([['style', new Style('red')]]));
 * aux.get('style') instanceof Style; // true
 */
export function DeepClone<T>(value: T): T;
export function DeepClone(value: unknown): unknown {
    return CloneValue(value, new WeakMap());
}

function CloneValue(value: unknown, copies: WeakMap<object, unknown>): unknown {
    if (typeof value !== `object` || value === null) {
        return value;
    }
    if (copies.has(value)) {
        return copies.get(value);
    }
    if (Array.isArray(value)) {
        const out: unknown[] = [];
        copies.set(value, out);
        for (const item of value) {
            out.push(CloneValue(item, copies));
        }
        return out;
    }
    if (value instanceof Map) {
        const out = new Map<unknown, unknown>();
        copies.set(value, out);
        for (const [key, item] of value) {
            out.set(CloneValue(key, copies), CloneValue(item, copies));
        }
        return out;
    }
    if (value instanceof Set) {
        const out = new Set<unknown>();
        copies.set(value, out);
        for (const item of value) {
            out.add(CloneValue(item, copies));
        }
        return out;
    }
    if (value instanceof Date) {
        return new Date(value.getTime());
    }
    if (value instanceof RegExp) {
        return new RegExp(value.source, value.flags);
    }
    const proto: object | null = Object.getPrototypeOf(value);
    const out: object = Object.create(proto);
    copies.set(value, out);

    for (const key of Reflect.ownKeys(value)) {
        const descriptor = Object.getOwnPropertyDescriptor(value, key);

        if (descriptor) {
            if (`value` in descriptor) {
                descriptor.value = CloneValue(descriptor.value, copies);
            }
            Object.defineProperty(out, key, descriptor);
        }
    }
    return out;
}
