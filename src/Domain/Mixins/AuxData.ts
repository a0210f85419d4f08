import { ObjectNotFoundError, ValidationError, describeValue } from '../../Common/Errors.js';
import { TypedProperty } from '../../Common/TypedProperty.js';

/** Initial auxiliary data: a Map or a plain object, keys are strings. */
export type AuxInput = ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>>;

/** Capability of objects carrying auxiliary key/value data. */
export interface AuxDataCapable {
    readonly aux: Map<string, unknown>;
    SetAux<V>(key: string, data: V): V;
    GetAux(key: string, ...defaultValue: [unknown] | []): unknown;
    HasAux(key: string): boolean;
    RemoveAux(key?: string): void;
}

function ParseAux(_owner: AuxData, raw: unknown): Map<string, unknown> {
    if (raw instanceof Map) {
        const aux = new Map<string, unknown>();

        for (const [key, data] of raw) {
            if (typeof key !== `string`) {
                throw new ValidationError(`invalid aux key: ${describeValue(key)}`, { property: `aux`, kind: `type` });
            }
            aux.set(key, data);
        }
        return aux;
    }
    if (typeof raw === `object` && raw !== null && !Array.isArray(raw)) {
        return new Map(Object.entries(raw));
    }
    throw new ValidationError(`invalid aux type: ${describeValue(raw)}`, { property: `aux`, kind: `type` });
}

const auxProperty = new TypedProperty<Map<string, unknown>, AuxData>(`aux`, ParseAux, { deleter: false });

/**
 * Ordered key/value store for data that has no dedicated field.
 * @example
 * const aux = new AuxData({ color: 'red' });
 * aux.Set('style', 'dashed');
 * aux.Get('color'); // 'red'
 */
export class AuxData {
    constructor(aux: unknown = {}) {
        auxProperty.Init(this, aux);
    }

    /** The live map; replacing it goes through validation. */
    public get entries(): Map<string, unknown> {
        return auxProperty.Get(this);
    }

    public set entries(aux: unknown) {
        auxProperty.Set(this, aux);
    }

    /** Stores data under key and returns it. */
    public Set<V>(key: string, data: V): V {
        this.entries.set(key, data);
        return data;
    }

    /**
     * Returns the data stored under key.
     * @throws ObjectNotFoundError when key is absent and no default was given
     */
    public Get(key: string, ...defaultValue: [unknown] | []): unknown {
        if (this.entries.has(key)) {
            return this.entries.get(key);
        }
        if (defaultValue.length === 1) {
            return defaultValue[0];
        }
        throw new ObjectNotFoundError(`no auxiliary data for key '${key}'`, { key });
    }

    public Has(key: string): boolean {
        return this.entries.has(key);
    }

    /** Removes one entry, or every entry when key is omitted. Absent keys are ignored. */
    public Remove(key?: string): void {
        if (key === undefined) {
            this.entries.clear();
        } else {
            this.entries.delete(key);
        }
    }
}
