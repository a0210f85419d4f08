import type { AnySchema } from 'joi';
import { AttributeError, ValidationError, describeValue } from './Errors.js';

/**
 * Validates and coerces a raw value for a typed property. Throws to reject the value.
 * @template TValue - Stored value type
 * @template TOwner - Instance the property belongs to
 */
export type PropertyParser<TValue, TOwner extends object> = (owner: TOwner, raw: unknown) => TValue;

/** Options controlling which accessors a TypedProperty exposes. */
export interface TypedPropertyOptions {
    /** Allow public writes through Set (default: true). */
    setter?: boolean;
    /** Allow Delete (default: true). */
    deleter?: boolean;
    /** Backing field name used in diagnostics (default: `_<name>`). */
    field?: string;
}

/**
 * TypedProperty binds a parser to a private backing field of each owner instance.
 * Every write goes through the parser; a rejected value leaves the field untouched.
 *
 * @example
 * const unitProperty = new TypedProperty('unit', SchemaParser('unit', Joi.string().allow(null)));
 *
 * class Axis {
 *     get unit(): string | null { return unitProperty.Get(this); }
 *     set unit(value: unknown) { unitProperty.Set(this, value); }
 * }
 */
export class TypedProperty<TValue, TOwner extends object = object> {
    public readonly name: string;
    public readonly field: string;
    public readonly setter: boolean;
    public readonly deleter: boolean;
    private readonly _parse: PropertyParser<TValue, TOwner>;
    private readonly _values: WeakMap<TOwner, { value: TValue }> = new WeakMap(); // owner -> backing value

    constructor(name: string, parse: PropertyParser<TValue, TOwner>, options: TypedPropertyOptions = {}) {
        this.name = name;
        this.field = options.field ?? `_${name}`;
        this.setter = options.setter ?? true;
        this.deleter = options.deleter ?? true;
        this._parse = parse;
    }

    /** Whether the backing field of owner holds a value. */
    public Has(owner: TOwner): boolean {
        return this._values.has(owner);
    }

    /**
     * Reads the backing field.
     * @throws AttributeError when the field was never set or has been deleted
     */
    public Get(owner: TOwner): TValue {
        const slot = this._values.get(owner);

        if (!slot) {
            throw new AttributeError(`Attribute '${this.name}' is not set`, { field: this.field });
        }
        return slot.value;
    }

    /**
     * Parses raw and stores the result.
     * @throws AttributeError when the property is read-only; parser errors propagate unchanged
     */
    public Set(owner: TOwner, raw: unknown): void {
        if (!this.setter) {
            throw new AttributeError(`Attribute '${this.name}' is read-only`, { field: this.field });
        }
        this.Init(owner, raw);
    }

    /** Parsed write that ignores the setter flag. Constructors use it for read-only fields. */
    public Init(owner: TOwner, raw: unknown): void {
        const value = this._parse(owner, raw);
        this._values.set(owner, { value });
    }

    /** Runs the parser without storing the result. */
    public Parse(owner: TOwner, raw: unknown): TValue {
        return this._parse(owner, raw);
    }

    /**
     * Removes the backing value; a later Get fails.
     * @throws AttributeError when deletion is disabled or nothing is stored
     */
    public Delete(owner: TOwner): void {
        if (!this.deleter) {
            throw new AttributeError(`Attribute '${this.name}' cannot be deleted`, { field: this.field });
        }
        if (!this._values.delete(owner)) {
            throw new AttributeError(`Attribute '${this.name}' is not set`, { field: this.field });
        }
    }
}

/**
 * Builds a parser from a Joi schema. Presence is required, so undefined is rejected like any
 * other wrong type. Joi conversions stay enabled, so callers pick strict schemas where coercion
 * is unwanted.
 * @param name string - Property name used in error messages
 * @param schema AnySchema<TValue> - Joi schema describing accepted values
 * @returns PropertyParser - Parser raising ValidationError; `details.kind` is `type` for
 * `*.base` failures and missing values, `value` otherwise
 * @example
 * const parseTitle = SchemaParser('x_title', Joi.string().allow(''));
 */
export function SchemaParser<TValue>(name: string, schema: AnySchema<TValue>): PropertyParser<TValue, object> {
    const labelled = schema.required().label(name);
    return (_owner, raw) => {
        const result = labelled.validate(raw);

        if (result.error) {
            const error = result.error;
            const type = error.details[0]?.type ?? `any.invalid`;
            throw new ValidationError(`invalid ${name}: ${describeValue(raw)} (${error.message})`, {
                property: name,
                kind: type.endsWith(`.base`) || type === `any.required` ? `type` : `value`,
                rule: type,
            }, error);
        }
        return result.value;
    };
}
