import { describe, it, expect, beforeEach } from 'vitest';
import Joi from 'joi';
import { AttributeError, ValidationError } from '../src/Common/Errors.js';
import { SchemaParser, TypedProperty } from '../src/Common/TypedProperty.js';
import { CaptureError } from './helpers.js';

class Box {}

describe('TypedProperty', () => {
    let sizeProperty: TypedProperty<number, Box>;
    let box: Box;

    beforeEach(() => {
        sizeProperty = new TypedProperty<number, Box>(`size`, SchemaParser(`size`, Joi.number().strict().integer()));
        box = new Box();
    });

    describe('reading and writing', () => {
        it('should fail to read a value that was never set', () => {
            const err = CaptureError(() => sizeProperty.Get(box));

            expect(err).toBeInstanceOf(AttributeError);
            expect(err).toMatchObject({ code: `ATTRIBUTE_ERROR`, details: { field: `_size` } });
        });

        it('should store parsed values per owner', () => {
            const other = new Box();
            sizeProperty.Set(box, 3);
            sizeProperty.Set(other, 4);

            expect(sizeProperty.Get(box)).toBe(3);
            expect(sizeProperty.Get(other)).toBe(4);
            expect(sizeProperty.Has(box)).toBe(true);
        });

        it('should report wrong types with kind "type"', () => {
            const err = CaptureError(() => sizeProperty.Set(box, `3`));

            expect(err).toBeInstanceOf(ValidationError);
            expect(err).toMatchObject({ details: { property: `size`, kind: `type`, rule: `number.base` } });
        });

        it('should reject undefined as a wrong type', () => {
            sizeProperty.Set(box, 3);
            const err = CaptureError(() => sizeProperty.Set(box, undefined));

            expect(err).toBeInstanceOf(ValidationError);
            expect(err).toMatchObject({ details: { property: `size`, kind: `type`, rule: `any.required` } });
            expect(sizeProperty.Get(box)).toBe(3);
        });

        it('should report wrong values with kind "value" and keep the previous value', () => {
            sizeProperty.Set(box, 3);
            const err = CaptureError(() => sizeProperty.Set(box, 2.5));

            expect(err).toMatchObject({ details: { kind: `value`, rule: `number.integer` } });
            expect(sizeProperty.Get(box)).toBe(3);
        });

        it('should parse without storing', () => {
            expect(sizeProperty.Parse(box, 7)).toBe(7);
            expect(sizeProperty.Has(box)).toBe(false);
        });
    });

    describe('options', () => {
        it('should refuse public writes to read-only properties but allow Init', () => {
            const readOnly = new TypedProperty<number, Box>(`id`, SchemaParser(`id`, Joi.number()), { setter: false });
            readOnly.Init(box, 1);

            expect(() => readOnly.Set(box, 2)).toThrow(AttributeError);
            expect(readOnly.Get(box)).toBe(1);
        });

        it('should validate on Init as well', () => {
            expect(() => sizeProperty.Init(box, `big`)).toThrow(ValidationError);
            expect(sizeProperty.Has(box)).toBe(false);
        });

        it('should delete the backing value', () => {
            sizeProperty.Set(box, 3);
            sizeProperty.Delete(box);

            expect(sizeProperty.Has(box)).toBe(false);
            expect(() => sizeProperty.Get(box)).toThrow(AttributeError);
            expect(() => sizeProperty.Delete(box)).toThrow(AttributeError);
        });

        it('should refuse deletion when the deleter is disabled', () => {
            const fixed = new TypedProperty<number, Box>(`size`, SchemaParser(`size`, Joi.number()), { deleter: false });
            fixed.Set(box, 3);

            expect(() => fixed.Delete(box)).toThrow(AttributeError);
            expect(fixed.Get(box)).toBe(3);
        });

        it('should name the backing field after the property unless told otherwise', () => {
            const custom = new TypedProperty<number, Box>(`size`, SchemaParser(`size`, Joi.number()), { field: `_boxSize` });

            expect(sizeProperty.field).toBe(`_size`);
            expect(custom.field).toBe(`_boxSize`);
            expect(CaptureError(() => custom.Get(box))).toMatchObject({ details: { field: `_boxSize` } });
        });
    });
});
