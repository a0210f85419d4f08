import { describe, it, expect, beforeEach } from 'vitest';
import { ValidationError } from '../src/Common/Errors.js';
import { Dataset } from '../src/Domain/Dataset.js';
import { Variable } from '../src/Domain/Variable.js';
import { ContextRegistry } from '../src/Services/ContextRegistry.js';

describe('Dataset', () => {
    let registry: ContextRegistry;

    beforeEach(() => {
        registry = new ContextRegistry();
    });

    it('should label itself with its name until a label is set', () => {
        const ds = new Dataset({ name: `ttbar`, labelShort: `$t\\bar{t}$`, registry });

        expect(ds.label).toBe(`ttbar`);
        expect(ds.labelRoot).toBe(`ttbar`);
        expect(ds.labelShort).toBe(`$t\\bar{t}$`);
        expect(ds.labelShortRoot).toBe(`t#bar{t}`);

        ds.label = `Top pair`;
        expect(ds.label).toBe(`Top pair`);
        expect(ds.labelShort).toBe(`$t\\bar{t}$`);
    });

    it('should fall back to the label for the short form', () => {
        const ds = new Dataset({ name: `data_2017`, isData: true, label: `Data 2017`, registry });

        expect(ds.labelShort).toBe(`Data 2017`);
        expect(ds.dataSource).toBe(`data`);
    });

    it('should switch between data and simulation', () => {
        const ds = new Dataset({ name: `ttbar`, registry });
        expect(ds.isMc).toBe(true);

        ds.isData = true;
        expect(ds.dataSource).toBe(`data`);
        expect(() => (ds.isData = `yes`)).toThrow(ValidationError);
        expect(() => (ds.isData = undefined)).toThrow(ValidationError);
        expect(ds.isMc).toBe(false);
    });

    it('should carry tags and aux data', () => {
        const ds = new Dataset({ name: `ttbar`, tags: [`top`, `nominal`], aux: { weight: 1.5 }, registry });

        expect(ds.HasTag(`nom*`)).toBe(true);
        expect(ds.GetAux(`weight`)).toBe(1.5);
        expect(ds.GetAux(`color`, `black`)).toBe(`black`);
    });

    it('should be indexed apart from other classes', () => {
        const ds = new Dataset({ name: `ttbar`, registry });
        const variable = new Variable({ name: `ttbar`, registry });

        expect(ds.id).toBe(0);
        expect(variable.id).toBe(0);
        expect(Dataset.Get(`ttbar`, { registry })).toBe(ds);
        expect(Dataset.Values({ registry })).toEqual([ds]);
    });

    it('should copy labels without their fallbacks', () => {
        const source = new Dataset({ name: `ttbar`, isData: false, labelShort: `tt`, tags: [`top`], registry });
        const copy = source.Copy({ overrides: { name: `ttbar_alt` } });
        copy.AddTag(`alt`);

        expect(copy.label).toBe(`ttbar_alt`);
        expect(copy.labelShort).toBe(`tt`);
        expect(copy.isMc).toBe(true);
        expect([...source.tags]).toEqual([`top`]);
        expect(copy.ToFields()).toEqual({
            name: `ttbar_alt`,
            id: 1,
            context: [`default`],
            isData: false,
            label: null,
            labelShort: `tt`,
            tags: new Set([`top`, `alt`]),
            aux: new Map(),
        });
    });
});
