import { describe, it, expect } from 'vitest';
import { CopyDraft, DeepClone, type CopyPlan } from '../src/Domain/Mixins/Copy.js';
import { Variable } from '../src/Domain/Variable.js';
import { ContextRegistry } from '../src/Services/ContextRegistry.js';

interface PointFields {
    name: string;
    coords: number[];
    meta: Map<string, string>;
}

class Style {
    public color: string;

    constructor(color: string) {
        this.color = color;
    }

    public get css(): string {
        return `color: ${this.color}`;
    }
}

const source: PointFields = { name: `p`, coords: [1, 2], meta: new Map([[`unit`, `cm`]]) };

const POINT_PLAN: CopyPlan<PointFields, PointFields> = {
    attrs: [`name`, `coords`, `meta`],
    callbacks: [],
    snapshot: point => point,
};

describe('CopyDraft', () => {
    it('should deep-copy the planned attributes', () => {
        const draft = CopyDraft(source, POINT_PLAN);
        draft.coords?.push(3);
        draft.meta?.set(`unit`, `mm`);

        expect(draft.name).toBe(`p`);
        expect(source.coords).toEqual([1, 2]);
        expect(source.meta.get(`unit`)).toBe(`cm`);
    });

    it('should run callbacks in order before applying overrides', () => {
        const calls: string[] = [];
        const draft = CopyDraft(source, POINT_PLAN, {
            callbacks: [
                (point, fields) => {
                    calls.push(`first`);
                    fields.name = `${point.name}_a`;
                },
                (_point, fields) => {
                    calls.push(`second`);
                    fields.name = `${fields.name ?? ``}_b`;
                    fields.coords = [0];
                },
            ],
            overrides: { coords: [9] },
        });

        expect(calls).toEqual([`first`, `second`]);
        expect(draft.name).toBe(`p_a_b`);
        expect(draft.coords).toEqual([9]);
    });

    it('should skip overridden and unlisted attributes', () => {
        const draft = CopyDraft(source, POINT_PLAN, { attrs: [`name`, `coords`], overrides: { name: `q` } });

        expect(draft).toEqual({ name: `q`, coords: [1, 2] });
    });
});

describe('DeepClone', () => {
    it('should keep the prototype of class instances', () => {
        const style = new Style(`red`);
        const copy = DeepClone(style);
        copy.color = `blue`;

        expect(copy).toBeInstanceOf(Style);
        expect(copy.css).toBe(`color: blue`);
        expect(style.color).toBe(`red`);
    });

    it('should share functions and copy nested containers', () => {
        const format = (value: number): string => value.toFixed(1);
        const original = { format, bins: [1, 2], seen: new Set([`a`]), when: new Date(0) };
        const copy = DeepClone(original);
        copy.bins.push(3);
        copy.seen.add(`b`);

        expect(copy.format).toBe(format);
        expect(copy.when).not.toBe(original.when);
        expect(copy.when.getTime()).toBe(0);
        expect(original.bins).toEqual([1, 2]);
        expect([...original.seen]).toEqual([`a`]);
    });

    it('should preserve shared and cyclic references', () => {
        const shared = { size: 1 };
        const node: { self?: object; left: object; right: object } = { left: shared, right: shared };
        node.self = node;
        const copy = DeepClone(node);

        expect(copy.self).toBe(copy);
        expect(copy.left).toBe(copy.right);
        expect(copy.left).not.toBe(shared);
    });

    it('should copy aux values holding class instances and functions', () => {
        const registry = new ContextRegistry();
        const format = (): number => 1;
        const source = new Variable({ name: `pt`, registry });
        source.SetAux(`style`, new Style(`red`));
        source.SetAux(`format`, format);

        const copy = source.Copy({ overrides: { name: `pt_copy` } });
        const style = copy.GetAux(`style`);

        expect(style).toBeInstanceOf(Style);
        expect(style).not.toBe(source.GetAux(`style`));
        expect(style instanceof Style ? style.css : undefined).toBe(`color: red`);
        expect(copy.GetAux(`format`)).toBe(format);
    });
});
