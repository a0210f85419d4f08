import { describe, it, expect, beforeEach } from 'vitest';
import { DuplicateObjectError, ObjectNotFoundError } from '../src/Common/Errors.js';
import { UniqueObject } from '../src/Domain/UniqueObject.js';
import { UniqueObjectIndex } from '../src/Repository/UniqueObjectIndex.js';
import { ContextRegistry } from '../src/Services/ContextRegistry.js';

class Sample extends UniqueObject {}

describe('UniqueObjectIndex', () => {
    let registry: ContextRegistry;
    let index: UniqueObjectIndex;
    let alpha: Sample;
    let beta: Sample;
    let gamma: Sample;

    beforeEach(() => {
        registry = new ContextRegistry();
        alpha = new Sample({ name: `alpha`, id: 0, registry });
        beta = new Sample({ name: `beta`, id: 5, registry });
        gamma = new Sample({ name: `gamma`, id: 2, registry });
        index = new UniqueObjectIndex(Sample, `scratch`);
        index.Add(alpha);
        index.Add(beta);
        index.Add(gamma);
    });

    describe('lookup', () => {
        it('should resolve names, ids and pairs to the same object', () => {
            expect(index.Get(`beta`)).toBe(beta);
            expect(index.Get(5)).toBe(beta);
            expect(index.Get([`beta`, 5])).toBe(beta);
        });

        it('should fail when a pair points at two different objects', () => {
            expect(() => index.Get([`beta`, 0])).toThrow(ObjectNotFoundError);
            expect(index.Find([`beta`, 0])).toBeUndefined();
        });

        it('should fail for unknown keys', () => {
            expect(() => index.Get(`delta`)).toThrow(ObjectNotFoundError);
            expect(() => index.Get(99)).toThrow(ObjectNotFoundError);
        });

        it('should test membership by key and by reference', () => {
            const lookalike = new Sample({ name: `alpha`, id: 0, registry: new ContextRegistry() });

            expect(index.Has(`alpha`)).toBe(true);
            expect(index.Has(2)).toBe(true);
            expect(index.Has(alpha)).toBe(true);
            expect(index.Has(lookalike)).toBe(false);
        });
    });

    describe('ordering', () => {
        it('should list snapshots in insertion order', () => {
            const names = index.Names();
            names.push(`mutated`);

            expect(index.Names()).toEqual([`alpha`, `beta`, `gamma`]);
            expect(index.Ids()).toEqual([0, 5, 2]);
            expect(index.Values()).toEqual([alpha, beta, gamma]);
            expect(index.Size).toBe(3);
        });

        it('should return first and last by insertion', () => {
            expect(index.GetFirst()).toBe(alpha);
            expect(index.GetLast()).toBe(gamma);
        });

        it('should use the default or fail on an empty index', () => {
            const empty = new UniqueObjectIndex(Sample, `empty`);

            expect(empty.GetFirst(null)).toBeNull();
            expect(empty.GetLast(`none`)).toBe(`none`);
            expect(() => empty.GetFirst()).toThrow(ObjectNotFoundError);
            expect(() => empty.GetLast()).toThrow(ObjectNotFoundError);
        });
    });

    describe('uniqueness', () => {
        it('should reject a second object with a taken name', () => {
            const clash = new Sample({ name: `alpha`, id: 9, registry: new ContextRegistry() });

            expect(() => index.Add(clash)).toThrow(DuplicateObjectError);
            expect(index.Size).toBe(3);
        });

        it('should reject a second object with a taken id', () => {
            const clash = new Sample({ name: `delta`, id: 5, registry: new ContextRegistry() });

            expect(() => index.CheckAdd(clash)).toThrow(DuplicateObjectError);
            expect(() => index.Add(clash)).toThrow(DuplicateObjectError);
            expect(index.Has(`delta`)).toBe(false);
        });
    });

    describe('removal', () => {
        it('should remove by key and by reference', () => {
            expect(index.Remove(`beta`)).toBe(beta);
            expect(index.Remove(gamma)).toBe(gamma);
            expect(index.Names()).toEqual([`alpha`]);
        });

        it('should fail on a missing object unless soft', () => {
            index.Remove(`beta`);

            expect(() => index.Remove(`beta`)).toThrow(ObjectNotFoundError);
            expect(() => index.Remove(beta)).toThrow(ObjectNotFoundError);
            expect(index.Remove(`beta`, { soft: true })).toBeUndefined();
        });

        it('should not hand out removed ids again', () => {
            expect(index.NextId(0)).toBe(6);
            index.Remove(`beta`);
            expect(index.NextId(0)).toBe(6);
        });

        it('should reset numbering when cleared', () => {
            expect(index.Clear()).toEqual([alpha, beta, gamma]);
            expect(index.Size).toBe(0);
            expect(index.NextId(0)).toBe(0);
            expect(index.NextId(3)).toBe(3);
        });
    });

    describe('matching', () => {
        it('should match names against glob patterns', () => {
            expect(index.Match([`a*`, `g*`])).toEqual([alpha, gamma]);
            expect(index.Match([`*a`, `g*`], { mode: `all` })).toEqual([gamma]);
        });

        it('should match names against regex patterns', () => {
            expect(index.Match(`(al|be)`, { dialect: `regex` })).toEqual([alpha, beta]);
        });
    });
});
