import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../src/Common/Errors.js';
import {
    InvertSelection,
    IsComposed,
    IsEnclosed,
    JoinNumexprSelection,
    JoinRootSelection,
    JoinSelection,
    ResolveSelectionMode,
} from '../src/Common/Selection.js';

describe('Selection helpers', () => {
    describe('joining', () => {
        it('should wrap clauses and join them with the dialect AND', () => {
            expect(JoinRootSelection([`(a > 0)`, `b < 100`], { bracket: true })).toBe(`((a > 0) && (b < 100))`);
            expect(JoinNumexprSelection([`a > 0`, `b < 100`])).toBe(`(a > 0) & (b < 100)`);
            expect(JoinSelection(`numexpr`, [`a`, `b`], { bracket: true })).toBe(`((a) & (b))`);
        });

        it('should flatten nested clause lists', () => {
            expect(JoinRootSelection([`a`, [`b`, [`c`]]])).toBe(`(a) && (b) && (c)`);
        });

        it('should drop empty and trivially true clauses', () => {
            expect(JoinRootSelection([`1`, `a`])).toBe(`(a)`);
            expect(JoinRootSelection([`(1)`, `w`], { op: `*` })).toBe(`(w)`);
            expect(JoinRootSelection([``, `  `])).toBe(`1`);
            expect(JoinRootSelection([])).toBe(`1`);
        });

        it('should keep trivially true clauses for other operators', () => {
            expect(JoinRootSelection([`1`, `a`], { op: `||` })).toBe(`(1) || (a)`);
        });

        it('should keep a single composed clause and wrap it when joined', () => {
            expect(JoinRootSelection([`(a) || (b)`])).toBe(`(a) || (b)`);
            expect(JoinRootSelection([`(a) || (b)`, `c`])).toBe(`((a) || (b)) && (c)`);
        });
    });

    describe('parentheses', () => {
        it('should detect fully enclosed clauses', () => {
            expect(IsEnclosed(`((a))`)).toBe(true);
            expect(IsEnclosed(`(a)(b)`)).toBe(false);
            expect(IsEnclosed(`a`)).toBe(false);
        });

        it('should detect combinations of groups', () => {
            expect(IsComposed(`!(a) && (b)`)).toBe(true);
            expect(IsComposed(`a && (b)`)).toBe(false);
            expect(IsComposed(`(a))`)).toBe(false);
        });
    });

    it('should invert clauses per dialect', () => {
        expect(InvertSelection(`root`, `a > 0`)).toBe(`!(a > 0)`);
        expect(InvertSelection(`numexpr`, `(a > 0)`)).toBe(`~(a > 0)`);
        expect(InvertSelection(`root`, ` a `)).toBe(`!(a)`);
    });

    it('should reject unknown dialects', () => {
        expect(ResolveSelectionMode(`numexpr`)).toBe(`numexpr`);
        expect(() => ResolveSelectionMode(`sql`)).toThrow(ConfigurationError);
    });
});
