/**
 * Selection-string helpers for the two supported expression dialects.
 *
 * - `root`: C++-like boolean expressions, AND is `&&`, negation is `!`.
 * - `numexpr`: array expressions, AND is `&`, negation is `~`.
 *
 * Clauses are wrapped in parentheses before joining, so the result is always re-parseable by the
 * same dialect and semantically equal to the conjunction of its inputs.
 */
import { ConfigurationError, ValidationError, describeValue } from './Errors.js';

export type SelectionMode = `root` | `numexpr`;

export const SELECTION_MODES: readonly SelectionMode[] = [`root`, `numexpr`];

/** A single clause or a list of clauses. Nested lists are flattened. */
export type SelectionInput = string | readonly SelectionInput[];

export interface JoinSelectionOptions {
    /** Joining operator; defaults to the dialect's AND. */
    op?: string;
    /** Wrap the joined result in one more pair of parentheses. */
    bracket?: boolean;
}

const DIALECTS: Record<SelectionMode, { and: string; not: string }> = {
    root: { and: `&&`, not: `!` },
    numexpr: { and: `&`, not: `~` },
};

/** Trivially-true clause, the neutral element of AND and of multiplication. */
export const TRUE_SELECTION = `1`;

/**
 * Resolves a selection mode, raising ConfigurationError for unknown names.
 * @example
 * ResolveSelectionMode('numexpr'); // 'numexpr'
 */
export function ResolveSelectionMode(mode: string): SelectionMode {
    const found = SELECTION_MODES.find(known => known === mode);

    if (!found) {
        throw new ConfigurationError(`unknown selection_mode: ${describeValue(mode)}`, { mode });
    }
    return found;
}

/** Whether the whole clause is enclosed by its first opening parenthesis. */
export function IsEnclosed(clause: string): boolean {
    if (!clause.startsWith(`(`) || !clause.endsWith(`)`)) {
        return false;
    }
    let depth = 0;

    for (let i = 0; i < clause.length; i++) {
        const char = clause[i];

        if (char === `(`) {
            depth++;
        } else if (char === `)`) {
            depth--;

            if (depth === 0) {
                return i === clause.length - 1;
            }
        }
    }
    return false;
}

/**
 * Whether the clause is a combination of parenthesised groups, e.g. `(a) && !(b)`. Such a clause
 * is kept as is when it is the only one; it is still wrapped before being joined with others.
 */
export function IsComposed(clause: string): boolean {
    let depth = 0;
    let groups = 0;

    for (const char of clause) {
        if (char === `(`) {
            if (depth === 0) {
                groups++;
            }
            depth++;
        } else if (char === `)`) {
            depth--;

            if (depth < 0) {
                return false;
            }
        } else if (depth === 0 && !/[\s&|*!~]/.test(char)) {
            return false;
        }
    }
    return depth === 0 && groups > 0;
}

/** Type guard for SelectionInput. */
export function IsSelectionInput(value: unknown): value is SelectionInput {
    if (typeof value === `string`) {
        return true;
    }
    return Array.isArray(value) && value.every(item => IsSelectionInput(item));
}

function FlattenClauses(input: readonly SelectionInput[], into: string[] = []): string[] {
    for (const item of input) {
        if (typeof item === `string`) {
            into.push(item.trim());
        } else if (Array.isArray(item)) {
            FlattenClauses(item, into);
        } else {
            throw new ValidationError(`invalid selection type: ${describeValue(item)}`, { kind: `type` });
        }
    }
    return into;
}

/**
 * Joins clauses in the given dialect.
 * @param mode SelectionMode - Dialect
 * @param clauses SelectionInput[] - Clauses (strings or nested lists of strings)
 * @param options JoinSelectionOptions - `op` overrides the dialect AND, `bracket` wraps the result
 * @returns string - Joined selection, `'1'` when nothing is left to join
 * @example
 * JoinSelection('root', ['(a > 0)', 'b < 100'], { bracket: true }); // '((a > 0) && (b < 100))'
 * JoinSelection('numexpr', ['a > 0', 'b < 100']); // '(a > 0) & (b < 100)'
 * JoinSelection('root', ['(a) || (b)']); // '(a) || (b)'
 */
export function JoinSelection(mode: SelectionMode, clauses: readonly SelectionInput[], options: JoinSelectionOptions = {}): string {
    const dialect = DIALECTS[ResolveSelectionMode(mode)];
    const op = options.op ?? dialect.and;
    const dropTrivial = op === dialect.and || op === `*`;

    const kept = FlattenClauses(clauses)
        .filter(clause => clause.length > 0)
        .filter(clause => !(dropTrivial && (clause === TRUE_SELECTION || clause === `(${TRUE_SELECTION})`)));

    if (kept.length === 0) {
        return TRUE_SELECTION;
    }
    const isSafe = kept.length === 1 ? IsComposed : IsEnclosed;
    const parts = kept.map(clause => (isSafe(clause) ? clause : `(${clause})`));
    const joined = parts.join(` ${op} `);
    return options.bracket ? `(${joined})` : joined;
}

/** Root-dialect join, see JoinSelection. */
export function JoinRootSelection(clauses: readonly SelectionInput[], options: JoinSelectionOptions = {}): string {
    return JoinSelection(`root`, clauses, options);
}

/** Numexpr-dialect join, see JoinSelection. */
export function JoinNumexprSelection(clauses: readonly SelectionInput[], options: JoinSelectionOptions = {}): string {
    return JoinSelection(`numexpr`, clauses, options);
}

/**
 * Negates a clause in the given dialect.
 * @example
 * InvertSelection('root', 'a > 0'); // '!(a > 0)'
 * InvertSelection('numexpr', '(a > 0)'); // '~(a > 0)'
 */
export function InvertSelection(mode: SelectionMode, clause: string): string {
    const dialect = DIALECTS[ResolveSelectionMode(mode)];
    const trimmed = clause.trim();
    return `${dialect.not}${IsEnclosed(trimmed) ? trimmed : `(${trimmed})`}`;
}
