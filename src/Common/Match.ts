import picomatch from 'picomatch';
import { ConfigurationError, ValidationError, describeValue } from './Errors.js';

/** How several patterns combine: at least one must match, or all of them. */
export type MatchMode = `any` | `all`;

/** Pattern syntax understood by MultiMatch. */
export type MatchDialect = `glob` | `regex`;

export interface MultiMatchOptions {
    mode?: MatchMode;
    dialect?: MatchDialect;
    /** Regex flags (regex dialect) or case folding via `i` (glob dialect). */
    flags?: string;
}

const MATCH_MODES: readonly MatchMode[] = [`any`, `all`];
const MATCH_DIALECTS: readonly MatchDialect[] = [`glob`, `regex`];

/**
 * Converts a scalar, array or set to a fresh array.
 * @example
 * MakeList('a'); // ['a']
 * MakeList(new Set(['a', 'b'])); // ['a', 'b']
 */
export function MakeList<T>(value: T | readonly T[] | ReadonlySet<T>): T[] {
    return IsCollection(value) ? [...value] : [value];
}

function IsCollection<T>(value: T | readonly T[] | ReadonlySet<T>): value is readonly T[] | ReadonlySet<T> {
    return Array.isArray(value) || value instanceof Set;
}

/** Resolves a match mode, raising ConfigurationError for unknown names. */
export function ResolveMatchMode(mode: string): MatchMode {
    const found = MATCH_MODES.find(known => known === mode);

    if (!found) {
        throw new ConfigurationError(`unknown match mode: ${describeValue(mode)}`, { mode });
    }
    return found;
}

function ResolveDialect(dialect: string): MatchDialect {
    const found = MATCH_DIALECTS.find(known => known === dialect);

    if (!found) {
        throw new ConfigurationError(`unknown matching dialect: ${describeValue(dialect)}`, { dialect });
    }
    return found;
}

/**
 * Builds a single-pattern predicate. Glob patterns match the whole name; regex patterns are
 * anchored at the start only.
 */
function CompilePattern(pattern: string, dialect: MatchDialect, flags: string): (name: string) => boolean {
    if (typeof pattern !== `string`) {
        throw new ValidationError(`invalid pattern: ${describeValue(pattern)}`, { kind: `type` });
    }
    if (dialect === `regex`) {
        let expression: RegExp;
        try {
            expression = new RegExp(`^(?:${pattern})`, flags);
        } catch(err) {
            throw new ValidationError(`invalid regular expression: ${describeValue(pattern)}`, { kind: `value` }, err);
        }
        return name => expression.test(name);
    }
    return picomatch(pattern, { bash: true, dot: true, nocase: flags.includes(`i`) });
}

/**
 * Compares name against several patterns.
 * @param name string - Value to test
 * @param patterns string | string[] - Glob or regex patterns
 * @param options MultiMatchOptions - `mode` (default `any`), `dialect` (default `glob`), `flags`
 * @returns boolean - true when any (or all) patterns match
 * @throws ConfigurationError for an unknown mode or dialect
 * @example
 * MultiMatch('muon_pt', ['muon_*', 'jet_*']); // true
 * MultiMatch('muon_pt', ['mu.*', '.*_pt'], { dialect: 'regex', mode: 'all' }); // true
 */
export function MultiMatch(name: string, patterns: string | readonly string[], options: MultiMatchOptions = {}): boolean {
    const mode = ResolveMatchMode(options.mode ?? `any`);
    const dialect = ResolveDialect(options.dialect ?? `glob`);
    const matchers = MakeList(patterns).map(pattern => CompilePattern(pattern, dialect, options.flags ?? ``));

    return mode === `any` ? matchers.some(matches => matches(name)) : matchers.every(matches => matches(name));
}
