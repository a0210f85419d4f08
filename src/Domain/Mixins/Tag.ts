import { ValidationError, describeValue } from '../../Common/Errors.js';
import { MakeList, MultiMatch, ResolveMatchMode, type MultiMatchOptions } from '../../Common/Match.js';
import { TypedProperty } from '../../Common/TypedProperty.js';

/** A tag, or several tags as an array or set. */
export type TagInput = string | readonly string[] | ReadonlySet<string>;

/** Capability of taggable objects. */
export interface Taggable {
    readonly tags: Set<string>;
    AddTag(tag: TagInput): void;
    RemoveTag(tag: TagInput): void;
    HasTag(tag: TagInput, options?: MultiMatchOptions): boolean;
}

function ParseTags(_owner: TagSet, raw: unknown): Set<string> {
    const items: readonly unknown[] | undefined = typeof raw === `string`
        ? [raw]
        : Array.isArray(raw) ? raw : raw instanceof Set ? [...raw] : undefined;

    if (!items) {
        throw new ValidationError(`invalid tags type: ${describeValue(raw)}`, { property: `tags`, kind: `type` });
    }
    const tags = new Set<string>();

    for (const tag of items) {
        if (typeof tag !== `string`) {
            throw new ValidationError(`invalid tag type: ${describeValue(tag)}`, { property: `tags`, kind: `type` });
        }
        tags.add(tag);
    }
    return tags;
}

const tagsProperty = new TypedProperty<Set<string>, TagSet>(`tags`, ParseTags, { deleter: false });

/**
 * String tags with glob or regex queries.
 * @example
 * const tags = new TagSet(['foo', 'bar']);
 * tags.Has('f*'); // true
 * tags.Has(['foo', 'baz'], { mode: 'all' }); // false
 */
export class TagSet {
    constructor(tags: unknown = []) {
        tagsProperty.Init(this, tags);
    }

    public get values(): Set<string> {
        return tagsProperty.Get(this);
    }

    public set values(tags: unknown) {
        tagsProperty.Set(this, tags);
    }

    public Add(tag: TagInput): void {
        for (const parsed of tagsProperty.Parse(this, tag)) {
            this.values.add(parsed);
        }
    }

    public Remove(tag: TagInput): void {
        for (const parsed of tagsProperty.Parse(this, tag)) {
            this.values.delete(parsed);
        }
    }

    /**
     * Tests tag patterns against the stored tags. A single pattern matches when any stored tag
     * matches it; `mode` decides whether any or all of several patterns must match.
     * @param tag TagInput - Pattern or patterns (glob by default)
     * @param options MultiMatchOptions - `mode` (`any`), `dialect` (`glob`), `flags`
     */
    public Has(tag: TagInput, options: MultiMatchOptions = {}): boolean {
        const mode = ResolveMatchMode(options.mode ?? `any`);
        const patterns = MakeList<string>(tag);
        const stored = [...this.values];
        const matches = (pattern: string) => stored.some(value => MultiMatch(value, [pattern], { ...options, mode: `any` }));

        return mode === `all` ? patterns.every(matches) : patterns.some(matches);
    }
}
