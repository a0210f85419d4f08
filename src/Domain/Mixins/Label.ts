import { ValidationError, describeValue } from '../../Common/Errors.js';
import { ToRootLatex } from '../../Common/Latex.js';
import { TypedProperty } from '../../Common/TypedProperty.js';

/** Capability of labelled objects. */
export interface Labelled {
    label: string | null;
    labelShort: string | null;
    readonly labelRoot: string | null;
    readonly labelShortRoot: string | null;
}

/** Parser for optional strings: null clears the value. */
export function ParseOptionalString(name: string): (owner: object, raw: unknown) => string | null {
    return (_owner, raw) => {
        if (raw === null || raw === undefined) {
            return null;
        }
        if (typeof raw !== `string`) {
            throw new ValidationError(`invalid ${name} type: ${describeValue(raw)}`, { property: name, kind: `type` });
        }
        return raw;
    };
}

const labelProperty = new TypedProperty<string | null, Label>(`label`, ParseOptionalString(`label`), { deleter: false });
const labelShortProperty = new TypedProperty<string | null, Label>(`label_short`, ParseOptionalString(`label_short`), { deleter: false });

/**
 * A label and its short form. An unset label falls back to the host attribute read by `fallback`
 * (entities pass their name); an unset short label falls back to the label.
 * @example
 * const label = new Label(() => 'muon', { labelShort: '$\\mu$' });
 * label.text; // 'muon'
 * label.shortRoot; // '#mu'
 */
export class Label {
    private readonly _fallback: () => string | null;

    constructor(fallback: () => string | null = () => null, initial: { label?: unknown; labelShort?: unknown } = {}) {
        this._fallback = fallback;
        labelProperty.Init(this, initial.label ?? null);
        labelShortProperty.Init(this, initial.labelShort ?? null);
    }

    public get text(): string | null {
        return labelProperty.Get(this) ?? this._fallback();
    }

    public set text(label: unknown) {
        labelProperty.Set(this, label);
    }

    public get short(): string | null {
        return labelShortProperty.Get(this) ?? this.text;
    }

    public set short(labelShort: unknown) {
        labelShortProperty.Set(this, labelShort);
    }

    /** Label as explicitly set, without fallback. */
    public get explicit(): string | null {
        return labelProperty.Get(this);
    }

    /** Short label as explicitly set, without fallback. */
    public get explicitShort(): string | null {
        return labelShortProperty.Get(this);
    }

    public get root(): string | null {
        return ToRootLatex(this.text);
    }

    public get shortRoot(): string | null {
        return ToRootLatex(this.short);
    }
}
