import { ValidationError, describeValue } from '../../Common/Errors.js';
import {
    IsSelectionInput,
    JoinSelection,
    ResolveSelectionMode,
    TRUE_SELECTION,
    type JoinSelectionOptions,
    type SelectionInput,
    type SelectionMode,
} from '../../Common/Selection.js';
import { TypedProperty } from '../../Common/TypedProperty.js';

/** Capability of objects holding a selection expression. */
export interface Selectable {
    selection: string;
    selectionMode: SelectionMode;
    AddSelection(selection: SelectionInput, options?: JoinSelectionOptions): void;
}

const selectionModeProperty = new TypedProperty<SelectionMode, SelectionRule>(
    `selection_mode`,
    (_owner, raw) => {
        if (typeof raw !== `string`) {
            throw new ValidationError(`invalid selection_mode type: ${describeValue(raw)}`, { property: `selection_mode`, kind: `type` });
        }
        return ResolveSelectionMode(raw);
    },
    { deleter: false },
);

const selectionProperty = new TypedProperty<string, SelectionRule>(
    `selection`,
    (owner, raw) => {
        if (!IsSelectionInput(raw)) {
            throw new ValidationError(`invalid selection type: ${describeValue(raw)}`, { property: `selection`, kind: `type` });
        }
        return JoinSelection(owner.mode, [raw]);
    },
    { deleter: false },
);

/**
 * A selection expression in one of the two dialects. Assigned expressions are normalised by the
 * dialect's join rules, so `a > 0` is stored as `(a > 0)`.
 * @example
 * const rule = new SelectionRule('branchA > 0');
 * rule.Add('myBranchB < 100', { bracket: true });
 * rule.expression; // '((branchA > 0) && (myBranchB < 100))'
 */
export class SelectionRule {
    /** Dialect used when no mode is given. */
    public static DefaultMode: SelectionMode = `root`;

    constructor(selection?: unknown, mode?: unknown) {
        selectionModeProperty.Init(this, mode ?? SelectionRule.DefaultMode);
        selectionProperty.Init(this, selection ?? TRUE_SELECTION);
    }

    public get expression(): string {
        return selectionProperty.Get(this);
    }

    public set expression(selection: unknown) {
        selectionProperty.Set(this, selection);
    }

    /** Switching dialects keeps the stored expression; later joins use the new dialect. */
    public get mode(): SelectionMode {
        return selectionModeProperty.Get(this);
    }

    public set mode(mode: unknown) {
        selectionModeProperty.Set(this, mode);
    }

    /**
     * ANDs a clause (or another operator given as `op`) onto the expression.
     * @example
     * rule.Add('myWeight', { op: '*' }); // '((branchA > 0) && (myBranchB < 100)) * (myWeight)'
     */
    public Add(selection: SelectionInput, options: JoinSelectionOptions = {}): void {
        this.expression = JoinSelection(this.mode, [this.expression, selection], options);
    }
}
