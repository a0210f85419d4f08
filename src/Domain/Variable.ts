import Joi from 'joi';
import { ValidationError, describeValue } from '../Common/Errors.js';
import { ToRootLatex } from '../Common/Latex.js';
import type { MultiMatchOptions } from '../Common/Match.js';
import type { JoinSelectionOptions, SelectionInput, SelectionMode } from '../Common/Selection.js';
import { SchemaParser, TypedProperty } from '../Common/TypedProperty.js';
import type { ContextRegistry } from '../Services/ContextRegistry.js';
import { AuxData, type AuxDataCapable, type AuxInput } from './Mixins/AuxData.js';
import { CopyDraft, type Copyable, type CopyPlan, type CopyRequest } from './Mixins/Copy.js';
import { ParseOptionalString } from './Mixins/Label.js';
import { SelectionRule, type Selectable } from './Mixins/Selection.js';
import { TagSet, type TagInput, type Taggable } from './Mixins/Tag.js';
import { RequireName, UniqueObject, type AutoId } from './UniqueObject.js';

/** Number of bins, lower edge and upper edge. */
export type Binning = readonly [number, number, number];

/** Every value a Variable can be built from; also the shape copies are drafted in. */
export interface VariableFields {
    name: string;
    id: number | AutoId;
    context: string | readonly string[];
    /** Projection expression; null falls back to the name. */
    expression: string | null;
    binning: Binning;
    xTitle: string;
    xTitleShort: string | null;
    yTitle: string;
    yTitleShort: string | null;
    logX: boolean;
    logY: boolean;
    /** Unit shown on both axes; null or '1' shows none. */
    unit: string | null;
    selection: SelectionInput;
    selectionMode: SelectionMode;
    tags: TagInput;
    aux: AuxInput;
}

export type VariableOptions = Partial<VariableFields> & { name: string; registry?: ContextRegistry };

export interface VariableCopyRequest extends CopyRequest<Variable, VariableFields> {
    /** Registry of the copy; default is the source's registry. */
    registry?: ContextRegistry;
}

export interface TitleOptions {
    /** Use the short title. */
    short?: boolean;
    /** Convert to ROOT latex. */
    root?: boolean;
}

export interface YTitleOptions extends TitleOptions {
    /** Bin width to print instead of the one derived from the binning. */
    binWidth?: number;
}

export interface FullTitleOptions {
    /** Histogram name; default is the variable name. */
    name?: string;
    short?: boolean;
    shortX?: boolean;
    shortY?: boolean;
    /** Convert axis titles to ROOT latex (default: true). */
    root?: boolean;
    binWidth?: number;
}

const expressionProperty = new TypedProperty<string | null, Variable>(
    `expression`,
    SchemaParser(`expression`, Joi.string().allow(null)),
    { deleter: false },
);

const parseBinning = SchemaParser(`binning`, Joi.array<number[]>().items(Joi.number().strict()).length(3));

const binningProperty = new TypedProperty<Binning, Variable>(
    `binning`,
    (owner, raw) => {
        const [bins, min, max] = parseBinning(owner, raw);

        if (bins <= 0) {
            throw new ValidationError(`binning needs a positive number of bins: ${describeValue(raw)}`, { property: `binning`, kind: `value` });
        }
        return [bins, min, max] as const;
    },
    { deleter: false },
);

const TITLE_SCHEMA = Joi.string().allow(``);

const xTitleProperty = new TypedProperty<string, Variable>(`x_title`, SchemaParser(`x_title`, TITLE_SCHEMA), { deleter: false });
const yTitleProperty = new TypedProperty<string, Variable>(`y_title`, SchemaParser(`y_title`, TITLE_SCHEMA), { deleter: false });
const xTitleShortProperty = new TypedProperty<string | null, Variable>(`x_title_short`, ParseOptionalString(`x_title_short`), { deleter: false });
const yTitleShortProperty = new TypedProperty<string | null, Variable>(`y_title_short`, ParseOptionalString(`y_title_short`), { deleter: false });
const logXProperty = new TypedProperty<boolean, Variable>(`log_x`, SchemaParser(`log_x`, Joi.boolean().strict()), { deleter: false });
const logYProperty = new TypedProperty<boolean, Variable>(`log_y`, SchemaParser(`log_y`, Joi.boolean().strict()), { deleter: false });
const unitProperty = new TypedProperty<string | null, Variable>(`unit`, ParseOptionalString(`unit`), { deleter: false });

/** Units that are not printed. */
const SILENT_UNITS: readonly (string | null)[] = [null, `1`];

export const VARIABLE_COPY_PLAN: CopyPlan<Variable, VariableFields> = {
    attrs: [
        `expression`, `binning`, `xTitle`, `xTitleShort`, `yTitle`, `yTitleShort`, `logX`, `logY`, `unit`,
        `selection`, `selectionMode`, `tags`, `aux`,
    ],
    callbacks: [],
    snapshot: variable => variable.ToFields(),
};

/**
 * A plotting variable: expression, binning, axis titles and an optional selection.
 *
 * @example
 * const v = new Variable({
 *     name: 'myVar',
 *     expression: 'myBranchA * myBranchB',
 *     selection: 'myBranchC > 0',
 *     binning: [20, 0, 10],
 *     xTitle: '$\\mu p_{T}$',
 *     unit: 'GeV',
 * });
 * v.xTitleRoot; // '#mu p_{T}'
 * v.FullTitle(); // 'myVar;#mu p_{T} [GeV];Entries / 0.5 GeV'
 */
export class Variable extends UniqueObject implements Copyable<Variable, VariableFields>, AuxDataCapable, Taggable, Selectable {
    private readonly _aux: AuxData;
    private readonly _tags: TagSet;
    private readonly _selection: SelectionRule;

    protected static override readonly registerOnConstruction: boolean = false;

    constructor(options: VariableOptions) {
        super(options);
        this._aux = new AuxData(options.aux ?? {});
        this._tags = new TagSet(options.tags ?? []);
        this._selection = new SelectionRule(options.selection, options.selectionMode);
        expressionProperty.Init(this, options.expression ?? null);
        binningProperty.Init(this, options.binning ?? [1, 0, 1]);
        xTitleProperty.Init(this, options.xTitle ?? ``);
        xTitleShortProperty.Init(this, options.xTitleShort ?? null);
        yTitleProperty.Init(this, options.yTitle ?? `Entries`);
        yTitleShortProperty.Init(this, options.yTitleShort ?? null);
        logXProperty.Init(this, options.logX ?? false);
        logYProperty.Init(this, options.logY ?? false);
        unitProperty.Init(this, options.unit === undefined ? `1` : options.unit);
        this.Register();
    }

    // expression

    /** The expression, or the name when none is set. */
    public get expression(): string {
        return expressionProperty.Get(this) ?? this.name;
    }

    public set expression(expression: unknown) {
        expressionProperty.Set(this, expression);
    }

    // binning and titles

    public get binning(): Binning {
        return binningProperty.Get(this);
    }

    public set binning(binning: unknown) {
        binningProperty.Set(this, binning);
    }

    public get binWidth(): number {
        const [bins, min, max] = this.binning;
        return (max - min) / bins;
    }

    public get xTitle(): string {
        return xTitleProperty.Get(this);
    }

    public set xTitle(xTitle: unknown) {
        xTitleProperty.Set(this, xTitle);
    }

    public get xTitleRoot(): string {
        return ToRootLatex(this.xTitle);
    }

    /** Short x title; falls back to xTitle. */
    public get xTitleShort(): string {
        return xTitleShortProperty.Get(this) ?? this.xTitle;
    }

    public set xTitleShort(xTitleShort: unknown) {
        xTitleShortProperty.Set(this, xTitleShort);
    }

    public get xTitleShortRoot(): string {
        return ToRootLatex(this.xTitleShort);
    }

    public get yTitle(): string {
        return yTitleProperty.Get(this);
    }

    public set yTitle(yTitle: unknown) {
        yTitleProperty.Set(this, yTitle);
    }

    public get yTitleRoot(): string {
        return ToRootLatex(this.yTitle);
    }

    /** Short y title; falls back to yTitle. */
    public get yTitleShort(): string {
        return yTitleShortProperty.Get(this) ?? this.yTitle;
    }

    public set yTitleShort(yTitleShort: unknown) {
        yTitleShortProperty.Set(this, yTitleShort);
    }

    public get yTitleShortRoot(): string {
        return ToRootLatex(this.yTitleShort);
    }

    public get logX(): boolean {
        return logXProperty.Get(this);
    }

    public set logX(logX: unknown) {
        logXProperty.Set(this, logX);
    }

    public get logY(): boolean {
        return logYProperty.Get(this);
    }

    public set logY(logY: unknown) {
        logYProperty.Set(this, logY);
    }

    public get unit(): string | null {
        return unitProperty.Get(this);
    }

    public set unit(unit: unknown) {
        unitProperty.Set(this, unit);
    }

    /**
     * X axis title with the unit appended.
     * @example
     * v.FullXTitle({ short: true, root: true }); // '#mu p_{T} [GeV]'
     */
    public FullXTitle(options: TitleOptions = {}): string {
        let title = options.short ? this.xTitleShort : this.xTitle;

        if (!SILENT_UNITS.includes(this.unit)) {
            title += ` [${this.unit}]`;
        }
        return options.root ? ToRootLatex(title) : title;
    }

    /**
     * Y axis title with bin width and unit appended. The derived bin width is rounded to two
     * decimals; an explicit binWidth is printed as given.
     * @example
     * v.FullYTitle(); // 'Entries / 0.25 GeV'
     */
    public FullYTitle(options: YTitleOptions = {}): string {
        let title = options.short ? this.yTitleShort : this.yTitle;
        const binWidth = options.binWidth ?? Math.round(this.binWidth * 100) / 100;
        title += ` / ${binWidth}`;

        if (!SILENT_UNITS.includes(this.unit)) {
            title += ` ${this.unit}`;
        }
        return options.root ? ToRootLatex(title) : title;
    }

    /**
     * Histogram title in the `name;x title;y title` form.
     * @example
     * v.FullTitle({ short: true }); // 'foo;#mu p_{T} [GeV];N / 0.25 GeV'
     */
    public FullTitle(options: FullTitleOptions = {}): string {
        const short = options.short ?? false;
        const root = options.root ?? true;
        const xTitle = this.FullXTitle({ short: options.shortX ?? short, root });
        const yTitle = this.FullYTitle({ binWidth: options.binWidth, short: options.shortY ?? short, root });

        return [options.name ?? this.name, xTitle, yTitle].join(`;`);
    }

    // selection

    public get selection(): string {
        return this._selection.expression;
    }

    public set selection(selection: unknown) {
        this._selection.expression = selection;
    }

    public get selectionMode(): SelectionMode {
        return this._selection.mode;
    }

    public set selectionMode(mode: unknown) {
        this._selection.mode = mode;
    }

    public AddSelection(selection: SelectionInput, options: JoinSelectionOptions = {}): void {
        this._selection.Add(selection, options);
    }

    // tags

    public get tags(): Set<string> {
        return this._tags.values;
    }

    public set tags(tags: unknown) {
        this._tags.values = tags;
    }

    public AddTag(tag: TagInput): void {
        this._tags.Add(tag);
    }

    public RemoveTag(tag: TagInput): void {
        this._tags.Remove(tag);
    }

    public HasTag(tag: TagInput, options: MultiMatchOptions = {}): boolean {
        return this._tags.Has(tag, options);
    }

    // aux

    public get aux(): Map<string, unknown> {
        return this._aux.entries;
    }

    public set aux(aux: unknown) {
        this._aux.entries = aux;
    }

    public SetAux<V>(key: string, data: V): V {
        return this._aux.Set(key, data);
    }

    public GetAux(key: string, ...defaultValue: [unknown] | []): unknown {
        return this._aux.Get(key, ...defaultValue);
    }

    public HasAux(key: string): boolean {
        return this._aux.Has(key);
    }

    public RemoveAux(key?: string): void {
        this._aux.Remove(key);
    }

    // copy

    /** Current values of every field, with explicit (non-fallback) expression and short titles. */
    public ToFields(): VariableFields {
        return {
            name: this.name,
            id: this.id,
            context: [...this.contexts],
            expression: expressionProperty.Get(this),
            binning: this.binning,
            xTitle: this.xTitle,
            xTitleShort: xTitleShortProperty.Get(this),
            yTitle: this.yTitle,
            yTitleShort: yTitleShortProperty.Get(this),
            logX: this.logX,
            logY: this.logY,
            unit: this.unit,
            selection: this.selection,
            selectionMode: this.selectionMode,
            tags: this.tags,
            aux: this.aux,
        };
    }

    /**
     * Copies this variable into a new Variable. The copy needs a free name in its context, so a
     * name is usually given via overrides or derived by a callback.
     * @example
     * const other = v.Copy({ overrides: { name: 'otherVar', expression: 'otherExpression' } });
     */
    public Copy(request: VariableCopyRequest = {}): Variable {
        return this.CopyAs(draft => new Variable({ ...RequireName(draft), registry: request.registry ?? this.registry }), request);
    }

    /** Copies this variable through a custom factory, e.g. into a subclass. */
    public CopyAs<TTarget>(target: (draft: Partial<VariableFields>) => TTarget, request: CopyRequest<Variable, VariableFields> = {}): TTarget {
        return target(CopyDraft(this, VARIABLE_COPY_PLAN, request));
    }
}
