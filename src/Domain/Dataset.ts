import type { MultiMatchOptions } from '../Common/Match.js';
import type { ContextRegistry } from '../Services/ContextRegistry.js';
import { AuxData, type AuxDataCapable, type AuxInput } from './Mixins/AuxData.js';
import { CopyDraft, type Copyable, type CopyPlan, type CopyRequest } from './Mixins/Copy.js';
import { DataSource, type DataSourceCapable, type DataSourceName } from './Mixins/DataSource.js';
import { Label, type Labelled } from './Mixins/Label.js';
import { TagSet, type TagInput, type Taggable } from './Mixins/Tag.js';
import { RequireName, UniqueObject, type AutoId } from './UniqueObject.js';

export interface DatasetFields {
    name: string;
    id: number | AutoId;
    context: string | readonly string[];
    isData: boolean;
    label: string | null;
    labelShort: string | null;
    tags: TagInput;
    aux: AuxInput;
}

export type DatasetOptions = Partial<DatasetFields> & { name: string; registry?: ContextRegistry };

export interface DatasetCopyRequest extends CopyRequest<Dataset, DatasetFields> {
    registry?: ContextRegistry;
}

export const DATASET_COPY_PLAN: CopyPlan<Dataset, DatasetFields> = {
    attrs: [`isData`, `label`, `labelShort`, `tags`, `aux`],
    callbacks: [],
    snapshot: dataset => dataset.ToFields(),
};

/**
 * A dataset record: real data or simulation, with a display label that defaults to the name.
 * @example
 * const ds = new Dataset({ name: 'ttbar', labelShort: '$t\\bar{t}$' });
 * ds.label; // 'ttbar'
 * ds.labelShortRoot; // 't#bar{t}'
 * ds.dataSource; // 'mc'
 */
export class Dataset extends UniqueObject
    implements Copyable<Dataset, DatasetFields>, AuxDataCapable, Taggable, DataSourceCapable, Labelled {
    private readonly _aux: AuxData;
    private readonly _tags: TagSet;
    private readonly _source: DataSource;
    private readonly _label: Label;

    protected static override readonly registerOnConstruction: boolean = false;

    constructor(options: DatasetOptions) {
        super(options);
        this._aux = new AuxData(options.aux ?? {});
        this._tags = new TagSet(options.tags ?? []);
        this._source = new DataSource(options.isData ?? false);
        this._label = new Label(() => this.name, { label: options.label, labelShort: options.labelShort });
        this.Register();
    }

    public get isData(): boolean {
        return this._source.isData;
    }

    public set isData(isData: unknown) {
        this._source.isData = isData;
    }

    public get isMc(): boolean {
        return this._source.isMc;
    }

    public set isMc(isMc: unknown) {
        this._source.isMc = isMc;
    }

    public get dataSource(): DataSourceName {
        return this._source.dataSource;
    }

    /** The label, or the name when none is set. */
    public get label(): string | null {
        return this._label.text;
    }

    public set label(label: unknown) {
        this._label.text = label;
    }

    public get labelShort(): string | null {
        return this._label.short;
    }

    public set labelShort(labelShort: unknown) {
        this._label.short = labelShort;
    }

    public get labelRoot(): string | null {
        return this._label.root;
    }

    public get labelShortRoot(): string | null {
        return this._label.shortRoot;
    }

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

    /** Current field values; labels without their fallbacks. */
    public ToFields(): DatasetFields {
        return {
            name: this.name,
            id: this.id,
            context: [...this.contexts],
            isData: this.isData,
            label: this._label.explicit,
            labelShort: this._label.explicitShort,
            tags: this.tags,
            aux: this.aux,
        };
    }

    public Copy(request: DatasetCopyRequest = {}): Dataset {
        return this.CopyAs(draft => new Dataset({ ...RequireName(draft), registry: request.registry ?? this.registry }), request);
    }

    public CopyAs<TTarget>(target: (draft: Partial<DatasetFields>) => TTarget, request: CopyRequest<Dataset, DatasetFields> = {}): TTarget {
        return target(CopyDraft(this, DATASET_COPY_PLAN, request));
    }
}
