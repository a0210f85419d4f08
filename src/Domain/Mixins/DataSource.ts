import Joi from 'joi';
import { SchemaParser, TypedProperty } from '../../Common/TypedProperty.js';

export type DataSourceName = `data` | `mc`;

/** Capability of objects that describe either real data or simulation. */
export interface DataSourceCapable {
    isData: boolean;
    isMc: boolean;
    readonly dataSource: DataSourceName;
}

const isDataProperty = new TypedProperty<boolean, DataSource>(
    `is_data`,
    SchemaParser(`is_data`, Joi.boolean().strict()),
    { deleter: false },
);

const parseIsMc = SchemaParser(`is_mc`, Joi.boolean().strict());

/**
 * Data/simulation flag. `isData` and `isMc` are two views of one boolean.
 * @example
 * const source = new DataSource();
 * source.dataSource; // 'mc'
 * source.isMc = false;
 * source.dataSource; // 'data'
 */
export class DataSource {
    constructor(isData: unknown = false) {
        isDataProperty.Init(this, isData);
    }

    public get isData(): boolean {
        return isDataProperty.Get(this);
    }

    public set isData(isData: unknown) {
        isDataProperty.Set(this, isData);
    }

    public get isMc(): boolean {
        return !this.isData;
    }

    public set isMc(isMc: unknown) {
        isDataProperty.Set(this, !parseIsMc(this, isMc));
    }

    public get dataSource(): DataSourceName {
        return this.isData ? `data` : `mc`;
    }
}
