/**
 * Domain entities and capability components.
 */

// Identity
export { AUTO_ID, RequireName, UniqueObject } from './UniqueObject.js';
export type { AutoId, LookupOptions, UniqueClass, UniqueObjectOptions } from './UniqueObject.js';

// Entities
export { Variable, VARIABLE_COPY_PLAN } from './Variable.js';
export type { Binning, FullTitleOptions, TitleOptions, VariableCopyRequest, VariableFields, VariableOptions, YTitleOptions } from './Variable.js';
export { Dataset, DATASET_COPY_PLAN } from './Dataset.js';
export type { DatasetCopyRequest, DatasetFields, DatasetOptions } from './Dataset.js';

// Capabilities
export { AuxData } from './Mixins/AuxData.js';
export type { AuxDataCapable, AuxInput } from './Mixins/AuxData.js';
export { CopyDraft, DeepClone } from './Mixins/Copy.js';
export type { Copyable, CopyCallback, CopyPlan, CopyRequest } from './Mixins/Copy.js';
export { DataSource } from './Mixins/DataSource.js';
export type { DataSourceCapable, DataSourceName } from './Mixins/DataSource.js';
export { Label, ParseOptionalString } from './Mixins/Label.js';
export type { Labelled } from './Mixins/Label.js';
export { SelectionRule } from './Mixins/Selection.js';
export type { Selectable } from './Mixins/Selection.js';
export { TagSet } from './Mixins/Tag.js';
export type { TagInput, Taggable } from './Mixins/Tag.js';

// Event names
export { EVENT_NAMES } from './Utility.js';
export type { EventName } from './Utility.js';
