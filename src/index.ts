/**
 * Public entry point of the object-metadata framework.
 */

export * from './Domain/index.js';

export { ContextRegistry, DEFAULT_REGISTRY } from './Services/ContextRegistry.js';
export { UniqueObjectIndex } from './Repository/UniqueObjectIndex.js';
export type { ObjectKey, RemoveOptions } from './Repository/UniqueObjectIndex.js';
export { RegistryEventBus } from './Events/RegistryEventBus.js';
export type { ContextEventPayload, ObjectEventPayload, RegistryEventMap } from './Events/RegistryEventBus.js';

export { CreateConfig, DEFAULT_CONFIG, DEFAULT_CONTEXT, FRAMEWORK_CONFIG_SCHEMA, LoadConfig } from './Config.js';
export type { FrameworkConfig } from './Types/Config.js';

export {
    AppError,
    AttributeError,
    ConfigurationError,
    DuplicateObjectError,
    ERROR_CODES,
    ObjectNotFoundError,
    ValidationError,
} from './Common/Errors.js';
export type { ErrorCode, ErrorDetails } from './Common/Errors.js';
export { GetLogLevel, LogLevel, SetLogLevel } from './Common/Log.js';
export type { LogLevelName } from './Common/Log.js';

export { SchemaParser, TypedProperty } from './Common/TypedProperty.js';
export type { PropertyParser, TypedPropertyOptions } from './Common/TypedProperty.js';
export {
    InvertSelection,
    JoinNumexprSelection,
    JoinRootSelection,
    JoinSelection,
    ResolveSelectionMode,
    SELECTION_MODES,
    TRUE_SELECTION,
} from './Common/Selection.js';
export type { JoinSelectionOptions, SelectionInput, SelectionMode } from './Common/Selection.js';
export { ToRootLatex } from './Common/Latex.js';
export { MakeList, MultiMatch } from './Common/Match.js';
export type { MatchDialect, MatchMode, MultiMatchOptions } from './Common/Match.js';
