/**
 * Error taxonomy for the object-metadata framework.
 * Provides a structured hierarchy with machine-readable codes, preserving original causes, and
 * optional metadata for diagnostics.
 *
 * Conventions:
 * - Class names are PascalCase.
 * - Error codes are SNAKE_CASE and globally unique.
 * - Each error includes `code`, optional `details`, and optional `cause` chain.
 * - Use specific subclasses instead of the base `AppError` wherever possible.
 */

/** Well-known error codes. */
export const ERROR_CODES = {
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    DUPLICATE_OBJECT: 'DUPLICATE_OBJECT',
    OBJECT_NOT_FOUND: 'OBJECT_NOT_FOUND',
    CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
    ATTRIBUTE_ERROR: 'ATTRIBUTE_ERROR',
} as const;

/** Union type of all known error code string literals. */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Structured error metadata (object identifiers, offending values, ...). */
export type ErrorDetails = Record<string, unknown>;

/**
 * Base application error carrying a machine code and structured details.
 */
export class AppError extends Error {
    /** Machine readable error code (SNAKE_CASE). */
    public readonly code: ErrorCode;
    /** Arbitrary structured metadata for diagnostics. */
    public readonly details?: ErrorDetails;

    /**
     * Constructs a new AppError.
     * @param code ErrorCode - Machine error code (see ERROR_CODES)
     * @param message string - Human readable summary
     * @param details ErrorDetails|undefined - Additional structured context
     * @param cause unknown - Original error object or value
     */
    constructor(code: ErrorCode, message: string, details?: ErrorDetails, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = new.target.name;
        this.code = code;
        this.details = details;
        // Maintain proper prototype chain (TS/JS quirk)
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * ValidationError indicates a value of the wrong type or shape was given to a typed property
 * or constructor. `details.kind` is `type` for a wrong type and `value` for a wrong value.
 */
export class ValidationError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.VALIDATION_ERROR, message, details, cause);
    }
}

/** DuplicateObjectError signals a name or id collision while registering in a context. */
export class DuplicateObjectError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.DUPLICATE_OBJECT, message, details);
    }
}

/** ObjectNotFoundError when a lookup or removal misses. */
export class ObjectNotFoundError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.OBJECT_NOT_FOUND, message, details);
    }
}

/** ConfigurationError for an invalid mode, dialect, context name or framework setting. */
export class ConfigurationError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.CONFIGURATION_ERROR, message, details, cause);
    }
}

/** AttributeError when a typed property is read before initialisation or written while read-only. */
export class AttributeError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.ATTRIBUTE_ERROR, message, details);
    }
}

/**
 * Renders an arbitrary value for error messages.
 * @param value unknown - Offending value
 * @returns string - Short printable form
 * @example
 * describeValue([1, 2]); // '[1,2]'
 */
export function describeValue(value: unknown): string {
    if (typeof value === `string`) {
        return `'${value}'`;
    }
    if (typeof value === `function`) {
        return `[function ${value.name || `anonymous`}]`;
    }
    try {
        const json = JSON.stringify(value);
        return json === undefined ? String(value) : json;
    } catch {
        return String(value);
    }
}
