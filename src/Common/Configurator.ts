import type { ObjectSchema } from 'joi';
import { ConfigurationError } from './Errors.js';

/**
 * Configurator validates and stores configuration using a Joi schema.
 * @template T - The expected shape of the configuration object
 */
export class Configurator<T> {
    /** Joi schema used for validation */
    private readonly _schema: ObjectSchema<T>;
    /** Stored, validated configuration object */
    private _config: T;

    /**
     * Creates a Configurator.
     * @param schema ObjectSchema<T> - Joi schema for validating the configuration
     * @param rawConfig unknown - Raw configuration object to validate
     * @throws ConfigurationError wrapping the Joi.ValidationError if validation fails
     * @example
     * const schema = Joi.object({ autoIdStart: Joi.number().integer().min(0) });
     * const configurator = new Configurator(schema, { autoIdStart: 1 });
     */
    constructor(schema: ObjectSchema<T>, rawConfig: unknown) {
        this._schema = schema;
        this._config = this._validate(rawConfig);
    }

    /**
     * Retrieves the stored configuration.
     * @returns T - Validated configuration object
     */
    public getConfig(): T {
        return this._config;
    }

    /**
     * Updates the configuration by validating new raw configuration.
     * @param rawConfig unknown - New raw configuration to validate
     * @throws ConfigurationError if validation fails; the previous configuration is kept
     */
    public updateConfig(rawConfig: unknown): void {
        this._config = this._validate(rawConfig);
    }

    private _validate(rawConfig: unknown): T {
        const result = this._schema.validate(rawConfig);

        if (result.error) {
            throw new ConfigurationError(`Config validation error: ${result.error.message}`, { rawConfig }, result.error);
        }
        return result.value;
    }
}
