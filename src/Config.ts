/**
 * Framework configuration: defaults, Joi schema, and loading from JSON or YAML files.
 */

import Joi from 'joi';
import { readConfigFile } from './Common/ConfigReader.js';
import { Configurator } from './Common/Configurator.js';
import { SetLogLevel } from './Common/Log.js';
import type { FrameworkConfig } from './Types/Config.js';

/** Name of the context objects join when none is requested. */
export const DEFAULT_CONTEXT = `default`;

export const DEFAULT_CONFIG: FrameworkConfig = {
    defaultContext: DEFAULT_CONTEXT,
    autoIdStart: 0,
    logLevel: `info`,
};

/** Joi schema for FrameworkConfig; missing keys fall back to DEFAULT_CONFIG. */
export const FRAMEWORK_CONFIG_SCHEMA = Joi.object<FrameworkConfig>({
    defaultContext: Joi.string().min(1).default(DEFAULT_CONFIG.defaultContext),
    autoIdStart: Joi.number().integer().min(0).default(DEFAULT_CONFIG.autoIdStart),
    logLevel: Joi.string().valid(`debug`, `info`, `warn`, `error`).default(DEFAULT_CONFIG.logLevel),
})
    .empty(null)
    .default();

/**
 * Validates a raw configuration object.
 * @param rawConfig unknown - Partial settings, e.g. `{ autoIdStart: 1 }`
 * @returns FrameworkConfig - Complete configuration
 * @throws ConfigurationError when a setting is invalid
 * @example
 * const config = CreateConfig({ defaultContext: 'analysis' });
 */
export function CreateConfig(rawConfig: unknown = {}): FrameworkConfig {
    return new Configurator(FRAMEWORK_CONFIG_SCHEMA, rawConfig).getConfig();
}

/**
 * Loads, validates and applies a configuration file. The log level takes effect immediately.
 * @param configPath string - Path to configuration file (JSON or YAML format)
 * @returns Promise<FrameworkConfig> - Parsed and validated configuration object
 * @example
 * const config = await LoadConfig('./registry.yaml');
 * const registry = new ContextRegistry(config);
 */
export async function LoadConfig(configPath: string): Promise<FrameworkConfig> {
    const parsedConfig = await readConfigFile(configPath);
    const config = CreateConfig(parsedConfig);
    SetLogLevel(config.logLevel);
    return config;
}
