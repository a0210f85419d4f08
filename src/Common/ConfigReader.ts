/**
 * Reads framework configuration files. This is a generic reader, not tied to the registry or any
 * event bus; validation happens in the Configurator.
 */
import { readFile } from 'fs/promises';
import { ConfigurationError } from './Errors.js';

/**
 * Loads and parses a config file (JSON or YAML).
 * @param configPath string - Path to config file (e.g. './registry.yaml')
 * @returns Promise<unknown> - Parsed, not yet validated config object
 * @throws ConfigurationError if the extension is unsupported, or reading or parsing fails
 * @example
 * const raw = await readConfigFile('./registry.json');
 */
export async function readConfigFile(configPath: string): Promise<unknown> {
    const isJson = configPath.endsWith('.json');
    const isYaml = configPath.endsWith('.yaml') || configPath.endsWith('.yml');

    if (!isJson && !isYaml) {
        throw new ConfigurationError('Unsupported config file format. Use .json or .yaml', { configPath });
    }
    let raw: string;
    try {
        raw = await readFile(configPath, 'utf-8');
    } catch(err) {
        throw new ConfigurationError(`Cannot read config file ${configPath}`, { configPath }, err);
    }

    if (isJson) {
        try {
            return JSON.parse(raw);
        } catch(err) {
            throw new ConfigurationError(`Invalid JSON in config file ${configPath}`, { configPath }, err);
        }
    }
    // Lazy-load yaml parser only if needed
    const yaml = await import('js-yaml');
    try {
        return yaml.load(raw);
    } catch(err) {
        throw new ConfigurationError(`Invalid YAML in config file ${configPath}`, { configPath }, err);
    }
}
