import { describe, it, expect, afterEach, vi } from 'vitest';
import { fileURLToPath } from 'node:url';
import Joi from 'joi';
import { CreateConfig, DEFAULT_CONFIG, LoadConfig } from '../src/Config.js';
import { readConfigFile } from '../src/Common/ConfigReader.js';
import { Configurator } from '../src/Common/Configurator.js';
import { AppError, ConfigurationError, ValidationError, describeValue } from '../src/Common/Errors.js';
import { GetLogLevel, LogLevel, SetLogLevel, log } from '../src/Common/Log.js';

function Fixture(name: string): string {
    return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

describe('Configuration', () => {
    afterEach(() => {
        SetLogLevel(`error`);
    });

    it('should fill missing settings with defaults', () => {
        expect(CreateConfig()).toEqual(DEFAULT_CONFIG);
        expect(CreateConfig({ autoIdStart: 1 })).toEqual({ defaultContext: `default`, autoIdStart: 1, logLevel: `info` });
    });

    it('should reject invalid and unknown settings', () => {
        expect(() => CreateConfig({ autoIdStart: -1 })).toThrow(ConfigurationError);
        expect(() => CreateConfig({ logLevel: `loud` })).toThrow(ConfigurationError);
        expect(() => CreateConfig({ colour: `red` })).toThrow(ConfigurationError);
    });

    it('should keep the previous configuration when an update fails', () => {
        const configurator = new Configurator(Joi.object<{ size: number }>({ size: Joi.number().required() }), { size: 1 });

        expect(() => configurator.updateConfig({ size: `big` })).toThrow(ConfigurationError);
        expect(configurator.getConfig()).toEqual({ size: 1 });
    });

    it('should load YAML files and apply the log level', async () => {
        SetLogLevel(`debug`);
        const config = await LoadConfig(Fixture(`registry.yaml`));

        expect(config).toEqual({ defaultContext: `analysis`, autoIdStart: 1, logLevel: `error` });
        expect(GetLogLevel()).toBe(LogLevel.Error);
    });

    it('should load JSON files', async () => {
        const config = await LoadConfig(Fixture(`registry.json`));

        expect(config).toEqual({ defaultContext: `study`, autoIdStart: 0, logLevel: `error` });
    });

    it('should reject broken, invalid and unsupported files', async () => {
        await expect(readConfigFile(Fixture(`invalid.json`))).rejects.toThrow(ConfigurationError);
        await expect(LoadConfig(Fixture(`invalid-values.yaml`))).rejects.toThrow(ConfigurationError);
        await expect(readConfigFile(Fixture(`registry.toml`))).rejects.toThrow(ConfigurationError);
        await expect(readConfigFile(Fixture(`missing.json`))).rejects.toThrow(ConfigurationError);
    });
});

describe('Log', () => {
    afterEach(() => {
        SetLogLevel(`error`);
        vi.restoreAllMocks();
    });

    it('should format messages with level, source and context', () => {
        const spy = vi.spyOn(console, `error`).mockImplementation(() => undefined);
        log.error(`boom`, `Test`, `default`);

        expect(spy).toHaveBeenCalledTimes(1);
        expect(spy.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[ERROR\] \[Test\] \[default\] boom$/);
    });

    it('should drop messages below the threshold', () => {
        const spy = vi.spyOn(console, `info`).mockImplementation(() => undefined);
        log.info(`hidden`, `Test`);
        SetLogLevel(`info`);
        log.info(`shown`, `Test`);

        expect(spy).toHaveBeenCalledTimes(1);
    });
});

describe('Errors', () => {
    it('should carry code, name and cause', () => {
        const cause = new Error(`inner`);
        const err = new ValidationError(`bad value`, { kind: `value` }, cause);

        expect(err).toBeInstanceOf(AppError);
        expect(err.name).toBe(`ValidationError`);
        expect(err.code).toBe(`VALIDATION_ERROR`);
        expect(err.cause).toBe(cause);
    });

    it('should describe values for messages', () => {
        expect(describeValue(`a`)).toBe(`'a'`);
        expect(describeValue([1, 2])).toBe(`[1,2]`);
        expect(describeValue(undefined)).toBe(`undefined`);
        expect(describeValue(function parse() {})).toBe(`[function parse]`);
    });
});
