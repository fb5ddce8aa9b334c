import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigError } from './errors';
import { parseLogLevel } from './logger';
import { ClientConfig } from './types';

const flag = z
    .union([z.boolean(), z.number(), z.string()])
    .nullish()
    .transform((value) => {
        if (value === null || value === undefined) return false;
        if (typeof value === 'boolean') return value;
        if (typeof value === 'number') return value !== 0;
        return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
    });

export const ConfigSourceSchema = z.object({
    license_base_url: z.string().nullish(),
    license_api_key: z.string().nullish(),
    license_api_secret: z.string().nullish(),
    license_allow_insecure_http: flag,
    license_log_level: z.string().nullish(),
});

export type ConfigSource = z.infer<typeof ConfigSourceSchema>;

export interface LoadConfigOptions {
    /** JSON file holding the `license_*` keys. Defaults to `LICENSE_CONFIG_PATH`. */
    configPath?: string;
    env?: NodeJS.ProcessEnv;
}

function readConfigFile(path: string): unknown {
    let raw: string;
    try {
        raw = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new ConfigError(`Failed to read config file ${path}: ${(error as Error).message}`);
    }
    try {
        return JSON.parse(raw || '{}');
    } catch (error) {
        throw new ConfigError(`Config file ${path} is not valid JSON: ${(error as Error).message}`);
    }
}

function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
    return {
        license_base_url: env.LICENSE_BASE_URL,
        license_api_key: env.LICENSE_API_KEY,
        license_api_secret: env.LICENSE_API_SECRET,
        license_allow_insecure_http: env.LICENSE_ALLOW_INSECURE_HTTP,
        license_log_level: env.LICENSE_LOG_LEVEL,
    };
}

/**
 * Resolves the client configuration. A config file wins when one is present;
 * otherwise the `LICENSE_*` environment variables are read.
 */
export function loadConfig(options: LoadConfigOptions = {}): ClientConfig {
    const env = options.env ?? process.env;
    const configPath = options.configPath ?? env.LICENSE_CONFIG_PATH;

    const raw = configPath && existsSync(configPath) ? readConfigFile(configPath) : fromEnv(env);
    const parsed = ConfigSourceSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(`Invalid license configuration: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    }

    return resolveConfig(parsed.data);
}

export function resolveConfig(source: ConfigSource): ClientConfig {
    const baseUrl = source.license_base_url?.trim();
    const apiKey = source.license_api_key?.trim();
    const apiSecret = source.license_api_secret?.trim();

    if (!baseUrl || !apiKey || !apiSecret) {
        throw new ConfigError('Missing license_base_url / license_api_key / license_api_secret in configuration');
    }
    if (!baseUrl.startsWith('http')) {
        throw new ConfigError(`Invalid license_base_url: ${baseUrl}`);
    }

    return {
        baseUrl: baseUrl.replace(/\/+$/, ''),
        apiKey,
        apiSecret,
        verifyTls: !source.license_allow_insecure_http,
        logLevel: parseLogLevel(source.license_log_level),
    };
}
