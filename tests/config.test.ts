import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig, resolveConfig } from '../src/config';
import { ConfigError } from '../src/errors';

const baseEnv = {
    LICENSE_BASE_URL: 'https://licenses.example.test/',
    LICENSE_API_KEY: 'ck_test',
    LICENSE_API_SECRET: 'test-secret',
};

describe('loadConfig', () => {
    let directory: string;

    beforeEach(() => {
        directory = mkdtempSync(join(tmpdir(), 'license-config-test-'));
    });

    afterEach(() => {
        rmSync(directory, { recursive: true, force: true });
        jest.restoreAllMocks();
    });

    it('should read the LICENSE_* environment variables', () => {
        expect(loadConfig({ env: baseEnv })).toEqual({
            baseUrl: 'https://licenses.example.test',
            apiKey: 'ck_test',
            apiSecret: 'test-secret',
            verifyTls: true,
            logLevel: 'info',
        });
    });

    it('should turn TLS verification off when insecure HTTP is allowed', () => {
        const config = loadConfig({ env: { ...baseEnv, LICENSE_ALLOW_INSECURE_HTTP: '1' } });
        expect(config.verifyTls).toBe(false);
    });

    it('should normalise the log level', () => {
        expect(loadConfig({ env: { ...baseEnv, LICENSE_LOG_LEVEL: 'DEBUG' } }).logLevel).toBe('debug');
    });

    it('should fall back to info on an unknown log level', () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

        expect(loadConfig({ env: { ...baseEnv, LICENSE_LOG_LEVEL: 'chatty' } }).logLevel).toBe('info');
        expect(warn).toHaveBeenCalledWith('[logger] Unknown log level "chatty", defaulting to "info"');
    });

    it('should throw ConfigError when a value is missing', () => {
        expect(() => loadConfig({ env: { ...baseEnv, LICENSE_API_SECRET: '' } })).toThrow(ConfigError);
        expect(() => loadConfig({ env: {} })).toThrow(
            'Missing license_base_url / license_api_key / license_api_secret in configuration'
        );
    });

    it('should prefer the config file over the environment', () => {
        const path = join(directory, 'license.json');
        writeFileSync(
            path,
            JSON.stringify({
                license_base_url: 'http://localhost:8080',
                license_api_key: 'ck_file',
                license_api_secret: 'test-secret',
                license_allow_insecure_http: true,
            })
        );

        expect(loadConfig({ configPath: path, env: baseEnv })).toEqual({
            baseUrl: 'http://localhost:8080',
            apiKey: 'ck_file',
            apiSecret: 'test-secret',
            verifyTls: false,
            logLevel: 'info',
        });
    });

    it('should take the file path from LICENSE_CONFIG_PATH', () => {
        const path = join(directory, 'license.json');
        writeFileSync(path, JSON.stringify({ ...fileSource(), license_api_key: 'ck_env_path' }));

        expect(loadConfig({ env: { LICENSE_CONFIG_PATH: path } }).apiKey).toBe('ck_env_path');
    });

    it('should fall back to the environment when the file does not exist', () => {
        expect(loadConfig({ configPath: join(directory, 'missing.json'), env: baseEnv }).apiKey).toBe('ck_test');
    });

    it('should reject a config file that is not JSON', () => {
        const path = join(directory, 'license.json');
        writeFileSync(path, 'license_base_url = nope');

        expect(() => loadConfig({ configPath: path, env: baseEnv })).toThrow(ConfigError);
    });
});

describe('resolveConfig', () => {
    it('should reject a base URL without an http scheme', () => {
        expect(() => resolveConfig({ ...fileSource(), license_base_url: 'ftp://licenses.example.test' })).toThrow(
            'Invalid license_base_url: ftp://licenses.example.test'
        );
    });

    it('should strip every trailing slash', () => {
        expect(resolveConfig({ ...fileSource(), license_base_url: ' https://licenses.example.test/// ' }).baseUrl).toBe(
            'https://licenses.example.test'
        );
    });
});

function fileSource() {
    return {
        license_base_url: 'https://licenses.example.test',
        license_api_key: 'ck_test',
        license_api_secret: 'test-secret',
        license_allow_insecure_http: false,
        license_log_level: null,
    };
}
