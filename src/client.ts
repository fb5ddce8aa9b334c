import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { Agent } from 'https';
import { loadConfig } from './config';
import { ConfigError, ContractError, RequestError } from './errors';
import { LockStore, MemoryLockStore } from './locks';
import { compactJson, createLogger, Logger, maskToken } from './logger';
import { ClientConfig, LicenseOperation, ResponseData } from './types';

const DEFAULT_API_PATH = '/wp-json/lmfwc/v2/licenses';
const DEFAULT_REQUEST_TIMEOUT = 30_000;
const DEFAULT_RETRY_COUNT = 3;
const DEFAULT_BACKOFF = 2_000;
const DEFAULT_IDEMPOTENCY_WINDOW_SECONDS = 8;
const DEFAULT_USER_AGENT = 'entitlement-agent/0.1 (+node)';
const DEFAULT_ERROR_CODE = 'lmfwc_error';

export const IDEMPOTENCY_GUARD_MESSAGE = 'Duplicate activate blocked by idempotency guard';

const LICENSE_KEY_PATTERN = /^[A-Z0-9-]{10,}$/;
const TOKEN_PATTERN = /^[A-Fa-f0-9]{16,128}$/;

// Socket-level failure codes, recognised even on errors that did not come
// through axios.
const TRANSPORT_ERROR_CODES = new Set([
    'ECONNABORTED',
    'ETIMEDOUT',
    'ECONNREFUSED',
    'ECONNRESET',
    'ENOTFOUND',
    'EAI_AGAIN',
    'EHOSTUNREACH',
    'ENETUNREACH',
    'EPIPE',
    'ERR_NETWORK',
]);

/**
 * The remote operations the lifecycle controller depends on.
 */
export interface LicenseApi {
    activate(licenseKey: string, token?: string): Promise<ResponseData>;
    deactivate(licenseKey: string, token?: string): Promise<ResponseData>;
    validate(licenseKey: string): Promise<ResponseData>;
}

export interface LicenseClientOptions extends Partial<ClientConfig> {
    /** Read when any of baseUrl / apiKey / apiSecret / verifyTls is not given. */
    configPath?: string;
    apiPath?: string;
    requestTimeout?: number;
    retryCount?: number;
    /** Base delay; attempt n waits `backoff * 2^n` ms. */
    backoff?: number;
    idempotencyWindowSeconds?: number;
    userAgent?: string;
    lockStore?: LockStore;
    sleep?: (ms: number) => Promise<void>;
    logger?: Logger;
}

type ResolvedOptions = ClientConfig &
    Required<Pick<LicenseClientOptions, 'apiPath' | 'requestTimeout' | 'retryCount' | 'backoff' | 'idempotencyWindowSeconds' | 'userAgent'>>;

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * True for failures where no response arrived (timeouts, DNS, refused or reset
 * connections, TLS handshake errors). With `validateStatus` accepting every
 * status, each axios request error is one of these. Only these are retried.
 */
function isTransportError(error: unknown): error is Error {
    if (!(error instanceof Error)) return false;
    if ('response' in error && error.response) return false;
    if ('isAxiosError' in error && error.isAxiosError === true) return true;
    return 'code' in error && typeof error.code === 'string' && TRANSPORT_ERROR_CODES.has(error.code);
}

export function isIdempotencyGuardError(error: unknown): error is RequestError {
    return error instanceof RequestError && error.status === 409 && /idempotency guard/i.test(error.message);
}

export class LicenseClient implements LicenseApi {
    private config: ResolvedOptions;
    private apiClient: AxiosInstance;
    private lockStore: LockStore;
    private sleep: (ms: number) => Promise<void>;
    private log: Logger;

    constructor(options: LicenseClientOptions = {}) {
        const needsConfig =
            !options.baseUrl || !options.apiKey || !options.apiSecret || options.verifyTls === undefined;
        const fallback = needsConfig ? loadConfig({ configPath: options.configPath }) : undefined;

        const baseUrl = options.baseUrl ?? fallback?.baseUrl;
        const apiKey = options.apiKey ?? fallback?.apiKey;
        const apiSecret = options.apiSecret ?? fallback?.apiSecret;

        if (!baseUrl || !baseUrl.startsWith('http') || !apiKey || !apiSecret) {
            throw new ConfigError('baseUrl (http/https), apiKey and apiSecret are required');
        }

        this.config = {
            baseUrl: baseUrl.replace(/\/+$/, ''),
            apiKey,
            apiSecret,
            verifyTls: options.verifyTls ?? fallback?.verifyTls ?? true,
            logLevel: options.logLevel ?? fallback?.logLevel ?? 'info',
            apiPath: options.apiPath ?? DEFAULT_API_PATH,
            requestTimeout: options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT,
            retryCount: options.retryCount ?? DEFAULT_RETRY_COUNT,
            backoff: options.backoff ?? DEFAULT_BACKOFF,
            idempotencyWindowSeconds: options.idempotencyWindowSeconds ?? DEFAULT_IDEMPOTENCY_WINDOW_SECONDS,
            userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
        };
        this.lockStore = options.lockStore ?? new MemoryLockStore();
        this.sleep = options.sleep ?? defaultSleep;
        this.log = options.logger ?? createLogger('LicenseClient', this.config.logLevel);

        this.apiClient = axios.create({
            baseURL: this.config.baseUrl,
            timeout: this.config.requestTimeout,
            headers: {
                Accept: 'application/json',
                'User-Agent': this.config.userAgent,
                'Cache-Control': 'no-cache',
                Pragma: 'no-cache',
            },
            auth: {
                username: this.config.apiKey,
                password: this.config.apiSecret,
            },
            httpsAgent: new Agent({ rejectUnauthorized: this.config.verifyTls }),
            responseType: 'text',
            transformResponse: (data: unknown) => data,
            validateStatus: () => true,
        });

        this.log.info(
            `init: baseUrl=${this.config.baseUrl} verifyTls=${this.config.verifyTls} timeout=${this.config.requestTimeout}ms`
        );
    }

    public get settings(): Readonly<Omit<ResolvedOptions, 'apiSecret'>> {
        const { apiSecret: _secret, ...rest } = this.config;
        return rest;
    }

    public async activate(licenseKey: string, token?: string): Promise<ResponseData> {
        this.assertLicenseKey(licenseKey);
        const cleanToken = token === undefined ? undefined : this.assertToken(token);

        const lockKey = `license-agent:activate-lock:${licenseKey}:${(cleanToken ?? 'none').slice(0, 16)}`;
        this.log.info(`activate: key=${licenseKey} token=${maskToken(cleanToken)} lock=${lockKey}`);
        if (!(await this.acquireGuard(lockKey))) {
            this.log.error('activate: idempotency guard hit');
            throw new RequestError(IDEMPOTENCY_GUARD_MESSAGE, 409);
        }

        const data = await this.request('activate', licenseKey, cleanToken);
        this.log.info(`activate: response=${compactJson(data)}`);
        return data;
    }

    public async reactivate(licenseKey: string, token: string): Promise<ResponseData> {
        this.log.info(`reactivate: key=${licenseKey} token=${maskToken(token)}`);
        return this.activate(licenseKey, token);
    }

    public async deactivate(licenseKey: string, token?: string): Promise<ResponseData> {
        this.assertLicenseKey(licenseKey);
        const cleanToken = token === undefined ? undefined : this.assertToken(token);
        this.log.info(`deactivate: key=${licenseKey} token=${maskToken(cleanToken)}`);

        const data = await this.request('deactivate', licenseKey, cleanToken);
        this.log.info(`deactivate: response=${compactJson(data)}`);
        return data;
    }

    public async validate(licenseKey: string): Promise<ResponseData> {
        this.assertLicenseKey(licenseKey);
        this.log.info(`validate: key=${licenseKey}`);

        const data = await this.request('validate', licenseKey);
        this.log.info(`validate: response=${compactJson(data)}`);
        return data;
    }

    private assertLicenseKey(licenseKey: string): void {
        if (typeof licenseKey !== 'string' || !licenseKey) {
            throw new ConfigError('license key must be a non-empty string');
        }
        if (!LICENSE_KEY_PATTERN.test(licenseKey)) {
            this.log.error(`invalid license key format: ${licenseKey}`);
            throw new ConfigError('license key format looks invalid (expected A-Z, 0-9 and dashes)');
        }
    }

    private assertToken(token: string): string {
        const trimmed = typeof token === 'string' ? token.trim() : '';
        if (!trimmed) {
            throw new ConfigError('token must be a non-empty string');
        }
        if (!TOKEN_PATTERN.test(trimmed)) {
            this.log.error(`invalid token format: ${maskToken(trimmed)}`);
            throw new ConfigError('token format looks invalid (expected a hex string)');
        }
        return trimmed;
    }

    private async acquireGuard(key: string): Promise<boolean> {
        try {
            const acquired = await this.lockStore.setNx(key, this.config.idempotencyWindowSeconds);
            this.log.debug(`guard: key=${key} ttl=${this.config.idempotencyWindowSeconds}s acquired=${acquired}`);
            return acquired;
        } catch (error) {
            // Fail open: a lock store outage must not block activation.
            this.log.warn(`guard: lock store failed (${(error as Error).message}); proceeding`);
            return true;
        }
    }

    private async request(operation: LicenseOperation, licenseKey: string, token?: string): Promise<ResponseData> {
        const path = `${this.config.apiPath}/${operation}/${encodeURIComponent(licenseKey)}`;

        for (let attempt = 0; ; attempt++) {
            const params: Record<string, string> = token ? { token } : {};
            params._ = String(Date.now());
            this.log.debug(`GET ${path} token=${maskToken(token)} attempt=${attempt}`);

            let response: AxiosResponse<unknown>;
            try {
                response = await this.apiClient.get<unknown>(path, { params });
            } catch (error) {
                if (!isTransportError(error)) throw error;

                this.log.warn(`network error on GET ${path} attempt=${attempt}/${this.config.retryCount}: ${error.message}`);
                if (attempt >= this.config.retryCount) {
                    throw new RequestError(`Network error: ${error.message}`, null, {}, error);
                }
                await this.sleep(this.config.backoff * 2 ** attempt);
                continue;
            }

            this.log.debug(`HTTP ${response.status} ${path}`);
            return this.handleResponse(response);
        }
    }

    private handleResponse(response: AxiosResponse<unknown>): ResponseData {
        const { status } = response;
        const text = typeof response.data === 'string' ? response.data : '';
        const parsed = parseBody(response.data);

        if (status >= 400) {
            const payload = parsed.ok && isRecord(parsed.body) ? parsed.body : { raw: text };
            const message = extractHttpErrorMessage(payload) ?? `HTTP ${status}`;
            this.log.error(`http error: status=${status} message=${message} payload=${compactJson(payload)}`);
            throw new RequestError(message, status, payload);
        }

        if (!parsed.ok) {
            this.log.error(`invalid json: ${parsed.error}; raw=${compactJson(text)}`);
            throw new ContractError(`Invalid JSON response: ${parsed.error}`, status, { raw: text });
        }

        const body = parsed.body;
        if (isRecord(body) && 'data' in body) {
            const data = body.data;
            if (isRecord(data) && ('errors' in data || 'error_data' in data)) {
                const { code, message, status: errorStatus } = extractEmbeddedError(data.errors, data.error_data);
                const errorMessage = message ?? 'Operation failed';
                this.log.error(
                    `contract error: code=${code} status=${errorStatus} message=${errorMessage} body=${compactJson(body)}`
                );
                throw new ContractError(errorMessage, errorStatus, body, code);
            }
            if (isRecord(data) || Array.isArray(data)) {
                return data;
            }
            return body;
        }

        if (isRecord(body) || Array.isArray(body)) {
            this.log.debug(`non-wrapper body=${compactJson(body)}`);
            return body;
        }

        throw new ContractError('Unexpected response body', status, { raw: text });
    }
}

type ParsedBody = { ok: true; body: unknown } | { ok: false; error: string };

function parseBody(data: unknown): ParsedBody {
    if (typeof data !== 'string') {
        return data === undefined || data === null ? { ok: false, error: 'empty body' } : { ok: true, body: data };
    }
    try {
        return { ok: true, body: JSON.parse(data) };
    } catch (error) {
        return { ok: false, error: (error as Error).message };
    }
}

/**
 * `message` when present, otherwise the first string inside any list-valued field.
 */
export function extractHttpErrorMessage(payload: Record<string, unknown>): string | null {
    if (payload.message) {
        return String(payload.message);
    }
    for (const value of Object.values(payload)) {
        if (!Array.isArray(value)) continue;
        const first = value.find((item): item is string => typeof item === 'string');
        if (first !== undefined) return first;
    }
    return null;
}

export function extractEmbeddedError(
    errors: unknown,
    errorData: unknown
): { code: string; message: string | null; status: number | null } {
    const errorMap = isRecord(errors) ? errors : {};
    const dataMap = isRecord(errorData) ? errorData : {};
    const code = Object.keys(errorMap)[0] ?? Object.keys(dataMap)[0] ?? DEFAULT_ERROR_CODE;

    const messages = errorMap[code];
    const message = Array.isArray(messages) && messages.length > 0 ? String(messages[0]) : null;

    let status: number | null = null;
    const detail = dataMap[code];
    if (isRecord(detail) && 'status' in detail) {
        const parsed = Number.parseInt(String(detail.status), 10);
        status = Number.isNaN(parsed) ? null : parsed;
    }

    return { code, message, status };
}
