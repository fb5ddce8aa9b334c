import axios from 'axios';
import { LicenseClient, LicenseClientOptions, IDEMPOTENCY_GUARD_MESSAGE } from '../src/client';
import { ConfigError, ContractError, RequestError } from '../src/errors';
import { MemoryLockStore } from '../src/locks';
import { silentLogger } from './helpers';

jest.mock('axios');

const mockedAxiosInstance = {
    get: jest.fn(),
};
const mockedAxios = axios as jest.Mocked<typeof axios>;

const LICENSE_KEY = 'ABCD-1234-EFGH-5678';
const TOKEN = '0123456789abcdef0123';

const BASE_OPTIONS: LicenseClientOptions = {
    baseUrl: 'https://licenses.example.test/',
    apiKey: 'ck_test',
    apiSecret: 'cs_test',
    verifyTls: true,
};

const jsonResponse = (body: unknown, status = 200) => ({ status, headers: {}, data: JSON.stringify(body) });
const textResponse = (text: string, status: number) => ({ status, headers: {}, data: text });
const transportError = (message: string, code: string) => Object.assign(new Error(message), { code });

describe('LicenseClient', () => {
    let sleep: jest.Mock<Promise<void>, [number]>;
    let client: LicenseClient;

    const makeClient = (options: Partial<LicenseClientOptions> = {}) =>
        new LicenseClient({ ...BASE_OPTIONS, sleep, logger: silentLogger(), ...options });

    beforeEach(() => {
        jest.clearAllMocks();
        mockedAxios.create.mockReturnValue(mockedAxiosInstance as any);
        sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
        client = makeClient();
    });

    describe('Constructor', () => {
        it('should throw ConfigError if credentials are missing and no config source has them', () => {
            const env = { ...process.env };
            delete process.env.LICENSE_BASE_URL;
            delete process.env.LICENSE_API_KEY;
            delete process.env.LICENSE_API_SECRET;
            delete process.env.LICENSE_CONFIG_PATH;
            try {
                expect(() => new LicenseClient({ ...BASE_OPTIONS, apiSecret: '' })).toThrow(ConfigError);
                expect(() => new LicenseClient({ ...BASE_OPTIONS, baseUrl: '' })).toThrow(ConfigError);
            } finally {
                process.env = env;
            }
        });

        it('should reject a base URL that is not http(s)', () => {
            expect(() => makeClient({ baseUrl: 'ftp://licenses.example.test' })).toThrow(ConfigError);
        });

        it('should configure axios with auth, headers and timeout', () => {
            expect(mockedAxios.create).toHaveBeenCalledWith(
                expect.objectContaining({
                    baseURL: 'https://licenses.example.test',
                    timeout: 30000,
                    auth: { username: 'ck_test', password: 'cs_test' },
                    headers: expect.objectContaining({
                        Accept: 'application/json',
                        'Cache-Control': 'no-cache',
                        Pragma: 'no-cache',
                    }),
                })
            );
        });

        it('should expose defaults without the secret', () => {
            const { settings } = client;
            expect(settings.retryCount).toBe(3);
            expect(settings.backoff).toBe(2000);
            expect(settings.requestTimeout).toBe(30000);
            expect(settings.idempotencyWindowSeconds).toBe(8);
            expect('apiSecret' in settings).toBe(false);
        });
    });

    describe('input validation', () => {
        it('should reject malformed license keys before any request', async () => {
            await expect(client.validate('abc')).rejects.toThrow(ConfigError);
            await expect(client.validate('lower-case-key')).rejects.toThrow(ConfigError);
            await expect(client.deactivate('')).rejects.toThrow(ConfigError);
            expect(mockedAxiosInstance.get).not.toHaveBeenCalled();
        });

        it('should reject tokens that are not hex', async () => {
            await expect(client.activate(LICENSE_KEY, 'not-a-token')).rejects.toThrow(ConfigError);
            await expect(client.deactivate(LICENSE_KEY, 'abc')).rejects.toThrow(ConfigError);
            expect(mockedAxiosInstance.get).not.toHaveBeenCalled();
        });
    });

    describe('requests', () => {
        it('should call the validate endpoint with a cache-busting parameter and return data', async () => {
            const data = { licenseKey: LICENSE_KEY, expiresAt: '2030-01-01 00:00:00', timesActivated: 1 };
            mockedAxiosInstance.get.mockResolvedValue(jsonResponse({ success: true, data }));

            const result = await client.validate(LICENSE_KEY);

            expect(result).toEqual(data);
            expect(mockedAxiosInstance.get).toHaveBeenCalledTimes(1);
            expect(mockedAxiosInstance.get).toHaveBeenCalledWith(`/wp-json/lmfwc/v2/licenses/validate/${LICENSE_KEY}`, {
                params: { _: expect.any(String) },
            });
        });

        it('should send the token as a query parameter', async () => {
            mockedAxiosInstance.get.mockResolvedValue(jsonResponse({ data: {} }));

            await client.deactivate(LICENSE_KEY, ` ${TOKEN} `);

            expect(mockedAxiosInstance.get).toHaveBeenCalledWith(
                `/wp-json/lmfwc/v2/licenses/deactivate/${LICENSE_KEY}`,
                { params: { token: TOKEN, _: expect.any(String) } }
            );
        });

        it('should return the whole body when there is no data member', async () => {
            mockedAxiosInstance.get.mockResolvedValue(jsonResponse({ valid: true }));
            await expect(client.validate(LICENSE_KEY)).resolves.toEqual({ valid: true });
        });

        it('should route reactivate through activate with the token', async () => {
            mockedAxiosInstance.get.mockResolvedValue(jsonResponse({ data: { activationData: { token: TOKEN } } }));

            await client.reactivate(LICENSE_KEY, TOKEN);

            expect(mockedAxiosInstance.get).toHaveBeenCalledWith(`/wp-json/lmfwc/v2/licenses/activate/${LICENSE_KEY}`, {
                params: { token: TOKEN, _: expect.any(String) },
            });
        });
    });

    describe('idempotency guard', () => {
        it('should block a second activate with the same key and token without a request', async () => {
            mockedAxiosInstance.get.mockResolvedValue(jsonResponse({ data: {} }));

            await client.activate(LICENSE_KEY, TOKEN);
            const second = client.activate(LICENSE_KEY, TOKEN);

            await expect(second).rejects.toThrow(RequestError);
            await expect(second).rejects.toMatchObject({ status: 409, message: IDEMPOTENCY_GUARD_MESSAGE });
            expect(mockedAxiosInstance.get).toHaveBeenCalledTimes(1);
        });

        it('should let activations with different tokens through', async () => {
            mockedAxiosInstance.get.mockResolvedValue(jsonResponse({ data: {} }));

            await client.activate(LICENSE_KEY, TOKEN);
            await client.activate(LICENSE_KEY, 'fedcba9876543210fedc');

            expect(mockedAxiosInstance.get).toHaveBeenCalledTimes(2);
        });

        it('should release the guard once the window has passed', async () => {
            let now = 1_000_000;
            const guarded = makeClient({ lockStore: new MemoryLockStore(() => now) });
            mockedAxiosInstance.get.mockResolvedValue(jsonResponse({ data: {} }));

            await guarded.activate(LICENSE_KEY);
            now += 8_001;
            await guarded.activate(LICENSE_KEY);

            expect(mockedAxiosInstance.get).toHaveBeenCalledTimes(2);
        });

        it('should fail open when the lock store is unavailable', async () => {
            const lockStore = { setNx: jest.fn().mockRejectedValue(new Error('redis down')) };
            const guarded = makeClient({ lockStore });
            mockedAxiosInstance.get.mockResolvedValue(jsonResponse({ data: {} }));

            await guarded.activate(LICENSE_KEY, TOKEN);
            await guarded.activate(LICENSE_KEY, TOKEN);

            expect(mockedAxiosInstance.get).toHaveBeenCalledTimes(2);
            expect(lockStore.setNx).toHaveBeenCalledWith(`license-agent:activate-lock:${LICENSE_KEY}:0123456789abcdef`, 8);
        });

        it('should not guard validate or deactivate', async () => {
            mockedAxiosInstance.get.mockResolvedValue(jsonResponse({ data: {} }));

            await client.validate(LICENSE_KEY);
            await client.validate(LICENSE_KEY);
            await client.deactivate(LICENSE_KEY);
            await client.deactivate(LICENSE_KEY);

            expect(mockedAxiosInstance.get).toHaveBeenCalledTimes(4);
        });
    });

    describe('retries', () => {
        it('should retry transport failures with exponential backoff', async () => {
            mockedAxiosInstance.get
                .mockRejectedValueOnce(transportError('timeout of 30000ms exceeded', 'ECONNABORTED'))
                .mockRejectedValueOnce(transportError('connect ECONNREFUSED', 'ECONNREFUSED'))
                .mockResolvedValueOnce(jsonResponse({ data: { ok: 1 } }));

            const result = await client.validate(LICENSE_KEY);

            expect(result).toEqual({ ok: 1 });
            expect(mockedAxiosInstance.get).toHaveBeenCalledTimes(3);
            expect(sleep.mock.calls).toEqual([[2000], [4000]]);
        });

        it('should give up after the configured retries', async () => {
            mockedAxiosInstance.get.mockRejectedValue(transportError('timeout of 30000ms exceeded', 'ECONNABORTED'));

            const call = client.validate(LICENSE_KEY);

            await expect(call).rejects.toThrow(RequestError);
            await expect(call).rejects.toMatchObject({
                message: 'Network error: timeout of 30000ms exceeded',
                status: null,
            });
            expect(mockedAxiosInstance.get).toHaveBeenCalledTimes(4);
            expect(sleep.mock.calls).toEqual([[2000], [4000], [8000]]);
        });

        it('should not retry HTTP error responses', async () => {
            mockedAxiosInstance.get.mockResolvedValue(jsonResponse({ message: 'Server busy' }, 503));

            await expect(client.validate(LICENSE_KEY)).rejects.toMatchObject({ name: 'RequestError', status: 503 });
            expect(mockedAxiosInstance.get).toHaveBeenCalledTimes(1);
            expect(sleep).not.toHaveBeenCalled();
        });

        it('should retry and wrap TLS handshake failures', async () => {
            mockedAxiosInstance.get.mockRejectedValue(
                Object.assign(new Error('certificate has expired'), { code: 'CERT_HAS_EXPIRED', isAxiosError: true })
            );

            const call = client.validate(LICENSE_KEY);

            await expect(call).rejects.toThrow(RequestError);
            await expect(call).rejects.toMatchObject({
                message: 'Network error: certificate has expired',
                status: null,
            });
            expect(mockedAxiosInstance.get).toHaveBeenCalledTimes(4);
            expect(sleep.mock.calls).toEqual([[2000], [4000], [8000]]);
        });

        it('should treat any axios request error without a response as transport', async () => {
            mockedAxiosInstance.get
                .mockRejectedValueOnce(
                    Object.assign(new Error('Hostname/IP does not match certificate'), {
                        code: 'ERR_TLS_CERT_ALTNAME_INVALID',
                        isAxiosError: true,
                    })
                )
                .mockResolvedValueOnce(jsonResponse({ data: { ok: 1 } }));

            await expect(client.validate(LICENSE_KEY)).resolves.toEqual({ ok: 1 });
            expect(mockedAxiosInstance.get).toHaveBeenCalledTimes(2);
            expect(sleep.mock.calls).toEqual([[2000]]);
        });
    });

    describe('response contract', () => {
        it('should raise RequestError with the message field on HTTP errors', async () => {
            const payload = { code: 'lmfwc_rest_data_error', message: 'License not found', data: { status: 404 } };
            mockedAxiosInstance.get.mockResolvedValue(jsonResponse(payload, 404));

            await expect(client.validate(LICENSE_KEY)).rejects.toMatchObject({
                name: 'RequestError',
                message: 'License not found',
                status: 404,
                payload,
            });
        });

        it('should fall back to the first string in a list field', async () => {
            mockedAxiosInstance.get.mockResolvedValue(jsonResponse({ errors: [42, 'Key is malformed'] }, 422));

            await expect(client.validate(LICENSE_KEY)).rejects.toMatchObject({ message: 'Key is malformed', status: 422 });
        });

        it('should wrap non-JSON error bodies', async () => {
            mockedAxiosInstance.get.mockResolvedValue(textResponse('Internal Server Error', 500));

            await expect(client.validate(LICENSE_KEY)).rejects.toMatchObject({
                message: 'HTTP 500',
                status: 500,
                payload: { raw: 'Internal Server Error' },
            });
        });

        it('should raise ContractError for errors embedded in a 200 body', async () => {
            const body = {
                success: true,
                data: {
                    errors: { lmfwc_rest_license_expired: ['The license Key expired on 2025-10-10 00:00:00 (UTC).'] },
                    error_data: { lmfwc_rest_license_expired: { status: 410 } },
                },
            };
            mockedAxiosInstance.get.mockResolvedValue(jsonResponse(body));

            const call = client.activate(LICENSE_KEY);

            await expect(call).rejects.toThrow(ContractError);
            await expect(call).rejects.toMatchObject({
                message: 'The license Key expired on 2025-10-10 00:00:00 (UTC).',
                status: 410,
                code: 'lmfwc_rest_license_expired',
                payload: body,
            });
        });

        it('should use a generic message when the embedded error has none', async () => {
            mockedAxiosInstance.get.mockResolvedValue(jsonResponse({ data: { error_data: { some_code: { status: '403' } } } }));

            await expect(client.validate(LICENSE_KEY)).rejects.toMatchObject({
                name: 'ContractError',
                message: 'Operation failed',
                status: 403,
                code: 'some_code',
            });
        });

        it('should raise ContractError for a non-JSON success body', async () => {
            mockedAxiosInstance.get.mockResolvedValue(textResponse('<html>maintenance</html>', 200));

            const call = client.validate(LICENSE_KEY);
            await expect(call).rejects.toThrow(ContractError);
            await expect(call).rejects.toThrow(/^Invalid JSON response/);
        });
    });
});
