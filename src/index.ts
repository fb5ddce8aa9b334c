import { isIdempotencyGuardError, LicenseApi } from './client';
import { ContractError, isApiError, LicenseAgentError, LicenseOperationError } from './errors';
import { compactJson, createLogger, Logger, maskToken } from './logger';
import { LicenseStore } from './store';
import { extractLatestToken, hasActiveActivation, parseTimestamp, readLicenseData } from './tokens';
import { GRACE_STATUSES, HealthReport, LicenseState, LogLevel, ResponseData } from './types';

const DEFAULT_GRACE_SOFT_HOURS = 24;
const DEFAULT_GRACE_HARD_HOURS = 48;
const DEFAULT_EXPIRED_TOLERANCE_HOURS = 24;
const HOUR = 60 * 60 * 1000;

export const EXPIRED_ERROR_CODE = 'lmfwc_rest_license_expired';

const EXPIRY_IN_MESSAGE = /expired on\s+([\d:\-\s]+?)\s*\(UTC\)/i;
const ACTIVATION_LIMIT = /activation limit|maximum activation/i;

const MESSAGES = {
    keyRequired: 'License key is required in settings or as parameter.',
    tokenRequired: 'Activation token is required (not found in settings or validation response).',
    expired: 'License is expired. Please renew your license.',
    settling: 'Another activation attempt is still settling. Please retry in a few seconds.',
    limit: 'Activation limit reached on the server and no fresh token was issued. Please deactivate an existing activation or increase the limit.',
    failed: 'Operation failed. See logs for details.',
    unexpected: 'Operation failed due to unexpected error. See logs for details.',
};

export interface LicenseAgentOptions {
    client: LicenseApi;
    store: LicenseStore;
    now?: () => Date;
    /** A failed validation within this many hours of the last success degrades to GRACE_SOFT. */
    graceSoftHours?: number;
    /** From this many hours since the last success a failed validation locks hard. */
    graceHardHours?: number;
    /** How long `health()` keeps reporting an EXPIRED license as usable. */
    expiredToleranceHours?: number;
    logLevel?: LogLevel;
    logger?: Logger;
}

/**
 * Pulls an expiry timestamp out of messages like
 * "The license Key expired on 2025-10-10 00:00:00 (UTC)."
 */
export function parseExpiryFromMessage(message: string): string | null {
    const match = EXPIRY_IN_MESSAGE.exec(message);
    if (!match) return null;
    const ms = parseTimestamp(match[1]);
    return ms === null ? null : new Date(ms).toISOString();
}

function errorCodes(error: LicenseAgentError): string[] {
    const codes: string[] = [];
    if (error instanceof ContractError && error.code) {
        codes.push(error.code);
    }
    if (isApiError(error)) {
        const errors = readLicenseData(error.payload).errors;
        if (errors) codes.push(...Object.keys(errors));
    }
    return codes;
}

export function isExpiredError(error: LicenseAgentError): boolean {
    return /expire/i.test(error.message) || errorCodes(error).includes(EXPIRED_ERROR_CODE);
}

export function isActivationLimitError(error: unknown): error is ContractError {
    return error instanceof ContractError && ACTIVATION_LIMIT.test(error.message);
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Drives the license lifecycle: activation, validation, reactivation and
 * deactivation against the remote API, and the local status machine the host
 * application consults.
 */
export class LicenseAgent {
    private client: LicenseApi;
    private store: LicenseStore;
    private now: () => Date;
    private graceSoftHours: number;
    private graceHardHours: number;
    private expiredToleranceHours: number;
    private log: Logger;

    constructor(options: LicenseAgentOptions) {
        this.client = options.client;
        this.store = options.store;
        this.now = options.now ?? (() => new Date());
        this.graceSoftHours = options.graceSoftHours ?? DEFAULT_GRACE_SOFT_HOURS;
        this.graceHardHours = options.graceHardHours ?? DEFAULT_GRACE_HARD_HOURS;
        this.expiredToleranceHours = options.expiredToleranceHours ?? DEFAULT_EXPIRED_TOLERANCE_HOURS;
        this.log = options.logger ?? createLogger('LicenseAgent', options.logLevel);
    }

    public async getState(): Promise<LicenseState> {
        return this.store.load();
    }

    /**
     * Activates the license. An expiry answer from the server marks the license
     * EXPIRED before the failure is raised.
     * @throws {LicenseOperationError}
     */
    public async activate(licenseKey?: string, token?: string): Promise<ResponseData> {
        return this.boundary('activate', async () => {
            const state = await this.store.load();
            const key = this.resolveKey(state, licenseKey);
            this.log.info(`activate: start key=${key} token=${maskToken(token)}`);

            try {
                return await this.activateWith(state, key, token?.trim() || undefined);
            } catch (error) {
                return this.failActivation('activate', state, error);
            }
        });
    }

    /**
     * Re-activates with the freshest token the server knows about. One retry with
     * a newly issued token is made when the server reports its activation limit.
     * @throws {LicenseOperationError}
     */
    public async reactivate(token?: string, licenseKey?: string): Promise<ResponseData> {
        return this.boundary('reactivate', async () => {
            const state = await this.store.load();
            const key = this.resolveKey(state, licenseKey);
            this.log.info(
                `reactivate: start key=${key} incoming=${maskToken(token)} saved=${maskToken(state.activationToken)}`
            );

            const rotated = await this.preflight(state, key);
            const effective = rotated ?? (token?.trim() || state.activationToken.trim() || null);
            this.log.info(`reactivate: effective token=${maskToken(effective)}`);
            if (!effective) {
                await this.store.save(state);
                throw new LicenseOperationError('token_required', MESSAGES.tokenRequired);
            }

            try {
                return await this.activateWith(state, key, effective);
            } catch (error) {
                if (!isActivationLimitError(error) || isExpiredError(error)) {
                    return this.failActivation('reactivate', state, error);
                }

                this.log.warn(`reactivate: first attempt hit the activation limit: ${error.message}`);
                const fresh = (await this.preflight(state, key)) ?? effective;
                if (fresh === effective) {
                    this.log.info('reactivate: retry skipped (no fresh token from preflight)');
                    this.recordError(state, error);
                    await this.store.save(state);
                    throw new LicenseOperationError('activation_limit', MESSAGES.limit, error);
                }

                this.log.info(`reactivate: retry with token=${maskToken(fresh)}`);
                try {
                    return await this.activateWith(state, key, fresh);
                } catch (retryError) {
                    if (isIdempotencyGuardError(retryError)) {
                        this.log.warn('reactivate: idempotency guard hit on retry');
                        this.recordError(state, retryError);
                        await this.store.save(state);
                        throw new LicenseOperationError('activation_settling', MESSAGES.settling, retryError);
                    }
                    return this.failActivation('reactivate', state, retryError);
                }
            }
        });
    }

    /**
     * Asks the server for the current license record. Always goes to the network,
     * also when the license is EXPIRED locally, so an extended expiry is picked up.
     * On failure the grace policy decides the degraded status.
     * @throws {LicenseOperationError}
     */
    public async validate(licenseKey?: string): Promise<ResponseData> {
        return this.boundary('validate', async () => {
            const state = await this.store.load();
            const key = this.resolveKey(state, licenseKey);
            this.log.info(`validate: start key=${key}`);

            try {
                const data = await this.client.validate(key);
                this.recordResponse(state, data);
                this.applyValidationUpdate(state, data);
                const changed = this.adoptToken(state, data);
                this.log.info(`validate: token changed=${changed} current=${maskToken(state.activationToken)}`);
                await this.store.save(state);
                return data;
            } catch (error) {
                const known = error instanceof LicenseAgentError;
                this.log.error(`validate: ${known ? 'API' : 'unexpected'} error: ${errorMessage(error)}`);
                this.applyGraceOnFailure(state, known ? errorMessage(error) : `Unexpected error: ${errorMessage(error)}`);
                this.recordError(state, error);
                await this.store.save(state);
                throw known
                    ? new LicenseOperationError('operation_failed', MESSAGES.failed, error)
                    : new LicenseOperationError('unexpected', MESSAGES.unexpected, error);
            }
        });
    }

    /**
     * Deactivates this installation (or every activation when no token is known)
     * and locks the license hard locally, whatever the server answers.
     * @throws {LicenseOperationError}
     */
    public async deactivate(token?: string, licenseKey?: string): Promise<ResponseData> {
        return this.boundary('deactivate', async () => {
            const state = await this.store.load();
            const key = this.resolveKey(state, licenseKey);
            this.log.info(
                `deactivate: start key=${key} incoming=${maskToken(token)} saved=${maskToken(state.activationToken)}`
            );

            let target = token?.trim() || undefined;
            if (!target) {
                target = (await this.preflight(state, key)) ?? (state.activationToken.trim() || undefined);
                this.log.info(`deactivate: token after preflight=${maskToken(target)} (none means bulk)`);
            }

            try {
                const data = await this.client.deactivate(key, target);
                this.recordResponse(state, data);
                this.applyExpiry(state, data);
                state.activationToken = '';

                try {
                    const refreshed = await this.client.validate(key);
                    this.log.info(`deactivate: post-validate response=${compactJson(refreshed)}`);
                    this.recordResponse(state, refreshed);
                    this.applyExpiry(state, refreshed);
                    state.lastValidated = this.now().toISOString();
                } catch (error) {
                    this.log.warn(`deactivate: post-validate skipped: ${errorMessage(error)}`);
                }

                this.lockHard(state, 'License deactivated');
                await this.store.save(state);
                return data;
            } catch (error) {
                const known = error instanceof LicenseAgentError;
                this.log.error(`deactivate: ${known ? 'API' : 'unexpected'} error: ${errorMessage(error)}`);
                this.lockHard(
                    state,
                    known ? `Deactivate failed: ${errorMessage(error)}` : `Deactivate unexpected error: ${errorMessage(error)}`
                );
                this.recordError(state, error);
                await this.store.save(state);
                throw known
                    ? new LicenseOperationError('operation_failed', MESSAGES.failed, error)
                    : new LicenseOperationError('unexpected', MESSAGES.unexpected, error);
            }
        });
    }

    /**
     * Status summary for health endpoints. Never throws.
     */
    public async health(): Promise<HealthReport> {
        let state: LicenseState;
        try {
            state = await this.store.load();
        } catch (error) {
            this.log.error(`health: state load failed: ${errorMessage(error)}`);
            return {
                ok: false,
                status: null,
                graceUntil: null,
                reason: null,
                lastValidated: null,
                expiresAt: null,
                error: `License state load failed: ${errorMessage(error)}`,
            };
        }

        const graceStart = parseTimestamp(state.graceUntil);
        const toleranceActive =
            graceStart !== null && this.now().getTime() < graceStart + this.expiredToleranceHours * HOUR;
        const ok =
            state.status === 'ACTIVE' || state.status === 'VALIDATED' || (state.status === 'EXPIRED' && toleranceActive);

        return {
            ok,
            status: state.status,
            graceUntil: state.graceUntil,
            reason: state.reason,
            lastValidated: state.lastValidated,
            expiresAt: state.expiresAt,
        };
    }

    private async boundary<T>(operation: string, run: () => Promise<T>): Promise<T> {
        try {
            return await run();
        } catch (error) {
            if (error instanceof LicenseOperationError) throw error;
            this.log.error(`${operation}: unexpected error`, error);
            throw new LicenseOperationError('unexpected', MESSAGES.unexpected, error);
        }
    }

    private resolveKey(state: LicenseState, licenseKey?: string): string {
        const key = (licenseKey ?? state.licenseKey ?? '').trim();
        if (!key) {
            throw new LicenseOperationError('license_key_required', MESSAGES.keyRequired);
        }
        state.licenseKey = key;
        return key;
    }

    private async activateWith(state: LicenseState, key: string, token?: string): Promise<ResponseData> {
        const data = await this.client.activate(key, token);
        this.recordResponse(state, data);
        this.applyActivationUpdate(state, data);
        const changed = this.adoptToken(state, data);
        this.log.info(`activate: token changed=${changed} current=${maskToken(state.activationToken)}`);
        await this.store.save(state);
        return data;
    }

    /**
     * Shared failure handling for activate and reactivate: expiry answers mark the
     * license EXPIRED, anything else leaves the status alone.
     */
    private async failActivation(operation: string, state: LicenseState, error: unknown): Promise<never> {
        if (error instanceof LicenseOperationError) throw error;

        if (error instanceof LicenseAgentError && isExpiredError(error)) {
            this.markExpired(state, error);
            await this.store.save(state);
            this.log.warn(`${operation}: license expired: ${error.message}`);
            throw new LicenseOperationError('expired', MESSAGES.expired, error);
        }

        this.recordError(state, error);
        await this.store.save(state);
        if (error instanceof LicenseAgentError) {
            this.log.error(`${operation}: API error: ${error.message}`);
            throw new LicenseOperationError('operation_failed', MESSAGES.failed, error);
        }
        this.log.error(`${operation}: unexpected error`, error);
        throw new LicenseOperationError('unexpected', MESSAGES.unexpected, error);
    }

    /**
     * Validates only to pick up a rotated token. Failures are logged and ignored.
     * Returns the latest token the server reported, if any.
     */
    private async preflight(state: LicenseState, key: string): Promise<string | null> {
        this.log.info(`preflight: validating key=${key}`);
        try {
            const data = await this.client.validate(key);
            this.recordResponse(state, data);
            const before = state.activationToken;
            const changed = this.adoptToken(state, data);
            this.log.info(
                `preflight: token changed=${changed} before=${maskToken(before)} after=${maskToken(state.activationToken)}`
            );
            if (changed) {
                state.reason = 'Token rotated from validate';
            }
            return extractLatestToken(data);
        } catch (error) {
            this.log.error(`preflight: failed with ${errorMessage(error)}`);
            return null;
        }
    }

    private adoptToken(state: LicenseState, data: ResponseData): boolean {
        const latest = extractLatestToken(data);
        if (!latest || latest === state.activationToken.trim()) {
            return false;
        }
        state.activationToken = latest;
        return true;
    }

    private applyExpiry(state: LicenseState, data: ResponseData): void {
        const ms = parseTimestamp(readLicenseData(data).expiresAt);
        if (ms !== null) {
            state.expiresAt = new Date(ms).toISOString();
        }
    }

    private applyActivationUpdate(state: LicenseState, data: ResponseData): void {
        this.applyExpiry(state, data);
        state.status = 'ACTIVE';
        state.reason = 'Activated';
        state.lastValidated = this.now().toISOString();
        state.graceUntil = null;
        this.log.info(`activation update: status=${state.status} expiresAt=${state.expiresAt}`);
    }

    /**
     * Applies a successful validation. The freshly reported expiry is checked
     * before anything else, so a license the server extended leaves EXPIRED and
     * one still past its date stays there.
     */
    private applyValidationUpdate(state: LicenseState, data: ResponseData): void {
        const previous = state.status;
        const now = this.now();
        this.applyExpiry(state, data);

        const expiresMs = parseTimestamp(state.expiresAt);
        if (expiresMs !== null && now.getTime() > expiresMs) {
            state.status = 'EXPIRED';
            state.reason = state.reason || 'License expired';
            state.graceUntil = state.graceUntil ?? now.toISOString();
            state.lastValidated = now.toISOString();
            this.log.info('validation update: expiresAt in the past, status EXPIRED');
            return;
        }

        const active = hasActiveActivation(data);
        state.status = active ? 'VALIDATED' : 'DEACTIVATED';
        state.reason = active ? 'Validated' : 'Validated (no active activation)';
        state.lastValidated = now.toISOString();
        state.graceUntil = null;

        if (GRACE_STATUSES.has(previous)) {
            state.status = 'VALIDATED';
            state.reason = 'Grace cleared after success';
        }
        this.log.info(`validation update: status=${state.status} active=${active} expiresAt=${state.expiresAt}`);
    }

    /**
     * Degrades the license by the time elapsed since the last successful remote
     * confirmation. Failure counts are not tracked.
     */
    private applyGraceOnFailure(state: LicenseState, reason: string): void {
        const now = this.now();
        state.reason = `Grace policy engaged: ${reason}`;
        state.graceUntil = now.toISOString();

        if (!state.lastValidated) {
            state.status = 'GRACE_SOFT';
            this.log.warn('grace: no lastValidated, status GRACE_SOFT');
            return;
        }

        const lastOk = parseTimestamp(state.lastValidated);
        const deltaHours = lastOk === null ? this.graceHardHours + 1 : (now.getTime() - lastOk) / HOUR;

        if (deltaHours <= this.graceSoftHours) {
            state.status = 'GRACE_SOFT';
        } else if (deltaHours >= this.graceHardHours) {
            state.status = 'LOCK_HARD';
        } else {
            state.status = 'GRACE_SOFT';
        }
        this.log.warn(`grace: status=${state.status} deltaHours=${deltaHours.toFixed(2)}`);
    }

    private markExpired(state: LicenseState, error: LicenseAgentError): void {
        const now = this.now().toISOString();
        const expiresAt = parseExpiryFromMessage(error.message);
        if (expiresAt) {
            state.expiresAt = expiresAt;
        }
        state.status = 'EXPIRED';
        state.reason = error.message || 'License expired';
        state.graceUntil = state.graceUntil ?? now;
        state.lastValidated = now;
        this.recordError(state, error);
    }

    private lockHard(state: LicenseState, reason: string): void {
        state.status = 'LOCK_HARD';
        state.reason = reason;
        state.graceUntil = this.now().toISOString();
    }

    private recordResponse(state: LicenseState, data: ResponseData): void {
        state.lastResponseRaw = JSON.stringify(data);
    }

    private recordError(state: LicenseState, error: unknown): void {
        state.lastErrorRaw = JSON.stringify({
            ts: this.now().toISOString(),
            code: error instanceof LicenseAgentError ? (errorCodes(error)[0] ?? null) : null,
            status: isApiError(error) ? error.status : null,
            message: errorMessage(error),
        });
    }
}

export { LicenseClient, isIdempotencyGuardError, IDEMPOTENCY_GUARD_MESSAGE } from './client';
export type { LicenseApi, LicenseClientOptions } from './client';
export { loadConfig } from './config';
export { createLogger, maskToken, compactJson } from './logger';
export type { Logger } from './logger';
export { MemoryLockStore, FileLock } from './locks';
export type { LockStore, MutexLock } from './locks';
export { MemoryLicenseStore, FileLicenseStore } from './store';
export type { LicenseStore } from './store';
export { extractLatestToken, hasActiveActivation, parseTimestamp } from './tokens';
export { RevalidationScheduler, scheduledAutoValidate } from './scheduler';
export * from './types';
export * from './errors';
