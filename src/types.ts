import { z } from 'zod';

export const LICENSE_STATUSES = [
    'UNCONFIGURED',
    'ACTIVE',
    'VALIDATED',
    'DEACTIVATED',
    'EXPIRED',
    'REVOKED',
    'GRACE_SOFT',
    'LOCK_HARD',
] as const;

export type LicenseStatus = (typeof LICENSE_STATUSES)[number];

export const GRACE_STATUSES: ReadonlySet<LicenseStatus> = new Set<LicenseStatus>(['GRACE_SOFT', 'LOCK_HARD']);

export const LicenseStateSchema = z.object({
    licenseKey: z.string().default(''),
    status: z.enum(LICENSE_STATUSES).default('UNCONFIGURED'),
    activationToken: z.string().default(''),
    expiresAt: z.string().nullable().default(null),
    graceUntil: z.string().nullable().default(null),
    reason: z.string().nullable().default(null),
    lastValidated: z.string().nullable().default(null),
    lastResponseRaw: z.string().nullable().default(null),
    lastErrorRaw: z.string().nullable().default(null),
});

/**
 * The singleton license document. Timestamps are ISO-8601 strings so the state
 * round-trips through any JSON document store.
 */
export type LicenseState = z.infer<typeof LicenseStateSchema>;

export function initialLicenseState(): LicenseState {
    return LicenseStateSchema.parse({});
}

export const ActivationRecordSchema = z
    .object({
        token: z.string().nullish(),
        created_at: z.string().nullish(),
        updated_at: z.string().nullish(),
        deactivated_at: z.string().nullish(),
    })
    .passthrough();

export type ActivationRecord = z.infer<typeof ActivationRecordSchema>;

/**
 * Known members of the `data` object returned by the license API. Anything else
 * is kept but never interpreted.
 */
export const LicenseDataSchema = z
    .object({
        expiresAt: z.string().nullish().catch(null),
        activationData: z.union([z.array(z.unknown()), z.record(z.unknown())]).nullish().catch(null),
        timesActivated: z.coerce.number().nullish().catch(null),
        errors: z.record(z.unknown()).nullish().catch(null),
        error_data: z.record(z.unknown()).nullish().catch(null),
    })
    .passthrough();

export type LicenseData = z.infer<typeof LicenseDataSchema>;

/**
 * What a client operation resolves to: the `data` member of the body, or the
 * whole body when there is none.
 */
export type ResponseData = Record<string, unknown> | unknown[];

export interface ClientConfig {
    baseUrl: string;
    apiKey: string;
    apiSecret: string;
    verifyTls: boolean;
    logLevel: LogLevel;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LicenseOperation = 'activate' | 'deactivate' | 'validate';

export type OperationFailureKind =
    | 'license_key_required'
    | 'token_required'
    | 'expired'
    | 'activation_settling'
    | 'activation_limit'
    | 'operation_failed'
    | 'unexpected';

export interface HealthReport {
    ok: boolean;
    status: LicenseStatus | null;
    graceUntil: string | null;
    reason: string | null;
    lastValidated: string | null;
    expiresAt: string | null;
    error?: string;
}
