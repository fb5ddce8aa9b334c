import { OperationFailureKind } from './types';

export class LicenseAgentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'LicenseAgentError';

        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Missing or malformed local configuration, or an input that fails the shape
 * checks. Raised before any network I/O.
 */
export class ConfigError extends LicenseAgentError {
    constructor(message: string = 'Invalid agent configuration') {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Transport failure (after retries) or an HTTP response with status >= 400.
 */
export class RequestError extends LicenseAgentError {
    public status: number | null;
    public payload: Record<string, unknown>;
    public originalError?: Error;

    constructor(
        message: string,
        status: number | null = null,
        payload: Record<string, unknown> = {},
        originalError?: Error
    ) {
        super(message);
        this.name = 'RequestError';
        this.status = status;
        this.payload = payload;
        this.originalError = originalError;
    }
}

/**
 * HTTP succeeded but the body reports a failure (`data.errors` / `data.error_data`),
 * or the body is not JSON at all.
 */
export class ContractError extends LicenseAgentError {
    public status: number | null;
    public payload: Record<string, unknown>;
    public code: string | null;

    constructor(
        message: string,
        status: number | null = null,
        payload: Record<string, unknown> = {},
        code: string | null = null
    ) {
        super(message);
        this.name = 'ContractError';
        this.status = status;
        this.payload = payload;
        this.code = code;
    }
}

/**
 * User-facing failure of a controller operation. Diagnostic detail stays in the
 * license state and the logs; `cause` keeps the underlying error for callers that
 * want it.
 */
export class LicenseOperationError extends LicenseAgentError {
    public kind: OperationFailureKind;
    public cause?: unknown;

    constructor(kind: OperationFailureKind, message: string, cause?: unknown) {
        super(message);
        this.name = 'LicenseOperationError';
        this.kind = kind;
        this.cause = cause;
    }
}

export class LockTimeoutError extends LicenseAgentError {
    public lockName: string;

    constructor(lockName: string, timeoutMs: number) {
        super(`Could not acquire lock "${lockName}" within ${timeoutMs}ms`);
        this.name = 'LockTimeoutError';
        this.lockName = lockName;
    }
}

export function isApiError(error: unknown): error is RequestError | ContractError {
    return error instanceof RequestError || error instanceof ContractError;
}
