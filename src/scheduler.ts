import type { LicenseAgent } from './index';
import { LockTimeoutError } from './errors';
import { FileLock, MutexLock } from './locks';
import { compactJson, createLogger, Logger } from './logger';

export const AUTO_VALIDATE_LOCK = 'license-agent-auto-validate';
const DEFAULT_LOCK_TIMEOUT = 2_000;
const DEFAULT_INTERVAL = 6 * 60 * 60 * 1000;

export interface AutoValidateOptions {
    lock?: MutexLock;
    lockTimeout?: number;
    logger?: Logger;
}

type Revalidatable = Pick<LicenseAgent, 'validate' | 'getState'>;

/**
 * One revalidation run. Skips quietly when another run holds the lock or no
 * license key is stored; never throws.
 */
export async function scheduledAutoValidate(agent: Revalidatable, options: AutoValidateOptions = {}): Promise<void> {
    const lock = options.lock ?? new FileLock();
    const log = options.logger ?? createLogger('RevalidationScheduler');
    log.info('auto-validate: start');

    let release: (() => Promise<void>) | undefined;
    try {
        release = await lock.acquire(AUTO_VALIDATE_LOCK, options.lockTimeout ?? DEFAULT_LOCK_TIMEOUT);

        const { licenseKey } = await agent.getState();
        if (!licenseKey) {
            log.warn('auto-validate: no license key set; skipping');
            return;
        }

        const result = await agent.validate(licenseKey);
        log.info(`auto-validate: OK response=${compactJson(result)}`);
    } catch (error) {
        if (error instanceof LockTimeoutError) {
            log.info('auto-validate: skipped (another run is in progress)');
            return;
        }
        log.error('auto-validate: failed', error);
    } finally {
        if (release) {
            await release().catch((error: unknown) => log.warn('auto-validate: lock release failed', error));
        }
    }
}

export interface RevalidationSchedulerOptions extends AutoValidateOptions {
    interval?: number;
}

/**
 * Runs `scheduledAutoValidate` on a fixed interval.
 */
export class RevalidationScheduler {
    private timer: ReturnType<typeof setInterval> | null = null;
    private interval: number;
    private runOptions: AutoValidateOptions;

    constructor(
        private readonly agent: Revalidatable,
        options: RevalidationSchedulerOptions = {}
    ) {
        const { interval, ...runOptions } = options;
        this.interval = interval ?? DEFAULT_INTERVAL;
        this.runOptions = { ...runOptions, lock: runOptions.lock ?? new FileLock() };
    }

    public get running(): boolean {
        return this.timer !== null;
    }

    public start(): void {
        if (this.timer) return;
        this.timer = setInterval(() => {
            void this.runOnce();
        }, this.interval);
        this.timer.unref();
    }

    public stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
    }

    public runOnce(): Promise<void> {
        return scheduledAutoValidate(this.agent, this.runOptions);
    }
}
