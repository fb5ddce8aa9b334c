import { randomUUID } from 'crypto';
import { mkdir, open, readFile, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { LockTimeoutError } from './errors';

/**
 * Short-lived "set if not exists" store backing the activation idempotency guard.
 */
export interface LockStore {
    /** Resolves true when the key was free (and is now held for `ttlSeconds`). */
    setNx(key: string, ttlSeconds: number): Promise<boolean>;
}

export class MemoryLockStore implements LockStore {
    private entries = new Map<string, number>();

    constructor(private readonly clock: () => number = Date.now) {}

    public async setNx(key: string, ttlSeconds: number): Promise<boolean> {
        const now = this.clock();
        const heldUntil = this.entries.get(key);
        if (heldUntil !== undefined && heldUntil > now) {
            return false;
        }
        this.entries.set(key, now + ttlSeconds * 1000);
        return true;
    }

    public clear(): void {
        this.entries.clear();
    }
}

/**
 * Named mutual-exclusion lock. `acquire` rejects with LockTimeoutError when the
 * lock is still held after `timeoutMs`.
 */
export interface MutexLock {
    acquire(name: string, timeoutMs: number): Promise<() => Promise<void>>;
}

export interface FileLockOptions {
    directory?: string;
    pollIntervalMs?: number;
    /**
     * A lock file older than this whose owning process is no longer running is
     * considered abandoned and removed.
     */
    staleMs?: number;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function hasCode(error: unknown, code: string): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

function isProcessAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (error) {
        // EPERM: the process exists but belongs to another user.
        return hasCode(error, 'EPERM');
    }
}

/** Lock files hold `<pid>:<owner id>`. */
function ownerPid(contents: string): number | null {
    const pid = Number.parseInt(contents.split(':')[0], 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
}

/**
 * Cross-process advisory lock: one exclusively created file per lock name.
 */
export class FileLock implements MutexLock {
    private directory: string;
    private pollIntervalMs: number;
    private staleMs: number;

    constructor(options: FileLockOptions = {}) {
        this.directory = options.directory ?? join(tmpdir(), 'license-agent-locks');
        this.pollIntervalMs = options.pollIntervalMs ?? 100;
        this.staleMs = options.staleMs ?? 60_000;
    }

    public pathFor(name: string): string {
        return join(this.directory, `${name.replace(/[^A-Za-z0-9_.-]/g, '_')}.lock`);
    }

    public async acquire(name: string, timeoutMs: number): Promise<() => Promise<void>> {
        const path = this.pathFor(name);
        const deadline = Date.now() + timeoutMs;
        await mkdir(this.directory, { recursive: true });

        const owner = `${process.pid}:${randomUUID()}`;

        for (;;) {
            if (await this.tryCreate(path, owner)) {
                return () => this.release(path, owner);
            }
            if (await this.isStale(path)) {
                await rm(path, { force: true });
                continue;
            }
            if (Date.now() >= deadline) {
                throw new LockTimeoutError(name, timeoutMs);
            }
            await sleep(this.pollIntervalMs);
        }
    }

    private async tryCreate(path: string, owner: string): Promise<boolean> {
        try {
            const handle = await open(path, 'wx');
            await handle.writeFile(owner);
            await handle.close();
            return true;
        } catch (error) {
            if (hasCode(error, 'EEXIST')) return false;
            throw error;
        }
    }

    /** Leaves the file alone when it was taken over and now belongs to someone else. */
    private async release(path: string, owner: string): Promise<void> {
        const contents = await this.readOwner(path);
        if (contents === owner) {
            await rm(path, { force: true });
        }
    }

    private async isStale(path: string): Promise<boolean> {
        try {
            const info = await stat(path);
            if (Date.now() - info.mtimeMs <= this.staleMs) return false;
        } catch (error) {
            // Released between our attempt and the stat.
            if (hasCode(error, 'ENOENT')) return false;
            throw error;
        }

        const contents = await this.readOwner(path);
        if (contents === null) return false;
        const pid = ownerPid(contents);
        return pid === null || !isProcessAlive(pid);
    }

    private async readOwner(path: string): Promise<string | null> {
        try {
            return (await readFile(path, 'utf-8')).trim();
        } catch (error) {
            if (hasCode(error, 'ENOENT')) return null;
            throw error;
        }
    }
}
