import { existsSync } from 'fs';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { ConfigError } from './errors';
import { initialLicenseState, LicenseState, LicenseStateSchema } from './types';

/**
 * Load/save collaborator for the singleton license document.
 */
export interface LicenseStore {
    load(): Promise<LicenseState>;
    save(state: LicenseState): Promise<void>;
}

export class MemoryLicenseStore implements LicenseStore {
    private state: LicenseState;
    public saves = 0;

    constructor(initial: Partial<LicenseState> = {}) {
        this.state = { ...initialLicenseState(), ...initial };
    }

    public async load(): Promise<LicenseState> {
        return { ...this.state };
    }

    public async save(state: LicenseState): Promise<void> {
        this.state = { ...state };
        this.saves += 1;
    }
}

/**
 * Keeps the license document as a JSON file. Writes go through a temp file and a
 * rename so a crash never leaves a half-written document behind.
 */
export class FileLicenseStore implements LicenseStore {
    constructor(private readonly path: string) {}

    public async load(): Promise<LicenseState> {
        if (!existsSync(this.path)) {
            return initialLicenseState();
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(await readFile(this.path, 'utf-8'));
        } catch (error) {
            throw new ConfigError(`License state file ${this.path} is unreadable: ${(error as Error).message}`);
        }

        const result = LicenseStateSchema.safeParse(parsed);
        if (!result.success) {
            throw new ConfigError(`License state file ${this.path} has an invalid shape`);
        }
        return result.data;
    }

    public async save(state: LicenseState): Promise<void> {
        await mkdir(dirname(this.path), { recursive: true });
        const tmpPath = `${this.path}.tmp`;
        await writeFile(tmpPath, JSON.stringify(state, null, 2) + '\n', 'utf-8');
        await rename(tmpPath, this.path);
    }
}
