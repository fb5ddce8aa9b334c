import { ActivationRecord, ActivationRecordSchema, LicenseData, LicenseDataSchema } from './types';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Parses a timestamp as sent by the license API ("2025-12-31 00:00:00" or ISO-8601).
 * Values without a zone are read as UTC. Returns epoch milliseconds, or null.
 */
export function parseTimestamp(value: string | null | undefined): number | null {
    if (!value) return null;
    let text = value.trim();
    if (!text) return null;

    if (DATE_ONLY.test(text)) {
        text += 'T00:00:00';
    }
    text = text.replace(/^(\d{4}-\d{2}-\d{2})\s+/, '$1T');
    if (!HAS_ZONE.test(text)) {
        text += 'Z';
    }

    const ms = Date.parse(text);
    return Number.isNaN(ms) ? null : ms;
}

/**
 * Reads the known members out of a response. Accepts either the `data` object a
 * client call resolves to or a whole `{ data: ... }` body.
 */
export function readLicenseData(response: unknown): LicenseData {
    let value = response;
    if (isRecord(value) && isRecord(value.data)) {
        value = value.data;
    }
    const parsed = LicenseDataSchema.safeParse(isRecord(value) ? value : {});
    return parsed.success ? parsed.data : {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRecord(value: unknown): ActivationRecord | null {
    const parsed = ActivationRecordSchema.safeParse(value);
    return parsed.success ? parsed.data : null;
}

export function activationRecords(data: LicenseData): ActivationRecord[] {
    const raw = data.activationData;
    if (!raw) return [];
    if (Array.isArray(raw)) {
        return raw.map(toRecord).filter((record): record is ActivationRecord => record !== null);
    }
    const single = toRecord(raw);
    return single ? [single] : [];
}

function score(record: ActivationRecord): [number, number] {
    const isActive = record.deactivated_at ? 0 : 1;
    const recency = parseTimestamp(record.updated_at) || parseTimestamp(record.created_at) || 0;
    return [isActive, recency];
}

/**
 * Picks the activation token the installation should hold.
 *
 * A single activation object yields its own token. From a list, any record that
 * is still active beats every deactivated one; among equals the most recently
 * updated wins, and full ties keep the earliest record.
 */
export function extractLatestToken(response: unknown): string | null {
    const data = readLicenseData(response);
    const raw = data.activationData;

    if (raw && !Array.isArray(raw)) {
        const token = toRecord(raw)?.token?.trim();
        return token || null;
    }

    const candidates = activationRecords(data).filter((record) => !!record.token?.trim());
    if (candidates.length === 0) return null;

    let best = candidates[0];
    let bestScore = score(best);
    for (const candidate of candidates.slice(1)) {
        const candidateScore = score(candidate);
        if (
            candidateScore[0] > bestScore[0] ||
            (candidateScore[0] === bestScore[0] && candidateScore[1] > bestScore[1])
        ) {
            best = candidate;
            bestScore = candidateScore;
        }
    }

    return best.token?.trim() || null;
}

/**
 * True when any activation record lacks `deactivated_at`, or the server counts at
 * least one activation.
 */
export function hasActiveActivation(response: unknown): boolean {
    const data = readLicenseData(response);
    const active = activationRecords(data).some((record) => !record.deactivated_at);
    return active || (data.timesActivated ?? 0) > 0;
}
