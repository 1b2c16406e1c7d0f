import crypto from 'crypto';

/**
 * Credential naming helpers. All wall-clock parts are UTC.
 */

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/** HHMMSS */
export function formatUtcTime(date: Date): string {
    return `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
}

/** YYYYMMDD_HHMMSS */
export function formatUtcTimestamp(date: Date): string {
    const day = `${pad(date.getUTCFullYear(), 4)}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
    return `${day}_${formatUtcTime(date)}`;
}

/** 8 lowercase hex characters */
export function randomHexSuffix(): string {
    return crypto.randomBytes(4).toString('hex');
}

/**
 * Rename candidate used after a key collision:
 * `<requested>_<HHMMSS>_<suffix>`.
 */
export function buildCandidateName(requestedName: string, now: Date, suffix: string): string {
    return `${requestedName}_${formatUtcTime(now)}_${suffix}`;
}

/** `token` for caller-requested issuance, `auto` for automatic provisioning */
export type TokenNameKind = 'token' | 'auto';

/**
 * Name given to a token when the caller supplies none:
 * `<principal>_<kind>_<YYYYMMDD>_<HHMMSS>`.
 */
export function defaultTokenName(principal: string, now: Date, kind: TokenNameKind = 'token'): string {
    return `${principal}_${kind}_${formatUtcTimestamp(now)}`;
}
