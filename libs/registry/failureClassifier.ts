/**
 * Registry Failure Classifier
 *
 * Maps HTTP statuses and transport errors onto RegistryFailureKind.
 * Classification is deterministic; first match wins.
 */

import type { RegistryFailureKind } from '../errors/taxonomy.js';

interface ErrorPattern {
    readonly patterns: readonly (string | RegExp)[];
    readonly kind: 'TIMEOUT' | 'UNAVAILABLE';
}

const TRANSPORT_PATTERNS: readonly ErrorPattern[] = [
    // Deadline exceeded (AbortSignal timeouts surface as TimeoutError)
    {
        patterns: ['TimeoutError', 'ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT', /timed?\s*out/i],
        kind: 'TIMEOUT'
    },
    // Nothing delivered
    {
        patterns: ['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH', 'ENETUNREACH', 'EPIPE', 'UND_ERR_SOCKET', 'fetch failed'],
        kind: 'UNAVAILABLE'
    }
];

/**
 * Classify an HTTP status. Returns null for success statuses.
 */
export function classifyStatus(status: number): RegistryFailureKind | null {
    if (status >= 200 && status < 300) return null;
    if (status === 409) return 'CONFLICT';
    if (status === 404) return 'NOT_FOUND';
    return 'UNKNOWN';
}

/**
 * Classify an error thrown by fetch (or anything below it).
 */
export function classifyTransportError(err: unknown): RegistryFailureKind {
    const signals = collectSignals(err);

    const matched = TRANSPORT_PATTERNS.find(pattern =>
        pattern.patterns.some(p =>
            signals.some(signal => typeof p === 'string' ? signal === p || signal.includes(p) : p.test(signal))
        )
    );

    return matched ? matched.kind : 'UNKNOWN';
}

/**
 * Names, codes and messages along the error's cause chain.
 * undici wraps socket errors as TypeError('fetch failed', { cause }).
 */
function collectSignals(err: unknown): string[] {
    const signals: string[] = [];
    let current: unknown = err;

    for (let depth = 0; depth < 5 && current !== undefined && current !== null; depth++) {
        if (typeof current === 'string') {
            signals.push(current);
            break;
        }
        if (typeof current !== 'object') break;

        if ('name' in current && typeof current.name === 'string') signals.push(current.name);
        if ('code' in current && typeof current.code === 'string') signals.push(current.code);
        if ('message' in current && typeof current.message === 'string') signals.push(current.message);

        current = 'cause' in current ? current.cause : undefined;
    }

    return signals;
}

/**
 * Scrub credential material from registry bodies and error messages before
 * they are attached to errors or logged.
 */
export function sanitizeDetail(message: string | undefined): string | undefined {
    if (!message) return undefined;

    return message
        .replace(/"(secret|key_secret|rsa_public_key)"\s*:\s*"[^"]*"/gi, '"$1":"[REDACTED]"')
        .replace(/secret[=:]\s*\S+/gi, 'secret=[REDACTED]')
        .replace(/token[=:]\s*\S+/gi, 'token=[REDACTED]')
        .substring(0, 500);
}
