/**
 * Caller Authentication
 *
 * Verifies identity-provider bearer tokens (RS256) and turns their claims
 * into a CallerIdentity. Keys come from the provider's remote JWKS; when
 * the key set cannot be retrieved, a static certificate is used instead.
 */

import fs from 'fs';
import { z } from 'zod';
import {
    createRemoteJWKSet,
    errors,
    importSPKI,
    importX509,
    jwtVerify,
    type JWTVerifyGetKey
} from 'jose';
import { logger } from '../logging/logger.js';
import { AuthenticationError } from '../errors/appErrors.js';
import type { CallerIdentity } from '../context/identity.js';

const CLOCK_TOLERANCE_SECONDS = 30;
const CALLER_TOKEN_ALGORITHM = 'RS256';

export type VerificationKey = Awaited<ReturnType<typeof importX509>>;

// Providers emit roles/permissions either as names or as objects carrying a name.
const NamedGrantSchema = z.union([
    z.string(),
    z.object({ name: z.string() }).passthrough()
]);

const CallerClaimsSchema = z.object({
    sub: z.string().min(1),
    iss: z.string().min(1),
    preferred_username: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
    roles: z.array(NamedGrantSchema).optional(),
    permissions: z.array(NamedGrantSchema).optional(),
}).passthrough();

type NamedGrant = z.infer<typeof NamedGrantSchema>;

export interface CallerAuthenticatorOptions {
    readonly issuer: string;
    readonly audience: string;
    readonly keySource: JWTVerifyGetKey;
    readonly adminRoles: readonly string[];
    readonly adminPermissions: readonly string[];
}

export class CallerAuthenticator {
    constructor(private readonly options: CallerAuthenticatorOptions) { }

    async authenticate(token: string): Promise<CallerIdentity> {
        let payload: unknown;
        try {
            const verified = await jwtVerify(token, this.options.keySource, {
                issuer: this.options.issuer,
                audience: this.options.audience,
                clockTolerance: CLOCK_TOLERANCE_SECONDS,
                algorithms: [CALLER_TOKEN_ALGORITHM]
            });
            payload = verified.payload;
        } catch (error: unknown) {
            const code = error instanceof errors.JOSEError ? error.code : undefined;
            const errorMessage = error instanceof Error ? error.message : String(error);
            logger.warn({ code, error: errorMessage }, 'Caller token verification failed');
            throw new AuthenticationError('Invalid bearer token', { cause: error });
        }

        const parsed = CallerClaimsSchema.safeParse(payload);
        if (!parsed.success) {
            logger.warn({ issues: parsed.error.issues.map(i => i.path.join('.')) }, 'Caller token claims rejected');
            throw new AuthenticationError('Bearer token is missing required identity claims');
        }

        const claims = parsed.data;
        const roles = grantNames(claims.roles);
        const permissions = grantNames(claims.permissions);

        return {
            principal: claims.preferred_username ?? claims.name ?? claims.sub,
            subject: claims.sub,
            issuer: claims.iss,
            roles,
            permissions,
            isAdmin: roles.some(r => this.options.adminRoles.includes(r))
                || permissions.some(p => this.options.adminPermissions.includes(p))
        };
    }
}

function grantNames(grants?: NamedGrant[]): string[] {
    return (grants ?? []).map(g => (typeof g === 'string' ? g : g.name));
}

/**
 * Pulls the token out of an `Authorization: Bearer <token>` header.
 */
export function extractBearerToken(header: string | undefined): string {
    const match = header ? /^Bearer\s+(\S+)\s*$/i.exec(header) : null;
    if (!match) {
        throw new AuthenticationError('Missing or malformed Authorization header');
    }
    return match[1];
}

/**
 * Wraps a key source so that a key retrieval failure (unreachable JWKS,
 * malformed key set, no matching key) is answered with the fallback key.
 * Signature and claim failures happen after key retrieval and are not affected.
 */
export function withCertificateFallback(
    primary: JWTVerifyGetKey,
    loadFallback: () => Promise<VerificationKey>
): JWTVerifyGetKey {
    return async (protectedHeader, token) => {
        try {
            return await primary(protectedHeader, token);
        } catch (error: unknown) {
            logger.warn({
                error: error instanceof Error ? error.message : String(error)
            }, 'JWKS key retrieval failed - using static certificate');
            return loadFallback();
        }
    };
}

/**
 * Lazily reads a PEM certificate (or SPKI public key) from disk once.
 * A failed read is not cached.
 */
export function certificateFileKey(path: string): () => Promise<VerificationKey> {
    let pending: Promise<VerificationKey> | undefined;

    return () => {
        if (!pending) {
            pending = loadPem(path).catch((err: unknown) => {
                pending = undefined;
                throw err;
            });
        }
        return pending;
    };
}

async function loadPem(path: string): Promise<VerificationKey> {
    const pem = await fs.promises.readFile(path, 'utf-8');
    if (pem.includes('BEGIN CERTIFICATE')) {
        return importX509(pem, CALLER_TOKEN_ALGORITHM);
    }
    if (pem.includes('BEGIN PUBLIC KEY')) {
        return importSPKI(pem, CALLER_TOKEN_ALGORITHM);
    }
    throw new Error(`No PEM certificate or public key found in ${path}`);
}

export interface KeySourceOptions {
    readonly jwksUrl: string;
    readonly certPath?: string;
    readonly timeoutMs?: number;
}

export function createKeySource(options: KeySourceOptions): JWTVerifyGetKey {
    const remote = createRemoteJWKSet(new URL(options.jwksUrl), {
        timeoutDuration: options.timeoutMs
    });

    if (!options.certPath) {
        return remote;
    }
    return withCertificateFallback(remote, certificateFileKey(options.certPath));
}
