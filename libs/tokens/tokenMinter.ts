import { SignJWT, type JWTPayload } from 'jose';
import { ValidationError } from '../errors/appErrors.js';
import { CREDENTIAL_ALGORITHM, type IssuedCredential } from '../registry/types.js';

/**
 * Claims carried by every minted token. Serialised as
 * `sub`, `<keyClaimName>`, `iat`, `exp`.
 */
export interface TokenClaims {
    readonly subject: string;
    /** Registry credential key the gateway looks the token up by */
    readonly keyId: string;
    /** Seconds since epoch */
    readonly issuedAt: number;
    /** Seconds since epoch */
    readonly expiresAt: number;
}

export interface SignedToken {
    readonly token: string;
    readonly claims: TokenClaims;
    readonly expiresAt: Date;
}

export interface TokenMinterOptions {
    readonly keyClaimName: string;
    readonly defaultTtlSeconds: number;
    readonly maxTtlSeconds: number;
    readonly now?: () => Date;
}

export const RESERVED_CLAIMS: readonly string[] = ['sub', 'iat', 'exp'];

export class TokenMinter {
    private readonly now: () => Date;

    constructor(private readonly options: TokenMinterOptions) {
        if (RESERVED_CLAIMS.includes(options.keyClaimName)) {
            throw new ValidationError(`Key claim name '${options.keyClaimName}' collides with a registered claim`);
        }
        this.now = options.now ?? (() => new Date());
    }

    get keyClaimName(): string {
        return this.options.keyClaimName;
    }

    /**
     * Signs an HS256 token for `principal` with the credential's raw secret.
     * The key claim is always the credential's own (final) name.
     */
    async mint(principal: string, credential: IssuedCredential, ttlSeconds?: number): Promise<SignedToken> {
        const ttl = this.effectiveTtl(ttlSeconds);
        const issuedAt = Math.floor(this.now().getTime() / 1000);

        const claims: TokenClaims = {
            subject: principal,
            keyId: credential.name,
            issuedAt,
            expiresAt: issuedAt + ttl
        };

        const payload: JWTPayload = {
            sub: claims.subject,
            [this.options.keyClaimName]: claims.keyId,
            iat: claims.issuedAt,
            exp: claims.expiresAt
        };

        const token = await new SignJWT(payload)
            .setProtectedHeader({ alg: CREDENTIAL_ALGORITHM, typ: 'JWT' })
            .sign(new TextEncoder().encode(credential.secret));

        return { token, claims, expiresAt: new Date(claims.expiresAt * 1000) };
    }

    private effectiveTtl(ttlSeconds?: number): number {
        const requested = ttlSeconds ?? this.options.defaultTtlSeconds;
        if (!Number.isFinite(requested) || requested <= 0) {
            throw new ValidationError(`Token lifetime must be a positive number of seconds, got ${requested}`, [
                { path: 'ttl_seconds', message: 'must be positive' }
            ]);
        }
        return Math.min(Math.ceil(requested), this.options.maxTtlSeconds);
    }
}
