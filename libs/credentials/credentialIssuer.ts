/**
 * Credential Issuer
 *
 * Idempotent consumer provisioning and collision-safe credential creation.
 *
 * Naming protocol:
 * 1. Try the requested name.
 * 2. On CONFLICT try `<requested>_<HHMMSS>_<hex8>` with a fresh secret.
 * 3. Stop after `maxAttempts` total create calls (NAME_EXHAUSTED).
 *
 * Failed attempts leave nothing to clean up: a conflicting create writes
 * nothing on the registry side.
 */

import crypto from 'crypto';
import { getContextLogger } from '../logging/logger.js';
import { IdentityMapper } from '../identity/identityMapper.js';
import { isRegistryError, NameExhaustedError } from '../errors/taxonomy.js';
import type { Consumer, IssuedCredential, RegistryCallOptions, RegistryClient } from '../registry/types.js';
import { buildCandidateName, randomHexSuffix } from './naming.js';

export interface CredentialIssuerOptions {
    /** Total create attempts, first one included */
    readonly maxAttempts: number;
    readonly now?: () => Date;
    readonly randomSuffix?: () => string;
    readonly newSecret?: () => string;
}

export interface EnsuredConsumer {
    readonly consumer: Consumer;
    readonly created: boolean;
}

export interface CredentialIssuance {
    readonly credential: IssuedCredential;
    readonly requestedName: string;
    /** The registry's key for the credential; the only name a token may carry */
    readonly finalName: string;
    readonly renamed: boolean;
    readonly attempts: number;
}

type IssueAttemptResult =
    | { kind: 'issued'; credential: IssuedCredential; attempts: number }
    | { kind: 'exhausted'; attempts: number; candidates: string[] };

/** 32 random bytes as URL-safe text */
export function generateSecret(): string {
    return crypto.randomBytes(32).toString('base64url');
}

export class CredentialIssuer {
    private readonly maxAttempts: number;
    private readonly now: () => Date;
    private readonly randomSuffix: () => string;
    private readonly newSecret: () => string;

    constructor(private readonly registry: RegistryClient, options: CredentialIssuerOptions) {
        if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
            throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
        }
        this.maxAttempts = options.maxAttempts;
        this.now = options.now ?? (() => new Date());
        this.randomSuffix = options.randomSuffix ?? randomHexSuffix;
        this.newSecret = options.newSecret ?? generateSecret;
    }

    /**
     * Returns the principal's consumer, creating it when absent.
     * A CONFLICT on create means another caller won the race; the existing
     * record is looked up instead.
     */
    async ensureConsumer(principal: string, options?: RegistryCallOptions): Promise<EnsuredConsumer> {
        const log = getContextLogger();
        const consumerKey = IdentityMapper.resolve(principal);

        try {
            const consumer = await this.registry.createConsumer(principal, consumerKey, options);
            log.info({ principal, consumerId: consumer.id, consumerKey }, 'Consumer created');
            return { consumer, created: true };
        } catch (err: unknown) {
            if (!isRegistryError(err, 'CONFLICT')) {
                throw err;
            }

            const existing = await this.findConsumer(principal, options);
            if (!existing) {
                throw err;
            }
            log.debug({ principal, consumerId: existing.id }, 'Consumer already existed');
            return { consumer: existing, created: false };
        }
    }

    /**
     * Looks up the consumer whose username is `principal`.
     *
     * The admin API resolves `/consumers/{ref}` by id before username, so a
     * principal equal to another consumer's id lands on that consumer. Only
     * an exact username match is accepted; otherwise the listing is scanned.
     */
    async findConsumer(principal: string, options?: RegistryCallOptions): Promise<Consumer | undefined> {
        let resolved: Consumer;
        try {
            resolved = await this.registry.getConsumer(principal, options);
        } catch (err: unknown) {
            if (isRegistryError(err, 'NOT_FOUND')) {
                return undefined;
            }
            throw err;
        }

        if (resolved.username === principal) {
            return resolved;
        }

        getContextLogger().warn({
            principal,
            resolvedConsumerId: resolved.id
        }, 'Consumer lookup resolved to a different username');

        const consumers = await this.registry.listConsumers(options);
        return consumers.find(c => c.username === principal);
    }

    async issueCredential(
        consumer: Consumer,
        requestedName: string,
        options?: RegistryCallOptions
    ): Promise<CredentialIssuance> {
        const result = await this.attemptNames(consumer, requestedName, options);

        if (result.kind === 'exhausted') {
            getContextLogger().warn({
                consumerId: consumer.id,
                requestedName,
                attempts: result.attempts,
                candidates: result.candidates
            }, 'Credential name candidates exhausted');
            throw new NameExhaustedError(requestedName, result.attempts, result.candidates);
        }

        const finalName = result.credential.name;
        const renamed = finalName !== requestedName;

        if (renamed) {
            getContextLogger().warn({
                consumerId: consumer.id,
                requestedName,
                finalName,
                attempts: result.attempts
            }, 'Credential name was taken; issued under a generated name');
        }

        return { credential: result.credential, requestedName, finalName, renamed, attempts: result.attempts };
    }

    private async attemptNames(
        consumer: Consumer,
        requestedName: string,
        options?: RegistryCallOptions
    ): Promise<IssueAttemptResult> {
        const candidates: string[] = [];
        let candidate = requestedName;

        for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
            candidates.push(candidate);
            const secret = this.newSecret();

            try {
                const created = await this.registry.createCredential(consumer.id, candidate, secret, options);
                return { kind: 'issued', credential: { ...created, secret }, attempts: attempt };
            } catch (err: unknown) {
                if (!isRegistryError(err, 'CONFLICT')) {
                    throw err;
                }
            }

            if (attempt < this.maxAttempts) {
                candidate = buildCandidateName(requestedName, this.now(), this.randomSuffix());
            }
        }

        return { kind: 'exhausted', attempts: this.maxAttempts, candidates };
    }
}
