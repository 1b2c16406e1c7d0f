/**
 * Credential & Token Lifecycle Manager
 *
 * Orchestrates consumer provisioning, credential issuance, token minting,
 * inventory and revocation. Holds no state: every call re-derives what it
 * needs from the registry.
 */

import { getContextLogger } from '../logging/logger.js';
import { ValidationError } from '../errors/appErrors.js';
import { isRegistryError } from '../errors/taxonomy.js';
import { type ConsumerKey, IdentityMapper } from '../identity/identityMapper.js';
import { CredentialIssuer } from '../credentials/credentialIssuer.js';
import { defaultTokenName } from '../credentials/naming.js';
import { TokenMinter } from '../tokens/tokenMinter.js';
import { CredentialNameSchema, PrincipalSchema, StoredCredentialNameSchema } from '../validation/schema.js';
import { validate } from '../validation/zod-middleware.js';
import type { Consumer, NamedCredential, RegistryCallOptions, RegistryClient } from '../registry/types.js';

export interface IssueOptions extends RegistryCallOptions {
    readonly ttlSeconds?: number;
}

export interface IssuedTokenResult {
    readonly token: string;
    readonly expiresAt: Date;
    readonly requestedName: string;
    readonly finalName: string;
    readonly renamed: boolean;
    readonly credentialId: string;
    readonly consumerId: string;
    readonly consumerKey: ConsumerKey;
    readonly consumerCreated: boolean;
}

export interface TokenSummary {
    readonly id: string;
    readonly redactedId: string;
    readonly name: string;
    readonly algorithm: string;
    readonly consumerId: string;
    readonly createdAt?: string;
}

export interface TokenInventory {
    readonly principal: string;
    readonly consumerId?: string;
    readonly tokens: readonly TokenSummary[];
}

export interface ConsumerSummary {
    readonly id: string;
    readonly username: string;
    readonly customId?: string;
    readonly consumerKey: ConsumerKey;
    readonly createdAt?: string;
}

export type DeleteOutcome =
    | { status: 'deleted'; credentialId: string; name: string }
    | { status: 'not_found'; reason: 'consumer_missing' | 'credential_missing' };

export interface LifecycleManagerDeps {
    readonly registry: RegistryClient;
    readonly issuer: CredentialIssuer;
    readonly minter: TokenMinter;
    readonly now?: () => Date;
}

export class LifecycleManager {
    private readonly registry: RegistryClient;
    private readonly issuer: CredentialIssuer;
    private readonly minter: TokenMinter;
    private readonly now: () => Date;

    constructor(deps: LifecycleManagerDeps) {
        this.registry = deps.registry;
        this.issuer = deps.issuer;
        this.minter = deps.minter;
        this.now = deps.now ?? (() => new Date());
    }

    /**
     * Ensures the consumer, creates a uniquely named credential and mints a
     * token bound to the name the registry actually stored.
     */
    async issueForPrincipal(principal: string, requestedName?: string, options?: IssueOptions): Promise<IssuedTokenResult> {
        const subject = validate(PrincipalSchema, principal, 'issueForPrincipal.principal');
        const name = requestedName === undefined
            ? defaultTokenName(subject, this.now())
            : validate(CredentialNameSchema, requestedName, 'issueForPrincipal.requestedName');

        return this.issue(subject, name, options);
    }

    /**
     * Ensures the consumer and issues a token named after the principal.
     */
    async provisionConsumer(principal: string, options?: IssueOptions): Promise<IssuedTokenResult> {
        const subject = validate(PrincipalSchema, principal, 'provisionConsumer.principal');
        return this.issue(subject, subject, options);
    }

    /**
     * Ensures the consumer and issues a token under a generated
     * `<principal>_auto_<YYYYMMDD>_<HHMMSS>` name.
     */
    async autoProvision(principal: string, options?: IssueOptions): Promise<IssuedTokenResult> {
        const subject = validate(PrincipalSchema, principal, 'autoProvision.principal');
        return this.issue(subject, defaultTokenName(subject, this.now(), 'auto'), options);
    }

    async listTokens(principal: string, options?: RegistryCallOptions): Promise<TokenInventory> {
        const subject = validate(PrincipalSchema, principal, 'listTokens.principal');
        const consumer = await this.issuer.findConsumer(subject, options);
        if (!consumer) {
            return { principal: subject, tokens: [] };
        }

        const credentials = await this.listOwnedCredentials(consumer, options);
        return {
            principal: subject,
            consumerId: consumer.id,
            tokens: credentials.map(c => toSummary(c, consumer.id))
        };
    }

    async deleteById(principal: string, credentialId: string, options?: RegistryCallOptions): Promise<DeleteOutcome> {
        const subject = validate(PrincipalSchema, principal, 'deleteById.principal');
        if (credentialId.trim() === '') {
            throw new ValidationError('Credential id must not be empty', [{ path: 'id', message: 'required' }]);
        }

        const consumer = await this.issuer.findConsumer(subject, options);
        if (!consumer) {
            return { status: 'not_found', reason: 'consumer_missing' };
        }

        const credentials = await this.listOwnedCredentials(consumer, options);
        const target = credentials.find(c => c.id === credentialId);
        if (!target) {
            return { status: 'not_found', reason: 'credential_missing' };
        }

        return this.remove(subject, consumer, target, options);
    }

    /**
     * Deletes the principal's credential called `name`. Only the principal's
     * own consumer is scanned, and the name is matched exactly: generated
     * names embed the principal and may contain any character it does.
     */
    async deleteByName(principal: string, name: string, options?: RegistryCallOptions): Promise<DeleteOutcome> {
        const subject = validate(PrincipalSchema, principal, 'deleteByName.principal');
        const credentialName = validate(StoredCredentialNameSchema, name, 'deleteByName.name');

        const consumer = await this.issuer.findConsumer(subject, options);
        if (!consumer) {
            return { status: 'not_found', reason: 'consumer_missing' };
        }

        const credentials = await this.listOwnedCredentials(consumer, options);
        const target = credentials.find(c => c.name === credentialName);
        if (!target) {
            return { status: 'not_found', reason: 'credential_missing' };
        }

        return this.remove(subject, consumer, target, options);
    }

    async listConsumers(options?: RegistryCallOptions): Promise<ConsumerSummary[]> {
        const consumers = await this.registry.listConsumers(options);
        return consumers.map(c => ({
            id: c.id,
            username: c.username,
            customId: c.customId,
            consumerKey: IdentityMapper.resolve(c.username),
            createdAt: toIsoDate(c.createdAt)
        }));
    }

    private async issue(principal: string, requestedName: string, options?: IssueOptions): Promise<IssuedTokenResult> {
        const log = getContextLogger();
        const { consumer, created } = await this.issuer.ensureConsumer(principal, options);
        const issuance = await this.issuer.issueCredential(consumer, requestedName, options);
        const signed = await this.minter.mint(principal, issuance.credential, options?.ttlSeconds);

        log.info({
            principal,
            consumerId: consumer.id,
            credentialId: issuance.credential.id,
            finalName: issuance.finalName,
            renamed: issuance.renamed,
            expiresAt: signed.expiresAt.toISOString()
        }, 'Token issued');

        return {
            token: signed.token,
            expiresAt: signed.expiresAt,
            requestedName,
            finalName: issuance.finalName,
            renamed: issuance.renamed,
            credentialId: issuance.credential.id,
            consumerId: consumer.id,
            consumerKey: IdentityMapper.resolve(principal),
            consumerCreated: created
        };
    }

    private async listOwnedCredentials(consumer: Consumer, options?: RegistryCallOptions): Promise<NamedCredential[]> {
        const credentials = await this.registry.listCredentials(consumer.id, options);
        // Registries that echo the owner let us drop anything not bound to this consumer.
        return credentials.filter(c => c.consumerId === undefined || c.consumerId === consumer.id);
    }

    private async remove(
        principal: string,
        consumer: Consumer,
        credential: NamedCredential,
        options?: RegistryCallOptions
    ): Promise<DeleteOutcome> {
        try {
            await this.registry.deleteCredential(consumer.id, credential.id, options);
        } catch (err: unknown) {
            // Deleted concurrently between the scan and the delete.
            if (isRegistryError(err, 'NOT_FOUND')) {
                return { status: 'not_found', reason: 'credential_missing' };
            }
            throw err;
        }

        getContextLogger().info({
            principal,
            consumerId: consumer.id,
            credentialId: credential.id,
            name: credential.name
        }, 'Credential deleted');

        return { status: 'deleted', credentialId: credential.id, name: credential.name };
    }
}

export function redactId(id: string): string {
    return id.length <= 8 ? id : `${id.slice(0, 8)}…`;
}

function toSummary(credential: NamedCredential, consumerId: string): TokenSummary {
    return {
        id: credential.id,
        redactedId: redactId(credential.id),
        name: credential.name,
        algorithm: credential.algorithm,
        consumerId,
        createdAt: toIsoDate(credential.createdAt)
    };
}

function toIsoDate(epochSeconds?: number): string | undefined {
    return epochSeconds === undefined ? undefined : new Date(epochSeconds * 1000).toISOString();
}
