/**
 * Registry-side records as seen by this service.
 */

export interface Consumer {
    readonly id: string;
    readonly username: string;
    readonly customId?: string;
    /** Seconds since epoch, as reported by the registry */
    readonly createdAt?: number;
}

/**
 * A credential as listed by the registry. Never carries the secret.
 */
export interface NamedCredential {
    readonly id: string;
    /** The key the gateway matches against the token's key claim */
    readonly name: string;
    readonly algorithm: string;
    readonly consumerId?: string;
    readonly createdAt?: number;
}

/**
 * A credential this process just created, with the raw signing secret.
 * Only ever held in memory between creation and minting.
 */
export interface IssuedCredential extends NamedCredential {
    readonly secret: string;
}

/** Consumer id or username; the registry accepts either in paths. */
export type ConsumerRef = string;

export interface RegistryCallOptions {
    /** Cancels the in-flight round trip */
    readonly signal?: AbortSignal;
}

export const CREDENTIAL_ALGORITHM = 'HS256';

/**
 * Registry operation set. Every method is a single round trip (list
 * operations follow pagination) and fails only with a RegistryError.
 */
export interface RegistryClient {
    createConsumer(username: string, customId?: string, options?: RegistryCallOptions): Promise<Consumer>;
    getConsumer(ref: ConsumerRef, options?: RegistryCallOptions): Promise<Consumer>;
    deleteConsumer(ref: ConsumerRef, options?: RegistryCallOptions): Promise<void>;
    listConsumers(options?: RegistryCallOptions): Promise<Consumer[]>;
    createCredential(consumer: ConsumerRef, name: string, secret: string, options?: RegistryCallOptions): Promise<NamedCredential>;
    listCredentials(consumer: ConsumerRef, options?: RegistryCallOptions): Promise<NamedCredential[]>;
    deleteCredential(consumer: ConsumerRef, credentialId: string, options?: RegistryCallOptions): Promise<void>;
}
