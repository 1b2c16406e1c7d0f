/**
 * Registry Admin API Client
 *
 * Thin operation set over the gateway's consumer / jwt-credential admin
 * endpoints. Every call is one round trip bounded by its own deadline and
 * ends in either a parsed record or a classified RegistryError.
 */

import { z } from 'zod';
import { logger } from '../logging/logger.js';
import { RegistryError, type RegistryFailureKind, type RegistryOperation } from '../errors/taxonomy.js';
import {
    type RegistryConsumerPayload,
    RegistryConsumerSchema,
    type RegistryCredentialPayload,
    RegistryCredentialSchema,
    registryPageSchema
} from '../validation/schema.js';
import { classifyStatus, classifyTransportError, sanitizeDetail } from './failureClassifier.js';
import {
    type Consumer,
    type ConsumerRef,
    CREDENTIAL_ALGORITHM,
    type NamedCredential,
    type RegistryCallOptions,
    type RegistryClient
} from './types.js';

type HttpMethod = 'GET' | 'POST' | 'DELETE';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpRegistryClientOptions {
    /** Admin API base URL, e.g. http://localhost:8001 */
    readonly baseUrl: string;
    /** Per-round-trip deadline */
    readonly timeoutMs: number;
    readonly fetchImpl?: FetchLike;
    /** Upper bound on followed `next` links per listing */
    readonly maxPages?: number;
}

interface RegistryResponse {
    readonly status: number;
    readonly body: unknown;
}

// A registry returning a `next` cycle must not hang a request.
const DEFAULT_MAX_PAGES = 1000;

const ConsumerPageSchema = registryPageSchema(RegistryConsumerSchema);
const CredentialPageSchema = registryPageSchema(RegistryCredentialSchema);

export class HttpRegistryClient implements RegistryClient {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: FetchLike;
    private readonly maxPages: number;

    constructor(options: HttpRegistryClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs;
        this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
        this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    }

    async createConsumer(username: string, customId?: string, options?: RegistryCallOptions): Promise<Consumer> {
        const response = await this.send('createConsumer', 'POST', '/consumers', [200, 201], {
            body: customId ? { username, custom_id: customId } : { username },
            signal: options?.signal
        });
        return toConsumer(this.parse('createConsumer', RegistryConsumerSchema, response));
    }

    async getConsumer(ref: ConsumerRef, options?: RegistryCallOptions): Promise<Consumer> {
        const response = await this.send('getConsumer', 'GET', `/consumers/${segment(ref)}`, [200], {
            signal: options?.signal
        });
        return toConsumer(this.parse('getConsumer', RegistryConsumerSchema, response));
    }

    async deleteConsumer(ref: ConsumerRef, options?: RegistryCallOptions): Promise<void> {
        await this.send('deleteConsumer', 'DELETE', `/consumers/${segment(ref)}`, [200, 204], {
            signal: options?.signal
        });
    }

    async listConsumers(options?: RegistryCallOptions): Promise<Consumer[]> {
        const rows = await this.listAll('listConsumers', '/consumers', ConsumerPageSchema, options);
        return rows.map(toConsumer);
    }

    async createCredential(
        consumer: ConsumerRef,
        name: string,
        secret: string,
        options?: RegistryCallOptions
    ): Promise<NamedCredential> {
        // The gateway plugin runs with secret_is_base64, so tokens are signed with the raw secret.
        const response = await this.send('createCredential', 'POST', `/consumers/${segment(consumer)}/jwt`, [200, 201], {
            body: {
                key: name,
                secret: Buffer.from(secret, 'utf8').toString('base64'),
                algorithm: CREDENTIAL_ALGORITHM
            },
            signal: options?.signal
        });
        return toCredential(this.parse('createCredential', RegistryCredentialSchema, response));
    }

    async listCredentials(consumer: ConsumerRef, options?: RegistryCallOptions): Promise<NamedCredential[]> {
        const rows = await this.listAll('listCredentials', `/consumers/${segment(consumer)}/jwt`, CredentialPageSchema, options);
        return rows.map(toCredential);
    }

    async deleteCredential(consumer: ConsumerRef, credentialId: string, options?: RegistryCallOptions): Promise<void> {
        await this.send(
            'deleteCredential',
            'DELETE',
            `/consumers/${segment(consumer)}/jwt/${segment(credentialId)}`,
            [200, 204],
            { signal: options?.signal }
        );
    }

    private async listAll<T>(
        operation: RegistryOperation,
        path: string,
        schema: z.ZodType<{ data: T[]; next?: string | null }, z.ZodTypeDef, unknown>,
        options?: RegistryCallOptions
    ): Promise<T[]> {
        const rows: T[] = [];
        let next: string | null | undefined = path;

        for (let page = 0; next; page++) {
            if (page === this.maxPages) {
                // A partial scan would turn into false not_found answers upstream.
                logger.warn({ operation, path, pages: page }, 'Registry listing exceeded the page limit');
                throw new RegistryError('UNKNOWN', operation, `Registry ${operation} exceeded ${this.maxPages} pages`, {
                    detail: sanitizeDetail(next)
                });
            }
            const response = await this.send(operation, 'GET', next, [200], { signal: options?.signal });
            const parsed = this.parse(operation, schema, response);
            rows.push(...parsed.data);
            next = parsed.next;
        }

        return rows;
    }

    private parse<T>(
        operation: RegistryOperation,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        response: RegistryResponse
    ): T {
        const result = schema.safeParse(response.body);
        if (!result.success) {
            const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
            throw new RegistryError('UNKNOWN', operation, `Registry returned a malformed ${operation} payload`, {
                status: response.status,
                detail: sanitizeDetail(issues)
            });
        }
        return result.data;
    }

    private async send(
        operation: RegistryOperation,
        method: HttpMethod,
        path: string,
        expected: readonly number[],
        init: { body?: unknown; signal?: AbortSignal }
    ): Promise<RegistryResponse> {
        const url = /^https?:\/\//i.test(path) ? path : `${this.baseUrl}${path}`;
        const controller = new AbortController();
        let deadlineExceeded = false;
        let cancelled = false;

        const timer = setTimeout(() => {
            deadlineExceeded = true;
            controller.abort();
        }, this.timeoutMs);
        const onCallerAbort = () => {
            cancelled = true;
            controller.abort();
        };
        if (init.signal?.aborted) {
            onCallerAbort();
        } else {
            init.signal?.addEventListener('abort', onCallerAbort, { once: true });
        }

        const startedAt = Date.now();
        let status: number;
        let text: string;

        try {
            const response = await this.fetchImpl(url, {
                method,
                headers: init.body === undefined
                    ? { accept: 'application/json' }
                    : { accept: 'application/json', 'content-type': 'application/json' },
                body: init.body === undefined ? undefined : JSON.stringify(init.body),
                signal: controller.signal
            });
            status = response.status;
            text = await response.text();
        } catch (err: unknown) {
            // Caller cancellation is treated as the caller's own deadline.
            const kind: RegistryFailureKind = deadlineExceeded || cancelled ? 'TIMEOUT' : classifyTransportError(err);
            const message = err instanceof Error ? err.message : String(err);

            logger.warn({
                operation,
                method,
                path,
                kind,
                cancelled,
                durationMs: Date.now() - startedAt,
                error: sanitizeDetail(message)
            }, 'Registry round trip failed');

            throw new RegistryError(kind, operation, describeTransportFailure(kind, operation, this.timeoutMs), {
                detail: sanitizeDetail(message),
                cause: err
            });
        } finally {
            clearTimeout(timer);
            init.signal?.removeEventListener('abort', onCallerAbort);
        }

        logger.debug({ operation, method, path, status, durationMs: Date.now() - startedAt }, 'Registry round trip');

        if (expected.includes(status)) {
            return { status, body: parseJson(text) };
        }

        const kind = classifyStatus(status) ?? 'UNKNOWN';
        const detail = sanitizeDetail(text);

        if (kind === 'UNKNOWN') {
            logger.warn({ operation, method, path, status, detail }, 'Registry returned an unexpected status');
        }

        throw new RegistryError(kind, operation, `Registry ${operation} failed with ${kind} (HTTP ${status})`, {
            status,
            detail
        });
    }
}

function describeTransportFailure(kind: RegistryFailureKind, operation: RegistryOperation, timeoutMs: number): string {
    switch (kind) {
        case 'TIMEOUT':
            return `Registry ${operation} did not complete within ${timeoutMs}ms`;
        case 'UNAVAILABLE':
            return `Registry is not reachable for ${operation}`;
        default:
            return `Registry ${operation} failed before a response was received`;
    }
}

function parseJson(text: string): unknown {
    if (text.trim() === '') return undefined;
    try {
        return JSON.parse(text);
    } catch {
        // Non-JSON success bodies fail schema validation downstream.
        return text;
    }
}

function segment(value: string): string {
    return encodeURIComponent(value);
}

function toConsumer(row: RegistryConsumerPayload): Consumer {
    return {
        id: row.id,
        username: row.username ?? '',
        customId: row.custom_id ?? undefined,
        createdAt: row.created_at ?? undefined
    };
}

function toCredential(row: RegistryCredentialPayload): NamedCredential {
    return {
        id: row.id,
        name: row.key,
        algorithm: row.algorithm ?? CREDENTIAL_ALGORITHM,
        consumerId: row.consumer?.id,
        createdAt: row.created_at ?? undefined
    };
}
