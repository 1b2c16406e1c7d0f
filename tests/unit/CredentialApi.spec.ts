/**
 * Integration-style tests for the HTTP surface.
 *
 * The express app runs on an ephemeral port inside the test process, backed
 * by the in-memory registry and a table-driven caller verifier.
 *
 * @see services/credential-api/src/app.ts
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { once } from 'events';
import type { Server } from 'http';
import { decodeJwt } from 'jose';
import { createApp } from '../../services/credential-api/src/app.js';
import { CredentialIssuer, LifecycleManager, TokenMinter } from '../../libs/lifecycle/index.js';
import type { CallerVerifier } from '../../libs/middleware/authenticate.js';
import type { CallerIdentity } from '../../libs/context/identity.js';
import { AuthenticationError } from '../../libs/errors/appErrors.js';
import { RegistryError } from '../../libs/errors/taxonomy.js';
import { InMemoryRegistry } from '../support/inMemoryRegistry.js';

const alice: CallerIdentity = {
    principal: 'alice',
    subject: 'user-1',
    issuer: 'https://idp.test',
    roles: [],
    permissions: [],
    isAdmin: false
};

const admin: CallerIdentity = { ...alice, principal: 'root', subject: 'user-0', roles: ['admin'], isAdmin: true };

const CALLERS: Record<string, CallerIdentity> = {
    'alice-token': alice,
    'admin-token': admin
};

const verifier: CallerVerifier = {
    authenticate: async token => {
        const caller = CALLERS[token];
        if (!caller) throw new AuthenticationError('Invalid bearer token');
        return caller;
    }
};

interface ApiResponse {
    readonly status: number;
    readonly headers: Headers;
    readonly body: Record<string, unknown>;
}

function asRecord(value: unknown): Record<string, unknown> {
    assert.ok(typeof value === 'object' && value !== null && !Array.isArray(value), 'expected a JSON object');
    return Object.fromEntries(Object.entries(value));
}

describe('Credential API', () => {
    let registry: InMemoryRegistry;
    let server: Server;
    let baseUrl: string;

    beforeEach(async () => {
        registry = new InMemoryRegistry();
        const lifecycle = new LifecycleManager({
            registry,
            issuer: new CredentialIssuer(registry, { maxAttempts: 3 }),
            minter: new TokenMinter({ keyClaimName: 'kid', defaultTtlSeconds: 3600, maxTtlSeconds: 86_400 })
        });

        server = createApp({ lifecycle, authenticator: verifier }).listen(0, '127.0.0.1');
        await once(server, 'listening');
        const address = server.address();
        assert.ok(address !== null && typeof address === 'object');
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterEach(async () => {
        server.closeAllConnections();
        server.close();
        await once(server, 'close');
    });

    async function call(
        method: string,
        path: string,
        options: { token?: string; body?: unknown; rawBody?: string; headers?: Record<string, string> } = {}
    ): Promise<ApiResponse> {
        const headers: Record<string, string> = { ...options.headers };
        if (options.token) headers.authorization = `Bearer ${options.token}`;
        const payload = options.rawBody ?? (options.body === undefined ? undefined : JSON.stringify(options.body));
        if (payload !== undefined) headers['content-type'] = 'application/json';

        const response = await fetch(`${baseUrl}${path}`, { method, headers, body: payload });
        const text = await response.text();
        return {
            status: response.status,
            headers: response.headers,
            body: text === '' ? {} : asRecord(JSON.parse(text))
        };
    }

    it('answers health checks without authentication', async () => {
        const res = await call('GET', '/health');
        assert.strictEqual(res.status, 200);
        assert.deepStrictEqual(res.body, { status: 'ok', service: 'credential-api' });
    });

    it('rejects requests without a bearer token', async () => {
        const res = await call('POST', '/tokens', { body: {} });

        assert.strictEqual(res.status, 401);
        assert.deepStrictEqual(res.body, {
            error: { code: 'AUTHENTICATION_FAILED', message: 'Missing or malformed Authorization header' }
        });
        assert.match(res.headers.get('x-request-id') ?? '', /^[0-9a-f-]{36}$/);
    });

    it('propagates the caller\'s request id', async () => {
        const res = await call('GET', '/health', { headers: { 'x-request-id': 'req-123' } });
        assert.strictEqual(res.headers.get('x-request-id'), 'req-123');
    });

    it('issues tokens and renames on a repeated name', async () => {
        const first = await call('POST', '/tokens', { token: 'alice-token', body: { token_name: 'laptop' } });
        const second = await call('POST', '/tokens', { token: 'alice-token', body: { token_name: 'laptop' } });

        assert.strictEqual(first.status, 201);
        assert.strictEqual(first.body.token_name, 'laptop');
        assert.strictEqual(first.body.renamed, false);
        assert.strictEqual(first.body.consumer_created, true);
        assert.strictEqual(first.body.consumer_key, 'c2ef90b9-02bc-5d53-93cd-92652b6e1b41');

        assert.strictEqual(second.status, 201);
        assert.strictEqual(second.body.renamed, true);
        assert.strictEqual(second.body.requested_name, 'laptop');
        assert.match(String(second.body.token_name), /^laptop_\d{6}_[0-9a-f]{8}$/);
        assert.strictEqual(decodeJwt(String(second.body.token)).kid, second.body.token_name);
    });

    it('lists the caller\'s tokens without secrets', async () => {
        await call('POST', '/tokens', { token: 'alice-token', body: { token_name: 'laptop' } });

        const res = await call('GET', '/tokens', { token: 'alice-token' });

        assert.strictEqual(res.status, 200);
        assert.deepStrictEqual(res.body, {
            principal: 'alice',
            consumer_id: 'consumer-0001',
            tokens: [{
                id: 'cred-0002',
                redacted_id: 'cred-000…',
                name: 'laptop',
                algorithm: 'HS256',
                consumer_id: 'consumer-0001',
                created_at: '2023-11-14T22:13:20.000Z'
            }]
        });
    });

    it('forbids acting for another principal without admin rights', async () => {
        const res = await call('POST', '/tokens', { token: 'alice-token', body: { principal: 'bob' } });

        assert.strictEqual(res.status, 403);
        assert.strictEqual(asRecord(res.body.error).code, 'ACCESS_DENIED');
        assert.strictEqual(registry.calls.length, 0);
    });

    it('lets admins issue for another principal', async () => {
        const res = await call('POST', '/tokens', { token: 'admin-token', body: { principal: 'bob', token_name: 'ci' } });

        assert.strictEqual(res.status, 201);
        assert.strictEqual(decodeJwt(String(res.body.token)).sub, 'bob');
    });

    it('deletes by name, then reports 404', async () => {
        await call('POST', '/tokens', { token: 'alice-token', body: { token_name: 'laptop' } });

        const deleted = await call('DELETE', '/tokens/by-name/laptop', { token: 'alice-token' });
        const again = await call('DELETE', '/tokens/by-name/laptop', { token: 'alice-token' });

        assert.strictEqual(deleted.status, 200);
        assert.deepStrictEqual(deleted.body, { status: 'deleted', credential_id: 'cred-0002', name: 'laptop' });
        assert.strictEqual(again.status, 404);
        assert.deepStrictEqual(again.body, {
            error: { code: 'NOT_FOUND', message: 'No such credential for this principal', reason: 'credential_missing' }
        });
    });

    it('deletes by id', async () => {
        const issued = await call('POST', '/tokens', { token: 'alice-token', body: { token_name: 'laptop' } });

        const res = await call('DELETE', `/tokens/${String(issued.body.credential_id)}`, { token: 'alice-token' });

        assert.strictEqual(res.status, 200);
        assert.strictEqual(res.body.name, 'laptop');
        assert.deepStrictEqual(registry.credentials, []);
    });

    it('provisions a consumer with a token named after the principal', async () => {
        const res = await call('POST', '/consumers', { token: 'alice-token', body: {} });

        assert.strictEqual(res.status, 201);
        assert.strictEqual(res.body.token_name, 'alice');
        assert.strictEqual(res.body.consumer_created, true);
    });

    it('auto-provisions a consumer with a generated token name', async () => {
        const res = await call('POST', '/consumers/auto', { token: 'alice-token', body: {} });

        assert.strictEqual(res.status, 201);
        assert.match(String(res.body.token_name), /^alice_auto_\d{8}_\d{6}$/);
        assert.strictEqual(res.body.consumer_created, true);
        assert.strictEqual(decodeJwt(String(res.body.token)).kid, res.body.token_name);
    });

    it('describes the authenticated caller', async () => {
        const res = await call('GET', '/me', { token: 'alice-token' });

        assert.strictEqual(res.status, 200);
        assert.deepStrictEqual(res.body, {
            id: 'user-1',
            name: 'alice',
            issuer: 'https://idp.test',
            roles: [],
            permissions: [],
            is_admin: false
        });
    });

    it('restricts the consumer listing to admins', async () => {
        await call('POST', '/consumers', { token: 'alice-token', body: {} });

        const denied = await call('GET', '/consumers', { token: 'alice-token' });
        const allowed = await call('GET', '/consumers', { token: 'admin-token' });

        assert.strictEqual(denied.status, 403);
        assert.strictEqual(allowed.status, 200);
        assert.deepStrictEqual(allowed.body, {
            consumers: [{
                id: 'consumer-0001',
                username: 'alice',
                custom_id: 'c2ef90b9-02bc-5d53-93cd-92652b6e1b41',
                consumer_key: 'c2ef90b9-02bc-5d53-93cd-92652b6e1b41',
                created_at: '2023-11-14T22:13:20.000Z'
            }]
        });
    });

    it('rejects invalid and malformed bodies', async () => {
        const invalid = await call('POST', '/tokens', { token: 'alice-token', body: { token_name: 'my laptop' } });
        const malformed = await call('POST', '/tokens', { token: 'alice-token', rawBody: '{"token_name":' });

        assert.strictEqual(invalid.status, 400);
        assert.strictEqual(asRecord(invalid.body.error).code, 'VALIDATION_FAILED');
        assert.strictEqual(malformed.status, 400);
        assert.strictEqual(asRecord(malformed.body.error).code, 'MALFORMED_REQUEST');
    });

    it('surfaces an unreachable registry as a retryable 503', async () => {
        registry.failNext('createConsumer', new RegistryError('UNAVAILABLE', 'createConsumer', 'Registry is not reachable for createConsumer'));

        const res = await call('POST', '/tokens', { token: 'alice-token', body: { token_name: 'laptop' } });

        assert.strictEqual(res.status, 503);
        assert.deepStrictEqual(res.body, {
            error: { code: 'UNAVAILABLE', message: 'Registry is not reachable for createConsumer', retryable: true }
        });
    });

    it('answers unknown routes with 404', async () => {
        const res = await call('GET', '/nowhere', { token: 'alice-token' });
        assert.strictEqual(res.status, 404);
        assert.strictEqual(asRecord(res.body.error).code, 'ROUTE_NOT_FOUND');
    });
});
