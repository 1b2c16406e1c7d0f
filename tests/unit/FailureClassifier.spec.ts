/**
 * Unit Tests: Registry Failure Classifier
 *
 * @see libs/registry/failureClassifier.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { classifyStatus, classifyTransportError, sanitizeDetail } from '../../libs/registry/failureClassifier.js';

function errorWithCode(message: string, code: string): Error {
    return Object.assign(new Error(message), { code });
}

describe('Registry Failure Classifier', () => {
    describe('classifyStatus()', () => {
        it('treats 2xx as success', () => {
            assert.strictEqual(classifyStatus(200), null);
            assert.strictEqual(classifyStatus(201), null);
            assert.strictEqual(classifyStatus(204), null);
        });

        it('maps 409 and 404', () => {
            assert.strictEqual(classifyStatus(409), 'CONFLICT');
            assert.strictEqual(classifyStatus(404), 'NOT_FOUND');
        });

        it('maps everything else to UNKNOWN', () => {
            for (const status of [400, 401, 500, 502, 503]) {
                assert.strictEqual(classifyStatus(status), 'UNKNOWN', `status ${status}`);
            }
        });
    });

    describe('classifyTransportError()', () => {
        it('finds refused connections in the fetch cause chain', () => {
            const err = new TypeError('fetch failed', {
                cause: errorWithCode('connect ECONNREFUSED 127.0.0.1:8001', 'ECONNREFUSED')
            });
            assert.strictEqual(classifyTransportError(err), 'UNAVAILABLE');
        });

        it('maps DNS failures to UNAVAILABLE', () => {
            assert.strictEqual(classifyTransportError(errorWithCode('getaddrinfo ENOTFOUND registry', 'ENOTFOUND')), 'UNAVAILABLE');
        });

        it('maps deadline errors to TIMEOUT', () => {
            const timeout = new Error('The operation was aborted due to timeout');
            timeout.name = 'TimeoutError';
            assert.strictEqual(classifyTransportError(timeout), 'TIMEOUT');
            assert.strictEqual(
                classifyTransportError(new TypeError('fetch failed', { cause: errorWithCode('Connect Timeout Error', 'UND_ERR_CONNECT_TIMEOUT') })),
                'TIMEOUT'
            );
        });

        it('prefers TIMEOUT when both kinds appear in the chain', () => {
            const err = new TypeError('fetch failed', { cause: errorWithCode('connect ETIMEDOUT', 'ETIMEDOUT') });
            assert.strictEqual(classifyTransportError(err), 'TIMEOUT');
        });

        it('falls back to UNKNOWN', () => {
            assert.strictEqual(classifyTransportError(new Error('boom')), 'UNKNOWN');
            assert.strictEqual(classifyTransportError(undefined), 'UNKNOWN');
            assert.strictEqual(classifyTransportError(42), 'UNKNOWN');
        });
    });

    describe('sanitizeDetail()', () => {
        it('scrubs secrets from JSON bodies', () => {
            const body = '{"key":"laptop","secret":"dGVzdC1zZWNyZXQ="}';
            assert.strictEqual(sanitizeDetail(body), '{"key":"laptop","secret":"[REDACTED]"}');
        });

        it('scrubs key=value style secrets and tokens', () => {
            assert.strictEqual(sanitizeDetail('bad secret=abc and token=xyz'), 'bad secret=[REDACTED] and token=[REDACTED]');
        });

        it('truncates long messages', () => {
            assert.strictEqual(sanitizeDetail('x'.repeat(800))?.length, 500);
        });

        it('passes undefined and empty through as undefined', () => {
            assert.strictEqual(sanitizeDetail(undefined), undefined);
            assert.strictEqual(sanitizeDetail(''), undefined);
        });
    });
});
