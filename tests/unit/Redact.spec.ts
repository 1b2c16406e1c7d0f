import { describe, it } from 'node:test';
import assert from 'node:assert';
import { REDACT_CENSOR, REDACT_KEYS } from '../../libs/logging/redactionConfig.js';
import { pino } from 'pino';
import { Writable } from 'stream';

describe('Log Redaction', () => {
    it('should redact credential material in objects', () => {
        const lines: Array<Record<string, unknown>> = [];
        const stream = new Writable({
            write(chunk, _encoding, callback) {
                lines.push(JSON.parse(chunk.toString()));
                callback();
            }
        });

        const testLogger = pino({
            redact: {
                paths: REDACT_KEYS,
                censor: REDACT_CENSOR
            }
        }, stream);

        testLogger.info({
            authorization: 'Bearer test-token',
            secret: 'test-secret',
            token: 'header.payload.signature',
            request: {
                headers: { authorization: 'Bearer test-token' }
            },
            credential: {
                name: 'laptop',
                secret: 'test-secret'
            },
            visible: 'ok'
        }, 'test message');

        assert.strictEqual(lines.length, 1);
        const log = lines[0];
        assert.strictEqual(log.authorization, REDACT_CENSOR);
        assert.strictEqual(log.secret, REDACT_CENSOR);
        assert.strictEqual(log.token, REDACT_CENSOR);
        assert.deepStrictEqual(log.request, { headers: { authorization: REDACT_CENSOR } });
        assert.deepStrictEqual(log.credential, { name: 'laptop', secret: REDACT_CENSOR });
        assert.strictEqual(log.visible, 'ok');
    });
});
