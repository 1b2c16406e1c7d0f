import { describe, it } from 'node:test';
import assert from 'node:assert';
import { RequestContext } from '../../libs/context/requestContext.js';
import type { CallerIdentity, RequestScope } from '../../libs/context/identity.js';

const caller: CallerIdentity = {
    principal: 'alice',
    subject: 'user-1',
    issuer: 'https://idp.test',
    roles: [],
    permissions: [],
    isAdmin: false
};

const scopeA: RequestScope = { requestId: 'req-A' };
const scopeB: RequestScope = { requestId: 'req-B' };

describe('RequestContext', () => {
    it('should throw when accessing context outside run()', () => {
        assert.throws(() => RequestContext.get(), /MISSING_REQUEST_CONTEXT/);
        assert.strictEqual(RequestContext.current(), undefined);
    });

    it('should return context inside run()', () => {
        const result = RequestContext.run(scopeA, () => {
            assert.deepStrictEqual(RequestContext.get(), scopeA);
            return 'success';
        });
        assert.strictEqual(result, 'success');
    });

    it('should freeze the stored scope', () => {
        RequestContext.run(scopeA, () => {
            assert.strictEqual(Object.isFrozen(RequestContext.get()), true);
        });
    });

    it('should extend the current scope without leaking into the parent', () => {
        RequestContext.run(scopeA, () => {
            RequestContext.extend({ caller, principal: 'bob' }, () => {
                assert.deepStrictEqual(RequestContext.get(), { requestId: 'req-A', caller, principal: 'bob' });
            });
            assert.deepStrictEqual(RequestContext.get(), scopeA);
        });
    });

    it('should refuse to extend outside a scope', () => {
        assert.throws(() => RequestContext.extend({ principal: 'bob' }, () => undefined), /MISSING_REQUEST_CONTEXT/);
    });

    it('should maintain isolation between concurrent async requests', async () => {
        const flowA = RequestContext.run(scopeA, async () => {
            assert.deepStrictEqual(RequestContext.get(), scopeA);
            await new Promise(resolve => setTimeout(resolve, 50));
            assert.deepStrictEqual(RequestContext.get(), scopeA);
            return 'A';
        });

        const flowB = RequestContext.run(scopeB, async () => {
            assert.deepStrictEqual(RequestContext.get(), scopeB);
            await new Promise(resolve => setTimeout(resolve, 20));
            assert.deepStrictEqual(RequestContext.get(), scopeB);
            return 'B';
        });

        const [resA, resB] = await Promise.all([flowA, flowB]);
        assert.strictEqual(resA, 'A');
        assert.strictEqual(resB, 'B');
    });
});
