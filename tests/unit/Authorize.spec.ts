/**
 * Unit Tests: Authorization
 *
 * Self-service versus administrative access to another principal's credentials.
 *
 * @see libs/auth/authorize.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { canActFor, requireAdmin, resolveTargetPrincipal } from '../../libs/auth/authorize.js';
import type { CallerIdentity } from '../../libs/context/identity.js';
import { AuthorizationError } from '../../libs/errors/appErrors.js';

const alice: CallerIdentity = {
    principal: 'alice',
    subject: 'user-1',
    issuer: 'https://idp.test',
    roles: [],
    permissions: [],
    isAdmin: false
};

const admin: CallerIdentity = { ...alice, principal: 'root', subject: 'user-0', roles: ['admin'], isAdmin: true };

describe('Authorization', () => {
    it('lets a caller act for itself', () => {
        assert.strictEqual(canActFor(alice, 'alice'), true);
        assert.strictEqual(resolveTargetPrincipal(alice), 'alice');
        assert.strictEqual(resolveTargetPrincipal(alice, 'alice'), 'alice');
    });

    it('denies cross-principal access to non-admins', () => {
        assert.strictEqual(canActFor(alice, 'bob'), false);
        assert.throws(() => resolveTargetPrincipal(alice, 'bob'), AuthorizationError);
    });

    it('lets admins act for anyone', () => {
        assert.strictEqual(resolveTargetPrincipal(admin, 'bob'), 'bob');
        assert.strictEqual(resolveTargetPrincipal(admin), 'root');
    });

    it('requires admin for administrative operations', () => {
        assert.throws(() => requireAdmin(alice), AuthorizationError);
        assert.doesNotThrow(() => requireAdmin(admin));
    });
});
