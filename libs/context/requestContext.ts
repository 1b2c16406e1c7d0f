import { AsyncLocalStorage } from 'node:async_hooks';
import type { RequestScope } from "./identity.js";

/**
 * Request Context Container
 * AsyncLocalStorage-backed for concurrent request isolation.
 *
 * Only the HTTP boundary calls run()/extend(); downstream code reads.
 */

const storage = new AsyncLocalStorage<RequestScope>();

export class RequestContext {
    /**
     * Establish a request scope for the duration of fn.
     * Supports both sync and async functions.
     */
    public static run<T>(
        scope: RequestScope,
        fn: () => Promise<T> | T
    ): Promise<T> | T {
        return storage.run(Object.freeze({ ...scope }), fn);
    }

    /**
     * Run fn in a child scope that adds fields to the current one.
     * FAIL-CLOSED: there must already be a scope to extend.
     */
    public static extend<T>(
        fields: Omit<Partial<RequestScope>, 'requestId'>,
        fn: () => Promise<T> | T
    ): Promise<T> | T {
        return RequestContext.run({ ...RequestContext.get(), ...fields }, fn);
    }

    /**
     * Get current request scope.
     * FAIL-CLOSED: Throws if called outside run() scope.
     */
    public static get(): RequestScope {
        const scope = storage.getStore();
        if (!scope) {
            throw new Error("MISSING_REQUEST_CONTEXT: No request scope established");
        }
        return scope;
    }

    /**
     * Non-throwing variant for code that also runs outside requests (logging).
     */
    public static current(): RequestScope | undefined {
        return storage.getStore();
    }
}
