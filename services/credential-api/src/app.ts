import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { RequestContext } from "../../../libs/context/requestContext.js";
import { resolveTargetPrincipal, requireAdmin } from "../../../libs/auth/authorize.js";
import { LifecycleManager, type IssuedTokenResult, type DeleteOutcome } from "../../../libs/lifecycle/index.js";
import { authenticateCaller, currentCaller, type CallerVerifier } from "../../../libs/middleware/authenticate.js";
import { requestScope } from "../../../libs/middleware/requestScope.js";
import { errorHandler, notFoundHandler } from "../../../libs/middleware/errorHandler.js";
import { validate } from "../../../libs/validation/zod-middleware.js";
import {
    IssueTokenRequestSchema,
    PrincipalQuerySchema,
    ProvisionConsumerRequestSchema
} from "../../../libs/validation/schema.js";

export interface AppDeps {
    readonly lifecycle: LifecycleManager;
    readonly authenticator: CallerVerifier;
    readonly serviceName?: string;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const route = (handler: AsyncHandler) =>
    (req: Request, res: Response, next: NextFunction): void => {
        handler(req, res).catch(next);
    };

/**
 * Runs fn with the target principal recorded in the request scope.
 */
async function forPrincipal<T>(principal: string, fn: () => Promise<T>): Promise<T> {
    return await RequestContext.extend({ principal }, fn);
}

function issuedBody(result: IssuedTokenResult) {
    return {
        token: result.token,
        token_name: result.finalName,
        requested_name: result.requestedName,
        renamed: result.renamed,
        expires_at: result.expiresAt.toISOString(),
        credential_id: result.credentialId,
        consumer_id: result.consumerId,
        consumer_key: result.consumerKey,
        consumer_created: result.consumerCreated
    };
}

function sendDeleteOutcome(res: Response, outcome: DeleteOutcome): void {
    if (outcome.status === 'deleted') {
        res.status(200).json({ status: outcome.status, credential_id: outcome.credentialId, name: outcome.name });
        return;
    }
    const message = outcome.reason === 'consumer_missing'
        ? 'Principal has no consumer'
        : 'No such credential for this principal';
    res.status(404).json({ error: { code: 'NOT_FOUND', message, reason: outcome.reason } });
}

export function createApp(deps: AppDeps): Express {
    const { lifecycle } = deps;
    const serviceName = deps.serviceName ?? "credential-api";
    const app = express();

    app.disable("x-powered-by");
    app.use(express.json({ limit: "16kb" }));
    app.use(requestScope());

    app.get("/health", (_req, res) => {
        res.json({ status: "ok", service: serviceName });
    });

    app.use(authenticateCaller(deps.authenticator));

    app.get("/me", (_req, res) => {
        const caller = currentCaller();
        res.json({
            id: caller.subject,
            name: caller.principal,
            issuer: caller.issuer,
            roles: caller.roles,
            permissions: caller.permissions,
            is_admin: caller.isAdmin
        });
    });

    app.post("/tokens", route(async (req, res) => {
        const body = validate(IssueTokenRequestSchema, req.body ?? {}, "POST /tokens");
        const principal = resolveTargetPrincipal(currentCaller(), body.principal);

        const result = await forPrincipal(principal, () =>
            lifecycle.issueForPrincipal(principal, body.token_name, { ttlSeconds: body.ttl_seconds })
        );
        res.status(201).json(issuedBody(result));
    }));

    app.get("/tokens", route(async (req, res) => {
        const query = validate(PrincipalQuerySchema, req.query, "GET /tokens");
        const principal = resolveTargetPrincipal(currentCaller(), query.principal);

        const inventory = await forPrincipal(principal, () => lifecycle.listTokens(principal));
        res.json({
            principal: inventory.principal,
            consumer_id: inventory.consumerId ?? null,
            tokens: inventory.tokens.map(t => ({
                id: t.id,
                redacted_id: t.redactedId,
                name: t.name,
                algorithm: t.algorithm,
                consumer_id: t.consumerId,
                created_at: t.createdAt ?? null
            }))
        });
    }));

    app.delete("/tokens/by-name/:name", route(async (req, res) => {
        const query = validate(PrincipalQuerySchema, req.query, "DELETE /tokens/by-name");
        const principal = resolveTargetPrincipal(currentCaller(), query.principal);

        const outcome = await forPrincipal(principal, () => lifecycle.deleteByName(principal, req.params.name));
        sendDeleteOutcome(res, outcome);
    }));

    app.delete("/tokens/:id", route(async (req, res) => {
        const query = validate(PrincipalQuerySchema, req.query, "DELETE /tokens");
        const principal = resolveTargetPrincipal(currentCaller(), query.principal);

        const outcome = await forPrincipal(principal, () => lifecycle.deleteById(principal, req.params.id));
        sendDeleteOutcome(res, outcome);
    }));

    app.post("/consumers", route(async (req, res) => {
        const body = validate(ProvisionConsumerRequestSchema, req.body ?? {}, "POST /consumers");
        const principal = resolveTargetPrincipal(currentCaller(), body.principal);

        const result = await forPrincipal(principal, () => lifecycle.provisionConsumer(principal));
        res.status(201).json(issuedBody(result));
    }));

    app.post("/consumers/auto", route(async (req, res) => {
        const body = validate(ProvisionConsumerRequestSchema, req.body ?? {}, "POST /consumers/auto");
        const principal = resolveTargetPrincipal(currentCaller(), body.principal);

        const result = await forPrincipal(principal, () => lifecycle.autoProvision(principal));
        res.status(201).json(issuedBody(result));
    }));

    app.get("/consumers", route(async (_req, res) => {
        requireAdmin(currentCaller());

        const consumers = await lifecycle.listConsumers();
        res.json({
            consumers: consumers.map(c => ({
                id: c.id,
                username: c.username,
                custom_id: c.customId ?? null,
                consumer_key: c.consumerKey,
                created_at: c.createdAt ?? null
            }))
        });
    }));

    app.use(notFoundHandler());
    app.use(errorHandler(serviceName));

    return app;
}
