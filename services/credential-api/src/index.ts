import { bootstrap } from "../../../libs/bootstrap/startup.js";
import { logger } from "../../../libs/logging/logger.js";
import { CallerAuthenticator, createKeySource } from "../../../libs/auth/callerAuth.js";
import {
    CredentialIssuer,
    HttpRegistryClient,
    LifecycleManager,
    TokenMinter
} from "../../../libs/lifecycle/index.js";
import { createApp } from "./app.js";

async function main() {
    const config = bootstrap("credential-api");

    const registry = new HttpRegistryClient({
        baseUrl: config.registry.adminUrl,
        timeoutMs: config.registry.timeoutMs
    });

    const lifecycle = new LifecycleManager({
        registry,
        issuer: new CredentialIssuer(registry, { maxAttempts: config.credentials.maxNameAttempts }),
        minter: new TokenMinter({
            keyClaimName: config.tokens.keyClaimName,
            defaultTtlSeconds: config.tokens.defaultTtlSeconds,
            maxTtlSeconds: config.tokens.maxTtlSeconds
        })
    });

    const authenticator = new CallerAuthenticator({
        issuer: config.idp.issuer,
        audience: config.idp.audience,
        keySource: createKeySource({
            jwksUrl: config.idp.jwksUrl,
            certPath: config.idp.certPath,
            timeoutMs: config.registry.timeoutMs
        }),
        adminRoles: config.authorization.adminRoles,
        adminPermissions: config.authorization.adminPermissions
    });

    const app = createApp({ lifecycle, authenticator, serviceName: config.serviceName });

    const server = app.listen(config.http.port, config.http.host, () => {
        logger.info({ host: config.http.host, port: config.http.port }, "Credential API listening");
    });

    const shutdown = (signal: string) => {
        logger.info({ signal }, "Shutting down");
        server.close(err => {
            if (err) {
                logger.error({ err }, "Error while closing HTTP server");
                process.exit(1);
            }
            process.exit(0);
        });
    };

    process.once("SIGTERM", shutdown);
    process.once("SIGINT", shutdown);
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
