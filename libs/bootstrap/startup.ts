import { logger } from "../logging/logger.js";
import { type ConfigEnv, ConfigGuard } from "./config-guard.js";
import { SERVICE_CONFIG_GUARDS } from "./config/service-config.js";
import { type AppConfig, loadConfig } from "./config.js";

export function bootstrap(serviceName: string, env: ConfigEnv = process.env): AppConfig {
    logger.info({ serviceName }, "Bootstrapping service");

    ConfigGuard.enforce(SERVICE_CONFIG_GUARDS, env);
    const config = loadConfig(env);
    logger.level = config.logLevel;

    logger.info({
        serviceName,
        env: config.env,
        registry: config.registry.adminUrl,
        keyClaim: config.tokens.keyClaimName,
        maxNameAttempts: config.credentials.maxNameAttempts
    }, "Startup checks passed");

    return config;
}
