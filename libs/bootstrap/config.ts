import { z } from 'zod';
import { ValidationError } from '../errors/appErrors.js';
import { RESERVED_CLAIMS } from '../tokens/tokenMinter.js';
import type { ConfigEnv } from './config-guard.js';

/**
 * Typed service configuration, parsed once from the environment.
 * Blank variables count as unset.
 */

const ONE_YEAR_SECONDS = 31_536_000;

const blank = (value: unknown): unknown =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const integer = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
    z.preprocess(blank, z.coerce.number().int().min(min).max(max).default(fallback));

const text = (fallback: string) => z.preprocess(blank, z.string().trim().default(fallback));

const list = (fallback: string) =>
    text(fallback).transform(value => value.split(',').map(item => item.trim()).filter(Boolean));

const EnvSchema = z.object({
    NODE_ENV: text('development'),
    SERVICE_NAME: text('credential-manager'),
    LOG_LEVEL: z.preprocess(blank, z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')),
    HOST: text('0.0.0.0'),
    PORT: integer(8080, 0, 65535),

    REGISTRY_ADMIN_URL: z.preprocess(blank, z.string().trim().url().default('http://localhost:8001')),
    REGISTRY_TIMEOUT_MS: integer(10_000, 1),

    TOKEN_TTL_SECONDS: integer(ONE_YEAR_SECONDS, 1),
    TOKEN_MAX_TTL_SECONDS: integer(ONE_YEAR_SECONDS, 1),
    TOKEN_KEY_CLAIM: text('kid')
        .pipe(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain claim name'))
        .refine(claim => !RESERVED_CLAIMS.includes(claim), 'must not be sub, iat or exp'),

    CREDENTIAL_NAME_MAX_ATTEMPTS: integer(3, 1, 10),

    IDP_ISSUER: z.preprocess(blank, z.string().trim().url()),
    IDP_AUDIENCE: z.preprocess(blank, z.string().trim().min(1)),
    IDP_JWKS_URL: z.preprocess(blank, z.string().trim().url().optional()),
    IDP_CERT_PATH: z.preprocess(blank, z.string().trim().optional()),

    ADMIN_ROLES: list('admin'),
    ADMIN_PERMISSIONS: list('manage_all_consumers'),
}).superRefine((env, ctx) => {
    if (env.TOKEN_TTL_SECONDS > env.TOKEN_MAX_TTL_SECONDS) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['TOKEN_TTL_SECONDS'],
            message: 'must not exceed TOKEN_MAX_TTL_SECONDS'
        });
    }
});

export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL'];

export interface AppConfig {
    readonly env: string;
    readonly serviceName: string;
    readonly logLevel: LogLevel;
    readonly http: {
        readonly host: string;
        readonly port: number;
    };
    readonly registry: {
        readonly adminUrl: string;
        readonly timeoutMs: number;
    };
    readonly tokens: {
        readonly defaultTtlSeconds: number;
        readonly maxTtlSeconds: number;
        readonly keyClaimName: string;
    };
    readonly credentials: {
        readonly maxNameAttempts: number;
    };
    readonly idp: {
        readonly issuer: string;
        readonly audience: string;
        readonly jwksUrl: string;
        readonly certPath?: string;
    };
    readonly authorization: {
        readonly adminRoles: readonly string[];
        readonly adminPermissions: readonly string[];
    };
}

/**
 * @throws ValidationError naming every offending variable
 */
export function loadConfig(env: ConfigEnv = process.env): AppConfig {
    const result = EnvSchema.safeParse(env);

    if (!result.success) {
        const issues = result.error.issues.map(issue => ({
            path: issue.path.join('.'),
            message: issue.message
        }));
        throw new ValidationError(
            `Invalid configuration: ${issues.map(i => i.path).join(', ')}`,
            issues
        );
    }

    const e = result.data;

    return Object.freeze({
        env: e.NODE_ENV,
        serviceName: e.SERVICE_NAME,
        logLevel: e.LOG_LEVEL,
        http: Object.freeze({ host: e.HOST, port: e.PORT }),
        registry: Object.freeze({
            adminUrl: e.REGISTRY_ADMIN_URL.replace(/\/+$/, ''),
            timeoutMs: e.REGISTRY_TIMEOUT_MS
        }),
        tokens: Object.freeze({
            defaultTtlSeconds: e.TOKEN_TTL_SECONDS,
            maxTtlSeconds: e.TOKEN_MAX_TTL_SECONDS,
            keyClaimName: e.TOKEN_KEY_CLAIM
        }),
        credentials: Object.freeze({ maxNameAttempts: e.CREDENTIAL_NAME_MAX_ATTEMPTS }),
        idp: Object.freeze({
            issuer: e.IDP_ISSUER,
            audience: e.IDP_AUDIENCE,
            jwksUrl: e.IDP_JWKS_URL ?? `${e.IDP_ISSUER.replace(/\/+$/, '')}/.well-known/jwks.json`,
            certPath: e.IDP_CERT_PATH
        }),
        authorization: Object.freeze({
            adminRoles: Object.freeze(e.ADMIN_ROLES),
            adminPermissions: Object.freeze(e.ADMIN_PERMISSIONS)
        })
    });
}
