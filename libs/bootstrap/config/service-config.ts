import type { GuardRule } from '../config-guard.js';

const LOCAL_HOSTS = ['localhost', '127.0.0.1', '[::1]', '0.0.0.0'];

function pointsAtLocalhost(url: string | undefined): boolean {
    if (!url) return false;
    try {
        return LOCAL_HOSTS.includes(new URL(url).hostname);
    } catch {
        // Malformed URLs are reported by config parsing.
        return false;
    }
}

/**
 * Startup guards for the credential service.
 */
export const SERVICE_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'REGISTRY_ADMIN_URL' },
    { type: 'required', name: 'IDP_ISSUER' },
    { type: 'required', name: 'IDP_AUDIENCE' },

    {
        type: 'forbidIf',
        name: 'LOCAL_REGISTRY_IN_PRODUCTION',
        when: env => env.NODE_ENV === 'production' && pointsAtLocalhost(env.REGISTRY_ADMIN_URL),
        message: 'Production cannot use a localhost registry admin API',
    },

    {
        type: 'assert',
        check: env => !!(env.IDP_JWKS_URL || env.IDP_ISSUER || env.IDP_CERT_PATH),
        message: 'At least one caller key source (IDP_JWKS_URL, IDP_ISSUER or IDP_CERT_PATH) is required',
    },
];
