/**
 * Centralized Redaction Configuration
 * Keys that must never reach log output. Credential secrets travel through
 * the registry client and token minter, so both spellings are covered.
 */
export const REDACT_KEYS = [
    // Caller authentication (Root and Nested)
    'authorization', '*.authorization',
    'headers.authorization', '*.headers.authorization',
    'bearer', '*.bearer',
    'id_token', '*.id_token',
    'access_token', '*.access_token',

    // Gateway credentials (Root and Nested)
    'secret', '*.secret',
    'rawSecret', '*.rawSecret',
    'secretBase64', '*.secretBase64',
    'client_secret', '*.client_secret',

    // Minted tokens (Root and Nested)
    'token', '*.token',
    'jwt', '*.jwt',
    'signature', '*.signature'
];

export const REDACT_CENSOR = '[REDACTED]';
