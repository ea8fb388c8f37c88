/**
 * Centralized Redaction Configuration
 * Keys removed from every log record so request metadata cannot leak credentials.
 */
export const REDACT_KEYS = [
    // Transport headers (Root and Nested)
    'authorization', '*.authorization',
    'cookie', '*.cookie',

    // Credentials (Root and Nested)
    'password', '*.password',
    'token', '*.token',
    'apiKey', '*.apiKey',
    'secret', '*.secret'
];

export const REDACT_CENSOR = '[REDACTED]';
