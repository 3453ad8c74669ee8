/**
 * Centralized Redaction Configuration
 * Keys that must never reach log output.
 */
export const REDACT_KEYS = [
    // Database credentials (Root and Nested)
    'password', '*.password',
    'connectionString', '*.connectionString',
    'ca', '*.ca',

    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'secret', '*.secret',
    'apiKey', '*.apiKey',

    // Payout rail
    'railCredentials', '*.railCredentials'
];

export const REDACT_CENSOR = '[REDACTED]';
