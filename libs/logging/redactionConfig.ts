/**
 * Centralized Redaction Configuration
 * Keys that must never reach the logs in clear text.
 */
export const REDACT_KEYS = [
    // Venue session (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'session_token', '*.session_token',
    'sessionToken', '*.sessionToken',
    'ssid', '*.ssid',
    'cookie', '*.cookie',

    // Credentials (Root and Nested)
    'password', '*.password',
    'secret', '*.secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',

    // Account identifiers (Root and Nested)
    'email', '*.email',
    'account_id', '*.account_id'
];

export const REDACT_CENSOR = '[REDACTED]';
