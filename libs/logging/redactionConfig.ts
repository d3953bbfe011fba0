/**
 * Centralized Redaction Configuration
 * Keys that must never reach a log sink in clear text. Audit bodies are masked
 * separately per rule; this list covers structured fields passed to the logger.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'cookie', '*.cookie',
    'token', '*.token',
    'access_token', '*.access_token',
    'refresh_token', '*.refresh_token',
    'password', '*.password',
    'secret', '*.secret',
    'client_secret', '*.client_secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',

    // Request headers as logged by the HTTP boundary
    'headers.authorization',
    'headers.cookie',
    'headers["x-api-key"]',

    // Raw payloads (only masked bodies may be logged)
    'rawBody', '*.rawBody'
];

export const REDACT_CENSOR = '[REDACTED]';
