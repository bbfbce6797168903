/**
 * Keys that must be redacted from logs to prevent credential leakage.
 * Call parameters are logged at debug level, so their nested keys are listed too.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'access_token', '*.access_token',
    'refresh_token', '*.refresh_token',
    'id_token', '*.id_token',
    'password', '*.password',
    'secret', '*.secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',
    'sessionKey', '*.sessionKey',

    // Call parameters
    'parameters.authorization',
    'parameters.token',
    'parameters.password',
    'parameters.receipt',
    'parameters.sessionKey'
];

export const REDACT_CENSOR = '[REDACTED]';
