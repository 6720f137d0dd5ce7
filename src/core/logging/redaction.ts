/**
 * Redaction configuration for pino.
 *
 * Temporary credentials and MFA codes must never reach a log line.
 */
export const REDACTION_CONFIG = {
  paths: [
    // Credential triple, flat or nested one level down
    'secretAccessKey',
    'sessionToken',
    '*.secretAccessKey',
    '*.sessionToken',
    'credentials.*',

    // MFA one-time code
    'tokenCode',
    '*.tokenCode',

    // Raw STS request/response shapes
    'SecretAccessKey',
    'SessionToken',
    'TokenCode',
    '*.SecretAccessKey',
    '*.SessionToken',
    '*.TokenCode',

    // Generic
    'token',
    'secret',
    'password',
    '*.token',
    '*.secret',
    'headers.authorization',
    'headers.Authorization',
  ],
  censor: '[REDACTED]',
};
