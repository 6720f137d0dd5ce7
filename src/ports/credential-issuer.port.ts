import type { ResultAsync } from 'neverthrow';
import type { ValidatedConfig } from '../config/app-config.js';
import type { CredentialRequestFailedError } from '../errors/app-error.js';
import type { TemporaryCredentials } from '../domain/credentials.js';

/**
 * Port: obtain temporary credentials for a role.
 *
 * Guarantees:
 * - Optional request parameters absent from the config are absent from the request
 * - `signal` is observed: an abort fails the call with reason `cancelled`
 * - No retries
 */
export interface CredentialIssuerPort {
  assumeRole(config: ValidatedConfig, signal: AbortSignal): ResultAsync<TemporaryCredentials, CredentialRequestFailedError>;
}
