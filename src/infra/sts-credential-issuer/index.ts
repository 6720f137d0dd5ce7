import {
  AssumeRoleCommand,
  type AssumeRoleCommandInput,
  type AssumeRoleCommandOutput,
  type STSClient,
} from '@aws-sdk/client-sts';
import type { Result } from 'neverthrow';
import { ResultAsync, errAsync, ok, err } from 'neverthrow';
import type { AssumeRoleConfig, ValidatedConfig } from '../../config/app-config.js';
import type { Logger } from '../../core/logging/index.js';
import type { TemporaryCredentials } from '../../domain/credentials.js';
import type { CredentialRequestFailedError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import type { CredentialIssuerPort } from '../../ports/credential-issuer.port.js';

/**
 * One AssumeRole round trip. Separated from the client so tests can stand in
 * for STS without a network.
 */
export type AssumeRoleSend = (input: AssumeRoleCommandInput, signal: AbortSignal) => Promise<AssumeRoleCommandOutput>;

export function createAssumeRoleSend(client: STSClient): AssumeRoleSend {
  return (input, signal) => client.send(new AssumeRoleCommand(input), { abortSignal: signal });
}

/**
 * Config -> AssumeRole request. Optional members are only set when the config
 * carries them; an unset member is missing from the object, not `undefined`.
 */
export function toAssumeRoleInput(config: AssumeRoleConfig): AssumeRoleCommandInput {
  const input: AssumeRoleCommandInput = {
    RoleArn: config.roleArn,
    RoleSessionName: config.roleSessionName,
  };
  if (config.durationSeconds !== undefined) input.DurationSeconds = config.durationSeconds;
  if (config.externalId !== undefined) input.ExternalId = config.externalId;
  if (config.serialNumber !== undefined) input.SerialNumber = config.serialNumber;
  if (config.tokenCode !== undefined) input.TokenCode = config.tokenCode;
  if (config.sourceIdentity !== undefined) input.SourceIdentity = config.sourceIdentity;
  return input;
}

function toTemporaryCredentials(
  roleArn: string,
  output: AssumeRoleCommandOutput
): Result<TemporaryCredentials, CredentialRequestFailedError> {
  const credentials = output.Credentials;
  if (!credentials?.AccessKeyId || !credentials.SecretAccessKey || !credentials.SessionToken) {
    return err(Err.credentialRequestFailed(roleArn, 'incomplete_response'));
  }

  return ok({
    accessKeyId: credentials.AccessKeyId,
    secretAccessKey: credentials.SecretAccessKey,
    sessionToken: credentials.SessionToken,
    ...(credentials.Expiration === undefined ? {} : { expiration: credentials.Expiration }),
  });
}

/**
 * CredentialIssuerPort backed by STS AssumeRole.
 */
export class StsCredentialIssuer implements CredentialIssuerPort {
  constructor(
    private readonly send: AssumeRoleSend,
    private readonly logger: Logger
  ) {}

  assumeRole(config: ValidatedConfig, signal: AbortSignal): ResultAsync<TemporaryCredentials, CredentialRequestFailedError> {
    if (signal.aborted) {
      return errAsync(Err.credentialRequestFailed(config.roleArn, 'cancelled', signal.reason));
    }

    this.logger.debug(
      { roleArn: config.roleArn, roleSessionName: config.roleSessionName, durationSeconds: config.durationSeconds },
      'requesting credentials'
    );

    return ResultAsync.fromPromise(this.send(toAssumeRoleInput(config), signal), (cause) =>
      Err.credentialRequestFailed(config.roleArn, signal.aborted ? 'cancelled' : 'rejected', cause)
    )
      .andThen((output) => toTemporaryCredentials(config.roleArn, output))
      .map((credentials) => {
        this.logger.debug(
          { accessKeyId: credentials.accessKeyId, expiration: credentials.expiration?.toISOString() },
          'credentials issued'
        );
        return credentials;
      });
  }
}
