import type {
  AppError,
  CommandFailedError,
  CommandFailure,
  ConfigInvalidError,
  ConfigIssue,
  CredentialRequestFailedError,
  InvalidEnvironError,
} from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

function describeCommandFailure(file: string, failure: CommandFailure): string {
  switch (failure.kind) {
    case 'spawn_failed':
      return `Failed to start ${file}: ${causeMessage(failure.cause)}`;
    case 'exited':
      return `${file} exited with status ${failure.exitCode}`;
    case 'killed':
      return `${file} was killed by ${failure.signal}`;
    case 'cancelled':
      return `${file} was cancelled`;
    default:
      return assertNever(failure);
  }
}

function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: issues.length === 1 && issues[0] ? issues[0].message : 'Invalid configuration',
  }),

  credentialRequestFailed: (
    roleArn: string,
    reason: CredentialRequestFailedError['reason'],
    cause?: unknown
  ): CredentialRequestFailedError => ({
    _tag: 'CredentialRequestFailed',
    roleArn,
    reason,
    message:
      reason === 'cancelled'
        ? `Credential request for ${roleArn} was cancelled`
        : reason === 'incomplete_response'
          ? `No credentials returned for ${roleArn}`
          : `Failed to assume role ${roleArn}: ${causeMessage(cause)}`,
    cause,
  }),

  invalidEnviron: (entry: string): InvalidEnvironError => ({
    _tag: 'InvalidEnviron',
    entry,
    message: 'invalid environ',
  }),

  commandFailed: (file: string, failure: CommandFailure): CommandFailedError => ({
    _tag: 'CommandFailed',
    file,
    failure,
    message: describeCommandFailure(file, failure),
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
