/**
 * Assume Role Command
 *
 * Assumes the configured role, then runs the operands as a command with the
 * temporary credentials in its environment.
 * Pure function with dependency injection.
 */

import { okAsync, type ResultAsync } from 'neverthrow';
import { success, failure, misuse, type CliResult } from '../types/index.js';
import type { AssumeRoleFlags, LoadConfigResult, ValidatedConfig } from '../../config/app-config.js';
import type { Logger } from '../../core/logging/index.js';
import { buildChildEnviron, type ChildEnviron, type Environ } from '../../domain/environment.js';
import type { AppError, CommandFailedError } from '../../errors/app-error.js';
import { appErrorDetails } from '../../errors/formatter.js';
import type { CredentialIssuerPort } from '../../ports/credential-issuer.port.js';
import type { CommandRunnerPort } from '../../ports/command-runner.port.js';
import { assertNever } from '../../runtime/assert-never.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface AssumeRoleCommandDeps {
  readonly loadConfig: (flags: AssumeRoleFlags) => LoadConfigResult<ValidatedConfig>;
  readonly credentialIssuer: CredentialIssuerPort;
  readonly commandRunner: CommandRunnerPort;
  /** The parent's environment, read once the credentials are in hand. */
  readonly parentEnviron: () => Environ;
  readonly signal: AbortSignal;
  readonly logger: Logger;
}

export const USAGE = 'aws-assume-role -role-arn [ROLE ARN] -- [COMMANDS...]';

type RunOutcome = { readonly kind: 'no_commands' } | { readonly kind: 'completed' };

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Execute the assume-role command.
 *
 * Parsing → RequestingCredentials → BuildingEnv → Running. The first failing
 * step ends the run; nothing is retried.
 */
export async function executeAssumeRoleCommand(
  deps: AssumeRoleCommandDeps,
  flags: AssumeRoleFlags,
  operands: readonly string[]
): Promise<CliResult> {
  const outcome = await deps
    .loadConfig(flags)
    .asyncAndThen((config) => deps.credentialIssuer.assumeRole(config, deps.signal))
    .andThen((credentials) => buildChildEnviron(credentials, deps.parentEnviron()))
    .andThen((environ) => runOperands(deps, environ, operands));

  return outcome.match(
    () => success(),
    (error) => {
      deps.logger.debug({ tag: error._tag, message: error.message }, 'run failed');
      return toCliFailure(error);
    }
  );
}

function runOperands(
  deps: AssumeRoleCommandDeps,
  environ: ChildEnviron,
  operands: readonly string[]
): ResultAsync<RunOutcome, CommandFailedError> {
  const [file, ...args] = operands;
  if (file === undefined) {
    deps.logger.info('no commands');
    return okAsync<RunOutcome, CommandFailedError>({ kind: 'no_commands' });
  }

  return deps.commandRunner.run({ file, args }, environ, deps.signal).map((): RunOutcome => ({ kind: 'completed' }));
}

function toCliFailure(error: AppError): CliResult {
  const details = appErrorDetails(error);

  switch (error._tag) {
    case 'ConfigInvalid':
      return misuse(error.message, { details, suggestions: [`Usage: ${USAGE}`] });

    case 'CredentialRequestFailed':
    case 'InvalidEnviron':
    case 'CommandFailed':
      return failure(error.message, { details });

    default:
      return assertNever(error);
  }
}
