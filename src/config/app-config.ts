/**
 * Application configuration - parse, don't validate.
 *
 * - Flag values and ambient environment both go through a Zod schema
 * - Empty optional values become absent here, once, so nothing downstream sends ""
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import type { Clock } from '../runtime/ports/clock.js';
import { LOG_LEVELS, type LogLevel } from '../core/logging/index.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import { parseDuration, toWholeSeconds } from './duration.js';

// =============================================================================
// Branded primitives
// =============================================================================

export type RoleArn = Brand<string, 'RoleArn'>;
export type RoleSessionName = Brand<string, 'RoleSessionName'>;

export const DEFAULT_DURATION = '900s';

export interface AssumeRoleConfig {
  readonly roleArn: RoleArn;
  readonly roleSessionName: RoleSessionName;
  /** Whole seconds; absent when the requested duration was zero. */
  readonly durationSeconds?: number;
  readonly externalId?: string;
  readonly serialNumber?: string;
  readonly tokenCode?: string;
  readonly sourceIdentity?: string;
}

export type ValidatedConfig = ValidatedAppConfig<AssumeRoleConfig>;

/**
 * Raw flag values as the CLI parser hands them over.
 * Every value may be missing or empty.
 */
export interface AssumeRoleFlags {
  readonly roleArn?: string;
  readonly roleSessionName?: string;
  readonly duration?: string;
  readonly externalId?: string;
  readonly serialNumber?: string;
  readonly tokenCode?: string;
  readonly sourceIdentity?: string;
}

export interface EnvConfig {
  readonly logLevel: LogLevel;
}

export type LoadConfigResult<T> = Result<T, ConfigInvalidError>;

// =============================================================================
// Schemas
// =============================================================================

const ROLE_ARN_REQUIRED = 'role-arn is required';

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v === '' ? undefined : v));

const FlagsSchema = z.object({
  roleArn: z.string({ required_error: ROLE_ARN_REQUIRED }).min(1, ROLE_ARN_REQUIRED),
  roleSessionName: optionalText,
  duration: z
    .string()
    .default(DEFAULT_DURATION)
    .transform((value, ctx) => {
      const parsed = parseDuration(value);
      if (parsed.isErr()) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error });
        return z.NEVER;
      }
      if (parsed.value < 0n) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duration must not be negative, got "${value}"` });
        return z.NEVER;
      }
      return toWholeSeconds(parsed.value);
    }),
  externalId: optionalText,
  serialNumber: optionalText,
  tokenCode: optionalText,
  sourceIdentity: optionalText,
});

const EnvSchema = z.object({
  AWS_ASSUME_ROLE_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(LOG_LEVELS).default('info')),
});

/** Schema keys back to the flag names an operator typed. */
const FLAG_NAMES: Readonly<Record<keyof AssumeRoleFlags, string>> = {
  roleArn: 'role-arn',
  roleSessionName: 'role-session-name',
  duration: 'duration',
  externalId: 'external-id',
  serialNumber: 'serial-number',
  tokenCode: 'token-code',
  sourceIdentity: 'source-identity',
};

// =============================================================================
// Public API
// =============================================================================

export interface LoadAssumeRoleConfigOptions {
  readonly flags: AssumeRoleFlags;
  readonly clock: Clock;
}

export function loadAssumeRoleConfig(options: LoadAssumeRoleConfigOptions): LoadConfigResult<ValidatedConfig> {
  const parsed = FlagsSchema.safeParse(options.flags);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error, flagPath)));
  }

  const flags = parsed.data;
  const config: AssumeRoleConfig = {
    roleArn: flags.roleArn as RoleArn,
    roleSessionName: (flags.roleSessionName ?? options.clock.nowNanos().toString()) as RoleSessionName,
    ...(flags.duration === 0 ? {} : { durationSeconds: flags.duration }),
    ...(flags.externalId === undefined ? {} : { externalId: flags.externalId }),
    ...(flags.serialNumber === undefined ? {} : { serialNumber: flags.serialNumber }),
    ...(flags.tokenCode === undefined ? {} : { tokenCode: flags.tokenCode }),
    ...(flags.sourceIdentity === undefined ? {} : { sourceIdentity: flags.sourceIdentity }),
  };

  return ok(config as ValidatedConfig);
}

export function loadEnvConfig(env: Record<string, string | undefined>): LoadConfigResult<EnvConfig> {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error, (path) => path)));
  }

  return ok({ logLevel: parsed.data.AWS_ASSUME_ROLE_LOG_LEVEL });
}

/**
 * Tests and local construction only: creates a validated config without flag parsing.
 */
export function createValidatedConfig(value: AssumeRoleConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function flagPath(path: string): string {
  return isFlagKey(path) ? FLAG_NAMES[path] : path;
}

function isFlagKey(key: string): key is keyof AssumeRoleFlags {
  return Object.prototype.hasOwnProperty.call(FLAG_NAMES, key);
}

function toConfigIssues(error: z.ZodError, renamePath: (path: string) => string): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? renamePath(issue.path.join('.')) : '(root)',
    message: issue.message,
  }));
}
