import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

/** Flag or environment values failed their schema. */
export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

/** STS refused, failed, was cancelled, or answered without a full credential triple. */
export type CredentialRequestFailedError = Readonly<{
  readonly _tag: 'CredentialRequestFailed';
  readonly roleArn: string;
  readonly reason: 'rejected' | 'cancelled' | 'incomplete_response';
  readonly message: string;
  readonly cause?: unknown;
}>;

/** A parent environment entry had no `=`. */
export type InvalidEnvironError = Readonly<{
  readonly _tag: 'InvalidEnviron';
  readonly entry: string;
  readonly message: string;
}>;

export type CommandFailure =
  | { readonly kind: 'spawn_failed'; readonly cause: unknown }
  | { readonly kind: 'exited'; readonly exitCode: number }
  | { readonly kind: 'killed'; readonly signal: NodeJS.Signals }
  | { readonly kind: 'cancelled' };

/** The child could not be launched or did not succeed. */
export type CommandFailedError = Readonly<{
  readonly _tag: 'CommandFailed';
  readonly file: string;
  readonly failure: CommandFailure;
  readonly message: string;
}>;

export type AppError =
  | ConfigInvalidError
  | CredentialRequestFailedError
  | InvalidEnvironError
  | CommandFailedError;

/**
 * Branded config type: only the config loader can produce one.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
