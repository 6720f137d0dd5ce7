import type { ResultAsync } from 'neverthrow';
import type { ChildEnviron } from '../domain/environment.js';
import type { CommandFailedError } from '../errors/app-error.js';

export interface CommandLine {
  readonly file: string;
  readonly args: readonly string[];
}

/**
 * Port: run a command to completion.
 *
 * The child gets exactly `environ` (nothing merged from the parent) and the
 * parent's stdin, stdout and stderr. Aborting `signal` kills the child, or
 * prevents the launch when already aborted.
 */
export interface CommandRunnerPort {
  run(command: CommandLine, environ: ChildEnviron, signal: AbortSignal): ResultAsync<void, CommandFailedError>;
}
