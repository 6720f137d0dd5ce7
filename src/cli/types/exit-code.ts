import type { ExitCode as ProcessExitCode } from '../../runtime/ports/process-terminator.js';

/**
 * Why a run failed, as far as the caller is concerned.
 */
export type ExitCode =
  | { kind: 'general_error' }  // credential, environment or child failure
  | { kind: 'misuse' };        // bad flags or configuration

/**
 * Misuse terminates like any other failure: status 1.
 */
export function toProcessExitCode(exitCode: ExitCode): ProcessExitCode {
  switch (exitCode.kind) {
    case 'general_error':
    case 'misuse':
      return { kind: 'failure' };
  }
}
