/**
 * CLI Result Types
 *
 * Discriminated unions for CLI command outcomes.
 * Commands return these; the composition root interprets them.
 */

import type { ExitCode } from './exit-code.js';

/**
 * A failure diagnostic: the headline, then optional detail and suggestion lines.
 */
export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly suggestions?: readonly string[];
}

/**
 * A successful run prints nothing of its own: the child's output is the output.
 */
export type CliResult =
  | { kind: 'success' }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput };

export function success(): CliResult {
  return { kind: 'success' };
}

export function failure(
  message: string,
  options?: {
    exitCode?: ExitCode;
    details?: readonly string[];
    suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'general_error' },
    output: {
      message,
      details: options?.details,
      suggestions: options?.suggestions,
    },
  };
}

/**
 * Failure caused by how the tool was invoked (missing flag, bad value).
 */
export function misuse(message: string, options?: { details?: readonly string[]; suggestions?: readonly string[] }): CliResult {
  return failure(message, { ...options, exitCode: { kind: 'misuse' } });
}
