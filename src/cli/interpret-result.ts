/**
 * CLI Result Interpreter
 *
 * Bridges CLI command results to process termination.
 * The only place a CliResult turns into a process exit.
 */

import type { CliResult } from './types/cli-result.js';
import { toProcessExitCode } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult } from './output-formatter.js';

export function interpretCliResult(result: CliResult, terminator: ProcessTerminator): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      // Let the process end naturally.
      return;

    case 'failure':
      terminator.terminate(toProcessExitCode(result.exitCode));
  }
}
