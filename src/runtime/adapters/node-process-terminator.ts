import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';
import { assertNever } from '../assert-never.js';

/** Every failure exits with status 1. */
export class NodeProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    switch (code.kind) {
      case 'failure':
        return process.exit(1);
      default:
        return assertNever(code);
    }
  }
}
