import { spawn, type ChildProcess } from 'child_process';
import type { Result } from 'neverthrow';
import { ResultAsync, ok, err } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import { environToRecord, type ChildEnviron } from '../../domain/environment.js';
import type { CommandFailedError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import type { CommandLine, CommandRunnerPort } from '../../ports/command-runner.port.js';

function spawnChild(
  command: CommandLine,
  environ: ChildEnviron,
  signal: AbortSignal
): Result<ChildProcess, CommandFailedError> {
  try {
    return ok(
      spawn(command.file, [...command.args], {
        env: environToRecord(environ),
        stdio: 'inherit',
        signal,
        killSignal: 'SIGKILL',
      })
    );
  } catch (cause) {
    return err(Err.commandFailed(command.file, { kind: 'spawn_failed', cause }));
  }
}

/**
 * CommandRunnerPort on top of `child_process.spawn`.
 *
 * - stdio is inherited
 * - the child is killed with SIGKILL when the signal aborts
 * - the result settles once, on the first of `error` (launch failure) or `close`
 */
export class ChildProcessCommandRunner implements CommandRunnerPort {
  constructor(private readonly logger: Logger) {}

  run(command: CommandLine, environ: ChildEnviron, signal: AbortSignal): ResultAsync<void, CommandFailedError> {
    return new ResultAsync(this.spawnAndWait(command, environ, signal));
  }

  private spawnAndWait(
    command: CommandLine,
    environ: ChildEnviron,
    signal: AbortSignal
  ): Promise<Result<void, CommandFailedError>> {
    if (signal.aborted) {
      return Promise.resolve(err(Err.commandFailed(command.file, { kind: 'cancelled' })));
    }

    const spawned = spawnChild(command, environ, signal);
    if (spawned.isErr()) {
      return Promise.resolve(err(spawned.error));
    }
    const child = spawned.value;

    return new Promise((resolve) => {
      let settled = false;
      const settle = (result: Result<void, CommandFailedError>): void => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      this.logger.debug({ file: command.file, pid: child.pid }, 'spawned command');

      child.once('error', (cause) => {
        // An abort surfaces as an error on a live child; wait for `close` so it is reaped.
        if (signal.aborted && child.pid !== undefined) return;
        settle(
          err(
            Err.commandFailed(
              command.file,
              signal.aborted ? { kind: 'cancelled' } : { kind: 'spawn_failed', cause }
            )
          )
        );
      });

      child.once('close', (exitCode, exitSignal) => {
        if (signal.aborted) {
          settle(err(Err.commandFailed(command.file, { kind: 'cancelled' })));
        } else if (exitCode === 0) {
          settle(ok(undefined));
        } else if (exitSignal !== null) {
          settle(err(Err.commandFailed(command.file, { kind: 'killed', signal: exitSignal })));
        } else {
          settle(err(Err.commandFailed(command.file, { kind: 'exited', exitCode: exitCode ?? 1 })));
        }
      });
    });
  }
}
