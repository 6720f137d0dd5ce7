/**
 * Program definition: flags, operands, and the wiring from container to command.
 * src/cli.ts runs it against the real process; tests run it against a test-mode container.
 */

import { Command } from 'commander';

import { initializeContainer, container } from '../di/container.js';
import { DI } from '../di/tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import type { ShutdownEvents } from '../runtime/ports/shutdown-events.js';
import type { Clock } from '../runtime/ports/clock.js';
import { createRunCancellation } from '../runtime/cancellation.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import type { CredentialIssuerPort } from '../ports/credential-issuer.port.js';
import type { CommandRunnerPort } from '../ports/command-runner.port.js';
import { DEFAULT_DURATION, loadAssumeRoleConfig, type AssumeRoleFlags } from '../config/app-config.js';
import { environFromRecord } from '../domain/environment.js';
import { formatAppError } from '../errors/formatter.js';

import { interpretCliResult } from './interpret-result.js';
import { misuse } from './types/index.js';
import { normalizeArgv } from './normalize-argv.js';
import { executeAssumeRoleCommand, USAGE } from './commands/index.js';

export interface RunCliOptions {
  readonly runtimeMode: RuntimeMode;
  readonly env: Record<string, string | undefined>;
}

export function createProgram(options: RunCliOptions): Command {
  return new Command()
    .name('aws-assume-role')
    .description('Assume an IAM role and run a command with the temporary credentials')
    .version('0.1.0')
    .usage(USAGE.replace(/^aws-assume-role /, ''))
    .option('--role-arn <arn>', 'role ARN (required)')
    .option('--role-session-name <name>', 'role session name (default unix nano timestamp)')
    .option('--duration <duration>', 'role session duration', DEFAULT_DURATION)
    .option('--external-id <id>', 'external ID')
    .option('--serial-number <serial>', 'MFA serial number')
    .option('--token-code <code>', 'MFA token code provided by MFA device')
    .option('--source-identity <identity>', 'source identity')
    .argument('[command...]', 'command and arguments to run with the credentials')
    .passThroughOptions()
    .action(async (operands: string[], flags: AssumeRoleFlags) => {
      const init = initializeContainer({ runtimeMode: options.runtimeMode, env: options.env });
      const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);

      if (init.isErr()) {
        interpretCliResult(misuse(formatAppError(init.error)), terminator);
        return;
      }

      const loggers = container.resolve<ILoggerFactory>(DI.Logging.Factory);
      const clock = container.resolve<Clock>(DI.Runtime.Clock);
      const cancellation = createRunCancellation({
        signals: container.resolve<ProcessSignals>(DI.Runtime.ProcessSignals),
        shutdownEvents: container.resolve<ShutdownEvents>(DI.Runtime.ShutdownEvents),
        logger: loggers.create('Cancellation'),
      });

      const result = await executeAssumeRoleCommand(
        {
          loadConfig: (raw) => loadAssumeRoleConfig({ flags: raw, clock }),
          credentialIssuer: container.resolve<CredentialIssuerPort>(DI.Infra.CredentialIssuer),
          commandRunner: container.resolve<CommandRunnerPort>(DI.Infra.CommandRunner),
          parentEnviron: () => environFromRecord(options.env),
          signal: cancellation.signal,
          logger: loggers.create('AssumeRole'),
        },
        flags,
        operands
      );

      // Detach signal handlers before terminating.
      cancellation.dispose();
      interpretCliResult(result, terminator);
    });
}

/**
 * Parse `argv` (without the node and script entries) and run to completion.
 * A failed run ends in `ProcessTerminator.terminate`; a successful one resolves.
 */
export async function runCli(argv: readonly string[], options: RunCliOptions): Promise<void> {
  await createProgram(options).parseAsync(normalizeArgv(argv), { from: 'user' });
}
