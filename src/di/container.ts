import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import { STSClient } from '@aws-sdk/client-sts';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from './tokens.js';
import { assertNever } from '../runtime/assert-never.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessLifecyclePolicy } from '../runtime/process-lifecycle-policy.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import { NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import { NoopProcessSignals } from '../runtime/adapters/noop-process-signals.js';
import type { ShutdownEvents } from '../runtime/ports/shutdown-events.js';
import { InMemoryShutdownEvents } from '../runtime/adapters/in-memory-shutdown-events.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { Clock } from '../runtime/ports/clock.js';
import { SystemClock } from '../runtime/adapters/system-clock.js';
import type { EnvConfig } from '../config/app-config.js';
import { loadEnvConfig } from '../config/app-config.js';
import type { ConfigInvalidError } from '../errors/app-error.js';
import { PinoLoggerFactory, type ILoggerFactory } from '../core/logging/index.js';
import type { CredentialIssuerPort } from '../ports/credential-issuer.port.js';
import type { CommandRunnerPort } from '../ports/command-runner.port.js';
import { StsCredentialIssuer, createAssumeRoleSend } from '../infra/sts-credential-issuer/index.js';
import { ChildProcessCommandRunner } from '../infra/child-process-runner/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(env: Record<string, string | undefined>): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into services.
  if (env['VITEST'] || env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'cli' };
}

function toProcessLifecyclePolicy(mode: RuntimeMode): ProcessLifecyclePolicy {
  switch (mode.kind) {
    case 'test':
      return { kind: 'no_signal_handlers' };
    case 'cli':
      return { kind: 'install_signal_handlers' };
    default:
      return assertNever(mode);
  }
}

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  readonly env?: Record<string, string | undefined>;
}

function registerRuntime(mode: RuntimeMode): void {
  const policy = toProcessLifecyclePolicy(mode);

  const signals: ProcessSignals =
    policy.kind === 'no_signal_handlers' ? new NoopProcessSignals() : new NodeProcessSignals();
  container.register<ProcessSignals>(DI.Runtime.ProcessSignals, { useValue: signals });

  container.register<ShutdownEvents>(DI.Runtime.ShutdownEvents, { useValue: new InMemoryShutdownEvents() });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });

  container.register<Clock>(DI.Runtime.Clock, { useValue: new SystemClock() });
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION + LOGGING
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(env: Record<string, string | undefined>): Result<void, ConfigInvalidError> {
  // Tests may inject config before initialization.
  if (container.isRegistered(DI.Config.Env)) return ok(undefined);

  const loaded = loadEnvConfig(env);
  if (loaded.isErr()) return err(loaded.error);

  container.register<EnvConfig>(DI.Config.Env, { useValue: loaded.value });
  return ok(undefined);
}

function registerLogging(): void {
  if (container.isRegistered(DI.Logging.Factory)) return;

  container.register<ILoggerFactory>(DI.Logging.Factory, {
    useFactory: instanceCachingFactory((c) => new PinoLoggerFactory(c.resolve<EnvConfig>(DI.Config.Env).logLevel)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// INFRASTRUCTURE
// ═══════════════════════════════════════════════════════════════════════════

function registerInfra(): void {
  if (!container.isRegistered(DI.Infra.CredentialIssuer)) {
    container.register<CredentialIssuerPort>(DI.Infra.CredentialIssuer, {
      useFactory: instanceCachingFactory(
        (c) =>
          new StsCredentialIssuer(
            createAssumeRoleSend(new STSClient({})),
            c.resolve<ILoggerFactory>(DI.Logging.Factory).create('StsCredentialIssuer')
          )
      ),
    });
  }

  if (!container.isRegistered(DI.Infra.CommandRunner)) {
    container.register<CommandRunnerPort>(DI.Infra.CommandRunner, {
      useFactory: instanceCachingFactory(
        (c) => new ChildProcessCommandRunner(c.resolve<ILoggerFactory>(DI.Logging.Factory).create('CommandRunner'))
      ),
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

/**
 * Wire the container. Runtime ports are registered first so a configuration
 * failure can still be reported through the ProcessTerminator.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<void, ConfigInvalidError> {
  if (initialized) return ok(undefined);

  const env = options.env ?? process.env;
  registerRuntime(options.runtimeMode ?? detectRuntimeMode(env));

  const config = registerConfig(env);
  if (config.isErr()) return config;

  registerLogging();
  registerInfra();
  initialized = true;
  return ok(undefined);
}

/**
 * Tests only: drop every registration so the next initialization starts clean.
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export { container };
