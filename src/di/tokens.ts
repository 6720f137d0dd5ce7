/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, grouped by layer.
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Ambient settings read from the environment (EnvConfig) */
    Env: Symbol('Config.Env'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** ILoggerFactory */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process lifecycle)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    ProcessSignals: Symbol('Runtime.ProcessSignals'),
    ShutdownEvents: Symbol('Runtime.ShutdownEvents'),
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
    Clock: Symbol('Runtime.Clock'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // INFRASTRUCTURE
  // ═══════════════════════════════════════════════════════════════════
  Infra: {
    /** CredentialIssuerPort (STS AssumeRole) */
    CredentialIssuer: Symbol('Infra.CredentialIssuer'),
    /** CommandRunnerPort (child_process) */
    CommandRunner: Symbol('Infra.CommandRunner'),
  },
} as const;
