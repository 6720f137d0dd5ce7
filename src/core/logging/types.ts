import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type: pino's Logger, used directly.
 *
 * Data-first call style:
 *   logger.info({ roleArn }, 'requesting credentials');
 *   logger.error({ err: error }, 'command failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger bound to a component name */
  create(component: string): Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const satisfies readonly LogLevel[];
