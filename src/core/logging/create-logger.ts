import pino, { type DestinationStream } from 'pino';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Create the root pino logger.
 *
 * - Sync output to stderr: stdout belongs to the child command
 * - JSON lines for machine parsing
 * - Redaction of credential material
 */
export function createRootLogger(level: LogLevel, destination?: DestinationStream): Logger {
  return pino(
    {
      level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    destination ?? pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory: creates component loggers off a single root.
 */
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly root: Logger;

  constructor(level: LogLevel, destination?: DestinationStream) {
    this.root = createRootLogger(level, destination);
  }

  create(component: string): Logger {
    return this.root.child({ component });
  }
}
