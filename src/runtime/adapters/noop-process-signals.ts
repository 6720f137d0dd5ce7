import type { ProcessSignal, ProcessSignals, Unsubscribe } from '../ports/process-signals.js';

/**
 * Test-mode ProcessSignals: never touches the real process.
 */
export class NoopProcessSignals implements ProcessSignals {
  on(_signal: ProcessSignal, _handler: () => void): Unsubscribe {
    return () => undefined;
  }
}
