import type { ProcessSignal, ProcessSignals, Unsubscribe } from '../ports/process-signals.js';

/**
 * Node.js adapter for ProcessSignals.
 * The returned unsubscribe removes the exact listener that was added.
 */
export class NodeProcessSignals implements ProcessSignals {
  on(signal: ProcessSignal, handler: () => void): Unsubscribe {
    const listener = (): void => handler();
    process.on(signal, listener);
    return () => {
      process.off(signal, listener);
    };
  }
}
