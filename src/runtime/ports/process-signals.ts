/**
 * Port for subscribing to OS signals.
 * Abstracts Node's `process.on` / `process.off` so the run can be cancelled in tests
 * without touching the real process.
 */
export type ProcessSignal = 'SIGINT' | 'SIGTERM';

export type Unsubscribe = () => void;

export interface ProcessSignals {
  on(signal: ProcessSignal, handler: () => void): Unsubscribe;
}
