import type { ProcessSignal, Unsubscribe } from './process-signals.js';

export type ShutdownEvent =
  | { readonly kind: 'shutdown_requested'; readonly signal: ProcessSignal };

/**
 * In-process bus for "the operator asked us to stop".
 *
 * Signal handlers emit onto it; the run's cancellation listens on it.
 */
export interface ShutdownEvents {
  onShutdown(listener: (event: ShutdownEvent) => void): Unsubscribe;
  emit(event: ShutdownEvent): void;
}
