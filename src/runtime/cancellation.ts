import type { Logger } from '../core/logging/index.js';
import type { ProcessSignal, ProcessSignals } from './ports/process-signals.js';
import type { ShutdownEvent, ShutdownEvents } from './ports/shutdown-events.js';

export const CANCELLATION_SIGNALS: readonly ProcessSignal[] = ['SIGINT', 'SIGTERM'];

/**
 * Cancellation scope for a single run.
 *
 * `signal` is handed to every suspending operation (STS request, child wait).
 * `dispose` must be called once the run is over; it detaches every listener.
 */
export interface RunCancellation {
  readonly signal: AbortSignal;
  dispose(): void;
}

export interface RunCancellationDeps {
  readonly signals: ProcessSignals;
  readonly shutdownEvents: ShutdownEvents;
  readonly logger: Logger;
}

/**
 * Wire OS signals -> shutdown events -> AbortController.
 *
 * The first shutdown request aborts the scope. Later requests are ignored, the
 * abort has already been delivered to whatever is in flight.
 */
export function createRunCancellation(deps: RunCancellationDeps): RunCancellation {
  const controller = new AbortController();

  const unsubscribeSignals = CANCELLATION_SIGNALS.map((signal) =>
    deps.signals.on(signal, () => deps.shutdownEvents.emit({ kind: 'shutdown_requested', signal }))
  );

  const unsubscribeShutdown = deps.shutdownEvents.onShutdown((event: ShutdownEvent) => {
    if (controller.signal.aborted) return;
    deps.logger.warn({ signal: event.signal }, 'cancellation requested');
    controller.abort(new Error(`received ${event.signal}`));
  });

  return {
    signal: controller.signal,
    dispose: () => {
      unsubscribeShutdown();
      for (const unsubscribe of unsubscribeSignals) unsubscribe();
    },
  };
}
