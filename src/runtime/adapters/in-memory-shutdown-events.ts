import type { ShutdownEvent, ShutdownEvents } from '../ports/shutdown-events.js';
import type { Unsubscribe } from '../ports/process-signals.js';

/**
 * Synchronous, single-process ShutdownEvents implementation.
 */
export class InMemoryShutdownEvents implements ShutdownEvents {
  private readonly listeners = new Set<(event: ShutdownEvent) => void>();

  onShutdown(listener: (event: ShutdownEvent) => void): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: ShutdownEvent): void {
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }
}
