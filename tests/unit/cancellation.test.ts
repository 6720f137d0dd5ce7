import { describe, it, expect } from 'vitest';
import { createRunCancellation, CANCELLATION_SIGNALS } from '../../src/runtime/cancellation.js';
import { InMemoryShutdownEvents } from '../../src/runtime/adapters/in-memory-shutdown-events.js';
import { FakeProcessSignals } from '../fakes/process-signals.fake.js';
import { FakeLogger } from '../helpers/FakeLogger.js';

function setup() {
  const signals = new FakeProcessSignals();
  const shutdownEvents = new InMemoryShutdownEvents();
  const logger = new FakeLogger();
  const cancellation = createRunCancellation({ signals, shutdownEvents, logger: logger.asLogger() });
  return { signals, shutdownEvents, logger, cancellation };
}

describe('createRunCancellation', () => {
  it('listens for SIGINT and SIGTERM', () => {
    const { signals } = setup();

    expect(CANCELLATION_SIGNALS).toEqual(['SIGINT', 'SIGTERM']);
    expect(signals.listenerCount('SIGINT')).toBe(1);
    expect(signals.listenerCount('SIGTERM')).toBe(1);
  });

  it('starts out not aborted', () => {
    expect(setup().cancellation.signal.aborted).toBe(false);
  });

  it.each(['SIGINT', 'SIGTERM'] as const)('aborts on %s', (signal) => {
    const { signals, cancellation, logger } = setup();

    signals.raise(signal);

    expect(cancellation.signal.aborted).toBe(true);
    expect(logger.getEntries('warn')).toEqual([{ level: 'warn', obj: { signal }, msg: 'cancellation requested' }]);
  });

  it('aborts on a shutdown event from any other source', () => {
    const { shutdownEvents, cancellation } = setup();

    shutdownEvents.emit({ kind: 'shutdown_requested', signal: 'SIGTERM' });

    expect(cancellation.signal.aborted).toBe(true);
  });

  it('only acts on the first request', () => {
    const { signals, cancellation, logger } = setup();

    signals.raise('SIGINT');
    signals.raise('SIGTERM');

    expect(logger.getEntries('warn')).toHaveLength(1);
    expect(cancellation.signal.reason).toEqual(new Error('received SIGINT'));
  });

  it('detaches every listener on dispose', () => {
    const { signals, cancellation } = setup();

    cancellation.dispose();
    signals.raise('SIGINT');

    expect(signals.listenerCount('SIGINT')).toBe(0);
    expect(signals.listenerCount('SIGTERM')).toBe(0);
    expect(cancellation.signal.aborted).toBe(false);
  });
});
