import { describe, it, expect } from 'vitest';
import { InMemoryShutdownEvents } from '../../../src/runtime/adapters/in-memory-shutdown-events.js';
import { describeShutdown, type ShutdownEvent } from '../../../src/runtime/ports/shutdown-events.js';
import { toProcessLifecyclePolicy } from '../../../src/runtime/process-lifecycle-policy.js';

describe('InMemoryShutdownEvents', () => {
  it('delivers to every listener until unsubscribed', () => {
    const events = new InMemoryShutdownEvents();
    const seen: string[] = [];
    const unsubscribe = events.onShutdown((e) => seen.push(describeShutdown(e)));

    events.emit({ kind: 'shutdown_requested', signal: 'SIGTERM' });
    unsubscribe();
    events.emit({ kind: 'shutdown_requested', signal: 'SIGINT' });

    expect(seen).toEqual(['signal SIGTERM']);
    expect(events.listenerCount).toBe(0);
  });

  it('still notifies later listeners when one throws, then rethrows', () => {
    const events = new InMemoryShutdownEvents();
    const seen: ShutdownEvent[] = [];
    events.onShutdown(() => {
      throw new Error('listener broke');
    });
    events.onShutdown((e) => seen.push(e));

    expect(() => events.emit({ kind: 'stop_requested', source: 'test' })).toThrow('listener broke');
    expect(seen).toEqual([{ kind: 'stop_requested', source: 'test' }]);
  });
});

describe('toProcessLifecyclePolicy', () => {
  it('installs signal handlers outside tests only', () => {
    expect(toProcessLifecyclePolicy({ kind: 'test' }).kind).toBe('no_signal_handlers');
    expect(toProcessLifecyclePolicy({ kind: 'service' }).kind).toBe('install_signal_handlers');
  });
});
