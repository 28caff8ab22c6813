import { describe, it, expect } from 'vitest';
import { BroadcastHub } from './hub';
import { StreamSession } from './session';
import type { StreamTransport } from './session';
import { waitFor } from './testing/memory-source';

class FakeTransport implements StreamTransport {
  readonly frames: string[] = [];
  disconnected = false;
  failWrites = false;
  /** While set, writes are accepted but report a full buffer. */
  saturated = false;
  drainWaits = 0;
  private drainWaiters: Array<() => void> = [];

  write(frame: string): boolean {
    if (this.failWrites) throw new Error('socket hang up');
    this.frames.push(frame);
    return !this.saturated;
  }

  drained(): Promise<void> {
    this.drainWaits++;
    return new Promise(resolve => this.drainWaiters.push(resolve));
  }

  drain(): void {
    this.saturated = false;
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const fn of waiters) fn();
  }
}

describe('StreamSession', () => {
  it('writes the connected frame first, then broadcast frames', async () => {
    const hub = new BroadcastHub();
    const t = new FakeTransport();
    const s = new StreamSession(hub, 'lab1', t, { heartbeatMs: 1000 });
    const done = s.run();
    expect(t.frames).toEqual(['data: {"type":"connected"}\n\n']);
    expect(s.state).toBe('streaming');
    expect(hub.subscriberCount('lab1')).toBe(1);
    hub.broadcast('lab1', { type: 'parameter_values_changed', parameters: ['temperature'] });
    await waitFor(() => t.frames.length === 2);
    expect(t.frames[1]).toBe('data: {"type":"parameter_values_changed","parameters":["temperature"]}\n\n');
    s.close();
    await done;
    expect(s.state).toBe('closed');
  });

  it('writes heartbeats while idle', async () => {
    const hub = new BroadcastHub();
    const t = new FakeTransport();
    const s = new StreamSession(hub, 'lab1', t, { heartbeatMs: 10 });
    const done = s.run();
    await waitFor(() => t.frames.length >= 3);
    expect(t.frames.slice(1, 3)).toEqual([': heartbeat\n\n', ': heartbeat\n\n']);
    s.close();
    await done;
  });

  it('unsubscribes within one iteration of a client disconnect', async () => {
    const hub = new BroadcastHub();
    const t = new FakeTransport();
    const s = new StreamSession(hub, 'lab1', t, { heartbeatMs: 10 });
    const done = s.run();
    t.disconnected = true;
    await done;
    expect(hub.has('lab1')).toBe(false);
    expect(s.state).toBe('closed');
  });

  it('releases the subscription when the transport fails', async () => {
    const hub = new BroadcastHub();
    const t = new FakeTransport();
    const s = new StreamSession(hub, 'lab1', t, { heartbeatMs: 10 });
    const done = s.run();
    t.failWrites = true;
    await expect(done).rejects.toThrow('socket hang up');
    expect(hub.has('lab1')).toBe(false);
  });

  it('ends when the hub is cleared at shutdown', async () => {
    const hub = new BroadcastHub();
    const s = new StreamSession(hub, null, new FakeTransport(), { heartbeatMs: 1000 });
    const done = s.run();
    hub.clear();
    await done;
    expect(s.state).toBe('closed');
  });

  it('stops taking frames while the transport is saturated, so the queue drops', async () => {
    const hub = new BroadcastHub({ capacity: 10 });
    const t = new FakeTransport();
    t.saturated = true;
    const s = new StreamSession(hub, 'lab1', t, { heartbeatMs: 1000 });
    const done = s.run();
    let dropped = 0;
    for (let i = 0; i < 500; i++) {
      dropped += hub.broadcast('lab1', { type: 'parameter_values_changed', parameters: [`p${i}`] }).dropped;
    }
    expect(dropped).toBe(490);
    expect(t.frames).toEqual(['data: {"type":"connected"}\n\n']);
    expect(t.drainWaits).toBe(1);

    t.drain();
    await waitFor(() => t.frames.length === 11);
    expect(t.frames[1]).toBe('data: {"type":"parameter_values_changed","parameters":["p0"]}\n\n');
    expect(t.frames[10]).toBe('data: {"type":"parameter_values_changed","parameters":["p9"]}\n\n');
    s.close();
    await done;
  });

  it('ends a session closed while waiting for the transport to drain', async () => {
    const hub = new BroadcastHub();
    const t = new FakeTransport();
    t.saturated = true;
    const s = new StreamSession(hub, 'lab1', t, { heartbeatMs: 1000 });
    const done = s.run();
    s.close();
    await done;
    expect(s.state).toBe('closed');
    expect(hub.has('lab1')).toBe(false);
  });

  it('cannot be run twice', async () => {
    const hub = new BroadcastHub();
    const t = new FakeTransport();
    t.disconnected = true;
    const s = new StreamSession(hub, 'lab1', t);
    await s.run();
    await expect(s.run()).rejects.toThrow('session cannot start from state closed');
  });
});
