jest.mock('../../logger', () => ({
  createLogger: () => ({
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    http: jest.fn(),
  }),
}));

import type { SessionEvent } from '../../../types/voice';
import { Broadcaster } from '../Broadcaster';
import { emptySnapshot } from '../Session';
import { createTrack } from '../track';

const songEvent = (tenantId: string): SessionEvent => ({
  tenantId,
  kind: 'song_update',
  payload: { currentTrack: null, isPlaying: false, isPaused: false },
});

describe('Broadcaster', () => {
  it('delivers events to subscribers of the tenant only', () => {
    const broadcaster = new Broadcaster();
    const a = jest.fn();
    const b = jest.fn();
    broadcaster.subscribe('g1', a);
    broadcaster.subscribe('g2', b);

    expect(broadcaster.publish(songEvent('g1'))).toBe(1);
    expect(a).toHaveBeenCalledWith(songEvent('g1'));
    expect(b).not.toHaveBeenCalled();
  });

  it('returns 0 without subscribers', () => {
    expect(new Broadcaster().publish(songEvent('g1'))).toBe(0);
  });

  it('unsubscribes and drops empty channels', () => {
    const broadcaster = new Broadcaster();
    const listener = jest.fn();
    const unsubscribe = broadcaster.subscribe('g1', listener);
    expect(broadcaster.subscriberCount('g1')).toBe(1);

    expect(unsubscribe()).toBe(true);
    expect(broadcaster.unsubscribe('g1', listener)).toBe(false);
    expect(broadcaster.subscriberCount('g1')).toBe(0);
    expect(broadcaster.publish(songEvent('g1'))).toBe(0);
  });

  it('keeps delivering when a listener throws', () => {
    const broadcaster = new Broadcaster();
    const after = jest.fn();
    broadcaster.subscribe('g1', () => {
      throw new Error('listener broke');
    });
    broadcaster.subscribe('g1', after);

    expect(broadcaster.publish(songEvent('g1'))).toBe(1);
    expect(after).toHaveBeenCalledTimes(1);
  });

  it('lets a listener unsubscribe itself during delivery', () => {
    const broadcaster = new Broadcaster();
    const second = jest.fn();
    const unsubscribe: () => void = broadcaster.subscribe('g1', () => {
      unsubscribe();
    });
    broadcaster.subscribe('g1', second);

    broadcaster.publish(songEvent('g1'));
    broadcaster.publish(songEvent('g1'));

    expect(second).toHaveBeenCalledTimes(2);
    expect(broadcaster.subscriberCount('g1')).toBe(1);
  });

  it('builds song and queue payloads from a snapshot', () => {
    const broadcaster = new Broadcaster();
    const events: SessionEvent[] = [];
    broadcaster.subscribe('g1', (event) => events.push(event));

    const current = createTrack({ sourceUrl: 'https://media.test/a', title: 'a' });
    const queued = createTrack({ sourceUrl: 'https://media.test/b', title: 'b' });
    broadcaster.publishState({
      ...emptySnapshot('g1', 'Guild'),
      state: 'playing',
      isPlaying: true,
      currentSong: current,
      queue: [queued],
      queueLength: 1,
    });

    expect(events).toEqual([
      {
        tenantId: 'g1',
        kind: 'song_update',
        payload: { currentTrack: current, isPlaying: true, isPaused: false },
      },
      { tenantId: 'g1', kind: 'queue_update', payload: { queue: [queued], queueLength: 1 } },
    ]);
  });

  it('publishes only the requested kinds', () => {
    const broadcaster = new Broadcaster();
    const listener = jest.fn();
    broadcaster.subscribe('g1', listener);

    broadcaster.publishState(emptySnapshot('g1', null), ['queue_update']);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({
      tenantId: 'g1',
      kind: 'queue_update',
      payload: { queue: [], queueLength: 0 },
    });
  });
});
