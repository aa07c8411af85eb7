import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

import { ManualScheduler } from '../testing/fakes.js';
import type { IdleCandidate, ReapableSessions } from './afkReaper.js';
import { startAfkReaper, sweepIdleSessions } from './afkReaper.js';

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

function makeSource(candidates: IdleCandidate[]) {
  const reap = vi.fn(async (_channelId: string, _sessionId: string, _cutoff: number) => true);
  const activeSessions = vi.fn((): IdleCandidate[] => candidates);
  const source: ReapableSessions = { activeSessions, reap };
  return { source, reap, activeSessions };
}

describe('sweepIdleSessions', () => {
  it('reaps only sessions idle past the threshold', async () => {
    const { source, reap } = makeSource([
      { sessionId: 's1', channelId: 'c1', lastActivityAt: 0 },
      { sessionId: 's2', channelId: 'c2', lastActivityAt: 20_000 },
      { sessionId: 's3', channelId: 'c3', lastActivityAt: 10_000 }
    ]);

    const reaped = await sweepIdleSessions(source, 180_000, 190_000);

    expect(reaped).toBe(1);
    expect(reap).toHaveBeenCalledTimes(1);
    expect(reap).toHaveBeenCalledWith('c1', 's1', 10_000);
  });

  it('does not count sessions the source declined to reap', async () => {
    const { source, reap } = makeSource([{ sessionId: 's1', channelId: 'c1', lastActivityAt: 0 }]);
    reap.mockResolvedValueOnce(false);

    await expect(sweepIdleSessions(source, 1_000, 5_000)).resolves.toBe(0);
  });
});

describe('startAfkReaper', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sweeps on every interval', async () => {
    const scheduler = new ManualScheduler();
    const { source, activeSessions } = makeSource([]);
    const handle = startAfkReaper({ source, intervalMs: 10_000, idleMs: 180_000, scheduler, now: scheduler.now });

    scheduler.advance(10_000);
    await flush();
    scheduler.advance(10_000);
    await flush();

    expect(activeSessions).toHaveBeenCalledTimes(2);
    handle.stop();
  });

  it('backs off on consecutive failures and recovers', async () => {
    const scheduler = new ManualScheduler();
    const { source, activeSessions } = makeSource([]);
    activeSessions.mockImplementation(() => {
      throw new Error('registry unavailable');
    });
    const handle = startAfkReaper({
      source,
      intervalMs: 10_000,
      idleMs: 180_000,
      errorDelayMs: 30_000,
      scheduler,
      now: scheduler.now
    });

    scheduler.advance(10_000);
    await flush();
    expect(activeSessions).toHaveBeenCalledTimes(1);

    scheduler.advance(29_999);
    await flush();
    expect(activeSessions).toHaveBeenCalledTimes(1);
    scheduler.advance(1);
    await flush();
    expect(activeSessions).toHaveBeenCalledTimes(2);

    scheduler.advance(59_999);
    await flush();
    expect(activeSessions).toHaveBeenCalledTimes(2);
    scheduler.advance(1);
    await flush();
    expect(activeSessions).toHaveBeenCalledTimes(3);

    activeSessions.mockImplementation(() => []);
    scheduler.advance(120_000);
    await flush();
    expect(activeSessions).toHaveBeenCalledTimes(4);

    scheduler.advance(10_000);
    await flush();
    expect(activeSessions).toHaveBeenCalledTimes(5);
    expect(console.error).toHaveBeenCalledTimes(3);

    handle.stop();
    scheduler.advance(600_000);
    await flush();
    expect(activeSessions).toHaveBeenCalledTimes(5);
  });

  it('caps the backoff at five minutes', async () => {
    const scheduler = new ManualScheduler();
    const { source, activeSessions } = makeSource([]);
    activeSessions.mockImplementation(() => {
      throw new Error('registry unavailable');
    });
    const handle = startAfkReaper({ source, intervalMs: 10_000, idleMs: 1_000, scheduler, now: scheduler.now });

    scheduler.advance(10_000);
    await flush();
    // 30s, 60s, 120s, 240s
    for (const delay of [30_000, 60_000, 120_000, 240_000]) {
      scheduler.advance(delay);
      await flush();
    }
    expect(activeSessions).toHaveBeenCalledTimes(5);

    scheduler.advance(299_999);
    await flush();
    expect(activeSessions).toHaveBeenCalledTimes(5);
    scheduler.advance(1);
    await flush();
    expect(activeSessions).toHaveBeenCalledTimes(6);
    handle.stop();
  });
});
