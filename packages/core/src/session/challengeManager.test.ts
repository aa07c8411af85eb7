import { describe, it, expect, vi } from 'vitest';

import { ManualScheduler, counterIds } from '../testing/fakes.js';
import { ChallengeManager } from './challengeManager.js';

const xena = { id: 'x', displayName: 'Xena' };
const yuri = { id: 'y', displayName: 'Yuri' };

function makeManager(busy = new Set<string>()) {
  const scheduler = new ManualScheduler();
  const onExpire = vi.fn();
  const manager = new ChallengeManager({
    scheduler,
    timeoutMs: 60_000,
    isChannelBusy: (channelId) => busy.has(channelId),
    onExpire,
    now: scheduler.now,
    generateId: counterIds('ch')
  });
  const input = { proposer: xena, target: yuri, channelId: 'c1', guildId: 'g1', params: { kind: 'tictactoe' as const } };
  return { scheduler, onExpire, manager, input };
}

describe('ChallengeManager', () => {
  it('rejects a second challenge for the same target and channel', () => {
    const { manager, input } = makeManager();

    expect(manager.create(input).ok).toBe(true);
    expect(manager.create(input)).toEqual({ ok: false, reason: 'conflict' });
    expect(manager.create({ ...input, channelId: 'c2' }).ok).toBe(true);
  });

  it('rejects a challenge in a channel with a running game', () => {
    const { manager, input } = makeManager(new Set(['c1']));

    expect(manager.create(input)).toEqual({ ok: false, reason: 'already_active' });
  });

  it('expires after the timeout and then resolves to nothing', () => {
    const { manager, input, scheduler, onExpire } = makeManager();
    const created = manager.create(input);
    if (!created.ok) throw new Error('expected a challenge');
    expect(created.challenge.expiresAt).toBe(60_000);

    scheduler.advance(59_999);
    expect(onExpire).not.toHaveBeenCalled();
    scheduler.advance(1);

    expect(onExpire).toHaveBeenCalledTimes(1);
    expect(onExpire).toHaveBeenCalledWith(created.challenge);
    expect(manager.resolve('y', 'c1')).toBeNull();
  });

  it('cancels the expiry when resolved first', () => {
    const { manager, input, scheduler, onExpire } = makeManager();
    const created = manager.create(input);
    if (!created.ok) throw new Error('expected a challenge');

    expect(manager.resolve('y', 'c1')).toBe(created.challenge);
    expect(manager.resolve('y', 'c1')).toBeNull();
    expect(scheduler.pending).toBe(0);
    scheduler.advance(60_000);

    expect(onExpire).not.toHaveBeenCalled();
    expect(manager.expire(created.challenge.id)).toBeNull();
  });

  it('ignores a stale expiry for a newer challenge under the same key', () => {
    const { manager, input } = makeManager();
    const older = manager.create(input);
    if (!older.ok) throw new Error('expected a challenge');
    manager.resolve('y', 'c1');
    const newer = manager.create(input);
    if (!newer.ok) throw new Error('expected a challenge');

    expect(manager.expire(older.challenge.id)).toBeNull();
    expect(manager.get('y', 'c1')).toBe(newer.challenge);
  });

  it('records the rendered prompt', () => {
    const { manager, input } = makeManager();
    const created = manager.create(input);
    if (!created.ok) throw new Error('expected a challenge');

    expect(manager.attachMessage(created.challenge.id, { channelId: 'c1', messageId: 'm1' })).toBe(true);
    expect(manager.findById(created.challenge.id)?.messageRef).toEqual({ channelId: 'c1', messageId: 'm1' });
    expect(manager.attachMessage('missing', { channelId: 'c1', messageId: 'm2' })).toBe(false);
  });
});
