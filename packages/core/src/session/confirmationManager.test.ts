import { describe, it, expect, vi } from 'vitest';

import { ManualScheduler, counterIds } from '../testing/fakes.js';
import { ConfirmationManager } from './confirmationManager.js';

const xena = { id: 'x', displayName: 'Xena' };
const yuri = { id: 'y', displayName: 'Yuri' };

function makeManager() {
  const scheduler = new ManualScheduler();
  const onExpire = vi.fn();
  const manager = new ConfirmationManager({
    scheduler,
    timeoutMs: 60_000,
    onExpire,
    now: scheduler.now,
    generateId: counterIds('cf')
  });
  return { scheduler, onExpire, manager };
}

const input = { requester: xena, opponent: yuri, channelId: 'c1', sessionId: 's1' };

describe('ConfirmationManager', () => {
  it('allows one live confirmation per session', () => {
    const { manager } = makeManager();
    const created = manager.create(input);
    if (!created.ok) throw new Error('expected a confirmation');

    expect(manager.create({ ...input, requester: yuri, opponent: xena })).toEqual({
      ok: false,
      reason: 'pending',
      existing: created.confirmation
    });
    expect(manager.create({ ...input, sessionId: 's2' }).ok).toBe(true);
  });

  it('hands the confirmation to whoever resolves first', () => {
    const { manager, scheduler, onExpire } = makeManager();
    const created = manager.create(input);
    if (!created.ok) throw new Error('expected a confirmation');

    expect(manager.resolve(created.confirmation.id)).toBe(created.confirmation);
    expect(manager.resolve(created.confirmation.id)).toBeNull();
    expect(manager.expire(created.confirmation.id)).toBeNull();
    scheduler.advance(60_000);
    expect(onExpire).not.toHaveBeenCalled();
    expect(manager.forSession('s1')).toBeNull();
  });

  it('expires after the timeout', () => {
    const { manager, scheduler, onExpire } = makeManager();
    const created = manager.create(input);
    if (!created.ok) throw new Error('expected a confirmation');

    scheduler.advance(60_000);

    expect(onExpire).toHaveBeenCalledWith(created.confirmation);
    expect(manager.get(created.confirmation.id)).toBeNull();
    expect(manager.create(input).ok).toBe(true);
  });

  it('drops the pending request of a finished session', () => {
    const { manager, scheduler } = makeManager();
    const created = manager.create(input);
    if (!created.ok) throw new Error('expected a confirmation');

    expect(manager.dropForSession('s1')).toBe(created.confirmation);
    expect(manager.dropForSession('s1')).toBeNull();
    expect(manager.size).toBe(0);
    expect(scheduler.pending).toBe(0);
  });
});
