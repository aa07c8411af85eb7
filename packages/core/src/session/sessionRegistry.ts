import type { Session } from './session.js';

export type TryCreateResult = { ok: true } | { ok: false; reason: 'already_active' };

/**
 * 채널 하나당 진행 중인 세션은 최대 하나.
 * 검사와 등록 사이에 await 이 없으므로 동시에 수락해도 한쪽만 성공한다.
 */
export class SessionRegistry {
  private readonly byChannel = new Map<string, Session>();

  tryCreate(channelId: string, session: Session): TryCreateResult {
    if (this.byChannel.has(channelId)) return { ok: false, reason: 'already_active' };
    this.byChannel.set(channelId, session);
    return { ok: true };
  }

  get(channelId: string): Session | null {
    return this.byChannel.get(channelId) ?? null;
  }

  has(channelId: string): boolean {
    return this.byChannel.has(channelId);
  }

  /** 특정 세션이 아직 등록돼 있을 때만 지운다. 이미 다른 세션으로 바뀌었으면 false. */
  remove(channelId: string, sessionId?: string): boolean {
    const current = this.byChannel.get(channelId);
    if (!current) return false;
    if (sessionId !== undefined && current.id !== sessionId) return false;
    this.byChannel.delete(channelId);
    return true;
  }

  list(): Session[] {
    return [...this.byChannel.values()];
  }

  get size(): number {
    return this.byChannel.size;
  }

  clear() {
    this.byChannel.clear();
  }
}
