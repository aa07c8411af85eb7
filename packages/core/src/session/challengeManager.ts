import type { Player } from '../games/types.js';
import type { CancelHandle, Scheduler } from '../lib/scheduler.js';
import type { MessageRef } from '../ports.js';
import type { GameParams } from './session.js';

export type Challenge = {
  readonly id: string;
  readonly proposer: Player;
  readonly target: Player;
  readonly channelId: string;
  readonly guildId: string | null;
  readonly params: GameParams;
  readonly createdAt: number;
  readonly expiresAt: number;
  messageRef: MessageRef | null;
};

export type CreateChallengeInput = {
  proposer: Player;
  target: Player;
  channelId: string;
  guildId: string | null;
  params: GameParams;
};

export type CreateChallengeResult =
  | { ok: true; challenge: Challenge }
  | { ok: false; reason: 'conflict' | 'already_active' };

export type ChallengeManagerOptions = {
  scheduler: Scheduler;
  timeoutMs: number;
  /** 채널에 진행 중인 세션이 있는지 */
  isChannelBusy: (channelId: string) => boolean;
  onExpire?: (challenge: Challenge) => void;
  now?: () => number;
  generateId: () => string;
};

type Entry = {
  challenge: Challenge;
  timer: CancelHandle;
};

const keyOf = (targetId: string, channelId: string) => `${targetId}:${channelId}`;

/**
 * (대상, 채널) 당 대기 중인 도전은 하나. 수락·거절·만료 중 먼저 도착한 쪽만 항목을 가져간다.
 */
export class ChallengeManager {
  private readonly entries = new Map<string, Entry>();
  private readonly options: ChallengeManagerOptions;

  constructor(options: ChallengeManagerOptions) {
    this.options = options;
  }

  private now(): number {
    return this.options.now ? this.options.now() : Date.now();
  }

  create(input: CreateChallengeInput): CreateChallengeResult {
    const key = keyOf(input.target.id, input.channelId);
    if (this.entries.has(key)) return { ok: false, reason: 'conflict' };
    if (this.options.isChannelBusy(input.channelId)) return { ok: false, reason: 'already_active' };

    const createdAt = this.now();
    const challenge: Challenge = {
      id: this.options.generateId(),
      proposer: input.proposer,
      target: input.target,
      channelId: input.channelId,
      guildId: input.guildId,
      params: input.params,
      createdAt,
      expiresAt: createdAt + this.options.timeoutMs,
      messageRef: null
    };

    const timer = this.options.scheduler.after(this.options.timeoutMs, () => {
      const expired = this.expire(challenge.id);
      if (expired) this.options.onExpire?.(expired);
    });
    this.entries.set(key, { challenge, timer });
    return { ok: true, challenge };
  }

  get(targetId: string, channelId: string): Challenge | null {
    return this.entries.get(keyOf(targetId, channelId))?.challenge ?? null;
  }

  findById(id: string): Challenge | null {
    for (const entry of this.entries.values()) {
      if (entry.challenge.id === id) return entry.challenge;
    }
    return null;
  }

  attachMessage(id: string, ref: MessageRef): boolean {
    const challenge = this.findById(id);
    if (!challenge) return false;
    challenge.messageRef = ref;
    return true;
  }

  /** 수락/거절. 항목을 지우고 타이머를 취소한다. 이미 처리됐으면 null. */
  resolve(targetId: string, channelId: string): Challenge | null {
    const key = keyOf(targetId, channelId);
    const entry = this.entries.get(key);
    if (!entry) return null;
    this.entries.delete(key);
    this.options.scheduler.cancel(entry.timer);
    return entry.challenge;
  }

  /** 저장된 항목이 여전히 같은 도전일 때만 지운다. */
  expire(id: string): Challenge | null {
    for (const [key, entry] of this.entries) {
      if (entry.challenge.id !== id) continue;
      this.entries.delete(key);
      this.options.scheduler.cancel(entry.timer);
      return entry.challenge;
    }
    return null;
  }

  list(): Challenge[] {
    return [...this.entries.values()].map((e) => e.challenge);
  }

  get size(): number {
    return this.entries.size;
  }

  dispose() {
    for (const entry of this.entries.values()) this.options.scheduler.cancel(entry.timer);
    this.entries.clear();
  }
}
