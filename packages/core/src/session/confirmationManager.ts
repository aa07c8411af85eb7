import type { Player } from '../games/types.js';
import type { CancelHandle, Scheduler } from '../lib/scheduler.js';
import type { MessageRef } from '../ports.js';

export type Confirmation = {
  readonly id: string;
  readonly requester: Player;
  readonly opponent: Player;
  readonly channelId: string;
  readonly sessionId: string;
  readonly createdAt: number;
  messageRef: MessageRef | null;
};

export type CreateConfirmationInput = {
  requester: Player;
  opponent: Player;
  channelId: string;
  sessionId: string;
};

export type CreateConfirmationResult =
  | { ok: true; confirmation: Confirmation }
  | { ok: false; reason: 'pending'; existing: Confirmation };

export type ConfirmationManagerOptions = {
  scheduler: Scheduler;
  timeoutMs: number;
  onExpire?: (confirmation: Confirmation) => void;
  now?: () => number;
  generateId: () => string;
};

type Entry = {
  confirmation: Confirmation;
  timer: CancelHandle;
};

export class ConfirmationManager {
  private readonly byId = new Map<string, Entry>();
  // sessionId → confirmationId
  private readonly bySession = new Map<string, string>();
  private readonly options: ConfirmationManagerOptions;

  constructor(options: ConfirmationManagerOptions) {
    this.options = options;
  }

  create(input: CreateConfirmationInput): CreateConfirmationResult {
    const existingId = this.bySession.get(input.sessionId);
    const existing = existingId ? this.byId.get(existingId) : undefined;
    if (existing) return { ok: false, reason: 'pending', existing: existing.confirmation };

    const confirmation: Confirmation = {
      id: this.options.generateId(),
      requester: input.requester,
      opponent: input.opponent,
      channelId: input.channelId,
      sessionId: input.sessionId,
      createdAt: this.options.now ? this.options.now() : Date.now(),
      messageRef: null
    };

    const timer = this.options.scheduler.after(this.options.timeoutMs, () => {
      const expired = this.expire(confirmation.id);
      if (expired) this.options.onExpire?.(expired);
    });
    this.byId.set(confirmation.id, { confirmation, timer });
    this.bySession.set(input.sessionId, confirmation.id);
    return { ok: true, confirmation };
  }

  get(id: string): Confirmation | null {
    return this.byId.get(id)?.confirmation ?? null;
  }

  forSession(sessionId: string): Confirmation | null {
    const id = this.bySession.get(sessionId);
    return id ? this.get(id) : null;
  }

  attachMessage(id: string, ref: MessageRef): boolean {
    const entry = this.byId.get(id);
    if (!entry) return false;
    entry.confirmation.messageRef = ref;
    return true;
  }

  private take(id: string): Confirmation | null {
    const entry = this.byId.get(id);
    if (!entry) return null;
    this.byId.delete(id);
    if (this.bySession.get(entry.confirmation.sessionId) === id) {
      this.bySession.delete(entry.confirmation.sessionId);
    }
    this.options.scheduler.cancel(entry.timer);
    return entry.confirmation;
  }

  /** 수락/거절. 먼저 가져간 쪽만 값을 받는다. */
  resolve(id: string): Confirmation | null {
    return this.take(id);
  }

  expire(id: string): Confirmation | null {
    return this.take(id);
  }

  /** 세션이 다른 이유로 끝났을 때 남은 요청을 치운다. */
  dropForSession(sessionId: string): Confirmation | null {
    const id = this.bySession.get(sessionId);
    return id ? this.take(id) : null;
  }

  get size(): number {
    return this.byId.size;
  }

  dispose() {
    for (const entry of this.byId.values()) this.options.scheduler.cancel(entry.timer);
    this.byId.clear();
    this.bySession.clear();
  }
}
