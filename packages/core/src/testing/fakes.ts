import { ChannelUnreachableError } from '../errors.js';
import type { Random } from '../games/types.js';
import type { CancelHandle, Scheduler } from '../lib/scheduler.js';
import type {
  ChallengeClosedReason,
  ConfirmationClosedReason,
  GameRenderer,
  GameResult,
  IdentityResolver,
  MessageRef,
  ResolvedUser,
  ResultRecorder
} from '../ports.js';
import type { Challenge } from '../session/challengeManager.js';
import type { Confirmation } from '../session/confirmationManager.js';
import type { BoardEvent, GameEnd, SessionSnapshot } from '../session/session.js';

type Timer = { id: number; at: number; callback: () => void; cancelled: boolean };

/** 테스트용 수동 시계. advance 로 시간을 흘려 만기된 콜백을 순서대로 실행한다. */
export class ManualScheduler implements Scheduler {
  private timers: Timer[] = [];
  private seq = 0;
  current = 0;

  now = () => this.current;

  after(ms: number, callback: () => void): CancelHandle {
    const timer: Timer = { id: ++this.seq, at: this.current + Math.max(0, ms), callback, cancelled: false };
    this.timers.push(timer);
    return {
      id: timer.id,
      cancel: () => {
        timer.cancelled = true;
      }
    };
  }

  cancel(handle: CancelHandle) {
    handle.cancel();
  }

  advance(ms: number) {
    const target = this.current + ms;
    for (;;) {
      const due = this.timers
        .filter((t) => !t.cancelled && t.at <= target)
        .sort((a, b) => a.at - b.at || a.id - b.id)[0];
      if (!due) break;
      due.cancelled = true;
      this.current = due.at;
      due.callback();
    }
    this.current = target;
    this.timers = this.timers.filter((t) => !t.cancelled);
  }

  get pending(): number {
    return this.timers.filter((t) => !t.cancelled).length;
  }
}

export type RenderCall =
  | { method: 'renderChallenge'; challenge: Challenge }
  | { method: 'renderChallengeClosed'; challenge: Challenge; reason: ChallengeClosedReason }
  | { method: 'renderConfirmation'; confirmation: Confirmation }
  | { method: 'renderConfirmationClosed'; confirmation: Confirmation; reason: ConfirmationClosedReason }
  | { method: 'renderBoard'; session: SessionSnapshot; event: BoardEvent }
  | { method: 'renderGameOver'; session: SessionSnapshot; end: GameEnd }
  | { method: 'deleteMessage'; ref: MessageRef };

export class RecordingRenderer implements GameRenderer {
  readonly calls: RenderCall[] = [];
  /** 여기에 넣은 채널로의 렌더링은 ChannelUnreachableError 를 던진다. */
  readonly unreachable = new Set<string>();
  private seq = 0;

  private guard(channelId: string) {
    if (this.unreachable.has(channelId)) throw new ChannelUnreachableError(channelId);
  }

  private nextRef(channelId: string): MessageRef {
    return { channelId, messageId: `msg-${++this.seq}` };
  }

  async renderChallenge(challenge: Challenge): Promise<MessageRef> {
    this.calls.push({ method: 'renderChallenge', challenge });
    this.guard(challenge.channelId);
    return this.nextRef(challenge.channelId);
  }

  async renderChallengeClosed(challenge: Challenge, reason: ChallengeClosedReason): Promise<void> {
    this.calls.push({ method: 'renderChallengeClosed', challenge, reason });
    this.guard(challenge.channelId);
  }

  async renderConfirmation(confirmation: Confirmation): Promise<MessageRef> {
    this.calls.push({ method: 'renderConfirmation', confirmation });
    this.guard(confirmation.channelId);
    return this.nextRef(confirmation.channelId);
  }

  async renderConfirmationClosed(confirmation: Confirmation, reason: ConfirmationClosedReason): Promise<void> {
    this.calls.push({ method: 'renderConfirmationClosed', confirmation, reason });
    this.guard(confirmation.channelId);
  }

  async renderBoard(session: SessionSnapshot, event: BoardEvent): Promise<MessageRef> {
    this.calls.push({ method: 'renderBoard', session, event });
    this.guard(session.channelId);
    return session.boardRef ?? this.nextRef(session.channelId);
  }

  async renderGameOver(session: SessionSnapshot, end: GameEnd): Promise<void> {
    this.calls.push({ method: 'renderGameOver', session, end });
    this.guard(session.channelId);
  }

  async deleteMessage(ref: MessageRef): Promise<void> {
    this.calls.push({ method: 'deleteMessage', ref });
    this.guard(ref.channelId);
  }

  callsOf<M extends RenderCall['method']>(method: M): Extract<RenderCall, { method: M }>[] {
    return this.calls.filter((c): c is Extract<RenderCall, { method: M }> => c.method === method);
  }
}

export class RecordingRecorder implements ResultRecorder {
  readonly results: GameResult[] = [];
  failWith: Error | null = null;

  async recordResult(result: GameResult): Promise<void> {
    this.results.push(result);
    if (this.failWith) throw this.failWith;
  }
}

export class StaticIdentity implements IdentityResolver {
  private readonly users = new Map<string, ResolvedUser>();

  constructor(users: ResolvedUser[] = []) {
    for (const u of users) this.users.set(u.id, u);
  }

  add(user: ResolvedUser) {
    this.users.set(user.id, user);
  }

  async resolve(userId: string): Promise<ResolvedUser | null> {
    return this.users.get(userId) ?? null;
  }
}

/** 주어진 값을 순환하며 돌려주는 난수원 */
export function sequenceRandom(values: number[]): Random {
  let i = 0;
  return () => {
    const value = values[i % values.length] ?? 0;
    i += 1;
    return value;
  };
}

export function counterIds(prefix = 'id'): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}
