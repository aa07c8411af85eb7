import { randomUUID } from 'crypto';

import type { Rejection, RejectionCode } from './errors.js';
import { isChannelUnreachable } from './errors.js';
import { getCategory, randomCategory } from './games/emojiCategories.js';
import type { Position } from './games/memoryMatch.js';
import { MemoryMatchGame } from './games/memoryMatch.js';
import { RockPaperScissorsGame } from './games/rockPaperScissors.js';
import { TicTacToeGame } from './games/ticTacToe.js';
import type { Player, Random } from './games/types.js';
import { otherPlayer } from './games/types.js';
import { KeyedLock } from './lib/keyedLock.js';
import type { CancelHandle, Scheduler } from './lib/scheduler.js';
import { createTimerScheduler } from './lib/scheduler.js';
import type { GameRenderer, GameResult, IdentityResolver, ResultRecorder } from './ports.js';
import type { GameConfig } from './schemas.js';
import { GameConfigSchema } from './schemas.js';
import type { AfkReaperHandle, IdleCandidate, ReapableSessions } from './session/afkReaper.js';
import { startAfkReaper } from './session/afkReaper.js';
import type { Challenge } from './session/challengeManager.js';
import { ChallengeManager } from './session/challengeManager.js';
import type { Confirmation } from './session/confirmationManager.js';
import { ConfirmationManager } from './session/confirmationManager.js';
import type {
  BoardEvent,
  ChallengeRequest,
  ChannelRef,
  GameEnd,
  GameParams,
  Session,
  SessionSnapshot
} from './session/session.js';
import { createEngine, gridOf, isParticipant, playerById, scoresOf, snapshotSession } from './session/session.js';
import { SessionRegistry } from './session/sessionRegistry.js';

export type DispatchResult<T> = { ok: true; value: T } | { ok: false; error: Rejection };

const ok = <T>(value: T): DispatchResult<T> => ({ ok: true, value });
const fail = (code: RejectionCode): { ok: false; error: Rejection } => ({ ok: false, error: { code } });

export type MoveArgs =
  | { type: 'flip'; row: number; col: number }
  | { type: 'pair'; first: Position; second: Position }
  | { type: 'place'; row: number; col: number }
  | { type: 'choose'; choice: string }
  | { type: 'action'; action: string };

export type MoveResult = {
  session: SessionSnapshot;
  event: BoardEvent | null;
  end: GameEnd | null;
};

export type ChallengeDecision = 'accept' | 'decline';

export type ChallengeResolution =
  | { kind: 'started'; challenge: Challenge; session: SessionSnapshot }
  | { kind: 'declined' | 'withdrawn'; challenge: Challenge };

export type ConfirmationResolution = {
  kind: 'accepted' | 'declined' | 'withdrawn';
  confirmation: Confirmation;
};

export type GameDispatcherOptions = {
  renderer: GameRenderer;
  recorder: ResultRecorder;
  identity: IdentityResolver;
  config?: Partial<GameConfig>;
  scheduler?: Scheduler;
  random?: Random;
  now?: () => number;
  generateId?: () => string;
  symbolsFor?: (category: string) => string[] | null;
};

type Step =
  | { type: 'event'; event: BoardEvent }
  | { type: 'end'; end: GameEnd }
  | { type: 'rejected'; code: RejectionCode };

type RecentRound = {
  session: Session;
  timer: CancelHandle;
};

/**
 * 게임 요청의 단일 진입점. 같은 채널에 대한 세션 변경은 모두 채널 락 안에서 실행된다.
 */
export class GameDispatcher implements ReapableSessions {
  readonly config: GameConfig;
  readonly sessions = new SessionRegistry();
  readonly challenges: ChallengeManager;
  readonly confirmations: ConfirmationManager;

  private readonly renderer: GameRenderer;
  private readonly recorder: ResultRecorder;
  private readonly identity: IdentityResolver;
  private readonly scheduler: Scheduler;
  private readonly random: Random;
  private readonly now: () => number;
  private readonly generateId: () => string;
  private readonly symbolsFor: (category: string) => string[] | null;
  private readonly lock = new KeyedLock();
  private readonly revealTimers = new Map<string, CancelHandle>();
  private readonly recentRounds = new Map<string, RecentRound>();
  private reaper: AfkReaperHandle | null = null;

  constructor(options: GameDispatcherOptions) {
    this.config = GameConfigSchema.parse({ ...options.config });
    this.renderer = options.renderer;
    this.recorder = options.recorder;
    this.identity = options.identity;
    this.scheduler = options.scheduler ?? createTimerScheduler();
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
    this.symbolsFor = options.symbolsFor ?? getCategory;

    this.challenges = new ChallengeManager({
      scheduler: this.scheduler,
      timeoutMs: this.config.challengeTimeoutMs,
      isChannelBusy: (channelId) => this.sessions.has(channelId),
      onExpire: (challenge) => this.background('challenge expiry', this.closeChallenge(challenge, 'expired')),
      now: this.now,
      generateId: this.generateId
    });

    this.confirmations = new ConfirmationManager({
      scheduler: this.scheduler,
      timeoutMs: this.config.confirmationTimeoutMs,
      onExpire: (confirmation) =>
        this.background(
          'confirmation expiry',
          this.safely(() => this.renderer.renderConfirmationClosed(confirmation, 'expired'))
        ),
      now: this.now,
      generateId: this.generateId
    });
  }

  /* ──────────── Challenge ──────────── */

  async challenge(
    proposerId: string,
    targetId: string,
    channel: ChannelRef,
    request: ChallengeRequest
  ): Promise<DispatchResult<Challenge>> {
    if (proposerId === targetId) return fail('self_challenge');

    const params = this.toParams(request);
    if (!params) return fail('invalid_category');

    const [proposer, target] = await Promise.all([
      this.identity.resolve(proposerId, channel.guildId),
      this.identity.resolve(targetId, channel.guildId)
    ]);
    if (!proposer || !target) return fail('unknown_user');
    if (target.bot) return fail('bot_challenge');

    const created = this.challenges.create({
      proposer: { id: proposer.id, displayName: proposer.displayName },
      target: { id: target.id, displayName: target.displayName },
      channelId: channel.channelId,
      guildId: channel.guildId,
      params
    });
    if (!created.ok) return fail(created.reason);

    const { challenge } = created;
    try {
      const ref = await this.renderer.renderChallenge(challenge);
      this.challenges.attachMessage(challenge.id, ref);
    } catch (error) {
      this.challenges.expire(challenge.id);
      if (isChannelUnreachable(error)) return fail('channel_unreachable');
      throw error;
    }
    return ok(challenge);
  }

  private toParams(request: ChallengeRequest): GameParams | null {
    if (request.kind !== 'memory') return request;
    const category = request.category ? request.category.toLowerCase() : randomCategory(this.random);
    if (!this.symbolsFor(category)) return null;
    return { kind: 'memory', category, ...gridOf(request.grid) };
  }

  /**
   * 도전 수락/거절. challengeId 가 주어지면 버튼을 누른 사람이 대상자인지 확인하고,
   * 도전자가 누른 거절은 철회로 처리한다.
   */
  resolveChallenge(
    actorId: string,
    channelId: string,
    decision: ChallengeDecision,
    challengeId?: string
  ): Promise<DispatchResult<ChallengeResolution>> {
    return this.lock.run<DispatchResult<ChallengeResolution>>(channelId, async () => {
      let targetId = actorId;
      let withdrawn = false;

      if (challengeId !== undefined) {
        const pending = this.challenges.findById(challengeId);
        if (!pending || pending.channelId !== channelId) return fail('already_resolved');
        if (pending.target.id !== actorId) {
          if (pending.proposer.id !== actorId || decision !== 'decline') return fail('not_a_player');
          targetId = pending.target.id;
          withdrawn = true;
        }
      }

      const challenge = this.challenges.resolve(targetId, channelId);
      if (!challenge) return fail('already_resolved');

      if (decision === 'decline') {
        await this.closeChallenge(challenge, 'declined');
        return ok({ kind: withdrawn ? 'withdrawn' : 'declined', challenge });
      }

      return this.startSession(challenge);
    });
  }

  private async startSession(challenge: Challenge): Promise<DispatchResult<ChallengeResolution>> {
    const players = [challenge.proposer, challenge.target] as const;
    const now = this.now();
    const session: Session = {
      id: this.generateId(),
      kind: challenge.params.kind,
      channelId: challenge.channelId,
      guildId: challenge.guildId,
      players,
      params: challenge.params,
      engine: createEngine(challenge.params, players, this.random, this.symbolsFor),
      createdAt: now,
      lastActivityAt: now,
      boardRef: null,
      finalized: false
    };

    const created = this.sessions.tryCreate(challenge.channelId, session);
    if (!created.ok) {
      await this.closeChallenge(challenge, 'declined');
      return fail(created.reason);
    }
    this.dropRecentRound(challenge.channelId);

    await this.closeChallenge(challenge, 'accepted');
    const rendered = await this.renderInitialBoard(session, { kind: 'started' });
    if (!rendered.ok) return rendered;

    console.log(`[Dispatcher] ${session.kind} 시작: ${challenge.proposer.id} vs ${challenge.target.id} (#${session.channelId})`);
    return ok({ kind: 'started', challenge, session: snapshotSession(session) });
  }

  private async renderInitialBoard(session: Session, event: BoardEvent): Promise<DispatchResult<SessionSnapshot>> {
    try {
      session.boardRef = await this.renderer.renderBoard(snapshotSession(session), event);
      return ok(snapshotSession(session));
    } catch (error) {
      if (!isChannelUnreachable(error)) throw error;
      session.finalized = true;
      this.sessions.remove(session.channelId, session.id);
      return fail('channel_unreachable');
    }
  }

  private async closeChallenge(challenge: Challenge, reason: 'accepted' | 'declined' | 'expired') {
    await this.safely(() => this.renderer.renderChallengeClosed(challenge, reason));
  }

  /* ──────────── Moves ──────────── */

  move(playerId: string, channelId: string, args: MoveArgs): Promise<DispatchResult<MoveResult>> {
    return this.lock.run<DispatchResult<MoveResult>>(channelId, async () => {
      const session = this.sessions.get(channelId);
      if (!session || session.finalized) return fail('no_active_game');
      const player = playerById(session, playerId);
      if (!player) return fail('not_a_player');

      const step = applyMove(session, player, args);
      if (step.type === 'rejected') return fail(step.code);

      session.lastActivityAt = this.now();

      if (step.type === 'end') {
        await this.finalize(session, step.end);
        return ok({ session: snapshotSession(session), event: null, end: step.end });
      }

      try {
        session.boardRef = await this.renderer.renderBoard(snapshotSession(session), step.event);
      } catch (error) {
        if (!isChannelUnreachable(error)) throw error;
        // 채널이 사라졌으면 세션도 더 이어갈 수 없다.
        console.warn(`[Dispatcher] channel unreachable: ${error.channelId}`);
        await this.finalize(session, { reason: 'inactive', winner: null, endedBy: null, detail: null });
        return fail('channel_unreachable');
      }
      if (step.event.kind === 'no_match') this.scheduleHide(session);

      return ok({ session: snapshotSession(session), event: step.event, end: null });
    });
  }

  private scheduleHide(session: Session) {
    this.cancelHide(session.id);
    const handle = this.scheduler.after(this.config.revealDelayMs, () => {
      this.revealTimers.delete(session.id);
      this.background('hide cards', this.lock.run(session.channelId, () => this.hideCards(session)));
    });
    this.revealTimers.set(session.id, handle);
  }

  private cancelHide(sessionId: string) {
    const handle = this.revealTimers.get(sessionId);
    if (!handle) return;
    this.scheduler.cancel(handle);
    this.revealTimers.delete(sessionId);
  }

  private async hideCards(session: Session) {
    if (session.finalized || this.sessions.get(session.channelId) !== session) return;
    await this.safely(async () => {
      session.boardRef = await this.renderer.renderBoard(snapshotSession(session), { kind: 'cards_hidden' });
    });
  }

  /* ──────────── End-game confirmation ──────────── */

  requestEnd(playerId: string, channelId: string): Promise<DispatchResult<Confirmation>> {
    return this.lock.run<DispatchResult<Confirmation>>(channelId, async () => {
      const session = this.sessions.get(channelId);
      if (!session || session.finalized) return fail('no_active_game');
      const requester = playerById(session, playerId);
      if (!requester) return fail('not_a_player');

      const created = this.confirmations.create({
        requester,
        opponent: otherPlayer(session.players, requester.id),
        channelId,
        sessionId: session.id
      });
      if (!created.ok) return fail('confirmation_pending');

      const { confirmation } = created;
      try {
        const ref = await this.renderer.renderConfirmation(confirmation);
        this.confirmations.attachMessage(confirmation.id, ref);
      } catch (error) {
        this.confirmations.resolve(confirmation.id);
        if (isChannelUnreachable(error)) return fail('channel_unreachable');
        throw error;
      }
      return ok(confirmation);
    });
  }

  /**
   * 상대만 수락할 수 있다. 요청자 본인의 거절은 철회로 처리한다.
   * 수락 시 세션 종료와 요청 제거는 await 없이 한 번에 일어난다.
   */
  async resolveConfirmation(
    confirmationId: string,
    actorId: string,
    decision: ChallengeDecision
  ): Promise<DispatchResult<ConfirmationResolution>> {
    const initial = this.confirmations.get(confirmationId);
    if (!initial) return fail('already_resolved');

    return this.lock.run<DispatchResult<ConfirmationResolution>>(initial.channelId, async () => {
      const confirmation = this.confirmations.get(confirmationId);
      if (!confirmation) return fail('already_resolved');

      const isOpponent = confirmation.opponent.id === actorId;
      const isRequester = confirmation.requester.id === actorId;
      if (!isOpponent && !(isRequester && decision === 'decline')) return fail('not_a_player');

      if (decision === 'decline') {
        this.confirmations.resolve(confirmationId);
        const kind = isOpponent ? 'declined' : 'withdrawn';
        await this.safely(() => this.renderer.renderConfirmationClosed(confirmation, kind));
        return ok({ kind, confirmation });
      }

      const session = this.sessions.get(confirmation.channelId);
      if (!session || session.id !== confirmation.sessionId || session.finalized) {
        this.confirmations.resolve(confirmationId);
        return fail('already_resolved');
      }

      await this.finalize(session, {
        reason: 'agreed',
        winner: null,
        endedBy: confirmation.requester,
        detail: null
      });
      await this.safely(() => this.renderer.renderConfirmationClosed(confirmation, 'accepted'));
      return ok({ kind: 'accepted', confirmation });
    });
  }

  /* ──────────── Rematch ──────────── */

  /** RPS 결과가 나온 직후 같은 두 사람이 같은 채널에서 다시 붙는다. */
  rematch(playerId: string, channelId: string): Promise<DispatchResult<SessionSnapshot>> {
    return this.lock.run<DispatchResult<SessionSnapshot>>(channelId, async () => {
      const recent = this.recentRounds.get(channelId);
      if (!recent) return fail('no_active_game');
      const previous = recent.session;
      if (!isParticipant(previous, playerId)) return fail('not_a_player');
      if (this.sessions.has(channelId)) return fail('already_active');
      if (!(previous.engine instanceof RockPaperScissorsGame)) return fail('unknown_engine_state');

      previous.engine.reset();
      const now = this.now();
      const session: Session = {
        ...previous,
        id: this.generateId(),
        createdAt: now,
        lastActivityAt: now,
        boardRef: null,
        finalized: false
      };

      const created = this.sessions.tryCreate(channelId, session);
      if (!created.ok) return fail(created.reason);
      this.dropRecentRound(channelId);

      // 지난 판 결과 메시지는 지우고 새 보드를 보낸다
      const { boardRef } = previous;
      if (boardRef) await this.safely(() => this.renderer.deleteMessage(boardRef));

      return this.renderInitialBoard(session, { kind: 'rematch' });
    });
  }

  private rememberRound(session: Session) {
    this.dropRecentRound(session.channelId);
    const timer = this.scheduler.after(this.config.rematchWindowMs, () => {
      const current = this.recentRounds.get(session.channelId);
      if (current?.session === session) this.recentRounds.delete(session.channelId);
    });
    this.recentRounds.set(session.channelId, { session, timer });
  }

  private dropRecentRound(channelId: string) {
    const recent = this.recentRounds.get(channelId);
    if (!recent) return;
    this.scheduler.cancel(recent.timer);
    this.recentRounds.delete(channelId);
  }

  /* ──────────── Finalization ──────────── */

  /**
   * 세션을 끝낸다. 상태 전환(종료 표시, 레지스트리 제거, 확인 요청 제거)은 첫 await 전에 끝나며
   * 결과 기록은 세션당 정확히 한 번만 일어난다.
   */
  private async finalize(session: Session, end: GameEnd): Promise<void> {
    if (session.finalized) return;
    session.finalized = true;
    if (!session.engine.isOver) session.engine.end();
    this.sessions.remove(session.channelId, session.id);
    this.cancelHide(session.id);
    const dropped = this.confirmations.dropForSession(session.id);
    if (session.engine instanceof RockPaperScissorsGame && end.reason === 'completed') {
      this.rememberRound(session);
    }

    await this.record(buildResult(session, end, new Date(this.now())));

    if (dropped && end.reason !== 'agreed') {
      await this.safely(() => this.renderer.renderConfirmationClosed(dropped, 'cancelled'));
    }
    await this.safely(() => this.renderer.renderGameOver(snapshotSession(session), end));
  }

  private async record(result: GameResult) {
    try {
      await this.recorder.recordResult(result);
    } catch (error) {
      console.error('[Stats] Failed to record game result:', { sessionId: result.sessionId, error });
    }
  }

  /* ──────────── AFK ──────────── */

  activeSessions(): IdleCandidate[] {
    return this.sessions.list().map((s) => ({
      sessionId: s.id,
      channelId: s.channelId,
      lastActivityAt: s.lastActivityAt
    }));
  }

  reap(channelId: string, sessionId: string, cutoff: number): Promise<boolean> {
    return this.lock.run(channelId, async () => {
      const session = this.sessions.get(channelId);
      if (!session || session.id !== sessionId || session.finalized) return false;
      if (session.lastActivityAt >= cutoff) return false;

      console.log(`[Dispatcher] ${session.kind} 잠수 종료 (#${channelId})`);
      await this.finalize(session, { reason: 'inactive', winner: null, endedBy: null, detail: null });
      return true;
    });
  }

  startReaper(): AfkReaperHandle {
    this.reaper?.stop();
    this.reaper = startAfkReaper({
      source: this,
      intervalMs: this.config.afkSweepIntervalMs,
      idleMs: this.config.afkTimeoutMs,
      errorDelayMs: this.config.afkErrorDelayMs,
      scheduler: this.scheduler,
      now: this.now
    });
    return this.reaper;
  }

  /* ──────────── Queries ──────────── */

  sessionIn(channelId: string): SessionSnapshot | null {
    const session = this.sessions.get(channelId);
    return session ? snapshotSession(session) : null;
  }

  /** 타이머를 모두 정리하고 진행 중인 상태를 버린다. 세션은 재시작 후 복구되지 않는다. */
  shutdown(): number {
    this.reaper?.stop();
    this.reaper = null;
    this.challenges.dispose();
    this.confirmations.dispose();
    for (const handle of this.revealTimers.values()) this.scheduler.cancel(handle);
    this.revealTimers.clear();
    for (const recent of this.recentRounds.values()) this.scheduler.cancel(recent.timer);
    this.recentRounds.clear();

    const dropped = this.sessions.size;
    for (const session of this.sessions.list()) session.finalized = true;
    this.sessions.clear();
    if (dropped > 0) console.warn(`[Dispatcher] shutdown: 진행 중이던 세션 ${dropped}개 폐기`);
    return dropped;
  }

  /* ──────────── Helpers ──────────── */

  /** 채널 접근 불가는 경고만 남기고 넘어간다. */
  private async safely(task: () => Promise<void>) {
    try {
      await task();
    } catch (error) {
      if (!isChannelUnreachable(error)) throw error;
      console.warn(`[Dispatcher] channel unreachable: ${error.channelId}`);
    }
  }

  private background(label: string, task: Promise<unknown>) {
    task.catch((error: unknown) => {
      console.error(`[Dispatcher] ${label} failed:`, error);
    });
  }
}

function applyMove(session: Session, player: Player, args: MoveArgs): Step {
  const { engine } = session;
  const completed = (winner: Player | null, detail: GameEnd['detail']): Step => ({
    type: 'end',
    end: { reason: 'completed', winner, endedBy: null, detail }
  });

  switch (args.type) {
    case 'flip':
    case 'pair': {
      if (!(engine instanceof MemoryMatchGame)) return { type: 'rejected', code: 'unknown_engine_state' };
      const outcome =
        args.type === 'flip'
          ? engine.flip(player, args.row, args.col)
          : engine.selectPair(player, args.first, args.second);
      if (outcome.kind === 'rejected') return { type: 'rejected', code: outcome.reason };
      if (outcome.kind === 'game_over') return completed(outcome.winner, outcome);
      return { type: 'event', event: outcome };
    }
    case 'place': {
      if (!(engine instanceof TicTacToeGame)) return { type: 'rejected', code: 'unknown_engine_state' };
      const outcome = engine.place(player, args.row, args.col);
      if (outcome.kind === 'rejected') return { type: 'rejected', code: outcome.reason };
      if (outcome.kind === 'win') return completed(outcome.winner, outcome);
      if (outcome.kind === 'draw') return completed(null, outcome);
      return { type: 'event', event: outcome };
    }
    case 'choose':
    case 'action': {
      if (!(engine instanceof RockPaperScissorsGame)) return { type: 'rejected', code: 'unknown_engine_state' };
      const outcome =
        args.type === 'choose' ? engine.submitChoice(player, args.choice) : engine.setAction(player, args.action);
      if (outcome.kind === 'rejected') return { type: 'rejected', code: outcome.reason };
      if (outcome.kind === 'resolved') return completed(outcome.winner, outcome);
      return { type: 'event', event: outcome };
    }
  }
}

function buildResult(session: Session, end: GameEnd, endedAt: Date): GameResult {
  return {
    kind: session.kind,
    sessionId: session.id,
    channelId: session.channelId,
    guildId: session.guildId,
    players: session.players,
    winnerId: end.winner?.id ?? null,
    scores: scoresOf(session.engine),
    reason: end.reason,
    endedAt
  };
}
