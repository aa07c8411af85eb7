import type { GameKind, Player, PlayerPair } from './games/types.js';
import type { Challenge } from './session/challengeManager.js';
import type { Confirmation } from './session/confirmationManager.js';
import type { BoardEvent, GameEnd, SessionSnapshot } from './session/session.js';

export type MessageRef = {
  channelId: string;
  messageId: string;
};

export type ChallengeClosedReason = 'accepted' | 'declined' | 'expired';
export type ConfirmationClosedReason = 'accepted' | 'declined' | 'withdrawn' | 'expired' | 'cancelled';

/**
 * 채팅 플랫폼 쪽 출력. 구현체는 채널에 접근할 수 없으면 ChannelUnreachableError 를 던진다.
 */
export interface GameRenderer {
  renderChallenge(challenge: Challenge): Promise<MessageRef>;
  renderChallengeClosed(challenge: Challenge, reason: ChallengeClosedReason): Promise<void>;
  renderConfirmation(confirmation: Confirmation): Promise<MessageRef>;
  renderConfirmationClosed(confirmation: Confirmation, reason: ConfirmationClosedReason): Promise<void>;
  /** 보드 메시지를 새로 보내거나(session.boardRef 가 null) 기존 메시지를 수정한다. */
  renderBoard(session: SessionSnapshot, event: BoardEvent): Promise<MessageRef>;
  renderGameOver(session: SessionSnapshot, end: GameEnd): Promise<void>;
  deleteMessage(ref: MessageRef): Promise<void>;
}

export type GameEndReason = 'completed' | 'agreed' | 'inactive';

export type GameResult = {
  kind: GameKind;
  sessionId: string;
  channelId: string;
  guildId: string | null;
  players: PlayerPair;
  /** null 이면 무승부(또는 승부 없이 종료) */
  winnerId: string | null;
  scores: Record<string, number>;
  reason: GameEndReason;
  endedAt: Date;
};

export interface ResultRecorder {
  recordResult(result: GameResult): Promise<void>;
}

export type ResolvedUser = Player & { bot: boolean };

export interface IdentityResolver {
  resolve(userId: string, guildId: string | null): Promise<ResolvedUser | null>;
}
