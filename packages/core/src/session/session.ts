import type { FlipOutcome, GridOption, MemoryGameOver, MemoryMatchSnapshot } from '../games/memoryMatch.js';
import { GRID_OPTIONS, MemoryMatchGame } from '../games/memoryMatch.js';
import type { PlaceOutcome, TicTacToeSnapshot } from '../games/ticTacToe.js';
import { TicTacToeGame } from '../games/ticTacToe.js';
import type { RpsOutcome, RpsSnapshot } from '../games/rockPaperScissors.js';
import { RockPaperScissorsGame } from '../games/rockPaperScissors.js';
import type { GameKind, Player, PlayerPair, Random } from '../games/types.js';
import type { GameEndReason, MessageRef } from '../ports.js';

export type GameParams =
  | { kind: 'memory'; category: string; rows: number; cols: number }
  | { kind: 'tictactoe' }
  | { kind: 'rps' }
  | { kind: 'rps_action' };

/** 도전 시점의 요청 파라미터. 카테고리·그리드는 비어 있으면 기본값으로 채운다. */
export type ChallengeRequest =
  | { kind: 'memory'; category?: string | null; grid?: GridOption | null }
  | { kind: 'tictactoe' }
  | { kind: 'rps' }
  | { kind: 'rps_action' };

export type ChannelRef = {
  channelId: string;
  guildId: string | null;
};

export type GameEngine = MemoryMatchGame | TicTacToeGame | RockPaperScissorsGame;
export type GameSnapshot = MemoryMatchSnapshot | TicTacToeSnapshot | RpsSnapshot;

export type Session = {
  readonly id: string;
  readonly kind: GameKind;
  readonly channelId: string;
  readonly guildId: string | null;
  readonly players: PlayerPair;
  readonly params: GameParams;
  readonly engine: GameEngine;
  readonly createdAt: number;
  lastActivityAt: number;
  boardRef: MessageRef | null;
  finalized: boolean;
};

export type SessionSnapshot = {
  id: string;
  kind: GameKind;
  channelId: string;
  guildId: string | null;
  players: PlayerPair;
  params: GameParams;
  game: GameSnapshot;
  boardRef: MessageRef | null;
  createdAt: number;
  lastActivityAt: number;
};

export type BoardEvent =
  | { kind: 'started' }
  | { kind: 'rematch' }
  | { kind: 'cards_hidden' }
  | Extract<FlipOutcome, { kind: 'first_pick' | 'match' | 'joker' | 'no_match' }>
  | Extract<PlaceOutcome, { kind: 'placed' }>
  | Extract<RpsOutcome, { kind: 'action_recorded' | 'choice_recorded' }>;

export type GameEnd = {
  reason: GameEndReason;
  winner: Player | null;
  endedBy: Player | null;
  detail:
    | MemoryGameOver
    | Extract<PlaceOutcome, { kind: 'win' | 'draw' }>
    | Extract<RpsOutcome, { kind: 'resolved' }>
    | null;
};

export function createEngine(
  params: GameParams,
  players: PlayerPair,
  random: Random,
  symbolsFor: (category: string) => string[] | null
): GameEngine {
  switch (params.kind) {
    case 'memory': {
      const symbols = symbolsFor(params.category);
      if (!symbols) throw new Error(`Unknown emoji category: ${params.category}`);
      return new MemoryMatchGame({
        players,
        category: params.category,
        symbols,
        rows: params.rows,
        cols: params.cols,
        random
      });
    }
    case 'tictactoe':
      return new TicTacToeGame({ players, random });
    case 'rps':
      return new RockPaperScissorsGame({ players, variant: 'basic' });
    case 'rps_action':
      return new RockPaperScissorsGame({ players, variant: 'action' });
  }
}

export function gridOf(grid: GridOption | null | undefined): { rows: number; cols: number } {
  return GRID_OPTIONS[grid ?? '5x5'];
}

export function isParticipant(session: Pick<Session, 'players'>, playerId: string): boolean {
  return session.players.some((p) => p.id === playerId);
}

export function playerById(session: Pick<Session, 'players'>, playerId: string): Player | null {
  return session.players.find((p) => p.id === playerId) ?? null;
}

/** 통계 기록용 점수. 메모리 게임은 찾은 쌍 수, 나머지는 이긴 쪽 1점. */
export function scoresOf(engine: GameEngine): Record<string, number> {
  if (engine instanceof MemoryMatchGame) return engine.scoreTable();
  const winnerId = engine.winner?.id ?? null;
  return Object.fromEntries(engine.players.map((p) => [p.id, p.id === winnerId ? 1 : 0]));
}

export function snapshotSession(session: Session): SessionSnapshot {
  return {
    id: session.id,
    kind: session.kind,
    channelId: session.channelId,
    guildId: session.guildId,
    players: session.players,
    params: session.params,
    game: session.engine.snapshot(),
    boardRef: session.boardRef,
    createdAt: session.createdAt,
    lastActivityAt: session.lastActivityAt
  };
}
