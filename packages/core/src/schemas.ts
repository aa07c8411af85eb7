import { z } from 'zod';

import type { GameResult } from './ports.js';

export const GameConfigSchema = z.object({
  challengeTimeoutMs: z.number().int().min(1_000).default(60_000),
  confirmationTimeoutMs: z.number().int().min(1_000).default(60_000),
  afkTimeoutMs: z.number().int().min(1_000).default(180_000),
  afkSweepIntervalMs: z.number().int().min(1_000).default(10_000),
  afkErrorDelayMs: z.number().int().min(1_000).default(30_000),
  revealDelayMs: z.number().int().min(0).default(2_000),
  /** RPS 결과 뒤 "다시 하기" 버튼이 유효한 시간 */
  rematchWindowMs: z.number().int().min(0).default(60_000)
});

export type GameConfig = z.infer<typeof GameConfigSchema>;

export function defaultGameConfig(): GameConfig {
  return GameConfigSchema.parse({});
}

export const GameResultRowSchema = z.object({
  game_kind: z.enum(['memory', 'tictactoe', 'rps', 'rps_action']),
  session_id: z.string().min(1),
  guild_id: z.string().nullable(),
  channel_id: z.string().min(1),
  player1_id: z.string().min(1),
  player1_name: z.string(),
  player2_id: z.string().min(1),
  player2_name: z.string(),
  winner_id: z.string().nullable(),
  scores: z.record(z.string(), z.number().int().min(0)),
  end_reason: z.enum(['completed', 'agreed', 'inactive']),
  ended_at: z.string()
});

export type GameResultRow = z.infer<typeof GameResultRowSchema>;

export function toGameResultRow(result: GameResult): GameResultRow {
  const [p1, p2] = result.players;
  return GameResultRowSchema.parse({
    game_kind: result.kind,
    session_id: result.sessionId,
    guild_id: result.guildId,
    channel_id: result.channelId,
    player1_id: p1.id,
    player1_name: p1.displayName,
    player2_id: p2.id,
    player2_name: p2.displayName,
    winner_id: result.winnerId,
    scores: result.scores,
    end_reason: result.reason,
    ended_at: result.endedAt.toISOString()
  });
}
