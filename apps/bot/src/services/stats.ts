import { toGameResultRow, type GameResult, type ResultRecorder } from '@duelhall/core';

import type { SupabaseAdminClient } from '../lib/supabase.js';

/**
 * 게임 결과를 `record_game_result` RPC 로 저장한다.
 * 결과 행 저장과 player_stats 승/패 누적은 DB 함수 안에서 한 트랜잭션으로 처리된다.
 */
export class SupabaseStatsRecorder implements ResultRecorder {
  constructor(private readonly supabase: SupabaseAdminClient) {}

  async recordResult(result: GameResult): Promise<void> {
    const row = toGameResultRow(result);
    const { error } = await this.supabase.rpc('record_game_result', {
      p_session_id: row.session_id,
      p_game_kind: row.game_kind,
      p_guild_id: row.guild_id,
      p_channel_id: row.channel_id,
      p_player1_id: row.player1_id,
      p_player1_name: row.player1_name,
      p_player2_id: row.player2_id,
      p_player2_name: row.player2_name,
      p_winner_id: row.winner_id,
      p_scores: row.scores,
      p_end_reason: row.end_reason,
      p_ended_at: row.ended_at
    });
    if (error) throw error;
  }
}
