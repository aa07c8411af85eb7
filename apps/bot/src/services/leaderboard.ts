import type { GameKind } from '@duelhall/core';

import type { SupabaseAdminClient } from '../lib/supabase.js';

export const LEADERBOARD_PAGE_SIZE = 10;

export type LeaderboardScope = 'server' | 'global';
export type LeaderboardFilter = GameKind | 'all';

export type LeaderboardQuery = {
  scope: LeaderboardScope;
  game: LeaderboardFilter;
  /** 0부터 */
  page: number;
  guildId: string | null;
};

export type LeaderboardEntry = {
  rank: number;
  userId: string;
  displayName: string;
  kind: GameKind;
  wins: number;
  losses: number;
};

export type LeaderboardPage = {
  query: LeaderboardQuery;
  entries: LeaderboardEntry[];
  total: number;
  pageCount: number;
};

export type PlayerRecord = {
  kind: GameKind;
  wins: number;
  losses: number;
};

type StatsRow = {
  discord_user_id: string;
  display_name: string;
  game_kind: GameKind;
  wins: number;
  losses: number;
};

const COLUMNS = 'discord_user_id, display_name, game_kind, wins, losses';

export const pageCountOf = (total: number) => Math.max(1, Math.ceil(total / LEADERBOARD_PAGE_SIZE));

export function winRate(wins: number, losses: number): string {
  const played = wins + losses;
  return played > 0 ? `${((wins / played) * 100).toFixed(1)}%` : '0.0%';
}

async function selectPage(
  supabase: SupabaseAdminClient,
  query: LeaderboardQuery,
  page: number
): Promise<{ rows: StatsRow[]; total: number }> {
  const from = page * LEADERBOARD_PAGE_SIZE;
  const to = from + LEADERBOARD_PAGE_SIZE - 1;
  const { guildId } = query;

  if (query.scope === 'global' || !guildId) {
    let request = supabase.from('global_player_stats').select(COLUMNS, { count: 'exact' });
    if (query.game !== 'all') request = request.eq('game_kind', query.game);
    const { data, error, count } = await request
      .order('wins', { ascending: false })
      .order('losses', { ascending: true })
      .order('discord_user_id', { ascending: true })
      .range(from, to);
    if (error) throw new Error(error.message);
    return { rows: data ?? [], total: count ?? 0 };
  }

  let request = supabase.from('player_stats').select(COLUMNS, { count: 'exact' }).eq('guild_id', guildId);
  if (query.game !== 'all') request = request.eq('game_kind', query.game);
  const { data, error, count } = await request
    .order('wins', { ascending: false })
    .order('losses', { ascending: true })
    .order('discord_user_id', { ascending: true })
    .range(from, to);
  if (error) throw new Error(error.message);
  return { rows: data ?? [], total: count ?? 0 };
}

/** 승 내림차순, 패 오름차순. 요청한 페이지가 사라졌으면 마지막 페이지를 돌려준다. */
export async function fetchLeaderboard(supabase: SupabaseAdminClient, query: LeaderboardQuery): Promise<LeaderboardPage> {
  const requested = Math.max(0, query.page);
  const first = await selectPage(supabase, query, requested);
  const page = Math.min(requested, pageCountOf(first.total) - 1);
  const { rows, total } = page === requested ? first : await selectPage(supabase, query, page);

  const offset = page * LEADERBOARD_PAGE_SIZE;
  return {
    query: { ...query, page },
    entries: rows.map((row, i) => ({
      rank: offset + i + 1,
      userId: row.discord_user_id,
      displayName: row.display_name,
      kind: row.game_kind,
      wins: row.wins,
      losses: row.losses
    })),
    total,
    pageCount: pageCountOf(total)
  };
}

export async function fetchPlayerRecords(
  supabase: SupabaseAdminClient,
  userId: string,
  guildId: string | null
): Promise<PlayerRecord[]> {
  const { data, error } = await supabase
    .from('player_stats')
    .select('game_kind, wins, losses')
    .eq('discord_user_id', userId)
    .eq('guild_id', guildId ?? 'global')
    .order('game_kind', { ascending: true });
  if (error) throw new Error(error.message);
  return (data ?? []).map((row) => ({ kind: row.game_kind, wins: row.wins, losses: row.losses }));
}
