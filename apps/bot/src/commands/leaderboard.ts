import { SlashCommandBuilder } from 'discord.js';
import type { ButtonInteraction, ChatInputCommandInteraction, StringSelectMenuInteraction } from 'discord.js';
import { GAME_KINDS, isGameKind } from '@duelhall/core';

import { getBotContext } from '../context.js';
import { buildLeaderboardView } from '../lib/leaderboardUi.js';
import { GAME_LABELS } from '../lib/messages.js';
import type { LeaderboardFilter, LeaderboardQuery, LeaderboardScope } from '../services/leaderboard.js';
import { fetchLeaderboard } from '../services/leaderboard.js';
import type { SlashCommand } from './types.js';

const toFilter = (value: string | null | undefined): LeaderboardFilter =>
  value && isGameKind(value) ? value : 'all';

function scopeNameOf(scope: LeaderboardScope, guildName: string | undefined) {
  return scope === 'global' ? '전체 서버' : guildName ?? '서버';
}

async function loadView(query: LeaderboardQuery, guildName: string | undefined) {
  const { supabase } = getBotContext();
  const page = await fetchLeaderboard(supabase, query);
  return buildLeaderboardView(page, scopeNameOf(query.scope, guildName));
}

/** 페이지 버튼과 게임 선택 메뉴. 같은 메시지를 새 페이지로 바꾼다. */
export async function updateLeaderboard(
  interaction: ButtonInteraction | StringSelectMenuInteraction,
  query: Omit<LeaderboardQuery, 'guildId'>
) {
  const game = interaction.isStringSelectMenu() ? toFilter(interaction.values[0]) : query.game;
  await interaction.deferUpdate();
  const view = await loadView({ ...query, game, guildId: interaction.guildId }, interaction.guild?.name);
  await interaction.editReply(view);
}

export const leaderboardCommand: SlashCommand = {
  name: 'leaderboard',
  json: new SlashCommandBuilder()
    .setName('leaderboard')
    .setNameLocalizations({ ko: '리더보드' })
    .setDescription('게임별 승패 순위를 보여줍니다.')
    .setDMPermission(false)
    .addStringOption((o) =>
      o
        .setName('scope')
        .setNameLocalizations({ ko: '범위' })
        .setDescription('이 서버 또는 전체 서버 (기본: 이 서버)')
        .addChoices({ name: '이 서버', value: 'server' }, { name: '전체 서버', value: 'global' })
    )
    .addStringOption((o) =>
      o
        .setName('game')
        .setNameLocalizations({ ko: '게임' })
        .setDescription('게임 (기본: 전체)')
        .addChoices(
          { name: '전체 게임', value: 'all' },
          ...GAME_KINDS.map((kind) => ({ name: GAME_LABELS[kind], value: kind }))
        )
    )
    .toJSON(),
  async execute(interaction: ChatInputCommandInteraction) {
    const scope: LeaderboardScope = interaction.options.getString('scope') === 'global' ? 'global' : 'server';
    const game = toFilter(interaction.options.getString('game'));

    await interaction.deferReply();
    const view = await loadView({ scope, game, page: 0, guildId: interaction.guildId }, interaction.guild?.name);
    await interaction.editReply(view);
  }
};
