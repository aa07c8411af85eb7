import { ActionRowBuilder, ButtonBuilder, ButtonStyle, StringSelectMenuBuilder } from 'discord.js';
import type { EmbedBuilder, MessageActionRowComponentBuilder } from 'discord.js';
import { GAME_KINDS } from '@duelhall/core';

import { encodeCustomId } from '../games/customIds.js';
import type { LeaderboardFilter, LeaderboardPage, PlayerRecord } from '../services/leaderboard.js';
import { winRate } from '../services/leaderboard.js';
import { brandEmbed, Colors } from './embed.js';
import { GAME_LABELS } from './messages.js';

type LeaderboardView = {
  embeds: EmbedBuilder[];
  components: ActionRowBuilder<MessageActionRowComponentBuilder>[];
};

const filterLabel = (game: LeaderboardFilter) => (game === 'all' ? '🎮 전체 게임' : GAME_LABELS[game]);

const recordText = (wins: number, losses: number) => `${wins}승 ${losses}패 (${winRate(wins, losses)})`;

export const buildLeaderboardEmbed = (page: LeaderboardPage, scopeName: string) => {
  const { query } = page;
  const lines = page.entries.map((e) => {
    const game = query.game === 'all' ? ` · ${GAME_LABELS[e.kind]}` : '';
    return `**${e.rank}.** ${e.displayName}${game} · ${recordText(e.wins, e.losses)}`;
  });

  return brandEmbed()
    .setColor(Colors.BRAND_LEMON)
    .setTitle(`🏆 ${scopeName} 리더보드 · ${filterLabel(query.game)}`)
    .setDescription(lines.length ? lines.join('\n') : '아직 기록이 없어. 먼저 한 판 해 봐!')
    .setFooter({ text: `${query.page + 1}/${page.pageCount} 페이지 · 기록 ${page.total}개` });
};

export const buildLeaderboardRows = (page: LeaderboardPage) => {
  const { scope, game, page: current } = page.query;

  const filter = new StringSelectMenuBuilder()
    .setCustomId(encodeCustomId({ type: 'leaderboard_game', scope }))
    .setPlaceholder('게임 선택')
    .addOptions(
      (['all', ...GAME_KINDS] as const).map((value) => ({
        label: filterLabel(value),
        value,
        default: value === game
      }))
    );

  const prev = new ButtonBuilder()
    .setCustomId(encodeCustomId({ type: 'leaderboard', scope, game, page: Math.max(0, current - 1) }))
    .setLabel('◀️ 이전')
    .setStyle(ButtonStyle.Primary)
    .setDisabled(current <= 0);
  const next = new ButtonBuilder()
    .setCustomId(encodeCustomId({ type: 'leaderboard', scope, game, page: current + 1 }))
    .setLabel('다음 ▶️')
    .setStyle(ButtonStyle.Primary)
    .setDisabled(current >= page.pageCount - 1);

  return [
    new ActionRowBuilder<MessageActionRowComponentBuilder>().addComponents(filter),
    new ActionRowBuilder<MessageActionRowComponentBuilder>().addComponents(prev, next)
  ];
};

export const buildLeaderboardView = (page: LeaderboardPage, scopeName: string): LeaderboardView => ({
  embeds: [buildLeaderboardEmbed(page, scopeName)],
  components: buildLeaderboardRows(page)
});

export const buildPlayerStatsEmbed = (displayName: string, records: PlayerRecord[]) => {
  const embed = brandEmbed().setColor(Colors.BRAND_SKY).setTitle(`📊 ${displayName} 님의 전적`);
  if (!records.length) return embed.setDescription('아직 기록이 없어.');

  const lines = records.map((r) => `${GAME_LABELS[r.kind]} · ${recordText(r.wins, r.losses)}`);
  if (records.length > 1) {
    const wins = records.reduce((sum, r) => sum + r.wins, 0);
    const losses = records.reduce((sum, r) => sum + r.losses, 0);
    lines.push('', `**합계** · ${recordText(wins, losses)}`);
  }
  return embed.setDescription(lines.join('\n'));
};
