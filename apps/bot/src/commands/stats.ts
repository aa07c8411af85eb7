import { SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';

import { getBotContext } from '../context.js';
import { buildPlayerStatsEmbed } from '../lib/leaderboardUi.js';
import { fetchPlayerRecords } from '../services/leaderboard.js';
import type { SlashCommand } from './types.js';

export const statsCommand: SlashCommand = {
  name: 'stats',
  json: new SlashCommandBuilder()
    .setName('stats')
    .setNameLocalizations({ ko: '전적' })
    .setDescription('이 서버에서의 게임 전적을 보여줍니다.')
    .setDMPermission(false)
    .addUserOption((o) => o.setName('user').setNameLocalizations({ ko: '유저' }).setDescription('볼 유저 (기본: 나)'))
    .toJSON(),
  async execute(interaction: ChatInputCommandInteraction) {
    const { supabase } = getBotContext();
    const picked = interaction.options.getUser('user');
    const user = picked ?? interaction.user;
    const member = picked ? interaction.options.getMember('user') : interaction.member;
    const displayName =
      member && 'displayName' in member ? member.displayName : user.globalName ?? user.username;

    const records = await fetchPlayerRecords(supabase, user.id, interaction.guildId);
    const embed = buildPlayerStatsEmbed(displayName, records).setThumbnail(user.displayAvatarURL());
    await interaction.reply({ embeds: [embed] });
  }
};
