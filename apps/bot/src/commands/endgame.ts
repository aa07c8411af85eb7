import { SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';

import { getBotContext } from '../context.js';
import { errorEmbed, infoEmbed } from '../lib/embed.js';
import { rejectionText } from '../lib/messages.js';
import { GUILD_ONLY_TEXT } from './challenge.js';
import type { SlashCommand } from './types.js';

export const endgameCommand: SlashCommand = {
  name: 'endgame',
  json: new SlashCommandBuilder()
    .setName('endgame')
    .setNameLocalizations({ ko: '게임종료' })
    .setDescription('이 채널에서 진행 중인 게임의 종료를 상대에게 요청합니다.')
    .setDMPermission(false)
    .toJSON(),
  async execute(interaction: ChatInputCommandInteraction) {
    if (!interaction.inGuild()) {
      await interaction.reply({ content: GUILD_ONLY_TEXT, ephemeral: true });
      return;
    }

    const { games } = getBotContext();
    const result = await games.requestEnd(interaction.user.id, interaction.channelId);
    if (!result.ok) {
      await interaction.reply({ embeds: [errorEmbed('종료 요청 실패', rejectionText(result.error.code))], ephemeral: true });
      return;
    }
    await interaction.reply({ embeds: [infoEmbed('종료 요청을 보냈어요', '상대가 동의하면 게임이 끝나요.')], ephemeral: true });
  }
};
