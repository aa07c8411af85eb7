import type { ChatInputCommandInteraction } from 'discord.js';
import type { ChallengeRequest } from '@duelhall/core';

import { getBotContext } from '../context.js';
import { errorEmbed, mention, successEmbed } from '../lib/embed.js';
import { GAME_LABELS, rejectionText } from '../lib/messages.js';

export const GUILD_ONLY_TEXT = '서버 채널에서만 사용할 수 있어요.';

/** 게임 명령어 공통: 상대 옵션을 읽어 도전장을 채널에 올린다. */
export async function sendChallenge(interaction: ChatInputCommandInteraction, request: ChallengeRequest) {
  if (!interaction.inGuild()) {
    await interaction.reply({ content: GUILD_ONLY_TEXT, ephemeral: true });
    return;
  }

  const target = interaction.options.getUser('user', true);
  await interaction.deferReply({ ephemeral: true });

  const { games } = getBotContext();
  const result = await games.challenge(
    interaction.user.id,
    target.id,
    { channelId: interaction.channelId, guildId: interaction.guildId },
    request
  );

  if (!result.ok) {
    await interaction.editReply({ embeds: [errorEmbed('도전할 수 없어요', rejectionText(result.error.code))] });
    return;
  }

  await interaction.editReply({
    embeds: [successEmbed('도전장을 보냈어요', `${mention(target.id)} 님에게 ${GAME_LABELS[request.kind]} 도전!`)]
  });
}
