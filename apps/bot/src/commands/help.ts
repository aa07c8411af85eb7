import { SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import { categoryNames } from '@duelhall/core';

import { getBotContext } from '../context.js';
import { brandEmbed } from '../lib/embed.js';
import type { SlashCommand } from './types.js';

export const helpCommand: SlashCommand = {
  name: 'help',
  json: new SlashCommandBuilder()
    .setName('help')
    .setNameLocalizations({ ko: '도움말' })
    .setDescription('사용 가능한 게임과 명령어를 보여줍니다.')
    .toJSON(),
  async execute(interaction: ChatInputCommandInteraction) {
    const { games } = getBotContext();
    const challengeSeconds = Math.round(games.config.challengeTimeoutMs / 1000);
    const afkMinutes = Math.round(games.config.afkTimeoutMs / 60_000);

    const embed = brandEmbed()
      .setTitle('🎮 미니게임 도움말')
      .setDescription('상대를 지정해 도전장을 보내고, 상대가 수락하면 게임이 시작돼!')
      .addFields(
        {
          name: '/짝맞추기 [상대] [카테고리] [크기]',
          value: '같은 이모지 두 장을 찾아. 짝을 맞추면 한 번 더! 5x5 는 7쌍, 4x5 는 6쌍을 먼저 찾으면 승리. 🃏 조커는 혼자서 짝이 돼.',
          inline: false
        },
        { name: '/틱택토 [상대]', value: '가로·세로·대각선 한 줄을 먼저 채우면 승리.', inline: false },
        { name: '/가위바위보 [상대]', value: '둘 다 손을 내면 결과가 공개돼. 끝나고 바로 다시 하기도 가능!', inline: false },
        { name: '/액션가위바위보 [상대]', value: '먼저 액션을 고르고 가위바위보! 이긴 사람이 자기 액션을 상대에게 해.', inline: false },
        { name: '/게임종료', value: '상대가 동의하면 진행 중인 게임을 끝내.', inline: false },
        { name: '/리더보드 [범위] [게임]', value: '서버 또는 전체 순위를 10명씩 보여줘. 버튼으로 페이지를 넘길 수 있어.', inline: false },
        { name: '/전적 [유저]', value: '게임별 승패와 승률을 보여줘.', inline: false },
        {
          name: '규칙',
          value: [
            '채널당 게임은 하나만 진행돼.',
            `도전장은 ${challengeSeconds}초 안에 응답해야 해.`,
            `${afkMinutes}분 동안 아무도 움직이지 않으면 게임이 자동으로 끝나.`
          ].join('\n'),
          inline: false
        },
        { name: '카테고리', value: categoryNames().join(', '), inline: false }
      )
      .setFooter({ text: 'Duel Hall', iconURL: interaction.client.user.displayAvatarURL() });

    await interaction.reply({ embeds: [embed] });
  }
};
