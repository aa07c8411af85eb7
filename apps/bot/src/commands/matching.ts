import { SlashCommandBuilder } from 'discord.js';
import type { AutocompleteInteraction, ChatInputCommandInteraction } from 'discord.js';
import { categoryNames, type GridOption } from '@duelhall/core';

import { sendChallenge } from './challenge.js';
import type { SlashCommand } from './types.js';

const toGrid = (value: string | null): GridOption | null => (value === '5x5' || value === '4x5' ? value : null);

export const matchingCommand: SlashCommand = {
  name: 'matching',
  json: new SlashCommandBuilder()
    .setName('matching')
    .setNameLocalizations({ ko: '짝맞추기' })
    .setDescription('상대에게 이모지 짝맞추기 게임을 신청합니다.')
    .setDMPermission(false)
    .addUserOption((o) => o.setName('user').setNameLocalizations({ ko: '상대' }).setDescription('도전할 상대').setRequired(true))
    .addStringOption((o) =>
      o
        .setName('category')
        .setNameLocalizations({ ko: '카테고리' })
        .setDescription('이모지 카테고리 (비우면 무작위)')
        .setAutocomplete(true)
    )
    .addStringOption((o) =>
      o
        .setName('grid_size')
        .setNameLocalizations({ ko: '크기' })
        .setDescription('보드 크기 (기본 5x5)')
        .addChoices({ name: '5x5 (기본)', value: '5x5' }, { name: '4x5 (모바일)', value: '4x5' })
    )
    .toJSON(),
  async execute(interaction: ChatInputCommandInteraction) {
    await sendChallenge(interaction, {
      kind: 'memory',
      category: interaction.options.getString('category'),
      grid: toGrid(interaction.options.getString('grid_size'))
    });
  },
  async autocomplete(interaction: AutocompleteInteraction) {
    const current = interaction.options.getFocused().toLowerCase();
    const choices = categoryNames()
      .filter((name) => name.includes(current))
      .slice(0, 25)
      .map((name) => ({ name, value: name }));
    await interaction.respond(choices);
  }
};
