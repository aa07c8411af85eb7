import { SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';

import { sendChallenge } from './challenge.js';
import type { SlashCommand } from './types.js';

export const tictactoeCommand: SlashCommand = {
  name: 'tictactoe',
  json: new SlashCommandBuilder()
    .setName('tictactoe')
    .setNameLocalizations({ ko: '틱택토' })
    .setDescription('상대에게 틱택토 게임을 신청합니다.')
    .setDMPermission(false)
    .addUserOption((o) => o.setName('user').setNameLocalizations({ ko: '상대' }).setDescription('도전할 상대').setRequired(true))
    .toJSON(),
  async execute(interaction: ChatInputCommandInteraction) {
    await sendChallenge(interaction, { kind: 'tictactoe' });
  }
};
