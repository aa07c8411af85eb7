import { SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';

import { sendChallenge } from './challenge.js';
import type { SlashCommand } from './types.js';

export const rpsCommand: SlashCommand = {
  name: 'rps',
  json: new SlashCommandBuilder()
    .setName('rps')
    .setNameLocalizations({ ko: '가위바위보' })
    .setDescription('상대에게 가위바위보를 신청합니다.')
    .setDMPermission(false)
    .addUserOption((o) => o.setName('user').setNameLocalizations({ ko: '상대' }).setDescription('도전할 상대').setRequired(true))
    .toJSON(),
  async execute(interaction: ChatInputCommandInteraction) {
    await sendChallenge(interaction, { kind: 'rps' });
  }
};

// 이긴 사람이 미리 고른 액션을 상대에게 한다
export const rpsActionCommand: SlashCommand = {
  name: 'rps_action',
  json: new SlashCommandBuilder()
    .setName('rps_action')
    .setNameLocalizations({ ko: '액션가위바위보' })
    .setDescription('이긴 사람이 액션을 하는 가위바위보를 신청합니다.')
    .setDMPermission(false)
    .addUserOption((o) => o.setName('user').setNameLocalizations({ ko: '상대' }).setDescription('도전할 상대').setRequired(true))
    .toJSON(),
  async execute(interaction: ChatInputCommandInteraction) {
    await sendChallenge(interaction, { kind: 'rps_action' });
  }
};
