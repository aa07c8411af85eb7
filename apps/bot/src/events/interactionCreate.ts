import type { ButtonInteraction, Client, Interaction, StringSelectMenuInteraction } from 'discord.js';
import { isRpsChoice, RPS_EMOJI, type Rejection } from '@duelhall/core';

import { commands } from '../commands/index.js';
import { updateLeaderboard } from '../commands/leaderboard.js';
import type { SlashCommand } from '../commands/types.js';
import { getBotContext } from '../context.js';
import { handleError } from '../errorHandler.js';
import { parseCustomId, type GameCustomId } from '../games/customIds.js';
import { rejectionText } from '../lib/messages.js';

const commandMap: Map<string, SlashCommand> = new Map(commands.map((c) => [c.name, c] as const));

type ComponentInteraction = ButtonInteraction | StringSelectMenuInteraction;

// 보드/요청 메시지는 렌더러가 직접 수정하므로 여기서는 응답만 미뤄 둔다.
async function rejectQuietly(interaction: ComponentInteraction, error: Rejection) {
  await interaction.followUp({ content: rejectionText(error.code), ephemeral: true });
}

type SessionCustomId = Exclude<GameCustomId, { type: 'leaderboard' | 'leaderboard_game' }>;

async function handleGameComponent(interaction: ComponentInteraction, id: SessionCustomId) {
  const { games } = getBotContext();
  const userId = interaction.user.id;
  const { channelId } = interaction;

  await interaction.deferUpdate();

  // 이전 판의 버튼
  if ('sessionId' in id && id.type !== 'rematch' && games.sessionIn(channelId)?.id !== id.sessionId) {
    await rejectQuietly(interaction, { code: 'game_over' });
    return;
  }

  switch (id.type) {
    case 'challenge': {
      const result = await games.resolveChallenge(userId, channelId, id.decision, id.challengeId);
      if (!result.ok) await rejectQuietly(interaction, result.error);
      return;
    }
    case 'confirm': {
      const result = await games.resolveConfirmation(id.confirmationId, userId, id.decision);
      if (!result.ok) await rejectQuietly(interaction, result.error);
      return;
    }
    case 'flip':
    case 'place': {
      const result = await games.move(userId, channelId, { type: id.type, row: id.row, col: id.col });
      if (!result.ok) await rejectQuietly(interaction, result.error);
      return;
    }
    case 'choose': {
      const result = await games.move(userId, channelId, { type: 'choose', choice: id.choice });
      if (!result.ok) {
        await rejectQuietly(interaction, result.error);
      } else if (!result.value.end && isRpsChoice(id.choice)) {
        await interaction.followUp({ content: `${RPS_EMOJI[id.choice]} 냈어! 상대를 기다리는 중…`, ephemeral: true });
      }
      return;
    }
    case 'action': {
      const action = interaction.isStringSelectMenu() ? interaction.values[0] : undefined;
      if (!action) return;
      const result = await games.move(userId, channelId, { type: 'action', action });
      if (!result.ok) {
        await rejectQuietly(interaction, result.error);
      } else {
        await interaction.followUp({ content: `이기면 **${action}**!`, ephemeral: true });
      }
      return;
    }
    case 'end': {
      const result = await games.requestEnd(userId, channelId);
      if (!result.ok) await rejectQuietly(interaction, result.error);
      return;
    }
    case 'rematch': {
      const result = await games.rematch(userId, channelId);
      if (!result.ok) await rejectQuietly(interaction, result.error);
      return;
    }
  }
}

export function registerInteractionCreate(client: Client) {
  client.on('interactionCreate', async (interaction: Interaction) => {
    if (interaction.isChatInputCommand()) {
      const cmd = commandMap.get(interaction.commandName);
      if (!cmd) return;

      try {
        await cmd.execute(interaction);
      } catch (e) {
        await handleError(e, interaction, interaction.commandName);
      }
    } else if (interaction.isAutocomplete()) {
      const cmd = commandMap.get(interaction.commandName);
      if (!cmd?.autocomplete) return;

      try {
        await cmd.autocomplete(interaction);
      } catch (e) {
        console.error('[interactionCreate] autocomplete failed:', e);
      }
    } else if (interaction.isButton() || interaction.isStringSelectMenu()) {
      const id = parseCustomId(interaction.customId);
      if (!id) return;

      try {
        if (id.type === 'leaderboard' || id.type === 'leaderboard_game') {
          await updateLeaderboard(interaction, {
            scope: id.scope,
            game: id.type === 'leaderboard' ? id.game : 'all',
            page: id.type === 'leaderboard' ? id.page : 0
          });
        } else {
          await handleGameComponent(interaction, id);
        }
      } catch (e) {
        await handleError(e, interaction, `game:${id.type}`);
      }
    }
  });
}
