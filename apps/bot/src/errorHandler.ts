import type { Interaction } from 'discord.js';
import { randomUUID } from 'crypto';

import { getBotContext } from './context.js';
import { errorEmbed } from './lib/embed.js';

export async function handleError(error: unknown, context: Interaction, commandName?: string) {
  const ctx = getBotContext();

  const errorMessage = error instanceof Error ? error.message : String(error);
  const stackTrace = error instanceof Error ? error.stack : 'No stack trace';
  const command = commandName || 'interaction';

  let errorId: string = randomUUID();
  try {
    const { data, error: insertError } = await ctx.supabase
      .from('error_logs')
      .insert({
        discord_user_id: context.user.id,
        command_name: command,
        error_message: errorMessage,
        stack_trace: stackTrace || '',
        metadata: {
          channel_id: context.channelId ?? null,
          guild_id: context.guildId ?? null
        }
      })
      .select('error_id')
      .single();

    if (insertError) throw insertError;
    if (data?.error_id) errorId = data.error_id;
  } catch (e) {
    console.error('[ErrorHandler] Failed to log to DB:', e);
  }

  console.error('[ErrorHandler]', {
    errorId,
    command,
    userId: context.user.id,
    channelId: context.channelId ?? null,
    guildId: context.guildId ?? null,
    errorMessage,
    stackTrace
  });

  const userEmbed = errorEmbed('에러가 발생했습니다', '처리 중 문제가 발생했습니다. 관리자에게 문의해 주세요.').addFields({
    name: '에러 고유 ID',
    value: `\`${errorId}\``
  });

  try {
    if (!context.isRepliable()) return;
    if (context.replied || context.deferred) {
      await context.followUp({ embeds: [userEmbed], ephemeral: true });
    } else {
      await context.reply({ embeds: [userEmbed], ephemeral: true });
    }
  } catch (e) {
    console.error('[ErrorHandler] Failed to reply to user:', e);
  }
}
