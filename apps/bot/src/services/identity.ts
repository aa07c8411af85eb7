import { DiscordAPIError, RESTJSONErrorCodes } from 'discord.js';
import type { Client } from 'discord.js';
import type { IdentityResolver, ResolvedUser } from '@duelhall/core';

const NOT_FOUND = new Set<number>([RESTJSONErrorCodes.UnknownUser, RESTJSONErrorCodes.UnknownMember]);

/** 서버 안에서는 멤버 닉네임을, 그 밖에서는 전역 표시 이름을 쓴다. */
export class DiscordIdentityResolver implements IdentityResolver {
  constructor(private readonly client: Client) {}

  async resolve(userId: string, guildId: string | null): Promise<ResolvedUser | null> {
    try {
      if (guildId) {
        const guild = await this.client.guilds.fetch(guildId);
        const member = await guild.members.fetch(userId);
        return { id: member.id, displayName: member.displayName, bot: member.user.bot };
      }
      const user = await this.client.users.fetch(userId);
      return { id: user.id, displayName: user.displayName, bot: user.bot };
    } catch (error) {
      if (error instanceof DiscordAPIError && typeof error.code === 'number' && NOT_FOUND.has(error.code)) {
        return null;
      }
      throw error;
    }
  }
}
