import { DiscordAPIError, RESTJSONErrorCodes } from 'discord.js';
import type { Client, GuildTextBasedChannel, Message } from 'discord.js';
import {
  ChannelUnreachableError,
  type BoardEvent,
  type Challenge,
  type ChallengeClosedReason,
  type Confirmation,
  type ConfirmationClosedReason,
  type GameEnd,
  type GameRenderer,
  type MessageRef,
  type SessionSnapshot
} from '@duelhall/core';

import type { GameView } from './boardViews.js';
import {
  boardView,
  challengeClosedView,
  challengeView,
  confirmationClosedView,
  confirmationView,
  gameOverView
} from './boardViews.js';

// 채널/메시지가 사라졌거나 권한이 없어진 경우
const UNREACHABLE_CODES = new Set<number>([
  RESTJSONErrorCodes.UnknownChannel,
  RESTJSONErrorCodes.UnknownMessage,
  RESTJSONErrorCodes.MissingAccess,
  RESTJSONErrorCodes.MissingPermissions
]);

export class DiscordRenderer implements GameRenderer {
  constructor(private readonly client: Client) {}

  async renderChallenge(challenge: Challenge): Promise<MessageRef> {
    return this.send(challenge.channelId, challengeView(challenge));
  }

  async renderChallengeClosed(challenge: Challenge, reason: ChallengeClosedReason): Promise<void> {
    if (!challenge.messageRef) return;
    await this.edit(challenge.messageRef, challengeClosedView(challenge, reason));
  }

  async renderConfirmation(confirmation: Confirmation): Promise<MessageRef> {
    return this.send(confirmation.channelId, confirmationView(confirmation));
  }

  async renderConfirmationClosed(confirmation: Confirmation, reason: ConfirmationClosedReason): Promise<void> {
    if (!confirmation.messageRef) return;
    await this.edit(confirmation.messageRef, confirmationClosedView(confirmation, reason));
  }

  async renderBoard(session: SessionSnapshot, event: BoardEvent): Promise<MessageRef> {
    const view = boardView(session, event);
    if (!session.boardRef) return this.send(session.channelId, view);
    await this.edit(session.boardRef, view);
    return session.boardRef;
  }

  async renderGameOver(session: SessionSnapshot, end: GameEnd): Promise<void> {
    const view = gameOverView(session, end);
    if (session.boardRef) {
      await this.edit(session.boardRef, view);
    } else {
      await this.send(session.channelId, view);
    }
  }

  async deleteMessage(ref: MessageRef): Promise<void> {
    const message = await this.fetchMessage(ref);
    await this.guard(ref.channelId, () => message.delete());
  }

  /* ──────────── Helpers ──────────── */

  private async send(channelId: string, view: GameView): Promise<MessageRef> {
    const channel = await this.fetchChannel(channelId);
    const message = await this.guard(channelId, () =>
      channel.send({ content: view.content, embeds: view.embeds, components: view.components })
    );
    return { channelId, messageId: message.id };
  }

  private async edit(ref: MessageRef, view: GameView): Promise<void> {
    const message = await this.fetchMessage(ref);
    await this.guard(ref.channelId, () =>
      message.edit({ content: view.content ?? null, embeds: view.embeds, components: view.components })
    );
  }

  // 게임은 서버 채널에서만 열린다
  private async fetchChannel(channelId: string): Promise<GuildTextBasedChannel> {
    const channel = await this.guard(channelId, () => this.client.channels.fetch(channelId));
    if (!channel || !channel.isTextBased() || channel.isDMBased()) throw new ChannelUnreachableError(channelId);
    return channel;
  }

  private async fetchMessage(ref: MessageRef): Promise<Message> {
    const channel = await this.fetchChannel(ref.channelId);
    return this.guard(ref.channelId, () => channel.messages.fetch(ref.messageId));
  }

  /** Discord 접근 에러를 ChannelUnreachableError 로 바꾼다. 나머지는 그대로 던진다. */
  private async guard<T>(channelId: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (error instanceof DiscordAPIError && typeof error.code === 'number' && UNREACHABLE_CODES.has(error.code)) {
        throw new ChannelUnreachableError(channelId, { cause: error });
      }
      throw error;
    }
  }
}
