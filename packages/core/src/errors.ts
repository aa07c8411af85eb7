export type RejectionCode =
  | 'not_your_turn'
  | 'invalid_position'
  | 'already_resolved'
  | 'already_active'
  | 'channel_unreachable'
  | 'unknown_engine_state'
  | 'unknown_user'
  | 'self_challenge'
  | 'bot_challenge'
  | 'not_a_player'
  | 'conflict'
  | 'no_active_game'
  | 'invalid_move'
  | 'game_over'
  | 'confirmation_pending'
  | 'invalid_category';

export type Rejection = {
  code: RejectionCode;
  message?: string;
};

/**
 * 렌더러가 채널(또는 메시지)에 더 이상 접근할 수 없을 때 던진다.
 * 세션 정리 경로에서는 치명적이지 않은 에러로 취급한다.
 */
export class ChannelUnreachableError extends Error {
  readonly channelId: string;

  constructor(channelId: string, options?: { cause?: unknown }) {
    super(`Channel ${channelId} is unreachable`, options);
    this.name = 'ChannelUnreachableError';
    this.channelId = channelId;
  }
}

export function isChannelUnreachable(error: unknown): error is ChannelUnreachableError {
  return error instanceof ChannelUnreachableError;
}
