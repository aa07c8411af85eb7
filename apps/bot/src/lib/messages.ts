import type { GameKind, RejectionCode } from '@duelhall/core';

export const GAME_LABELS: Record<GameKind, string> = {
  memory: '🧠 짝맞추기',
  tictactoe: '⭕ 틱택토',
  rps: '✊ 가위바위보',
  rps_action: '🤜 액션 가위바위보'
};

const REJECTION_TEXT: Record<RejectionCode, string> = {
  not_your_turn: '지금은 네 차례가 아니야.',
  invalid_position: '그 칸은 고를 수 없어.',
  already_resolved: '이미 처리된 요청이야.',
  already_active: '이 채널에서는 이미 게임이 진행 중이야.',
  channel_unreachable: '이 채널에 메시지를 보낼 수 없어. 봇 권한을 확인해 줘.',
  unknown_engine_state: '지금 게임에서는 할 수 없는 동작이야.',
  unknown_user: '상대를 찾을 수 없어.',
  self_challenge: '자기 자신에게는 도전할 수 없어!',
  bot_challenge: '봇에게는 도전할 수 없어!',
  not_a_player: '이 게임의 참가자가 아니야.',
  conflict: '그 상대에게는 이미 대기 중인 도전이 있어.',
  no_active_game: '이 채널에 진행 중인 게임이 없어.',
  invalid_move: '지금은 그 선택을 할 수 없어.',
  game_over: '이미 끝난 게임이야.',
  confirmation_pending: '이미 종료 요청이 대기 중이야.',
  invalid_category: '없는 이모지 카테고리야.'
};

export function rejectionText(code: RejectionCode): string {
  return REJECTION_TEXT[code];
}
