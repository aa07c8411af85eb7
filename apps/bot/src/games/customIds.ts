import { isGameKind } from '@duelhall/core';

import type { LeaderboardFilter, LeaderboardScope } from '../services/leaderboard.js';

/**
 * 게임 버튼/셀렉트 메뉴의 customId. 모두 `game:` 으로 시작하고 ':' 로 구분한다.
 * Discord 제한(100자) 안에 들어가도록 세션/요청 id 만 싣는다.
 */
export type GameCustomId =
  | { type: 'challenge'; challengeId: string; decision: 'accept' | 'decline' }
  | { type: 'confirm'; confirmationId: string; decision: 'accept' | 'decline' }
  | { type: 'flip'; sessionId: string; row: number; col: number }
  | { type: 'place'; sessionId: string; row: number; col: number }
  | { type: 'choose'; sessionId: string; choice: string }
  | { type: 'action'; sessionId: string }
  | { type: 'end'; sessionId: string }
  | { type: 'rematch'; sessionId: string }
  | { type: 'leaderboard'; scope: LeaderboardScope; game: LeaderboardFilter; page: number }
  | { type: 'leaderboard_game'; scope: LeaderboardScope };

export const GAME_PREFIX = 'game';

export function encodeCustomId(id: GameCustomId): string {
  switch (id.type) {
    case 'challenge':
      return [GAME_PREFIX, id.type, id.challengeId, id.decision].join(':');
    case 'confirm':
      return [GAME_PREFIX, id.type, id.confirmationId, id.decision].join(':');
    case 'flip':
    case 'place':
      return [GAME_PREFIX, id.type, id.sessionId, id.row, id.col].join(':');
    case 'choose':
      return [GAME_PREFIX, id.type, id.sessionId, id.choice].join(':');
    case 'action':
    case 'end':
    case 'rematch':
      return [GAME_PREFIX, id.type, id.sessionId].join(':');
    case 'leaderboard':
      return [GAME_PREFIX, id.type, id.scope, id.game, id.page].join(':');
    case 'leaderboard_game':
      return [GAME_PREFIX, id.type, id.scope].join(':');
  }
}

const toDecision = (value: string | undefined) => (value === 'accept' || value === 'decline' ? value : null);

const toScope = (value: string): LeaderboardScope | null => (value === 'server' || value === 'global' ? value : null);

const toFilter = (value: string | undefined): LeaderboardFilter | null => {
  if (value === 'all') return value;
  return value !== undefined && isGameKind(value) ? value : null;
};

const toPage = (value: string | undefined) => {
  if (value === undefined || !/^\d{1,4}$/.test(value)) return null;
  return Number(value);
};

const toIndex = (value: string | undefined) => {
  if (value === undefined || !/^\d$/.test(value)) return null;
  return Number(value);
};

export function parseCustomId(customId: string): GameCustomId | null {
  const [prefix, type, id, a, b] = customId.split(':');
  if (prefix !== GAME_PREFIX || !id) return null;

  switch (type) {
    case 'challenge':
    case 'confirm': {
      const decision = toDecision(a);
      if (!decision) return null;
      return type === 'challenge'
        ? { type, challengeId: id, decision }
        : { type, confirmationId: id, decision };
    }
    case 'flip':
    case 'place': {
      const row = toIndex(a);
      const col = toIndex(b);
      if (row === null || col === null) return null;
      return { type, sessionId: id, row, col };
    }
    case 'choose':
      return a ? { type, sessionId: id, choice: a } : null;
    case 'action':
    case 'end':
    case 'rematch':
      return { type, sessionId: id };
    case 'leaderboard': {
      const scope = toScope(id);
      const game = toFilter(a);
      const page = toPage(b);
      if (!scope || !game || page === null) return null;
      return { type, scope, game, page };
    }
    case 'leaderboard_game': {
      const scope = toScope(id);
      return scope ? { type, scope } : null;
    }
    default:
      return null;
  }
}
