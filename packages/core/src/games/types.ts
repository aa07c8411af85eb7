import type { RejectionCode } from '../errors.js';

export type Player = {
  readonly id: string;
  readonly displayName: string;
};

export type GameKind = 'memory' | 'tictactoe' | 'rps' | 'rps_action';

export const GAME_KINDS: readonly GameKind[] = ['memory', 'tictactoe', 'rps', 'rps_action'];

export function isGameKind(value: string): value is GameKind {
  return GAME_KINDS.some((kind) => kind === value);
}

/** [0, 1) 범위의 난수를 돌려주는 함수. 테스트에서는 고정 시퀀스를 주입한다. */
export type Random = () => number;

export type Rejected = {
  kind: 'rejected';
  reason: RejectionCode;
};

export const rejected = (reason: RejectionCode): Rejected => ({ kind: 'rejected', reason });

export function shuffle<T>(items: readonly T[], random: Random): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const a = out[i];
    const b = out[j];
    if (a === undefined || b === undefined) continue;
    out[i] = b;
    out[j] = a;
  }
  return out;
}

export function pickOne<T>(items: readonly T[], random: Random): T {
  const item = items[Math.floor(random() * items.length)];
  if (item === undefined) throw new Error('Cannot pick from an empty list');
  return item;
}

export function sample<T>(items: readonly T[], count: number, random: Random): T[] {
  return shuffle(items, random).slice(0, count);
}

export type PlayerPair = readonly [Player, Player];

export function otherPlayer(players: PlayerPair, playerId: string): Player {
  return players[0].id === playerId ? players[1] : players[0];
}
