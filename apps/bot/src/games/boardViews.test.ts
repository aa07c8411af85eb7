import { describe, it, expect } from 'vitest';
import { TicTacToeGame, type MemoryMatchSnapshot, type SessionSnapshot } from '@duelhall/core';

import { boardView, gameOverView } from './boardViews.js';

const xena = { id: 'x', displayName: 'Xena' };
const yuri = { id: 'y', displayName: 'Yuri' };

function snapshotOf(game: SessionSnapshot['game']): SessionSnapshot {
  return {
    id: 's-1',
    kind: game.kind,
    channelId: 'c1',
    guildId: 'g1',
    players: [xena, yuri],
    params: { kind: 'tictactoe' },
    game,
    boardRef: null,
    createdAt: 0,
    lastActivityAt: 0
  };
}

function buttonsOf(view: ReturnType<typeof boardView>) {
  return view.components.map((r) =>
    r.toJSON().components.map((c) => ('label' in c ? { label: c.label, disabled: c.disabled ?? false } : null))
  );
}

const card = (symbol: string, row: number, col: number, state: Partial<{ matched: boolean; revealed: boolean }> = {}) => ({
  symbol,
  row,
  col,
  matched: state.matched ?? false,
  revealed: state.revealed ?? false,
  joker: false
});

describe('boardView', () => {
  it('hides cards that are neither matched nor revealed', () => {
    const game: MemoryMatchSnapshot = {
      kind: 'memory',
      category: 'food',
      rows: 1,
      cols: 3,
      board: [[card('🍎', 0, 0, { matched: true }), card('🍕', 0, 1, { revealed: true }), card('🍩', 0, 2, {})]],
      currentPlayer: xena,
      scores: { x: 1, y: 0 },
      pairsToFind: 2,
      pairsFound: 1,
      pendingPick: { row: 0, col: 1 },
      gameOver: false,
      winner: null
    };

    const view = boardView(snapshotOf(game), { kind: 'first_pick', card: { row: 0, col: 1, symbol: '🍕' } });

    expect(buttonsOf(view)).toEqual([
      [
        { label: '🍎', disabled: true },
        { label: '🍕', disabled: true },
        { label: '❔', disabled: false }
      ]
    ]);
    expect(view.embeds[0]?.data.description).toBe('🍕 카드를 뒤집었어. 한 장 더!\n\n<@x> **1**  vs  <@y> **0**');
  });

  it('keeps both mismatched cards face up until they are hidden again', () => {
    const game: MemoryMatchSnapshot = {
      kind: 'memory',
      category: 'food',
      rows: 1,
      cols: 3,
      board: [[card('🍔', 0, 0), card('🌮', 0, 1), card('🍩', 0, 2)]],
      currentPlayer: yuri,
      scores: { x: 0, y: 0 },
      pairsToFind: 1,
      pairsFound: 0,
      pendingPick: null,
      gameOver: false,
      winner: null
    };

    const missed = boardView(snapshotOf(game), {
      kind: 'no_match',
      cards: [
        { row: 0, col: 0, symbol: '🍔' },
        { row: 0, col: 1, symbol: '🌮' }
      ],
      nextPlayer: yuri
    });
    const hidden = boardView(snapshotOf(game), { kind: 'cards_hidden' });

    expect(buttonsOf(missed)).toEqual([
      [
        { label: '🍔', disabled: true },
        { label: '🌮', disabled: true },
        { label: '❔', disabled: false }
      ]
    ]);
    expect(missed.embeds[0]?.data.description).toBe('꽝! 🍔 ≠ 🌮 · 이제 <@y> 님 차례.\n\n<@x> **0**  vs  <@y> **0**');
    expect(buttonsOf(hidden)).toEqual([
      [
        { label: '❔', disabled: false },
        { label: '❔', disabled: false },
        { label: '❔', disabled: false }
      ]
    ]);
    expect(hidden.embeds[0]?.data.description).toBe('<@y> 님 차례.\n\n<@x> **0**  vs  <@y> **0**');
  });

  it('adds an end-request row under an open tic-tac-toe board', () => {
    const engine = new TicTacToeGame({ players: [xena, yuri], random: () => 0 });
    engine.place(xena, 1, 1);

    const view = boardView(snapshotOf(engine.snapshot()), {
      kind: 'placed',
      mark: 'X',
      row: 1,
      col: 1,
      nextPlayer: yuri
    });

    expect(view.components).toHaveLength(4);
    expect(buttonsOf(view)[1]?.[1]).toEqual({ label: '❌', disabled: true });
    expect(buttonsOf(view)[3]).toEqual([{ label: '종료 요청', disabled: false }]);
  });
});

describe('gameOverView', () => {
  it('offers a rematch after a finished rps round', () => {
    const view = gameOverView(
      snapshotOf({
        kind: 'rps',
        phase: 'resolved',
        chosen: { x: true, y: true },
        actions: { x: null, y: null },
        result: { choices: { x: 'rock', y: 'rock' }, winner: null, payload: null },
        gameOver: true,
        winner: null
      }),
      {
        reason: 'completed',
        winner: null,
        endedBy: null,
        detail: { kind: 'resolved', choices: { x: 'rock', y: 'rock' }, winner: null, payload: null }
      }
    );

    expect(view.embeds[0]?.data.description).toBe('🤝 무승부!\n<@x> 🪨 바위\n<@y> 🪨 바위');
    expect(buttonsOf(view)).toEqual([[{ label: '🔁 다시 하기', disabled: false }]]);
  });

  it('drops the controls when a game ends by agreement', () => {
    const engine = new TicTacToeGame({ players: [xena, yuri], random: () => 0 });

    const view = gameOverView(snapshotOf(engine.snapshot()), {
      reason: 'agreed',
      winner: null,
      endedBy: xena,
      detail: null
    });

    expect(view.embeds[0]?.data.title).toBe('⭕ 틱택토 종료');
    expect(buttonsOf(view).flat().every((b) => b?.disabled)).toBe(true);
  });
});
