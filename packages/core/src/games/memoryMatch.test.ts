import { describe, it, expect } from 'vitest';

import { getCategory } from './emojiCategories.js';
import { JOKER_SYMBOL, MemoryMatchGame, type Card } from './memoryMatch.js';
import type { PlayerPair } from './types.js';

const alice = { id: 'a', displayName: 'Alice' };
const bob = { id: 'b', displayName: 'Bob' };
const players: PlayerPair = [alice, bob];
const first = () => 0;

function fixed(rows: number, cols: number, layout: string[]) {
  return new MemoryMatchGame({ players, category: 'test', symbols: [], rows, cols, random: first, layout });
}

describe('MemoryMatchGame', () => {
  it('keeps the turn and scores on an equal pair', () => {
    const game = fixed(2, 2, ['🍎', '🍕', '🍎', '🍕']);
    expect(game.currentPlayer).toBe(alice);

    const outcome = game.selectPair(alice, { row: 0, col: 0 }, { row: 1, col: 0 });

    expect(outcome.kind).toBe('match');
    expect(game.scoreOf('a')).toBe(1);
    expect(game.currentPlayer).toBe(alice);
    expect(game.cardAt(0, 0)?.matched).toBe(true);
    expect(game.cardAt(1, 0)?.matched).toBe(true);
    expect(game.pairsFound).toBe(1);
  });

  it('hides both cards and passes the turn on a mismatch', () => {
    const game = fixed(2, 2, ['🍎', '🍕', '🍎', '🍕']);

    const outcome = game.selectPair(alice, { row: 0, col: 0 }, { row: 0, col: 1 });

    expect(outcome).toEqual({
      kind: 'no_match',
      cards: [
        { row: 0, col: 0, symbol: '🍎' },
        { row: 0, col: 1, symbol: '🍕' }
      ],
      nextPlayer: bob
    });
    for (const card of [game.cardAt(0, 0), game.cardAt(0, 1)]) {
      expect(card?.matched).toBe(false);
      expect(card?.revealed).toBe(false);
    }
    expect(game.currentPlayer).toBe(bob);
    expect(game.scoreOf('a')).toBe(0);
  });

  it('matches only the joker and keeps the turn', () => {
    const game = fixed(1, 3, ['🍎', JOKER_SYMBOL, '🍎']);
    expect(game.includesJoker).toBe(true);
    expect(game.pairsToFind).toBe(1);

    const outcome = game.selectPair(alice, { row: 0, col: 0 }, { row: 0, col: 1 });

    expect(outcome).toEqual({
      kind: 'joker',
      scorer: alice,
      joker: { row: 0, col: 1 },
      other: { row: 0, col: 0 }
    });
    expect(game.cardAt(0, 1)?.matched).toBe(true);
    expect(game.cardAt(0, 0)?.matched).toBe(false);
    expect(game.cardAt(0, 0)?.revealed).toBe(false);
    expect(game.scoreOf('a')).toBe(1);
    expect(game.currentPlayer).toBe(alice);
    expect(game.pairsFound).toBe(0.5);
  });

  it('ends on all pairs with the higher score winning', () => {
    const game = fixed(1, 3, ['🍎', JOKER_SYMBOL, '🍎']);
    game.selectPair(alice, { row: 0, col: 0 }, { row: 0, col: 1 });

    const outcome = game.selectPair(alice, { row: 0, col: 0 }, { row: 0, col: 2 });

    expect(outcome.kind).toBe('game_over');
    if (outcome.kind !== 'game_over') return;
    expect(outcome.winner).toBe(alice);
    expect(outcome.reason).toBe('all_pairs');
    expect(outcome.last.kind).toBe('match');
    expect(game.isOver).toBe(true);
    expect(game.scoreTable()).toEqual({ a: 2, b: 0 });
  });

  it('reports a tie when both players found the same number of pairs', () => {
    const game = fixed(2, 4, ['🍎', '🍕', '🍩', '🍇', '🍎', '🍕', '🍩', '🍇']);
    game.selectPair(alice, { row: 0, col: 0 }, { row: 1, col: 0 });
    game.selectPair(alice, { row: 0, col: 2 }, { row: 1, col: 2 });
    game.selectPair(alice, { row: 0, col: 1 }, { row: 0, col: 3 });
    expect(game.currentPlayer).toBe(bob);
    game.selectPair(bob, { row: 0, col: 1 }, { row: 1, col: 1 });

    const outcome = game.selectPair(bob, { row: 0, col: 3 }, { row: 1, col: 3 });

    expect(outcome).toMatchObject({ kind: 'game_over', winner: null, reason: 'all_pairs' });
    expect(game.scoreTable()).toEqual({ a: 2, b: 2 });
  });

  it('rejects invalid selections without touching the board', () => {
    const game = fixed(2, 2, ['🍎', '🍕', '🍎', '🍕']);

    expect(game.selectPair(bob, { row: 0, col: 0 }, { row: 1, col: 0 })).toEqual({
      kind: 'rejected',
      reason: 'not_your_turn'
    });
    expect(game.selectPair(alice, { row: 0, col: 0 }, { row: 0, col: 0 })).toEqual({
      kind: 'rejected',
      reason: 'invalid_position'
    });
    expect(game.selectPair(alice, { row: 0, col: 0 }, { row: 2, col: 0 })).toEqual({
      kind: 'rejected',
      reason: 'invalid_position'
    });

    game.selectPair(alice, { row: 0, col: 0 }, { row: 1, col: 0 });
    expect(game.selectPair(alice, { row: 0, col: 0 }, { row: 0, col: 1 })).toEqual({
      kind: 'rejected',
      reason: 'invalid_position'
    });
    expect(game.scoreOf('a')).toBe(1);
  });

  it('reveals the first flip and resolves on the second', () => {
    const game = fixed(2, 2, ['🍎', '🍕', '🍎', '🍕']);

    expect(game.flip(alice, 0, 1)).toEqual({ kind: 'first_pick', card: { row: 0, col: 1, symbol: '🍕' } });
    expect(game.cardAt(0, 1)?.revealed).toBe(true);
    expect(game.flip(alice, 0, 1)).toEqual({ kind: 'rejected', reason: 'invalid_position' });
    expect(game.snapshot().pendingPick).toEqual({ row: 0, col: 1 });

    const outcome = game.flip(alice, 1, 1);
    expect(outcome.kind).toBe('match');
    expect(game.snapshot().pendingPick).toBeNull();
  });

  it('rejects moves once the game has ended', () => {
    const game = fixed(2, 2, ['🍎', '🍕', '🍎', '🍕']);
    game.end();

    expect(game.isOver).toBe(true);
    expect(game.winner).toBeNull();
    expect(game.flip(alice, 0, 0)).toEqual({ kind: 'rejected', reason: 'game_over' });
  });

  it('deals a 5x5 board with twelve pairs and one joker', () => {
    const symbols = getCategory('food') ?? [];
    const game = new MemoryMatchGame({ players, category: 'food', symbols, rows: 5, cols: 5, random: Math.random });
    const cards = game.snapshot().board.flat();

    expect(cards).toHaveLength(25);
    expect(game.pairsToFind).toBe(12);
    expect(cards.filter((c) => c.joker)).toHaveLength(1);
    for (const [symbol, count] of countSymbols(cards)) {
      if (symbol === JOKER_SYMBOL) continue;
      expect(count).toBe(2);
      expect(symbols).toContain(symbol);
    }
  });

  it('deals a 4x5 board without a joker', () => {
    const symbols = getCategory('animals') ?? [];
    const game = new MemoryMatchGame({ players, category: 'animals', symbols, rows: 5, cols: 4, random: Math.random });

    expect(game.includesJoker).toBe(false);
    expect(game.winThreshold).toBe(6);
    expect(game.snapshot().board.flat()).toHaveLength(20);
    expect(countSymbols(game.snapshot().board.flat()).size).toBe(10);
  });

  it('wins immediately on reaching the 5x5 target score', () => {
    const symbols = getCategory('hearts') ?? [];
    const game = new MemoryMatchGame({ players, category: 'hearts', symbols, rows: 5, cols: 5, random: first });
    const pairs = pairPositions(game.snapshot().board.flat());

    for (const [a, b] of pairs.slice(0, 6)) {
      expect(game.selectPair(alice, a, b).kind).toBe('match');
    }
    const [a, b] = pairs[6] ?? [];
    if (!a || !b) throw new Error('expected a seventh pair');
    const outcome = game.selectPair(alice, a, b);

    expect(outcome).toMatchObject({ kind: 'game_over', winner: alice, reason: 'target_score' });
    expect(game.scoreOf('a')).toBe(7);
  });

  it('refuses a category that is too small for the grid', () => {
    expect(
      () => new MemoryMatchGame({ players, category: 'tiny', symbols: ['🍎', '🍕'], rows: 5, cols: 5, random: first })
    ).toThrow('Category tiny has 2 symbols, 12 pairs needed');
  });
});

function countSymbols(cards: Card[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const card of cards) counts.set(card.symbol, (counts.get(card.symbol) ?? 0) + 1);
  return counts;
}

function pairPositions(cards: Card[]): Array<[Card, Card]> {
  const bySymbol = new Map<string, Card[]>();
  for (const card of cards) {
    if (card.joker) continue;
    bySymbol.set(card.symbol, [...(bySymbol.get(card.symbol) ?? []), card]);
  }
  const pairs: Array<[Card, Card]> = [];
  for (const [a, b] of bySymbol.values()) {
    if (a && b) pairs.push([a, b]);
  }
  return pairs;
}
