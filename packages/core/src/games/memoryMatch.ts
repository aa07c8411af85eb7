import type { PlayerPair, Player, Random, Rejected } from './types.js';
import { otherPlayer, pickOne, rejected, sample, shuffle } from './types.js';

export const JOKER_SYMBOL = '🃏';

export type GridOption = '5x5' | '4x5';

/** 4x5 는 가로 4칸, 세로 5줄이다. */
export const GRID_OPTIONS: Record<GridOption, { rows: number; cols: number }> = {
  '5x5': { rows: 5, cols: 5 },
  '4x5': { rows: 5, cols: 4 }
};

export const DEFAULT_GRID: GridOption = '5x5';

/** `${rows}x${cols}` → 즉시 승리에 필요한 점수 */
export const WIN_THRESHOLDS: Partial<Record<string, number>> = {
  '5x5': 7,
  '5x4': 6
};

export type Position = { row: number; col: number };

export type Card = {
  symbol: string;
  row: number;
  col: number;
  matched: boolean;
  revealed: boolean;
  joker: boolean;
};

export type MemoryMatchOptions = {
  players: PlayerPair;
  category: string;
  /** 카테고리 이모지 목록. 필요한 쌍 수만큼 무작위로 뽑는다. */
  symbols: readonly string[];
  rows: number;
  cols: number;
  random: Random;
  /** 행 우선 순서의 고정 배치. 주어지면 섞지 않는다. */
  layout?: readonly string[];
};

type Scored = { scorer: Player };

export type MatchOutcome = Scored & { kind: 'match'; symbol: string; cards: [Position, Position] };
export type JokerOutcome = Scored & { kind: 'joker'; joker: Position; other: Position };
export type NoMatchOutcome = {
  kind: 'no_match';
  cards: [Position & { symbol: string }, Position & { symbol: string }];
  nextPlayer: Player;
};
export type MemoryGameOver = {
  kind: 'game_over';
  winner: Player | null;
  reason: 'target_score' | 'all_pairs';
  last: MatchOutcome | JokerOutcome | NoMatchOutcome;
};

export type PairOutcome = MatchOutcome | JokerOutcome | NoMatchOutcome | MemoryGameOver | Rejected;
export type FlipOutcome = { kind: 'first_pick'; card: Position & { symbol: string } } | PairOutcome;

export type MemoryMatchSnapshot = {
  kind: 'memory';
  category: string;
  rows: number;
  cols: number;
  board: Card[][];
  currentPlayer: Player;
  scores: Record<string, number>;
  pairsToFind: number;
  pairsFound: number;
  pendingPick: Position | null;
  gameOver: boolean;
  winner: Player | null;
};

export class MemoryMatchGame {
  readonly players: PlayerPair;
  readonly category: string;
  readonly rows: number;
  readonly cols: number;
  readonly pairsToFind: number;
  readonly includesJoker: boolean;
  readonly winThreshold: number | null;

  private readonly board: Card[][];
  private readonly scores = new Map<string, number>();
  private current: Player;
  private pendingPick: Position | null = null;
  // joker 는 반 쌍(1), 일반 매치는 한 쌍(2)
  private halfPairs = 0;
  private over = false;
  private winnerPlayer: Player | null = null;

  constructor(options: MemoryMatchOptions) {
    const { players, rows, cols, random } = options;
    if (rows <= 0 || cols <= 0) throw new Error(`Invalid grid ${rows}x${cols}`);

    this.players = players;
    this.category = options.category;
    this.rows = rows;
    this.cols = cols;

    const cells = rows * cols;
    this.includesJoker = cells % 2 !== 0;
    this.pairsToFind = Math.floor(cells / 2);
    this.winThreshold = WIN_THRESHOLDS[`${rows}x${cols}`] ?? null;

    const deck = options.layout ? [...options.layout] : this.deal(options.symbols, random);
    if (deck.length !== cells) {
      throw new Error(`Layout has ${deck.length} cards, grid needs ${cells}`);
    }

    this.board = [];
    for (let r = 0; r < rows; r++) {
      const line: Card[] = [];
      for (let c = 0; c < cols; c++) {
        const symbol = deck[r * cols + c] ?? JOKER_SYMBOL;
        line.push({ symbol, row: r, col: c, matched: false, revealed: false, joker: symbol === JOKER_SYMBOL });
      }
      this.board.push(line);
    }

    for (const p of players) this.scores.set(p.id, 0);
    this.current = pickOne(players, random);
  }

  private deal(symbols: readonly string[], random: Random): string[] {
    const unique = [...new Set(symbols)].filter((s) => s !== JOKER_SYMBOL);
    if (unique.length < this.pairsToFind) {
      throw new Error(`Category ${this.category} has ${unique.length} symbols, ${this.pairsToFind} pairs needed`);
    }
    const picked = sample(unique, this.pairsToFind, random);
    const deck = [...picked, ...picked];
    if (this.includesJoker) deck.push(JOKER_SYMBOL);
    return shuffle(deck, random);
  }

  get currentPlayer(): Player {
    return this.current;
  }

  get isOver(): boolean {
    return this.over;
  }

  get winner(): Player | null {
    return this.winnerPlayer;
  }

  get pairsFound(): number {
    return this.halfPairs / 2;
  }

  scoreOf(playerId: string): number {
    return this.scores.get(playerId) ?? 0;
  }

  scoreTable(): Record<string, number> {
    return Object.fromEntries(this.players.map((p) => [p.id, this.scoreOf(p.id)]));
  }

  cardAt(row: number, col: number): Card | null {
    return this.board[row]?.[col] ?? null;
  }

  private checkMover(player: Player): Rejected | null {
    if (this.over) return rejected('game_over');
    if (player.id !== this.current.id) return rejected('not_your_turn');
    return null;
  }

  private selectable(pos: Position): Card | null {
    const card = this.cardAt(pos.row, pos.col);
    if (!card || card.matched) return null;
    return card;
  }

  /**
   * 카드 한 장을 뒤집는다. 첫 장이면 공개만 하고, 두 번째 장이면 selectPair 로 판정한다.
   */
  flip(player: Player, row: number, col: number): FlipOutcome {
    const denied = this.checkMover(player);
    if (denied) return denied;

    const card = this.selectable({ row, col });
    if (!card) return rejected('invalid_position');

    const first = this.pendingPick;
    if (!first) {
      card.revealed = true;
      this.pendingPick = { row, col };
      return { kind: 'first_pick', card: { row, col, symbol: card.symbol } };
    }

    if (first.row === row && first.col === col) return rejected('invalid_position');
    card.revealed = true;
    return this.selectPair(player, first, { row, col });
  }

  selectPair(player: Player, a: Position, b: Position): PairOutcome {
    const denied = this.checkMover(player);
    if (denied) return denied;

    if (a.row === b.row && a.col === b.col) return rejected('invalid_position');
    const first = this.selectable(a);
    const second = this.selectable(b);
    if (!first || !second) return rejected('invalid_position');

    this.pendingPick = null;

    let last: MatchOutcome | JokerOutcome | NoMatchOutcome;
    if (first.joker || second.joker) {
      const joker = first.joker ? first : second;
      const other = first.joker ? second : first;
      joker.matched = true;
      joker.revealed = true;
      other.revealed = false;
      this.addScore(player);
      this.halfPairs += 1;
      last = { kind: 'joker', scorer: player, joker: at(joker), other: at(other) };
    } else if (first.symbol === second.symbol) {
      first.matched = second.matched = true;
      first.revealed = second.revealed = true;
      this.addScore(player);
      this.halfPairs += 2;
      last = { kind: 'match', scorer: player, symbol: first.symbol, cards: [at(first), at(second)] };
    } else {
      first.revealed = second.revealed = false;
      this.current = otherPlayer(this.players, player.id);
      last = {
        kind: 'no_match',
        cards: [
          { ...at(first), symbol: first.symbol },
          { ...at(second), symbol: second.symbol }
        ],
        nextPlayer: this.current
      };
    }

    return this.evaluate(player, last) ?? last;
  }

  private evaluate(mover: Player, last: MatchOutcome | JokerOutcome | NoMatchOutcome): MemoryGameOver | null {
    if (this.winThreshold !== null && this.scoreOf(mover.id) >= this.winThreshold) {
      this.finish(mover);
      return { kind: 'game_over', winner: mover, reason: 'target_score', last };
    }
    if (this.halfPairs >= this.pairsToFind * 2) {
      const [p1, p2] = this.players;
      const s1 = this.scoreOf(p1.id);
      const s2 = this.scoreOf(p2.id);
      const winner = s1 === s2 ? null : s1 > s2 ? p1 : p2;
      this.finish(winner);
      return { kind: 'game_over', winner, reason: 'all_pairs', last };
    }
    return null;
  }

  private addScore(player: Player) {
    this.scores.set(player.id, this.scoreOf(player.id) + 1);
  }

  private finish(winner: Player | null) {
    this.over = true;
    this.winnerPlayer = winner;
    this.pendingPick = null;
  }

  /** 합의 종료나 잠수 정리처럼 승부 없이 끝낼 때 쓴다. */
  end() {
    if (this.over) return;
    this.finish(null);
  }

  snapshot(): MemoryMatchSnapshot {
    return {
      kind: 'memory',
      category: this.category,
      rows: this.rows,
      cols: this.cols,
      board: this.board.map((line) => line.map((card) => ({ ...card }))),
      currentPlayer: this.current,
      scores: this.scoreTable(),
      pairsToFind: this.pairsToFind,
      pairsFound: this.pairsFound,
      pendingPick: this.pendingPick ? { ...this.pendingPick } : null,
      gameOver: this.over,
      winner: this.winnerPlayer
    };
  }
}

const at = (card: Card): Position => ({ row: card.row, col: card.col });
