import type { PlayerPair, Player, Random, Rejected } from './types.js';
import { otherPlayer, pickOne, rejected } from './types.js';

export type Mark = 'X' | 'O';
export type Cell = Mark | null;

export type Line = [[number, number], [number, number], [number, number]];

const LINES: Line[] = [
  [[0, 0], [0, 1], [0, 2]],
  [[1, 0], [1, 1], [1, 2]],
  [[2, 0], [2, 1], [2, 2]],
  [[0, 0], [1, 0], [2, 0]],
  [[0, 1], [1, 1], [2, 1]],
  [[0, 2], [1, 2], [2, 2]],
  [[0, 0], [1, 1], [2, 2]],
  [[0, 2], [1, 1], [2, 0]]
];

export type PlaceOutcome =
  | { kind: 'placed'; mark: Mark; row: number; col: number; nextPlayer: Player }
  | { kind: 'win'; winner: Player; mark: Mark; line: Line }
  | { kind: 'draw' }
  | Rejected;

export type TicTacToeSnapshot = {
  kind: 'tictactoe';
  board: Cell[][];
  marks: Record<string, Mark>;
  currentPlayer: Player;
  gameOver: boolean;
  winner: Player | null;
  winningLine: Line | null;
};

export class TicTacToeGame {
  readonly players: PlayerPair;
  private readonly board: Cell[][] = [
    [null, null, null],
    [null, null, null],
    [null, null, null]
  ];
  private current: Player;
  private over = false;
  private winnerPlayer: Player | null = null;
  private winningLine: Line | null = null;

  constructor(options: { players: PlayerPair; random: Random }) {
    this.players = options.players;
    this.current = pickOne(options.players, options.random);
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

  /** 첫 번째 플레이어(도전자)가 X 다. */
  markOf(playerId: string): Mark {
    return this.players[0].id === playerId ? 'X' : 'O';
  }

  cellAt(row: number, col: number): Cell | undefined {
    return this.board[row]?.[col];
  }

  place(player: Player, row: number, col: number): PlaceOutcome {
    if (this.over) return rejected('game_over');
    if (player.id !== this.current.id) return rejected('not_your_turn');

    const line = this.board[row];
    if (!line || !Number.isInteger(col) || col < 0 || col > 2) return rejected('invalid_position');
    if (line[col] !== null) return rejected('invalid_position');

    const mark = this.markOf(player.id);
    line[col] = mark;

    const won = LINES.find((l) => l.every(([r, c]) => this.cellAt(r, c) === mark));
    if (won) {
      this.over = true;
      this.winnerPlayer = player;
      this.winningLine = won;
      return { kind: 'win', winner: player, mark, line: won };
    }

    if (this.board.every((r) => r.every((cell) => cell !== null))) {
      this.over = true;
      return { kind: 'draw' };
    }

    this.current = otherPlayer(this.players, player.id);
    return { kind: 'placed', mark, row, col, nextPlayer: this.current };
  }

  end() {
    this.over = true;
  }

  snapshot(): TicTacToeSnapshot {
    const [p1, p2] = this.players;
    return {
      kind: 'tictactoe',
      board: this.board.map((r) => [...r]),
      marks: { [p1.id]: 'X', [p2.id]: 'O' },
      currentPlayer: this.current,
      gameOver: this.over,
      winner: this.winnerPlayer,
      winningLine: this.winningLine
    };
  }
}
