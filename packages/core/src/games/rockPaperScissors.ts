import type { PlayerPair, Player, Rejected } from './types.js';
import { otherPlayer, rejected } from './types.js';

export const RPS_CHOICES = ['rock', 'paper', 'scissors'] as const;
export type RpsChoice = (typeof RPS_CHOICES)[number];

export const RPS_EMOJI: Record<RpsChoice, string> = {
  rock: '🪨',
  paper: '📄',
  scissors: '✂️'
};

// key 가 value 를 이긴다
const BEATS: Record<RpsChoice, RpsChoice> = {
  rock: 'scissors',
  paper: 'rock',
  scissors: 'paper'
};

export const ACTION_OPTIONS = [
  'slap',
  'kiss',
  'nuke',
  'laugh',
  'pat',
  'hug',
  'poke',
  'tickle',
  'bonk',
  'punch',
  'dance with'
] as const;
export type RpsAction = (typeof ACTION_OPTIONS)[number];

export type RpsVariant = 'basic' | 'action';
export type RpsPhase = 'waiting_for_actions' | 'waiting_for_choices' | 'resolved';

export const isRpsChoice = (value: string): value is RpsChoice => RPS_CHOICES.some((c) => c === value);

export const isRpsAction = (value: string): value is RpsAction => ACTION_OPTIONS.some((a) => a === value);

/** a 기준 승패. 같은 손이면 0. */
export function compareChoices(a: RpsChoice, b: RpsChoice): 1 | 0 | -1 {
  if (a === b) return 0;
  return BEATS[a] === b ? 1 : -1;
}

export type ActionPayload = {
  actor: Player;
  target: Player;
  action: RpsAction;
};

export type RpsResult = {
  choices: Record<string, RpsChoice>;
  winner: Player | null;
  payload: ActionPayload | null;
};

export type RpsOutcome =
  | { kind: 'action_recorded'; player: Player; phase: RpsPhase }
  | { kind: 'choice_recorded'; player: Player }
  | ({ kind: 'resolved' } & RpsResult)
  | Rejected;

export type RpsSnapshot = {
  kind: 'rps' | 'rps_action';
  phase: RpsPhase;
  /** 선택 여부만 노출한다. 결과 전에는 손을 공개하지 않는다. */
  chosen: Record<string, boolean>;
  actions: Record<string, RpsAction | null>;
  result: RpsResult | null;
  gameOver: boolean;
  winner: Player | null;
};

export class RockPaperScissorsGame {
  readonly players: PlayerPair;
  readonly variant: RpsVariant;
  private choices = new Map<string, RpsChoice>();
  private actions = new Map<string, RpsAction>();
  private currentPhase: RpsPhase;
  private result: RpsResult | null = null;
  private ended = false;

  constructor(options: { players: PlayerPair; variant: RpsVariant }) {
    this.players = options.players;
    this.variant = options.variant;
    this.currentPhase = this.initialPhase();
  }

  private initialPhase(): RpsPhase {
    return this.variant === 'action' ? 'waiting_for_actions' : 'waiting_for_choices';
  }

  get phase(): RpsPhase {
    return this.currentPhase;
  }

  get isOver(): boolean {
    return this.ended || this.currentPhase === 'resolved';
  }

  get winner(): Player | null {
    return this.result?.winner ?? null;
  }

  get lastResult(): RpsResult | null {
    return this.result;
  }

  private isPlayer(player: Player): boolean {
    return this.players.some((p) => p.id === player.id);
  }

  setAction(player: Player, action: string): RpsOutcome {
    if (this.isOver) return rejected('game_over');
    if (!this.isPlayer(player)) return rejected('not_a_player');
    if (this.variant !== 'action' || this.currentPhase !== 'waiting_for_actions') return rejected('invalid_move');
    if (!isRpsAction(action)) return rejected('invalid_move');
    if (this.actions.has(player.id)) return rejected('already_resolved');

    this.actions.set(player.id, action);
    if (this.players.every((p) => this.actions.has(p.id))) {
      this.currentPhase = 'waiting_for_choices';
    }
    return { kind: 'action_recorded', player, phase: this.currentPhase };
  }

  submitChoice(player: Player, choice: string): RpsOutcome {
    if (this.isOver) return rejected('game_over');
    if (!this.isPlayer(player)) return rejected('not_a_player');
    if (this.currentPhase !== 'waiting_for_choices') return rejected('invalid_move');
    if (!isRpsChoice(choice)) return rejected('invalid_move');
    if (this.choices.has(player.id)) return rejected('already_resolved');

    this.choices.set(player.id, choice);
    const [p1, p2] = this.players;
    const c1 = this.choices.get(p1.id);
    const c2 = this.choices.get(p2.id);
    if (!c1 || !c2) return { kind: 'choice_recorded', player };

    const cmp = compareChoices(c1, c2);
    const winner = cmp === 0 ? null : cmp > 0 ? p1 : p2;
    const result: RpsResult = {
      choices: { [p1.id]: c1, [p2.id]: c2 },
      winner,
      payload: this.payloadFor(winner)
    };
    this.result = result;
    this.currentPhase = 'resolved';
    return { kind: 'resolved', ...result };
  }

  private payloadFor(winner: Player | null): ActionPayload | null {
    if (this.variant !== 'action' || !winner) return null;
    const action = this.actions.get(winner.id);
    if (!action) return null;
    return { actor: winner, target: otherPlayer(this.players, winner.id), action };
  }

  /** 재대결용 초기화 */
  reset() {
    this.choices = new Map();
    this.actions = new Map();
    this.result = null;
    this.ended = false;
    this.currentPhase = this.initialPhase();
  }

  end() {
    this.ended = true;
  }

  snapshot(): RpsSnapshot {
    return {
      kind: this.variant === 'action' ? 'rps_action' : 'rps',
      phase: this.currentPhase,
      chosen: Object.fromEntries(this.players.map((p) => [p.id, this.choices.has(p.id)])),
      actions: Object.fromEntries(this.players.map((p) => [p.id, this.actions.get(p.id) ?? null])),
      result: this.result,
      gameOver: this.isOver,
      winner: this.winner
    };
  }
}
