import { ActionRowBuilder, ButtonBuilder, ButtonStyle, StringSelectMenuBuilder } from 'discord.js';
import type { EmbedBuilder, MessageActionRowComponentBuilder } from 'discord.js';
import {
  ACTION_OPTIONS,
  RPS_CHOICES,
  RPS_EMOJI,
  type BoardEvent,
  type Challenge,
  type ChallengeClosedReason,
  type Confirmation,
  type ConfirmationClosedReason,
  type GameEnd,
  type MemoryMatchSnapshot,
  type Player,
  type RpsSnapshot,
  type SessionSnapshot,
  type TicTacToeSnapshot
} from '@duelhall/core';

import { GAME_LABELS } from '../lib/messages.js';
import { Colors, brandEmbed, errorEmbed, infoEmbed, mention, mutedEmbed, successEmbed, warningEmbed } from '../lib/embed.js';
import { encodeCustomId } from './customIds.js';

type Row = ActionRowBuilder<MessageActionRowComponentBuilder>;

export type GameView = {
  content?: string;
  embeds: EmbedBuilder[];
  components: Row[];
};

const HIDDEN_CARD = '❔';
const EMPTY_CELL = '·';
const MARK_EMOJI = { X: '❌', O: '⭕' } as const;
const RPS_LABELS = { rock: '바위', paper: '보', scissors: '가위' } as const;

const row = (...components: MessageActionRowComponentBuilder[]): Row =>
  new ActionRowBuilder<MessageActionRowComponentBuilder>().addComponents(...components);

const relativeTime = (ms: number) => `<t:${Math.floor(ms / 1000)}:R>`;

/* ──────────── Challenge ──────────── */

function describeParams(challenge: Challenge): string | null {
  const { params } = challenge;
  if (params.kind !== 'memory') return null;
  return `카테고리 **${params.category}** · 그리드 **${params.cols}x${params.rows}**`;
}

export function challengeView(challenge: Challenge): GameView {
  const lines = [
    `${mention(challenge.proposer.id)} 님이 ${mention(challenge.target.id)} 님에게 도전했어!`,
    describeParams(challenge),
    `응답 마감 ${relativeTime(challenge.expiresAt)}`
  ].filter((line): line is string => line !== null);

  return {
    content: mention(challenge.target.id),
    embeds: [infoEmbed(`${GAME_LABELS[challenge.params.kind]} 도전장`, lines.join('\n'))],
    components: [
      row(
        new ButtonBuilder()
          .setCustomId(encodeCustomId({ type: 'challenge', challengeId: challenge.id, decision: 'accept' }))
          .setLabel('수락')
          .setStyle(ButtonStyle.Success),
        new ButtonBuilder()
          .setCustomId(encodeCustomId({ type: 'challenge', challengeId: challenge.id, decision: 'decline' }))
          .setLabel('거절')
          .setStyle(ButtonStyle.Danger)
      )
    ]
  };
}

export function challengeClosedView(challenge: Challenge, reason: ChallengeClosedReason): GameView {
  const title = GAME_LABELS[challenge.params.kind];
  const embed =
    reason === 'accepted'
      ? successEmbed(`${title} 도전 수락`, `${mention(challenge.target.id)} 님이 도전을 받아들였어!`)
      : reason === 'declined'
        ? errorEmbed(`${title} 도전 취소`, `${mention(challenge.proposer.id)} vs ${mention(challenge.target.id)} 도전이 취소됐어.`)
        : mutedEmbed(`${title} 도전 만료`, `${mention(challenge.target.id)} 님이 제한 시간 안에 응답하지 않았어.`);
  return { embeds: [embed], components: [] };
}

/* ──────────── Confirmation ──────────── */

export function confirmationView(confirmation: Confirmation): GameView {
  return {
    content: mention(confirmation.opponent.id),
    embeds: [
      warningEmbed(
        '게임 종료 요청',
        `${mention(confirmation.requester.id)} 님이 게임을 끝내자고 했어.\n${mention(confirmation.opponent.id)} 님, 동의해?`
      )
    ],
    components: [
      row(
        new ButtonBuilder()
          .setCustomId(encodeCustomId({ type: 'confirm', confirmationId: confirmation.id, decision: 'accept' }))
          .setLabel('종료 동의')
          .setStyle(ButtonStyle.Danger),
        new ButtonBuilder()
          .setCustomId(encodeCustomId({ type: 'confirm', confirmationId: confirmation.id, decision: 'decline' }))
          .setLabel('계속하기')
          .setStyle(ButtonStyle.Secondary)
      )
    ]
  };
}

const CONFIRMATION_CLOSED_TEXT: Record<ConfirmationClosedReason, string> = {
  accepted: '두 사람이 합의해서 게임을 종료했어.',
  declined: '상대가 거절해서 게임이 계속돼.',
  withdrawn: '요청자가 종료 요청을 취소했어.',
  expired: '응답이 없어 종료 요청이 만료됐어.',
  cancelled: '게임이 먼저 끝나서 종료 요청이 취소됐어.'
};

export function confirmationClosedView(_confirmation: Confirmation, reason: ConfirmationClosedReason): GameView {
  return { embeds: [mutedEmbed('게임 종료 요청', CONFIRMATION_CLOSED_TEXT[reason])], components: [] };
}

/* ──────────── Boards ──────────── */

function eventLine(event: BoardEvent, current: Player | null): string | null {
  switch (event.kind) {
    case 'started':
      return current ? `게임 시작! ${mention(current.id)} 님부터.` : '게임 시작!';
    case 'rematch':
      return '🔁 다시 한 판!';
    case 'cards_hidden':
      return current ? `${mention(current.id)} 님 차례.` : null;
    case 'first_pick':
      return `${event.card.symbol} 카드를 뒤집었어. 한 장 더!`;
    case 'match':
      return `✨ ${mention(event.scorer.id)} 짝 맞춤! ${event.symbol}`;
    case 'joker':
      return `🃏 ${mention(event.scorer.id)} 조커 발견! 한 번 더.`;
    case 'no_match':
      return `꽝! ${event.cards[0].symbol} ≠ ${event.cards[1].symbol} · 이제 ${mention(event.nextPlayer.id)} 님 차례.`;
    case 'placed':
      return `${MARK_EMOJI[event.mark]} (${event.row + 1}, ${event.col + 1}) · 이제 ${mention(event.nextPlayer.id)} 님 차례.`;
    case 'action_recorded':
      return `${mention(event.player.id)} 님이 액션을 골랐어.`;
    case 'choice_recorded':
      return `${mention(event.player.id)} 님이 손을 냈어.`;
  }
}

function scoreLines(session: SessionSnapshot, scores: Record<string, number>): string {
  return session.players.map((p) => `${mention(p.id)} **${scores[p.id] ?? 0}**`).join('  vs  ');
}

const positionKey = (row: number, col: number) => `${row}:${col}`;

// 꽝이 난 두 장은 엔진에서 이미 뒤집혔지만 cards_hidden 전까지는 앞면으로 보여 준다.
function faceUpCards(event: BoardEvent): Set<string> {
  if (event.kind !== 'no_match') return new Set();
  return new Set(event.cards.map((c) => positionKey(c.row, c.col)));
}

function memoryGrid(
  game: MemoryMatchSnapshot,
  sessionId: string,
  revealAll: boolean,
  faceUp: ReadonlySet<string> = new Set()
): Row[] {
  return game.board.map((cards) =>
    row(
      ...cards.map((card) => {
        const peeked = faceUp.has(positionKey(card.row, card.col));
        const shown = revealAll || card.matched || card.revealed || peeked;
        return new ButtonBuilder()
          .setCustomId(encodeCustomId({ type: 'flip', sessionId, row: card.row, col: card.col }))
          .setLabel(shown ? card.symbol : HIDDEN_CARD)
          .setStyle(
            card.matched
              ? ButtonStyle.Success
              : peeked
                ? ButtonStyle.Danger
                : card.revealed
                  ? ButtonStyle.Primary
                  : ButtonStyle.Secondary
          )
          .setDisabled(game.gameOver || shown);
      })
    )
  );
}

function memoryView(
  session: SessionSnapshot,
  game: MemoryMatchSnapshot,
  line: string | null,
  faceUp: ReadonlySet<string>
): GameView {
  const embed = brandEmbed()
    .setTitle(`${GAME_LABELS.memory} · ${game.category}`)
    .setDescription([line, scoreLines(session, game.scores)].filter(Boolean).join('\n\n'))
    .setFooter({ text: `찾은 쌍 ${game.pairsFound}/${game.pairsToFind}` });
  return { embeds: [embed], components: memoryGrid(game, session.id, game.gameOver, faceUp) };
}

function ticTacToeGrid(game: TicTacToeSnapshot, sessionId: string): Row[] {
  const winning = new Set((game.winningLine ?? []).map(([r, c]) => `${r}:${c}`));
  return game.board.map((cells, r) =>
    row(
      ...cells.map((cell, c) =>
        new ButtonBuilder()
          .setCustomId(encodeCustomId({ type: 'place', sessionId, row: r, col: c }))
          .setLabel(cell ? MARK_EMOJI[cell] : EMPTY_CELL)
          .setStyle(winning.has(`${r}:${c}`) ? ButtonStyle.Success : ButtonStyle.Secondary)
          .setDisabled(game.gameOver || cell !== null)
      )
    )
  );
}

function ticTacToeView(session: SessionSnapshot, game: TicTacToeSnapshot, line: string | null): GameView {
  const marks = session.players.map((p) => `${MARK_EMOJI[game.marks[p.id] ?? 'X']} ${mention(p.id)}`).join('  vs  ');
  const embed = brandEmbed()
    .setTitle(GAME_LABELS.tictactoe)
    .setDescription([marks, line].filter(Boolean).join('\n\n'));
  const components = ticTacToeGrid(game, session.id);
  if (!game.gameOver) components.push(endRow(session.id));
  return { embeds: [embed], components };
}

function rpsStatus(session: SessionSnapshot, game: RpsSnapshot): string {
  return session.players
    .map((p) => {
      const action = game.actions[p.id];
      const ready = game.phase === 'waiting_for_actions' ? action !== null : game.chosen[p.id];
      const extra = game.kind === 'rps_action' && action ? ` · 액션 선택 완료` : '';
      return `${ready ? '✅' : '⌛'} ${mention(p.id)}${extra}`;
    })
    .join('\n');
}

function rpsControls(session: SessionSnapshot, game: RpsSnapshot): Row[] {
  if (game.gameOver) return [];
  if (game.phase === 'waiting_for_actions') {
    return [
      row(
        new StringSelectMenuBuilder()
          .setCustomId(encodeCustomId({ type: 'action', sessionId: session.id }))
          .setPlaceholder('이긴 사람이 상대에게 할 액션을 골라 줘')
          .addOptions(ACTION_OPTIONS.map((action) => ({ label: action, value: action })))
      ),
      endRow(session.id)
    ];
  }
  return [
    row(
      ...RPS_CHOICES.map((choice) =>
        new ButtonBuilder()
          .setCustomId(encodeCustomId({ type: 'choose', sessionId: session.id, choice }))
          .setLabel(`${RPS_EMOJI[choice]} ${RPS_LABELS[choice]}`)
          .setStyle(ButtonStyle.Primary)
      )
    ),
    endRow(session.id)
  ];
}

function rpsView(session: SessionSnapshot, game: RpsSnapshot, line: string | null): GameView {
  const embed = brandEmbed()
    .setTitle(GAME_LABELS[game.kind])
    .setDescription([line, rpsStatus(session, game)].filter(Boolean).join('\n\n'));
  return { embeds: [embed], components: rpsControls(session, game) };
}

function endRow(sessionId: string): Row {
  return row(
    new ButtonBuilder()
      .setCustomId(encodeCustomId({ type: 'end', sessionId }))
      .setLabel('종료 요청')
      .setStyle(ButtonStyle.Secondary)
  );
}

function currentPlayerOf(session: SessionSnapshot): Player | null {
  const { game } = session;
  if (game.kind === 'memory' || game.kind === 'tictactoe') return game.gameOver ? null : game.currentPlayer;
  return null;
}

export function boardView(session: SessionSnapshot, event: BoardEvent): GameView {
  const line = eventLine(event, currentPlayerOf(session));
  const { game } = session;
  switch (game.kind) {
    case 'memory':
      return memoryView(session, game, line, faceUpCards(event));
    case 'tictactoe':
      return ticTacToeView(session, game, line);
    case 'rps':
    case 'rps_action':
      return rpsView(session, game, line);
  }
}

/* ──────────── Game over ──────────── */

function endLine(end: GameEnd): string {
  if (end.reason === 'agreed') return '🤝 두 사람의 합의로 게임이 끝났어.';
  if (end.reason === 'inactive') return '💤 한동안 움직임이 없어서 게임을 정리했어.';
  return end.winner ? `🏆 ${mention(end.winner.id)} 승리!` : '🤝 무승부!';
}

function rpsResultLines(end: GameEnd): string[] {
  const { detail } = end;
  if (detail?.kind !== 'resolved') return [];
  const choices = Object.entries(detail.choices).map(
    ([userId, choice]) => `${mention(userId)} ${RPS_EMOJI[choice]} ${RPS_LABELS[choice]}`
  );
  const { payload } = detail;
  if (payload) choices.push(`\n${mention(payload.actor.id)} 님이 ${mention(payload.target.id)} 님에게 **${payload.action}**!`);
  return choices;
}

export function gameOverView(session: SessionSnapshot, end: GameEnd): GameView {
  const { game } = session;
  const lines = [endLine(end), ...rpsResultLines(end)];
  if (game.kind === 'memory') lines.push(scoreLines(session, game.scores));

  const embed = brandEmbed()
    .setColor(end.reason === 'completed' ? Colors.BRAND_LEMON : Colors.MUTED)
    .setTitle(`${GAME_LABELS[session.kind]} 종료`)
    .setDescription(lines.join('\n'));

  switch (game.kind) {
    case 'memory':
      return { embeds: [embed], components: memoryGrid({ ...game, gameOver: true }, session.id, true) };
    case 'tictactoe':
      return { embeds: [embed], components: ticTacToeGrid({ ...game, gameOver: true }, session.id) };
    case 'rps':
    case 'rps_action': {
      if (end.reason !== 'completed') return { embeds: [embed], components: [] };
      const rematch = new ButtonBuilder()
        .setCustomId(encodeCustomId({ type: 'rematch', sessionId: session.id }))
        .setLabel('🔁 다시 하기')
        .setStyle(ButtonStyle.Primary);
      return { embeds: [embed], components: [row(rematch)] };
    }
  }
}
