import type { RESTPostAPIApplicationCommandsJSONBody } from 'discord-api-types/v10';

import { endgameCommand } from './endgame.js';
import { helpCommand } from './help.js';
import { leaderboardCommand } from './leaderboard.js';
import { matchingCommand } from './matching.js';
import { rpsActionCommand, rpsCommand } from './rps.js';
import { statsCommand } from './stats.js';
import { tictactoeCommand } from './tictactoe.js';
import type { SlashCommand } from './types.js';

export const commands: SlashCommand[] = [
  matchingCommand,
  tictactoeCommand,
  rpsCommand,
  rpsActionCommand,
  endgameCommand,
  leaderboardCommand,
  statsCommand,
  helpCommand
];

export function commandJson(): RESTPostAPIApplicationCommandsJSONBody[] {
  return commands.map((c) => c.json);
}
