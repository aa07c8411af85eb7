import { describe, it, expect } from 'vitest';

import { encodeCustomId, parseCustomId } from './customIds.js';

describe('game custom ids', () => {
  it('encodes board buttons with their position', () => {
    expect(encodeCustomId({ type: 'flip', sessionId: 's-1', row: 4, col: 2 })).toBe('game:flip:s-1:4:2');
    expect(encodeCustomId({ type: 'challenge', challengeId: 'c-9', decision: 'decline' })).toBe(
      'game:challenge:c-9:decline'
    );
  });

  it('parses what it encodes', () => {
    expect(parseCustomId('game:place:s-1:0:2')).toEqual({ type: 'place', sessionId: 's-1', row: 0, col: 2 });
    expect(parseCustomId('game:confirm:f-3:accept')).toEqual({
      type: 'confirm',
      confirmationId: 'f-3',
      decision: 'accept'
    });
    expect(parseCustomId('game:choose:s-1:rock')).toEqual({ type: 'choose', sessionId: 's-1', choice: 'rock' });
    expect(parseCustomId('game:rematch:s-1')).toEqual({ type: 'rematch', sessionId: 's-1' });
  });

  it('carries leaderboard scope, filter and page', () => {
    expect(encodeCustomId({ type: 'leaderboard', scope: 'global', game: 'rps', page: 12 })).toBe(
      'game:leaderboard:global:rps:12'
    );
    expect(parseCustomId('game:leaderboard:server:all:3')).toEqual({
      type: 'leaderboard',
      scope: 'server',
      game: 'all',
      page: 3
    });
    expect(parseCustomId('game:leaderboard_game:global')).toEqual({ type: 'leaderboard_game', scope: 'global' });
    expect(parseCustomId('game:leaderboard:planet:all:0')).toBeNull();
    expect(parseCustomId('game:leaderboard:server:chess:0')).toBeNull();
    expect(parseCustomId('game:leaderboard:server:all:-1')).toBeNull();
  });

  it('ignores foreign or malformed ids', () => {
    expect(parseCustomId('music_filter_apply')).toBeNull();
    expect(parseCustomId('game:flip:s-1:x:2')).toBeNull();
    expect(parseCustomId('game:flip:s-1:12:2')).toBeNull();
    expect(parseCustomId('game:challenge:c-1:maybe')).toBeNull();
    expect(parseCustomId('game:unknown:s-1')).toBeNull();
    expect(parseCustomId('game:end')).toBeNull();
  });
});
