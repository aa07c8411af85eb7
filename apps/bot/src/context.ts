import type { GameDispatcher } from '@duelhall/core';

import type { Env } from './lib/env.js';
import type { SupabaseAdminClient } from './lib/supabase.js';

export type BotContext = {
  env: Env;
  supabase: SupabaseAdminClient;
  games: GameDispatcher;
};

let ctx: BotContext | null = null;

export function setBotContext(next: BotContext) {
  ctx = next;
}

export function getBotContext(): BotContext {
  if (!ctx) throw new Error('Bot context not initialized');
  return ctx;
}
