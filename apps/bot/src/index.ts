import { config } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
config({ path: resolve(__dirname, '../../../.env.local') });

import { Client, GatewayIntentBits, REST, Routes } from 'discord.js';
import { GameDispatcher } from '@duelhall/core';

import { commandJson } from './commands/index.js';
import { setBotContext } from './context.js';
import { registerInteractionCreate } from './events/interactionCreate.js';
import { DiscordRenderer } from './games/renderer.js';
import { assertEnv, gameConfigFromEnv } from './lib/env.js';
import { createSupabaseAdminClient } from './lib/supabase.js';
import { DiscordIdentityResolver } from './services/identity.js';
import { SupabaseStatsRecorder } from './services/stats.js';

const env = assertEnv(process.env);

const supabase = createSupabaseAdminClient(env);

const client = new Client({
  intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMembers]
});

const games = new GameDispatcher({
  renderer: new DiscordRenderer(client),
  recorder: new SupabaseStatsRecorder(supabase),
  identity: new DiscordIdentityResolver(client),
  config: gameConfigFromEnv(env)
});

setBotContext({ env, supabase, games });

registerInteractionCreate(client);

client.once('ready', async () => {
  console.log(`Bot ready as ${client.user?.tag ?? 'unknown'}`);

  // 1) 슬래시 커맨드 등록 (길드 지정 시 즉시 반영)
  const rest = new REST({ version: '10' }).setToken(env.DISCORD_BOT_TOKEN);
  const route = env.DISCORD_GUILD_ID
    ? Routes.applicationGuildCommands(env.DISCORD_CLIENT_ID, env.DISCORD_GUILD_ID)
    : Routes.applicationCommands(env.DISCORD_CLIENT_ID);
  try {
    await rest.put(route, { body: commandJson() });
  } catch (error) {
    console.error('[Bot] 슬래시 커맨드 등록 실패:', error);
  }

  // 2) 잠수 세션 정리 시작
  games.startReaper();
});

const shutdown = (signal: string) => {
  console.log(`[Bot] ${signal} 수신, 종료합니다.`);
  games.shutdown();
  client
    .destroy()
    .catch((error: unknown) => console.error('[Bot] client destroy failed:', error))
    .finally(() => process.exit(0));
};

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));

await client.login(env.DISCORD_BOT_TOKEN);
