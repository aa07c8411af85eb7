import { z } from 'zod';
import type { GameConfig } from '@duelhall/core';

const optionalString = z.preprocess((v) => (v === '' ? undefined : v), z.string().min(1).optional());
const seconds = (fallback: number, min = 1) => z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z.object({
  DISCORD_CLIENT_ID: z.string().min(1),
  DISCORD_BOT_TOKEN: z.string().min(1),
  // 비어 있으면 전역 등록
  DISCORD_GUILD_ID: optionalString,
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),
  CHALLENGE_TIMEOUT_SECONDS: seconds(60),
  CONFIRMATION_TIMEOUT_SECONDS: seconds(60),
  AFK_TIMEOUT_SECONDS: seconds(180),
  AFK_SWEEP_INTERVAL_SECONDS: seconds(10),
  // 0 이면 꽝 카드를 바로 숨긴다
  REVEAL_DELAY_SECONDS: seconds(2, 0)
});

export type Env = z.infer<typeof EnvSchema>;

export function assertEnv(env: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Invalid environment:\n${issues}`);
  }
  return parsed.data;
}

export function gameConfigFromEnv(env: Env): Partial<GameConfig> {
  return {
    challengeTimeoutMs: env.CHALLENGE_TIMEOUT_SECONDS * 1000,
    confirmationTimeoutMs: env.CONFIRMATION_TIMEOUT_SECONDS * 1000,
    afkTimeoutMs: env.AFK_TIMEOUT_SECONDS * 1000,
    afkSweepIntervalMs: env.AFK_SWEEP_INTERVAL_SECONDS * 1000,
    revealDelayMs: env.REVEAL_DELAY_SECONDS * 1000
  };
}
