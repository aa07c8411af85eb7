import { createClient } from '@supabase/supabase-js';
import type { Database } from '@duelhall/core';

import type { Env } from './env.js';

export function createSupabaseAdminClient(env: Env) {
  return createClient<Database, 'duelhall'>(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
    db: {
      schema: 'duelhall'
    },
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false
    }
  });
}

export type SupabaseAdminClient = ReturnType<typeof createSupabaseAdminClient>;
