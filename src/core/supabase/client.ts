import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { appEnv, type AppEnv } from '../env';

let supabaseClient: SupabaseClient | null = null;

export function createSupabaseClient(env: Pick<AppEnv, 'supabaseUrl' | 'supabaseAnonKey'>) {
  if (!env.supabaseUrl || !env.supabaseAnonKey) {
    return null;
  }

  return createClient(env.supabaseUrl, env.supabaseAnonKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
      detectSessionInUrl: false
    }
  });
}

export function getSupabaseClient() {
  if (!supabaseClient) {
    supabaseClient = createSupabaseClient(appEnv);
  }

  return supabaseClient;
}

export function requireSupabaseClient() {
  const client = getSupabaseClient();
  if (!client) {
    throw new Error('Supabase is not configured. Define SUPABASE_URL and SUPABASE_ANON_KEY.');
  }
  return client;
}
