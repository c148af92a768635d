/**
 * Supabase Database Client
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { settings } from './settings';

let supabaseClient: SupabaseClient | null = null;

export function isDatabaseConfigured(): boolean {
  const url = settings.supabase_url;
  const key = settings.supabase_anon_key;
  return !!(url && key &&
            url !== 'your_supabase_url_here' &&
            key !== 'your_supabase_anon_key_here');
}

export function getSupabaseClient(): SupabaseClient {
  if (!supabaseClient) {
    const url = settings.supabase_url;
    const key = settings.supabase_anon_key;
    if (!url || !key) {
      throw new Error('Missing Supabase credentials in environment variables');
    }
    supabaseClient = createClient(url, key, {
      auth: { persistSession: false }
    });
  }
  return supabaseClient;
}

export async function testConnection(): Promise<boolean> {
  try {
    if (!isDatabaseConfigured()) return false;
    const client = getSupabaseClient();
    const { error } = await client.from(settings.catalog_table).select('part_no').limit(1);
    return !error;
  } catch (err) {
    console.error('❌ Database connection test failed:', err);
    return false;
  }
}
