/**
 * Environment-driven settings
 */

import dotenv from 'dotenv';

dotenv.config();

export interface Settings {
  port: number;
  catalog_file: string;
  catalog_table: string;
  default_exchange_rate: number;
  local_currency: string;
  supabase_url?: string;
  supabase_anon_key?: string;
}

function numberSetting(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    console.warn(`⚠️ Invalid ${name}="${raw}" - using ${fallback}`);
    return fallback;
  }
  return value;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    port: numberSetting(env, 'PORT', 3000),
    catalog_file: env.CATALOG_FILE || 'data/parts_catalog.json',
    catalog_table: env.CATALOG_TABLE || 'parts_catalog',
    default_exchange_rate: numberSetting(env, 'DEFAULT_EXCHANGE_RATE', 3.75),
    local_currency: env.LOCAL_CURRENCY || 'SAR',
    supabase_url: env.SUPABASE_URL,
    supabase_anon_key: env.SUPABASE_ANON_KEY
  };
}

export const settings = loadSettings();
