import { createClient } from '@supabase/supabase-js';
import type { ImportConfig } from './config';

export function createSupabase(config: Pick<ImportConfig, 'supabaseUrl' | 'supabaseKey' | 'line'>) {
  return createClient(config.supabaseUrl, config.supabaseKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    global: {
      headers: {
        'x-aoi-line': config.line,
      },
    },
  });
}
