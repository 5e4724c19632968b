import { createClient } from '@supabase/supabase-js';
import type { RecordInsertClient } from '@/lib/cribbageEventLog';

export interface SupabaseSettings {
  url: string;
  key: string;
}

/**
 * Supabase client narrowed to the inserts the record sink performs.
 * Sessions are never persisted; this process only writes.
 */
export function createSupabaseRecordClient(settings: SupabaseSettings): RecordInsertClient {
  const supabase = createClient(settings.url, settings.key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });

  return {
    async insert(table, row) {
      const { error } = await supabase.from(table).insert(row);
      return { error: error ? { message: error.message } : null };
    },
  };
}
