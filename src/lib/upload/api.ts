import type { SupabaseClient } from '@supabase/supabase-js';
import type { Panel } from '../../types/inspection';
import type { ResultRow, ResultsSink, UploadSummary } from '../../types/upload';
import { chunk, panelToRows } from './rows';

export const RESULTS_CONFLICT_KEY = 'serial_nmbr,date_time';

export function supabaseResultsSink(client: SupabaseClient, table: string): ResultsSink {
  return {
    async insert(rows: ResultRow[]) {
      const { error } = await client
        .from(table)
        .upsert(rows, { onConflict: RESULTS_CONFLICT_KEY, ignoreDuplicates: true });
      if (error) throw new Error(error.message);
    },
  };
}

export async function uploadPanels(
  sink: ResultsSink,
  panels: Panel[],
  chunkSize: number,
): Promise<UploadSummary> {
  let uploadedRows = 0;
  let failedChunks = 0;

  for (const group of chunk(panels, chunkSize)) {
    const rows = group.flatMap(panelToRows);
    if (rows.length === 0) continue;

    try {
      await sink.insert(rows);
      uploadedRows += rows.length;
    } catch (err) {
      failedChunks++;
      console.error('[Upload] Chunk failed:', err instanceof Error ? err.message : String(err));
    }
  }

  return { uploadedRows, failedChunks, allOk: failedChunks === 0 };
}
