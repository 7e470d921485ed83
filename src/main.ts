import { loadConfig } from './lib/config';
import { createSupabase } from './lib/supabase';
import { supabaseResultsSink } from './lib/upload/api';
import { runImportLoop } from './lib/importer/runImportLoop';

async function main(): Promise<void> {
  const config = loadConfig();
  console.log(`[Import] Starting uploader for line ${config.line}, interval ${config.intervalSeconds}s`);

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`[Import] ${signal} received, stopping after the current pass`);
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  const client = createSupabase(config);
  const summary = await runImportLoop(
    config,
    { sink: supabaseResultsSink(client, config.resultsTable) },
    controller.signal,
  );

  process.off('SIGINT', shutdown);
  process.off('SIGTERM', shutdown);
  if (summary.health !== 'ok') process.exitCode = 1;
}

main().catch((err) => {
  console.error('[Import] Fatal:', err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
