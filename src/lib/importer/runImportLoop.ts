import type { ImportConfig } from '../config';
import type { ImportDeps, ImportSummary } from '../../types/importer';
import { runImport } from './runImport';

type LoopConfig = Pick<ImportConfig, 'logDir' | 'line' | 'chunkSize' | 'deltaSeconds' | 'checkpointFile' | 'intervalSeconds'>;

export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

function report(summary: ImportSummary): void {
  console.log(
    `[Import] Pass done: ${summary.parsed}/${summary.files} parsed, ${summary.uploadedRows} row(s) uploaded, health ${summary.health}`
  );
}

/**
 * Runs an import pass, then one more every `intervalSeconds` until `signal`
 * aborts. An interval of 0 runs a single pass. Resolves with the last summary.
 */
export async function runImportLoop(config: LoopConfig, deps: ImportDeps, signal: AbortSignal): Promise<ImportSummary> {
  const wait = deps.sleep ?? sleep;

  let summary = await runImport(config, deps);
  report(summary);

  while (config.intervalSeconds > 0 && !signal.aborted) {
    await wait(config.intervalSeconds * 1000, signal);
    if (signal.aborted) break;
    summary = await runImport(config, deps);
    report(summary);
  }

  return summary;
}
