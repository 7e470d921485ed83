import type { ImportConfig } from '../config';
import type { ImportDeps, ImportSummary } from '../../types/importer';
import type { Panel } from '../../types/inspection';
import { parsePanelXml, describeParseError } from '../inspection';
import { uploadPanels } from '../upload/api';
import { findLogFiles, readLogFile } from '../scan/logFiles';
import { readCheckpoint, writeCheckpoint } from '../scan/checkpoint';

type RunConfig = Pick<ImportConfig, 'logDir' | 'line' | 'chunkSize' | 'deltaSeconds' | 'checkpointFile'>;

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function emptySummary(since: Date | null): ImportSummary {
  return {
    since,
    files: 0,
    parsed: 0,
    rejected: 0,
    uploadedRows: 0,
    failedChunks: 0,
    checkpointAdvanced: false,
    health: 'error',
  };
}

/**
 * One pass over the log folders: every document modified since the last
 * checkpoint is parsed and uploaded. The checkpoint only moves when nothing
 * was rejected and every chunk uploaded.
 */
export async function runImport(config: RunConfig, deps: ImportDeps): Promise<ImportSummary> {
  const now = deps.now ?? (() => new Date());
  const findFiles = deps.findLogFiles ?? findLogFiles;
  const readLog = deps.readLog ?? readLogFile;
  const loadCheckpoint = deps.readCheckpoint ?? readCheckpoint;
  const saveCheckpoint = deps.writeCheckpoint ?? writeCheckpoint;

  const startedAt = now();

  let since: Date;
  try {
    const last = await loadCheckpoint(config.checkpointFile);
    since = new Date(last.getTime() - config.deltaSeconds * 1000);
  } catch (err) {
    console.error('[Import] Failed to read checkpoint:', message(err));
    return emptySummary(null);
  }

  let files: string[];
  try {
    files = await findFiles(config.logDir, since, startedAt);
  } catch (err) {
    console.error('[Import] Failed to gather logs:', message(err));
    return emptySummary(since);
  }
  console.log(`[Import] ${files.length} log(s) since ${since.toISOString()}`);

  const panels: Panel[] = [];
  let rejected = 0;

  for (const file of files) {
    let text: string;
    try {
      text = await readLog(file);
    } catch (err) {
      rejected++;
      console.warn(`[Import] Could not read ${file}:`, message(err));
      continue;
    }

    const parsed = parsePanelXml(text, config.line, file);
    if (parsed.ok) {
      panels.push(parsed.panel);
    } else {
      rejected++;
      console.warn('[Import] Failed to process log:', describeParseError(parsed.error));
    }
  }

  const upload = await uploadPanels(deps.sink, panels, config.chunkSize);

  let checkpointAdvanced = false;
  if (upload.allOk && rejected === 0) {
    try {
      await saveCheckpoint(config.checkpointFile, startedAt);
      checkpointAdvanced = true;
    } catch (err) {
      console.error('[Import] Failed to write checkpoint:', message(err));
    }
  } else {
    console.error(`[Import] ${rejected} rejected log(s), ${upload.failedChunks} failed chunk(s) - not advancing checkpoint`);
  }

  return {
    since,
    files: files.length,
    parsed: panels.length,
    rejected,
    uploadedRows: upload.uploadedRows,
    failedChunks: upload.failedChunks,
    checkpointAdvanced,
    health: checkpointAdvanced ? 'ok' : 'error',
  };
}
