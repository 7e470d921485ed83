import type { ResultsSink } from './upload';

export type ImportHealth = 'ok' | 'error';

export interface ImportSummary {
  since: Date | null;
  files: number;
  parsed: number;
  rejected: number;
  uploadedRows: number;
  failedChunks: number;
  checkpointAdvanced: boolean;
  health: ImportHealth;
}

export interface ImportDeps {
  sink: ResultsSink;
  findLogFiles?: (root: string, since: Date, now: Date) => Promise<string[]>;
  readLog?: (path: string) => Promise<string>;
  readCheckpoint?: (path: string) => Promise<Date>;
  writeCheckpoint?: (path: string, d: Date) => Promise<void>;
  now?: () => Date;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}
