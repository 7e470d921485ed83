export interface ImportConfig {
  supabaseUrl: string;
  supabaseKey: string;
  logDir: string;
  line: string;
  chunkSize: number;
  deltaSeconds: number;
  checkpointFile: string;
  resultsTable: string;
  intervalSeconds: number;
}

type Env = Record<string, string | undefined>;

const REQUIRED_KEYS = ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY', 'AOI_DIR', 'AOI_LINE'] as const;

export const DEFAULT_CHUNK_SIZE = 10;
export const DEFAULT_CHECKPOINT_FILE = 'last_date.txt';
export const DEFAULT_RESULTS_TABLE = 'smt_aoi_results';
export const DEFAULT_INTERVAL_SECONDS = 300;

function readInt(raw: string | undefined, fallback: number, min: number): number {
  const s = raw?.trim() ?? '';
  if (!/^\d+$/.test(s)) return fallback;
  const n = Number(s);
  return n >= min ? n : fallback;
}

function readString(env: Env, key: string): string {
  return env[key]?.trim() ?? '';
}

export function loadConfig(env: Env = process.env): ImportConfig {
  const missing = REQUIRED_KEYS.filter((key) => !readString(env, key));
  if (missing.length > 0) {
    throw new Error(`Missing configuration: ${missing.join(', ')}`);
  }

  return {
    supabaseUrl: readString(env, 'SUPABASE_URL'),
    supabaseKey: readString(env, 'SUPABASE_SERVICE_ROLE_KEY'),
    logDir: readString(env, 'AOI_DIR'),
    line: readString(env, 'AOI_LINE'),
    chunkSize: readInt(env.AOI_CHUNKS, DEFAULT_CHUNK_SIZE, 1),
    deltaSeconds: readInt(env.AOI_DELTA_T, 0, 0),
    checkpointFile: readString(env, 'AOI_CHECKPOINT_FILE') || DEFAULT_CHECKPOINT_FILE,
    resultsTable: readString(env, 'AOI_RESULTS_TABLE') || DEFAULT_RESULTS_TABLE,
    // 0 runs a single pass
    intervalSeconds: readInt(env.AOI_INTERVAL_S, DEFAULT_INTERVAL_SECONDS, 0),
  };
}
