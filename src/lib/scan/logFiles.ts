import type { Dirent } from 'node:fs';
import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { formatDayFolder } from '../dateTime';

const TEMP_SUFFIXES = ['_AOI', '_AXI'];

const utf8 = new TextDecoder('utf-8', { fatal: true });

function startOfDay(d: Date): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate());
}

export function dayFoldersBetween(start: Date, end: Date): string[] {
  const folders: string[] = [];
  const last = startOfDay(end);
  for (let day = startOfDay(start); day <= last; day = new Date(day.getFullYear(), day.getMonth(), day.getDate() + 1)) {
    folders.push(formatDayFolder(day));
  }
  return folders;
}

export function isInspectionLogFile(name: string): boolean {
  const ext = extname(name);
  if (ext !== '.xml' && ext !== '.XML') return false;
  const stem = basename(name, ext);
  return !TEMP_SUFFIXES.some((suffix) => stem.endsWith(suffix));
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export async function findLogFiles(root: string, since: Date, now: Date = new Date()): Promise<string[]> {
  const files: string[] = [];

  for (const folder of dayFoldersBetween(since, now)) {
    const dir = join(root, folder);
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (isMissing(err)) continue;
      throw err;
    }
    console.debug(`[Scan] ${dir}: ${entries.length} entries`);

    for (const entry of entries) {
      if (!entry.isFile() || !isInspectionLogFile(entry.name)) continue;
      const path = join(dir, entry.name);
      let mtime: Date;
      try {
        mtime = (await stat(path)).mtime;
      } catch (err) {
        if (isMissing(err)) continue;
        throw err;
      }
      if (mtime >= since) files.push(path);
    }
  }

  return files.sort();
}

export async function readLogFile(path: string): Promise<string> {
  const bytes = await readFile(path);
  try {
    return utf8.decode(bytes);
  } catch {
    throw new Error(`${path} is not valid UTF-8`);
  }
}
