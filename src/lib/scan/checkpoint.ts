import { readFile, writeFile } from 'node:fs/promises';
import { formatDateTime, parseDateTime } from '../dateTime';

export function formatCheckpoint(d: Date): string {
  return formatDateTime(d);
}

export function parseCheckpoint(text: string): Date | null {
  return parseDateTime(text.trim());
}

export async function readCheckpoint(path: string): Promise<Date> {
  const text = await readFile(path, 'utf8');
  const value = parseCheckpoint(text);
  if (!value) {
    throw new Error(`Checkpoint ${path} holds "${text.trim()}", expected YYYY-MM-DD HH:MM:SS`);
  }
  return value;
}

export async function writeCheckpoint(path: string, d: Date): Promise<void> {
  await writeFile(path, formatCheckpoint(d), 'utf8');
}
