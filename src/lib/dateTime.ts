const DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

function daysInMonth(year: number, month: number): number {
  const d = new Date(2000, month, 0);
  d.setFullYear(year, month, 0);
  return d.getDate();
}

export function localDateTime(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
): Date | null {
  if (
    month < 1 || month > 12 ||
    day < 1 || day > daysInMonth(year, month) ||
    hour > 23 || minute > 59 || second > 59
  ) {
    return null;
  }
  const value = new Date(year, month - 1, day, hour, minute, second);
  // Date maps years 0-99 onto 1900-1999
  value.setFullYear(year, month - 1, day);
  return value;
}

export function formatDateTime(d: Date): string {
  return (
    `${pad(d.getFullYear(), 4)}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

export function parseDateTime(text: string): Date | null {
  const m = text.match(DATE_TIME_PATTERN);
  if (!m) return null;
  const [year, month, day, hour, minute, second] = m.slice(1).map(Number);
  return localDateTime(year, month, day, hour, minute, second);
}

export function formatDayFolder(d: Date): string {
  return `${pad(d.getFullYear(), 4)}_${pad(d.getMonth() + 1)}_${pad(d.getDate())}`;
}
