import type { DateStamp } from '../../types/inspection';
import { localDateTime } from '../dateTime';
import { childElement, elementText } from './xml';

const STAMP_PATTERN = /^(\d{4})(\d{2})(\d{2}) (\d{2})(\d{2})(\d{2})$/;

export function readChildText(node: Element, tag: string): string {
  return elementText(childElement(node, tag));
}

export function readNestedText(node: Element, outer: string, inner: string): string {
  const parent = childElement(node, outer);
  if (!parent) return '';
  return readChildText(parent, inner);
}

/**
 * Parses `YYYYMMDD HHMMSS` as a local calendar timestamp.
 */
export function parseStampText(text: string): DateStamp {
  const m = text.match(STAMP_PATTERN);
  if (!m) return { status: 'unparsable', raw: text };

  const [year, month, day, hour, minute, second] = m.slice(1).map(Number);
  const value = localDateTime(year, month, day, hour, minute, second);
  return value ? { status: 'ok', value } : { status: 'unparsable', raw: text };
}

export function readDateStamp(node: Element): DateStamp {
  const date = readNestedText(node, 'Date', 'End');
  const time = readNestedText(node, 'Time', 'End');
  if (!date || !time) return { status: 'absent' };
  return parseStampText(`${date} ${time}`);
}

export function truncateWinId(winId: string): string {
  const idx = winId.lastIndexOf('-');
  return idx === -1 ? winId : winId.slice(0, idx);
}

export function pushUnique(list: string[], value: string): void {
  if (!list.includes(value)) list.push(value);
}
