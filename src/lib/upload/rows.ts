import type { Panel } from '../../types/inspection';
import type { ResultRow } from '../../types/upload';
import { formatDateTime } from '../dateTime';

function joinOrNull(items: string[]): string | null {
  return items.length > 0 ? items.join(', ') : null;
}

export function panelTimestamp(panel: Panel): Date {
  return panel.kind === 'REPAIR' && panel.repairTime ? panel.repairTime : panel.inspectionTime;
}

export function panelToRows(panel: Panel): ResultRow[] {
  const dateTime = formatDateTime(panelTimestamp(panel));
  return panel.boards.map((board) => ({
    serial_nmbr: board.serial,
    board_nmbr: board.position,
    program: panel.program,
    station: panel.station,
    operator: panel.operator || null,
    result: board.result,
    date_time: dateTime,
    failed: joinOrNull(board.failures),
    pseudo_error: joinOrNull(board.pseudoFailures),
  }));
}

export function chunk<T>(items: T[], size: number): T[][] {
  const step = Math.max(1, Math.floor(size));
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += step) {
    out.push(items.slice(i, i + step));
  }
  return out;
}
