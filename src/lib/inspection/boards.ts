import type { Board, SectionResult } from '../../types/inspection';
import { childElement, childElements } from './xml';
import { readChildText } from './fields';
import { sectionError } from './errors';

export interface BoardSet {
  boards: Board[];
  anyFailed: boolean;
}

function emptyBoard(serial: string, result: string): Board {
  return { serial, position: 0, result, failures: [], pseudoFailures: [] };
}

export function interpretPcbInformation(root: Element): SectionResult<BoardSet> {
  const section = childElement(root, 'PCBInformation');
  if (!section) return { ok: true, value: { boards: [], anyFailed: false } };

  const entries = childElements(section);
  const slots: Array<Board | null> = entries.map(() => null);
  console.debug(`[InspectionLog] PCB count: ${slots.length}`);

  let anyFailed = false;
  const singles = entries.filter((el) => el.localName === 'SinglePCB');

  for (let i = 0; i < singles.length; i++) {
    const serial = readChildText(singles[i], 'Barcode');
    const result = readChildText(singles[i], 'Result');

    if (!serial || !result) {
      return sectionError(
        'MISSING_FIELD',
        'PCBInformation',
        `SinglePCB #${i + 1} is missing ${serial ? 'Result' : 'Barcode'}`,
        serial ? { field: 'Result', value: serial } : { field: 'Barcode' },
      );
    }

    if (result !== 'PASS') anyFailed = true;
    slots[i] = emptyBoard(serial, result);
  }

  const boards: Board[] = [];
  for (let i = 0; i < slots.length; i++) {
    const board = slots[i];
    if (!board || !board.serial || !board.result) {
      return sectionError(
        'INCONSISTENT_BOARD',
        'PCBInformation',
        `Board slot ${i + 1} of ${slots.length} has no serial or result`,
        { field: entries[i].localName },
      );
    }
    boards.push(board);
  }

  return { ok: true, value: { boards, anyFailed } };
}
