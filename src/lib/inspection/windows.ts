import type { DocumentKind, SectionResult } from '../../types/inspection';
import { childElement, childElements } from './xml';
import { readChildText, readNestedText, truncateWinId } from './fields';
import { sectionError } from './errors';

export const PSEUDO_DEFECT_CODE = 'Pszeudohiba';
export const NO_DEFECT_CODE = '0';

export interface DefectFinding {
  boardIndex: number;
  winId: string;
  pseudo: boolean;
}

interface WindowFields {
  winId: string;
  pcbNumber: string;
  code: string;
}

type WindowReader = (
  window: Element,
  ordinal: number,
  boardCount: number,
) => SectionResult<DefectFinding | null>;

function parseBoardNumber(raw: string): number | null {
  return /^\+?\d+$/.test(raw) ? Number(raw) : null;
}

function readFields(window: Element, codePath: [string, string]): WindowFields {
  return {
    winId: readChildText(window, 'WinID'),
    pcbNumber: readChildText(window, 'PCBNumber'),
    code: readNestedText(window, codePath[0], codePath[1]),
  };
}

function missingFields(fields: WindowFields, ordinal: number, codeLabel: string): SectionResult<DefectFinding | null> | null {
  const missing = !fields.winId ? 'WinID' : !fields.pcbNumber ? 'PCBNumber' : !fields.code ? codeLabel : null;
  if (!missing) return null;
  return sectionError(
    'MISSING_FIELD',
    'ComponentInformation',
    `Window #${ordinal} is incomplete: WinID "${fields.winId}", PCBNumber "${fields.pcbNumber}", result "${fields.code}"`,
    { field: missing },
  );
}

function unparsableNumber(raw: string, ordinal: number): SectionResult<DefectFinding | null> {
  return sectionError(
    'UNPARSABLE_BOARD_NUMBER',
    'ComponentInformation',
    `Window #${ordinal}: could not parse PCBNumber "${raw}"`,
    { field: 'PCBNumber', value: raw },
  );
}

const readRepairWindow: WindowReader = (window, ordinal, boardCount) => {
  const fields = readFields(window, ['Result', 'ErrorDescription']);
  const incomplete = missingFields(fields, ordinal, 'Result/ErrorDescription');
  if (incomplete) return incomplete;

  const index = parseBoardNumber(fields.pcbNumber);
  if (index === null) return unparsableNumber(fields.pcbNumber, ordinal);

  if (index >= boardCount) {
    console.debug(`[InspectionLog] Window #${ordinal} references unknown board index ${index}, ignored`);
    return { ok: true, value: null };
  }

  return {
    ok: true,
    value: {
      boardIndex: index,
      winId: truncateWinId(fields.winId),
      pseudo: fields.code === PSEUDO_DEFECT_CODE,
    },
  };
};

const readInspectionWindow: WindowReader = (window, ordinal, boardCount) => {
  const fields = readFields(window, ['Analysis', 'Result']);
  const incomplete = missingFields(fields, ordinal, 'Analysis/Result');
  if (incomplete) return incomplete;

  if (fields.code === NO_DEFECT_CODE) return { ok: true, value: null };

  const boardNumber = parseBoardNumber(fields.pcbNumber);
  if (boardNumber === null) return unparsableNumber(fields.pcbNumber, ordinal);

  if (boardNumber === 0) {
    return sectionError(
      'BOARD_OUT_OF_RANGE',
      'ComponentInformation',
      `Window #${ordinal}: PCBNumber is 0, expected 1+`,
      { field: 'PCBNumber', value: fields.pcbNumber },
    );
  }
  if (boardNumber > boardCount) {
    return sectionError(
      'BOARD_OUT_OF_RANGE',
      'ComponentInformation',
      `Window #${ordinal}: could not find board number ${boardNumber} of ${boardCount}`,
      { field: 'PCBNumber', value: fields.pcbNumber },
    );
  }

  return {
    ok: true,
    value: { boardIndex: boardNumber - 1, winId: truncateWinId(fields.winId), pseudo: false },
  };
};

const WINDOW_READERS: Record<DocumentKind, WindowReader> = {
  REPAIR: readRepairWindow,
  AOI_AXI: readInspectionWindow,
};

export function shouldScanWindows(kind: DocumentKind, anyFailed: boolean): boolean {
  return kind === 'REPAIR' || anyFailed;
}

export function interpretComponentInformation(
  root: Element,
  kind: DocumentKind,
  boardCount: number,
): SectionResult<DefectFinding[]> {
  const section = childElement(root, 'ComponentInformation');
  if (!section) return { ok: true, value: [] };

  const readWindow = WINDOW_READERS[kind];
  const findings: DefectFinding[] = [];
  const windows = childElements(section);

  for (let i = 0; i < windows.length; i++) {
    const read = readWindow(windows[i], i + 1, boardCount);
    if (!read.ok) return read;
    if (read.value) findings.push(read.value);
  }

  console.debug(`[InspectionLog] ${findings.length} defect window(s) in ${windows.length}`);
  return { ok: true, value: findings };
}
