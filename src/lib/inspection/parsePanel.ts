import type { Board, DocumentKind, PanelParseError, PanelParseResult } from '../../types/inspection';
import { parseXmlDocument } from './xml';
import { pushUnique } from './fields';
import { interpretGlobalInformation } from './globalInfo';
import { interpretPcbInformation } from './boards';
import { interpretComponentInformation, shouldScanWindows } from './windows';
import type { DefectFinding } from './windows';

const STATION_SUFFIX: Record<DocumentKind, string> = {
  REPAIR: 'HARAN',
  AOI_AXI: 'AOI_AXI',
};

export function stationName(line: string, kind: DocumentKind): string {
  return `${line}_${STATION_SUFFIX[kind]}`;
}

function fail(error: PanelParseError, source?: string): PanelParseResult {
  return { ok: false, error: source ? { ...error, source } : error };
}

function applyFindings(boards: Board[], findings: DefectFinding[]): void {
  for (const f of findings) {
    const board = boards[f.boardIndex];
    pushUnique(f.pseudo ? board.pseudoFailures : board.failures, f.winId);
  }
}

// Code point order, not UTF-16 code units.
function compareSerial(a: Board, b: Board): number {
  const x = Array.from(a.serial);
  const y = Array.from(b.serial);
  for (let i = 0; i < Math.min(x.length, y.length); i++) {
    const diff = (x[i].codePointAt(0) ?? 0) - (y[i].codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return x.length - y.length;
}

export function parsePanel(root: Element, line: string, source?: string): PanelParseResult {
  const global = interpretGlobalInformation(root);
  if (!global.ok) return fail(global.error, source);

  const boardSet = interpretPcbInformation(root);
  if (!boardSet.ok) return fail(boardSet.error, source);

  const { kind } = global.value;
  const { boards, anyFailed } = boardSet.value;

  if (shouldScanWindows(kind, anyFailed)) {
    const findings = interpretComponentInformation(root, kind, boards.length);
    if (!findings.ok) return fail(findings.error, source);
    applyFindings(boards, findings.value);
  }

  const sorted = [...boards]
    .sort(compareSerial)
    .map((board, i) => ({ ...board, position: i + 1 }));

  return {
    ok: true,
    panel: {
      ...global.value,
      station: stationName(line, kind),
      boards: sorted,
    },
  };
}

export function parsePanelXml(text: string, line: string, source?: string): PanelParseResult {
  if (source) console.debug(`[InspectionLog] Processing ${source}`);

  const root = parseXmlDocument(text);
  if (!root) {
    return fail({ code: 'MALFORMED_XML', section: 'Document', message: 'Document is not well-formed XML' }, source);
  }
  return parsePanel(root, line, source);
}
