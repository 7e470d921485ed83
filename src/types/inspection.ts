export type DocumentKind = 'AOI_AXI' | 'REPAIR';

export interface Board {
  serial: string;
  position: number;
  result: string;
  failures: string[];
  pseudoFailures: string[];
}

export interface Panel {
  kind: DocumentKind;
  program: string;
  station: string;
  operator: string;
  inspectionTime: Date;
  repairTime: Date | null;
  boards: Board[];
}

export type DateStamp =
  | { status: 'absent' }
  | { status: 'unparsable'; raw: string }
  | { status: 'ok'; value: Date };

export type PanelParseErrorCode =
  | 'MALFORMED_XML'
  | 'MISSING_SECTION'
  | 'MISSING_FIELD'
  | 'INVALID_TIMESTAMP'
  | 'UNPARSABLE_BOARD_NUMBER'
  | 'BOARD_OUT_OF_RANGE'
  | 'INCONSISTENT_BOARD';

export type LogSection =
  | 'Document'
  | 'GlobalInformation'
  | 'PCBInformation'
  | 'ComponentInformation';

export interface PanelParseError {
  code: PanelParseErrorCode;
  section: LogSection;
  field?: string;
  value?: string;
  source?: string;
  message: string;
}

export type PanelParseResult =
  | { ok: true; panel: Panel }
  | { ok: false; error: PanelParseError };

export type SectionResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: PanelParseError };
