export { parsePanel, parsePanelXml, stationName } from './parsePanel';
export { describeParseError } from './errors';
export { parseXmlDocument } from './xml';
export { PSEUDO_DEFECT_CODE } from './windows';
export type { Board, DocumentKind, Panel, PanelParseError, PanelParseErrorCode, PanelParseResult } from '../../types/inspection';
