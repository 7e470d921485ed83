import type { LogSection, PanelParseError, PanelParseErrorCode, SectionResult } from '../../types/inspection';

export function sectionError<T>(
  code: PanelParseErrorCode,
  section: LogSection,
  message: string,
  details: { field?: string; value?: string } = {},
): SectionResult<T> {
  return { ok: false, error: { code, section, message, ...details } };
}

export function describeParseError(error: PanelParseError): string {
  const where = error.source ? `${error.source}: ` : '';
  return `${where}[${error.code}] <${error.section}> ${error.message}`;
}
