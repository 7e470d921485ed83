import type { DateStamp, DocumentKind, SectionResult } from '../../types/inspection';
import { childElement } from './xml';
import { readChildText, readDateStamp } from './fields';
import { sectionError } from './errors';

const MIN_YEAR = 2000;

export interface GlobalInfo {
  kind: DocumentKind;
  program: string;
  operator: string;
  inspectionTime: Date;
  repairTime: Date | null;
}

function checkStamp(label: 'Inspection' | 'Repair', stamp: DateStamp): SectionResult<Date> {
  if (stamp.status === 'absent') {
    return sectionError('INVALID_TIMESTAMP', 'GlobalInformation', `${label} date/time is missing`, { field: label });
  }
  if (stamp.status === 'unparsable') {
    return sectionError(
      'INVALID_TIMESTAMP',
      'GlobalInformation',
      `${label} date/time "${stamp.raw}" is not YYYYMMDD HHMMSS`,
      { field: label, value: stamp.raw },
    );
  }
  const year = stamp.value.getFullYear();
  if (year < MIN_YEAR) {
    return sectionError(
      'INVALID_TIMESTAMP',
      'GlobalInformation',
      `${label} year ${year} is before ${MIN_YEAR}`,
      { field: label, value: String(year) },
    );
  }
  return { ok: true, value: stamp.value };
}

export function interpretGlobalInformation(root: Element): SectionResult<GlobalInfo> {
  const section = childElement(root, 'GlobalInformation');
  if (!section) {
    return sectionError('MISSING_SECTION', 'GlobalInformation', 'Could not find <GlobalInformation>');
  }

  const programNode = childElement(section, 'Program');
  const program = programNode ? readChildText(programNode, 'InspectionPlanName') : '';

  const inspectionNode = childElement(section, 'Inspection');
  const inspectionStamp: DateStamp = inspectionNode ? readDateStamp(inspectionNode) : { status: 'absent' };

  const repairNode = childElement(section, 'Repair');
  const kind: DocumentKind = repairNode ? 'REPAIR' : 'AOI_AXI';
  const operator = repairNode ? readChildText(repairNode, 'OperatorName').toUpperCase() : '';

  console.debug(`[InspectionLog] Program: ${program}, kind: ${kind}`);

  if (!program) {
    return sectionError('MISSING_FIELD', 'GlobalInformation', 'Program has no InspectionPlanName', {
      field: 'Program/InspectionPlanName',
    });
  }

  const inspection = checkStamp('Inspection', inspectionStamp);
  if (!inspection.ok) return inspection;

  let repairTime: Date | null = null;
  if (repairNode) {
    const repair = checkStamp('Repair', readDateStamp(repairNode));
    if (!repair.ok) return repair;
    repairTime = repair.value;
  }

  return {
    ok: true,
    value: { kind, program, operator, inspectionTime: inspection.value, repairTime },
  };
}
