/**
 * REPORT CATALOGUE
 * Template task id → report definition
 */

import type { ReportDefinition, ReportTypeId } from '../types/report.types';
import {
  cpeIncidentReport,
  digitalSignatureReport,
  directLodReport,
  incidentDetailReport,
  lodFinalReminderReport,
  openIncidentDistributionReport,
  pendingRejectReport,
} from './incident.reports';
import {
  batchApprovalReport,
  batchListReport,
  caseDistributionReport,
  drcSummaryReport,
  managerApprovalReport,
} from './case-distribution.reports';
import { requestLogReport, requestResponseLogReport } from './request.reports';

export const REPORT_DEFINITIONS: Readonly<Record<ReportTypeId, ReportDefinition>> = {
  20: incidentDetailReport,
  21: openIncidentDistributionReport,
  22: pendingRejectReport,
  23: directLodReport,
  24: cpeIncidentReport,
  26: caseDistributionReport,
  27: batchListReport,
  30: batchApprovalReport,
  32: drcSummaryReport,
  33: managerApprovalReport,
  37: requestLogReport,
  38: requestResponseLogReport,
  39: digitalSignatureReport,
  40: lodFinalReminderReport,
};

function isReportTypeId(value: number): value is ReportTypeId {
  return Object.prototype.hasOwnProperty.call(REPORT_DEFINITIONS, value);
}

/**
 * Looks up the report for a task's template id. Accepts the number or its
 * decimal string; anything else resolves to null.
 */
export function resolveReport(templateId: unknown): ReportDefinition | null {
  let id: number;
  if (typeof templateId === 'number') {
    id = templateId;
  } else if (typeof templateId === 'string' && /^\s*\d+\s*$/.test(templateId)) {
    id = parseInt(templateId, 10);
  } else {
    return null;
  }
  return isReportTypeId(id) ? REPORT_DEFINITIONS[id] : null;
}

export * from './incident.reports';
export * from './case-distribution.reports';
export * from './request.reports';
