/**
 * INCIDENT REPORTS
 * Exports over the Incident and Incident_log collections
 */

import type { ColumnSpec, ReportDefinition } from '../types/report.types';

const ACTIONS = ['collect arrears and CPE', 'collect arrears', 'collect CPE'] as const;
const COMMISSION_RULES = ['PEO TV', 'BB'] as const;

const FROM_TO = { fromParam: 'from_date', toParam: 'to_date' } as const;

const INCIDENT_COLUMNS: readonly ColumnSpec[] = [
  { key: 'Incident_Id', kind: 'identifier' },
  { key: 'Incident_Status', kind: 'text' },
  { key: 'Account_Num', kind: 'text' },
];

export const incidentDetailReport: ReportDefinition = {
  id: 20,
  name: 'Incident Detail',
  collection: 'Incident_log',
  title: 'INCIDENT REPORT',
  sheetName: 'INCIDENT REPORT',
  filePrefix: 'incidents_details',
  fields: [
    {
      kind: 'enum',
      param: 'action_type',
      label: 'Action:',
      target: 'Actions',
      allowed: ACTIONS,
      canonical: 'collect arrears and CPE',
    },
    {
      kind: 'enum',
      param: 'status',
      label: 'Status:',
      target: 'Incident_Status',
      allowed: ['Incident Open', 'Reject', 'Complete', 'Incident Error', 'Incident Inprogress'],
      canonical: 'Incident Open',
    },
  ],
  dateRange: { ...FROM_TO, targets: ['Created_Dtm'] },
  columns: [
    { key: 'Incident_Id', kind: 'identifier' },
    { key: 'Account_Num', kind: 'text' },
    { key: 'Incident_Status', kind: 'text' },
    { key: 'Actions', kind: 'text' },
    { key: 'Monitor_Months', kind: 'count' },
    { key: 'Created_By', kind: 'text' },
    { key: 'Created_Dtm', kind: 'timestamp' },
    { key: 'Source_Type', kind: 'text' },
  ],
  timestampFormat: 'datetime',
  auditFilterKeys: { Action: 'action_type', Status: 'status', From_Date: 'from_date', To_Date: 'to_date' },
};

export const openIncidentDistributionReport: ReportDefinition = {
  id: 21,
  name: 'Open Incident Distribution',
  collection: 'Incident_log',
  title: 'OPEN INCIDENT DISTRIBUTION REPORT',
  sheetName: 'OPEN INCIDENT DISTRIBUTION',
  filePrefix: 'incident_open_distribution',
  fields: [],
  fixedFilter: { Incident_Status: 'Incident Open' },
  columns: [
    { key: 'Id', kind: 'identifier' },
    { key: 'Incident_Status', kind: 'text' },
    { key: 'Account_Num', kind: 'text' },
    { key: 'Actions', kind: 'text' },
    { key: 'Amount', kind: 'currency' },
    { key: 'Source_Type', kind: 'text' },
  ],
  timestampFormat: 'datetime',
  auditFilterKeys: {},
};

export const pendingRejectReport: ReportDefinition = {
  id: 22,
  name: 'Pending Reject Incidents',
  collection: 'Incident',
  title: 'PENDING REJECT INCIDENT REPORT',
  sheetName: 'PENDING REJECT INCIDENT REPORT',
  filePrefix: 'pending_reject_incidents',
  fields: [
    {
      kind: 'enum-list',
      param: 'drc_commission_rules',
      label: 'DRC Commission Rules:',
      target: 'Filtered_Reason',
      allowed: COMMISSION_RULES,
    },
  ],
  dateRange: { ...FROM_TO, targets: ['Rejected_Dtm'] },
  fixedFilter: { Incident_Status: { $in: ['Incident Reject'] } },
  columns: [
    ...INCIDENT_COLUMNS,
    { key: 'Filtered_Reason', kind: 'text' },
    { key: 'Rejected_Dtm', kind: 'timestamp' },
    { key: 'Source_Type', kind: 'text' },
  ],
  timestampFormat: 'datetime',
  auditFilterKeys: { DRC_Commission_Rule: 'drc_commission_rules', From_Date: 'from_date', To_Date: 'to_date' },
};

export const directLodReport: ReportDefinition = {
  id: 23,
  name: 'Direct LOD Incidents',
  collection: 'Incident',
  title: 'DIRECT LOD INCIDENTS REPORT',
  sheetName: 'DIRECT LOD INCIDENTS REPORT',
  filePrefix: 'direct_lod_incidents',
  fields: [
    {
      kind: 'enum',
      param: 'drc_commission_rules',
      label: 'DRC Commission Rule:',
      target: 'drc_commision_rule',
      allowed: COMMISSION_RULES,
      canonical: 'PEO TV',
    },
  ],
  dateRange: { ...FROM_TO, targets: ['Created_Dtm'] },
  fixedFilter: { Incident_Status: 'Direct LOD' },
  fixedFilterSummary: [{ label: 'Incident Status:', value: 'Direct LOD' }],
  columns: [
    ...INCIDENT_COLUMNS,
    { key: 'Amount', kind: 'currency' },
    { key: 'Source_Type', kind: 'text' },
  ],
  timestampFormat: 'datetime',
  autoFilterThroughData: true,
  auditFilterKeys: { From_Date: 'from_date', To_Date: 'to_date', DRC_Commission_Rule: 'drc_commission_rules' },
};

export const cpeIncidentReport: ReportDefinition = {
  id: 24,
  name: 'CPE Incidents',
  collection: 'Incident_log',
  title: 'CPE INCIDENT REPORT',
  sheetName: 'CPE INCIDENT REPORT',
  filePrefix: 'cpe_incidents',
  fields: [
    {
      kind: 'enum',
      param: 'drc_commission_rules',
      label: 'DRC Commission Rule:',
      target: 'drc_commision_rule',
      allowed: COMMISSION_RULES,
      canonical: 'PEO TV',
    },
  ],
  dateRange: { ...FROM_TO, targets: ['Created_Dtm'] },
  fixedFilter: { Actions: 'collect CPE' },
  fixedFilterSummary: [{ label: 'Action:', value: 'collect CPE' }],
  columns: [
    ...INCIDENT_COLUMNS,
    { key: 'Actions', kind: 'text' },
    { key: 'Created_Dtm', kind: 'timestamp' },
  ],
  timestampFormat: 'datetime',
  autoFilterThroughData: true,
  auditFilterKeys: { From_Date: 'from_date', To_Date: 'to_date', DRC_Commission_Rule: 'drc_commission_rules' },
};

export const digitalSignatureReport: ReportDefinition = {
  id: 39,
  name: 'Digital Signatures',
  collection: 'case_details',
  title: 'DIGITAL SIGNATURES RELEVANT LOD REPORT',
  sheetName: 'DIGITAL SIGNATURES LOD REPORT',
  filePrefix: 'digital_signatures_relevant_lod',
  fields: [
    {
      kind: 'enum',
      param: 'case_current_status',
      label: 'Case Current Status:',
      target: 'Case_current_status',
      allowed: ['Abandoned', 'LIT prescribed'],
      canonical: 'Abandoned',
    },
  ],
  columns: [
    ...INCIDENT_COLUMNS,
    { key: 'Created_Dtm', kind: 'timestamp' },
    { key: 'Filtered_Reason', kind: 'text' },
  ],
  timestampFormat: 'datetime',
  autoFilterThroughData: true,
  auditFilterKeys: { Case_Current_Status: 'case_current_status' },
};

export const lodFinalReminderReport: ReportDefinition = {
  id: 40,
  name: 'LOD or Final Reminder',
  collection: 'Incident',
  title: 'EACH LOD OR FINAL REMINDER REPORT',
  sheetName: 'LOD OR FINAL REMINDER REPORT',
  filePrefix: 'each_lod_or_final_reminder',
  fields: [
    {
      kind: 'enum',
      param: 'case_current_status',
      label: 'Actions:',
      target: 'Actions',
      allowed: ['collect CPE', 'collect arrears', 'collect arrears and CPE'],
      canonical: 'collect CPE',
    },
    {
      kind: 'enum',
      param: 'current_document_type',
      label: 'Document Type:',
      target: 'current_document_type',
      allowed: COMMISSION_RULES,
      canonical: 'PEO TV',
    },
  ],
  columns: [
    ...INCIDENT_COLUMNS,
    { key: 'Created_Dtm', kind: 'timestamp' },
    { key: 'Filtered_Reason', kind: 'text' },
    { key: 'Rejected_Dtm', kind: 'timestamp' },
    { key: 'Rejected_By', kind: 'text' },
  ],
  timestampFormat: 'datetime',
  autoFilterThroughData: true,
  auditFilterKeys: { Case_Current_Status: 'case_current_status', Current_Document_Type: 'current_document_type' },
};
