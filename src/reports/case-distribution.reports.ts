/**
 * CASE DISTRIBUTION REPORTS
 * DRC transactions, batches, summaries and approvals
 */

import type { ReportRecord } from '../types/entities';
import type { ReportDefinition, ValidatedParams } from '../types/report.types';

export const caseDistributionReport: ReportDefinition = {
  id: 26,
  name: 'Case Distribution Transactions',
  collection: 'Case_distribution_drc_transactions',
  title: 'CASE DISTRIBUTION DRC TRANSACTION LIST',
  sheetName: 'CASE DISTRIBUTION REPORT',
  filePrefix: 'case_distribution_details',
  fields: [
    {
      kind: 'enum',
      param: 'current_arrears_band',
      label: 'Arrears Band:',
      target: 'Arrears Band',
      allowed: ['AB-5_10', 'AB-25_50'],
    },
    {
      kind: 'enum',
      param: 'drc_commission_rules',
      label: 'DRC Commission Rule:',
      target: 'drc_commision_rule',
      allowed: ['PEO TV', 'BB'],
      canonical: 'PEO TV',
    },
  ],
  dateRange: { fromParam: 'from_date', toParam: 'to_date', targets: ['Created Dtm'] },
  columns: [
    { key: 'Case Distribution Batch ID', header: 'Case Distribution Batch ID', kind: 'identifier' },
    { key: 'Created Dtm', kind: 'timestamp' },
    { key: 'Distributed Status', kind: 'text' },
    { key: 'Action Type', kind: 'text' },
    { key: 'DRC Commission Rule', header: 'DRC Commission Rule', kind: 'text' },
    { key: 'Arrears Band', kind: 'text' },
    { key: 'Case Count', kind: 'count' },
    { key: 'Approval', kind: 'text' },
  ],
  timestampFormat: 'datetime',
  auditFilterKeys: {
    Arrears_Band: 'current_arrears_band',
    DRC_Commission_Rule: 'drc_commission_rules',
    From_Date: 'from_date',
    To_Date: 'to_date',
  },
};

export const batchListReport: ReportDefinition = {
  id: 27,
  name: 'Case Distribution Batch List',
  collection: 'Case_distribution_drc_transactions',
  title: 'CASE DISTRIBUTION BATCH LIST',
  sheetName: 'CASE DISTRIBUTION BATCH LIST',
  filePrefix: 'case_distribution_batch_list',
  fields: [
    {
      kind: 'enum',
      param: 'case_distribution_batch_id',
      label: 'Case Distribution Batch ID:',
      target: 'case_distribution_batch_id',
      allowed: [1, 2],
    },
  ],
  columns: [
    { key: 'batch_seq', header: 'Batch Sequence', kind: 'count' },
    { key: 'rulebase_count', header: 'Rulebase Count', kind: 'count' },
    { key: 'approved_on', header: 'Approved On', kind: 'timestamp' },
  ],
  timestampFormat: 'datetime',
  auditFilterKeys: { Case_Distribution_Batch_Id: 'case_distribution_batch_id' },
};

export const batchApprovalReport: ReportDefinition = {
  id: 30,
  name: 'DRC Assign Batch Approval',
  collection: 'Template_forwarded_approver',
  title: 'DRC ASSIGN BATCH APPROVAL REPORT',
  sheetName: 'DRC ASSIGN BATCH APPROVAL',
  filePrefix: 'drc_assign_batch_approval',
  fields: [
    {
      kind: 'enum',
      param: 'approver_ref',
      label: 'Approver Reference:',
      target: 'approver_ref',
      allowed: ['k1', 'k2'],
    },
  ],
  columns: [
    { key: 'Batch_id', header: 'Batch ID', kind: 'identifier' },
    { key: 'created_dtm', kind: 'timestamp' },
    { key: 'drc_commision_rule', header: 'DRC Commission Rule', kind: 'text' },
    { key: 'approval_type', kind: 'text' },
    { key: 'case_count', kind: 'count' },
    { key: 'total_arrears', kind: 'currency' },
  ],
  timestampFormat: 'datetime',
  auditFilterKeys: { Approver_Ref: 'approver_ref' },
};

export const drcSummaryReport: ReportDefinition = {
  id: 32,
  name: 'DRC Summary',
  collection: 'Case_Distribution_DRC_Summary',
  title: 'DRC SUMMARY REPORT',
  sheetName: 'DRC SUMMARY REPORT',
  filePrefix: 'drc_summary',
  fields: [
    {
      kind: 'enum',
      param: 'drc_id',
      label: 'DRC:',
      target: 'drc_id',
      allowed: ['D1', 'D2'],
      canonical: 'D1',
    },
    {
      kind: 'enum',
      param: 'case_distribution_batch_id',
      label: 'Case Distribution Batch ID:',
      target: 'case_distribution_batch_id',
      allowed: [1, 2, 3],
    },
  ],
  columns: [
    { key: 'created_dtm', kind: 'timestamp' },
    { key: 'drc_id', header: 'DRC ID', kind: 'identifier' },
    { key: 'drc', header: 'DRC', kind: 'text' },
    { key: 'case_count', kind: 'count' },
    { key: 'tot_arrease', header: 'Total Arrears', kind: 'currency' },
    { key: 'proceed_on', kind: 'timestamp' },
  ],
  timestampFormat: 'datetime',
  auditFilterKeys: { DRC_Id: 'drc_id', Case_Distribution_Batch_Id: 'case_distribution_batch_id' },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * One row per entry of a case's `approve` array, restricted to the requested
 * approval type when one was given.
 */
export function flattenApprovals(records: ReportRecord[], params: ValidatedParams): ReportRecord[] {
  const wanted = params.values.approval_type;
  const wantedType = typeof wanted === 'string' ? wanted.toLowerCase() : null;
  const rows: ReportRecord[] = [];

  for (const record of records) {
    const approvals: unknown[] = Array.isArray(record.approve) ? record.approve : [];

    for (const approval of approvals) {
      if (!isRecord(approval)) continue;
      const approvalType = approval.approval_type;
      if (wantedType && (typeof approvalType !== 'string' || approvalType.toLowerCase() !== wantedType)) {
        continue;
      }
      rows.push({
        case_id: record.case_id ?? '',
        created_dtm: record.created_dtm ?? '',
        created_by: record.created_by ?? '',
        approval_type: approvalType ?? '',
        approve_status: approval.approve_status ?? '',
        approved_by: approval.approved_by ?? '',
        remark: approval.remark ?? '',
      });
    }
  }

  return rows;
}

export const managerApprovalReport: ReportDefinition = {
  id: 33,
  name: 'DRC Manager Approval',
  collection: 'Case_details',
  title: 'DRC APPROVAL REPORT',
  sheetName: 'DRC APPROVAL REPORT',
  filePrefix: 'drc_approval',
  fields: [
    {
      kind: 'enum',
      param: 'approval_type',
      label: 'Approval Type:',
      target: 'approve.approval_type',
      allowed: ['a1', 'a2'],
      canonical: 'a1',
    },
  ],
  dateRange: { fromParam: 'from_date', toParam: 'to_date', targets: ['Created_Dtm'] },
  columns: [
    { key: 'case_id', header: 'Case ID', kind: 'identifier' },
    { key: 'created_dtm', kind: 'timestamp' },
    { key: 'created_by', kind: 'text' },
    { key: 'approval_type', kind: 'text' },
    { key: 'approve_status', kind: 'text' },
    { key: 'approved_by', kind: 'text' },
    { key: 'remark', kind: 'text' },
  ],
  timestampFormat: 'datetime',
  autoFilterThroughData: true,
  transform: flattenApprovals,
  auditFilterKeys: { Approval_Type: 'approval_type', From_Date: 'from_date', To_Date: 'to_date' },
};
