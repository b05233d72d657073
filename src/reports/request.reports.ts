/**
 * REQUEST REPORTS
 * Request_log and Case_log exports
 */

import type { ColumnSpec, ReportDefinition } from '../types/report.types';

const VALIDITY_PERIOD: ColumnSpec = {
  key: 'Validity Period',
  kind: 'period',
  startKey: 'Validity Period Start',
  endKey: 'Validity Period End',
};

export const requestLogReport: ReportDefinition = {
  id: 37,
  name: 'Request Log',
  collection: 'Request_log',
  title: 'REQUEST LOG REPORT',
  sheetName: 'REQUEST LOG REPORT',
  filePrefix: 'request_log_details',
  fields: [
    { kind: 'text', param: 'delegate_user_id', label: 'Delegate User ID:', target: 'delegate_user_id' },
    {
      kind: 'enum',
      param: 'user_interaction_type',
      label: 'Interaction Type:',
      target: 'Request Type',
      allowed: ['FMB', 'RO', 'Admin'],
    },
    {
      kind: 'enum',
      param: 'request_accept',
      label: 'Request Status:',
      target: 'Approved',
      allowed: ['Approved', 'Pending', 'Rejected'],
    },
  ],
  dateRange: { fromParam: 'from_date', toParam: 'to_date', targets: ['Requested date'] },
  columns: [
    { key: 'Case ID', header: 'Case ID', kind: 'text' },
    { key: 'Status', kind: 'text' },
    { key: 'Request Status', kind: 'text' },
    { key: 'Amount', kind: 'currency' },
    VALIDITY_PERIOD,
    { key: 'DRC', header: 'DRC', kind: 'text' },
    { key: 'Request Type', kind: 'text' },
    { key: 'Requested date', kind: 'timestamp' },
    { key: 'Approved', kind: 'text' },
  ],
  timestampFormat: 'us-date',
  auditFilterKeys: {
    Delegate_User_Id: 'delegate_user_id',
    User_Interaction_Type: 'user_interaction_type',
    Request_Accept: 'request_accept',
    From_Date: 'from_date',
    To_Date: 'to_date',
  },
};

export const requestResponseLogReport: ReportDefinition = {
  id: 38,
  name: 'Request Response Log',
  collection: 'Case_log',
  title: 'REQUEST RESPONSE LOG REPORT',
  sheetName: 'REQUEST RESPONSE LOG REPORT',
  filePrefix: 'request_response_log',
  fields: [
    {
      kind: 'enum',
      param: 'case_current_status',
      label: 'Status:',
      target: 'Status',
      allowed: ['Pending FMB', 'In progress', 'Closed'],
      canonical: 'Pending FMB',
    },
  ],
  dateRange: { fromParam: 'from_date', toParam: 'to_date', targets: ['Approved on', 'Letter issued on'] },
  columns: [
    { key: 'Case ID', header: 'Case ID', kind: 'text' },
    { key: 'Status', kind: 'text' },
    { key: 'Request status', kind: 'text' },
    VALIDITY_PERIOD,
    { key: 'DRC', header: 'DRC', kind: 'text' },
    { key: 'Request Details', kind: 'text' },
    { key: 'Letter issued on', kind: 'timestamp' },
    { key: 'Approved on', kind: 'timestamp' },
    { key: 'Approved by', kind: 'text' },
    { key: 'Remark', kind: 'text' },
  ],
  timestampFormat: 'datetime',
  auditFilterKeys: { Case_Current_Status: 'case_current_status', From_Date: 'from_date', To_Date: 'to_date' },
};
