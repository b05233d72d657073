/**
 * TESTS: REPORT CATALOGUE
 */

import {
  REPORT_DEFINITIONS,
  flattenApprovals,
  incidentDetailReport,
  managerApprovalReport,
  resolveReport,
} from '../reports';

const definitions = Object.entries(REPORT_DEFINITIONS);

describe('resolveReport', () => {
  test('accepts numeric ids', () => {
    expect(resolveReport(20)).toBe(incidentDetailReport);
  });

  test('accepts decimal strings', () => {
    expect(resolveReport('33')).toBe(managerApprovalReport);
    expect(resolveReport(' 33 ')).toBe(managerApprovalReport);
  });

  test('returns null for unknown or malformed ids', () => {
    expect(resolveReport(25)).toBeNull();
    expect(resolveReport(20.5)).toBeNull();
    expect(resolveReport('20a')).toBeNull();
    expect(resolveReport(null)).toBeNull();
    expect(resolveReport(undefined)).toBeNull();
  });
});

describe('REPORT_DEFINITIONS', () => {
  test('covers the fourteen supported templates', () => {
    expect(Object.keys(REPORT_DEFINITIONS)).toEqual([
      '20', '21', '22', '23', '24', '26', '27', '30', '32', '33', '37', '38', '39', '40',
    ]);
  });

  test.each(definitions)('template %s is registered under its own id', (key, definition) => {
    expect(String(definition.id)).toBe(key);
  });

  test.each(definitions)('template %s has a sheet name Excel accepts', (_key, definition) => {
    expect(definition.sheetName.length).toBeLessThanOrEqual(31);
    expect(definition.sheetName).not.toMatch(/[\\/?*[\]:]/);
  });

  test('incident detail columns follow the export layout', () => {
    expect(incidentDetailReport.columns.map(column => column.key)).toEqual([
      'Incident_Id',
      'Account_Num',
      'Incident_Status',
      'Actions',
      'Monitor_Months',
      'Created_By',
      'Created_Dtm',
      'Source_Type',
    ]);
  });

  test('file prefixes are unique', () => {
    const prefixes = definitions.map(([, definition]) => definition.filePrefix);
    expect(new Set(prefixes).size).toBe(prefixes.length);
  });

  test.each(definitions)('template %s audits only parameters it declares', (_key, definition) => {
    const declared = new Set(definition.fields.map(field => field.param));
    if (definition.dateRange) {
      declared.add(definition.dateRange.fromParam);
      declared.add(definition.dateRange.toParam);
    }
    for (const param of Object.values(definition.auditFilterKeys)) {
      expect(declared.has(param)).toBe(true);
    }
  });
});

describe('flattenApprovals', () => {
  const records = [
    {
      case_id: 'C-1',
      created_by: 'officer',
      approve: [
        { approval_type: 'A1', approve_status: 'Approved', approved_by: 'mgr-1', remark: 'ok' },
        { approval_type: 'a2', approve_status: 'Pending' },
        'not an approval',
      ],
    },
    { case_id: 'C-2', approve: 'none' },
  ];

  test('emits a row per approval when no type is requested', () => {
    const rows = flattenApprovals(records, { values: {}, dateRange: null });

    expect(rows).toEqual([
      {
        case_id: 'C-1',
        created_dtm: '',
        created_by: 'officer',
        approval_type: 'A1',
        approve_status: 'Approved',
        approved_by: 'mgr-1',
        remark: 'ok',
      },
      {
        case_id: 'C-1',
        created_dtm: '',
        created_by: 'officer',
        approval_type: 'a2',
        approve_status: 'Pending',
        approved_by: '',
        remark: '',
      },
    ]);
  });

  test('keeps only the requested approval type, ignoring case', () => {
    const rows = flattenApprovals(records, { values: { approval_type: 'a1' }, dateRange: null });

    expect(rows.map(row => row.approval_type)).toEqual(['A1']);
  });
});
