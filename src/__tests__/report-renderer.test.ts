/**
 * TESTS: REPORT RENDERER
 * Sheet layout, cell formatting, autofilter and column widths
 */

import ExcelJS from 'exceljs';
import { ObjectId } from 'mongodb';
import {
  STYLES,
  describeFilters,
  formatCellValue,
  renderReportSheet,
  toHeaderTitle,
} from '../services/report-renderer.service';
import { validateReportParameters } from '../utils/validators';
import {
  directLodReport,
  incidentDetailReport,
  openIncidentDistributionReport,
  pendingRejectReport,
} from '../reports/incident.reports';
import { requestLogReport } from '../reports/request.reports';
import type { ReportRecord } from '../types/entities';
import type { ReportDefinition } from '../types/report.types';
import { createSilentLogger } from './helpers/test-context';

const logger = createSilentLogger();

function render(definition: ReportDefinition, records: ReportRecord[], raw: Record<string, unknown> = {}) {
  const workbook = new ExcelJS.Workbook();
  const params = validateReportParameters(definition, raw);
  const ok = renderReportSheet(workbook, definition, records, describeFilters(definition, params), logger);
  const ws = workbook.getWorksheet(definition.sheetName);
  if (!ws) throw new Error(`sheet ${definition.sheetName} was not created`);
  return { ok, ws };
}

function rowValues(ws: ExcelJS.Worksheet, row: number, count: number): unknown[] {
  const values: unknown[] = [];
  for (let col = 1; col <= count; col++) {
    values.push(ws.getCell(row, col).value);
  }
  return values;
}

const JANUARY = { action_type: 'collect CPE', status: null, from_date: '2025-01-01', to_date: '2025-01-31' };

// ============================================
// Layout
// ============================================
describe('sheet layout', () => {
  test('title row is merged across every column', () => {
    const { ok, ws } = render(incidentDetailReport, [], JANUARY);

    expect(ok).toBe(true);
    expect(ws.getCell(1, 1).value).toBe('INCIDENT REPORT');
    expect(ws.getCell(1, 8).isMerged).toBe(true);
    expect(ws.getCell(1, 8).master.address).toBe('A1');
    expect(ws.getCell(1, 1).font).toEqual(STYLES.mainHeader.font);
  });

  test('active filters fill rows 3.. with label and value, framed by blank rows', () => {
    const { ws } = render(incidentDetailReport, [], JANUARY);

    expect(ws.getRow(2).hasValues).toBe(false);
    expect(rowValues(ws, 3, 3)).toEqual([null, 'Action:', 'collect CPE']);
    expect(rowValues(ws, 4, 3)).toEqual([null, 'Date Range:', '2025-01-01 to 2025-01-31']);
    expect(ws.getRow(5).hasValues).toBe(false);
    expect(ws.getCell(3, 2).font).toEqual(STYLES.filterParameter.font);
    expect(ws.getCell(3, 3).font).toEqual(STYLES.filterValue.font);
  });

  test('header row follows the filters, title-cased', () => {
    const { ws } = render(incidentDetailReport, [], JANUARY);

    expect(rowValues(ws, 6, 8)).toEqual([
      'Incident Id',
      'Account Num',
      'Incident Status',
      'Actions',
      'Monitor Months',
      'Created By',
      'Created Dtm',
      'Source Type',
    ]);
    expect(ws.getCell(6, 1).font).toEqual(STYLES.subHeader.font);
  });

  test('an empty record set holds only title, filter and header rows', () => {
    const { ws } = render(incidentDetailReport, [], JANUARY);

    expect(ws.actualRowCount).toBe(1 + 2 + 1);
    expect(ws.rowCount).toBe(6);
  });

  test('without active filters the header sits on row 3', () => {
    const { ws } = render(openIncidentDistributionReport, []);

    expect(ws.rowCount).toBe(3);
    expect(rowValues(ws, 3, 6)).toEqual(['Id', 'Incident Status', 'Account Num', 'Actions', 'Amount', 'Source Type']);
  });

  test('fixed filters are listed before parameters', () => {
    const { ws } = render(directLodReport, [], { drc_commission_rules: 'BB' });

    expect(rowValues(ws, 3, 3)).toEqual([null, 'Incident Status:', 'Direct LOD']);
    expect(rowValues(ws, 4, 3)).toEqual([null, 'DRC Commission Rule:', 'BB']);
    expect(ws.getCell(6, 1).value).toBe('Incident Id');
  });
});

// ============================================
// Data rows
// ============================================
describe('data rows', () => {
  const record: ReportRecord = {
    Incident_Id: new ObjectId('65a1b2c3d4e5f60718293a4b'),
    Incident_Status: 'Incident Open',
    Account_Num: 'ACC-1001',
    Actions: 'collect CPE',
    Monitor_Months: '3.0',
    Created_Dtm: new Date('2025-01-10T08:15:00.000Z'),
    Source_Type: 'Pilot',
  };

  test('one row per record, formatted per column kind', () => {
    const { ws } = render(incidentDetailReport, [record, record], JANUARY);

    expect(rowValues(ws, 7, 8)).toEqual([
      '65a1b2c3d4e5f60718293a4b',
      'ACC-1001',
      'Incident Open',
      'collect CPE',
      3,
      '',
      '2025-01-10 08:15:00',
      'Pilot',
    ]);
    expect(ws.rowCount).toBe(8);
    expect(ws.getCell(7, 1).border).toEqual(STYLES.dataCell.border);
  });

  test('US date reports format dates, periods and amounts', () => {
    const { ws } = render(requestLogReport, [
      {
        'Case ID': 'C-1',
        Amount: 2500,
        'Validity Period Start': new Date('2025-01-01T00:00:00.000Z'),
        'Validity Period End': new Date('2025-06-30T00:00:00.000Z'),
        'Requested date': new Date('2025-02-03T00:00:00.000Z'),
      },
    ]);

    expect(ws.getCell(3, 1).value).toBe('Case ID');
    expect(rowValues(ws, 4, 9)).toEqual([
      'C-1',
      '',
      '',
      '2,500.00',
      '01/01/2025 - 06/30/2025',
      '',
      '',
      '02/03/2025',
      '',
    ]);
  });
});

// ============================================
// Autofilter and widths
// ============================================
describe('autofilter', () => {
  test('covers the header row only by default', () => {
    const { ws } = render(incidentDetailReport, [{ Incident_Id: 'INC-1' }], JANUARY);
    expect(ws.autoFilter).toEqual({ from: { row: 6, column: 1 }, to: { row: 6, column: 8 } });
  });

  test('runs through the last data row when the report asks for it', () => {
    const { ws } = render(directLodReport, [{ Incident_Id: 'INC-1' }, { Incident_Id: 'INC-2' }]);
    expect(ws.autoFilter).toEqual({ from: { row: 5, column: 1 }, to: { row: 7, column: 5 } });
  });
});

describe('column widths', () => {
  test('are (longest content + 2) x 1.2, never below 20 x 1.2', () => {
    const { ws } = render(openIncidentDistributionReport, [{ Actions: 'collect arrears and CPE plus a long note' }]);

    // title 'OPEN INCIDENT DISTRIBUTION REPORT' sits in column 1
    expect(ws.getColumn(1).width).toBeCloseTo(35 * 1.2);
    expect(ws.getColumn(2).width).toBeCloseTo(20 * 1.2);
    expect(ws.getColumn(4).width).toBeCloseTo(42 * 1.2);
  });
});

// ============================================
// Failure
// ============================================
describe('failure', () => {
  test('returns false and logs when a cell cannot be built', () => {
    const errorLogger = createSilentLogger();
    const spy = jest.spyOn(errorLogger, 'error');
    const broken: ReportRecord = {};
    Object.defineProperty(broken, 'Account_Num', {
      enumerable: true,
      get() {
        throw new Error('unreadable field');
      },
    });

    const workbook = new ExcelJS.Workbook();
    const ok = renderReportSheet(workbook, openIncidentDistributionReport, [broken], [], errorLogger);

    expect(ok).toBe(false);
    expect(spy).toHaveBeenCalledTimes(1);
  });
});

// ============================================
// Helpers
// ============================================
describe('toHeaderTitle', () => {
  test.each([
    ['Created_Dtm', 'Created Dtm'],
    ['case_count', 'Case Count'],
    ['Requested date', 'Requested Date'],
    ['tot_arrease', 'Tot Arrease'],
  ])('%s → %s', (key, title) => {
    expect(toHeaderTitle(key)).toBe(title);
  });
});

describe('formatCellValue', () => {
  test('identifiers keep their string form', () => {
    expect(formatCellValue({ key: 'id', kind: 'identifier' }, { id: 42 }, 'datetime')).toBe('42');
  });

  test('counts coerce numeric values and leave other text alone', () => {
    const column = { key: 'n', kind: 'count' } as const;
    expect(formatCellValue(column, { n: 7.9 }, 'datetime')).toBe(7);
    expect(formatCellValue(column, { n: 'many' }, 'datetime')).toBe('many');
  });

  test('currency leaves non-numeric values as they are', () => {
    expect(formatCellValue({ key: 'a', kind: 'currency' }, { a: 'pending' }, 'datetime')).toBe('pending');
  });

  test('a period without both dates falls back to its own field', () => {
    const column = { key: 'Validity Period', kind: 'period', startKey: 's', endKey: 'e' } as const;
    expect(formatCellValue(column, { 'Validity Period': '2025 H1' }, 'us-date')).toBe('2025 H1');
    expect(formatCellValue(column, {}, 'us-date')).toBe('');
  });

  test('nested values are written as JSON', () => {
    expect(formatCellValue({ key: 'x', kind: 'text' }, { x: { a: 1 } }, 'datetime')).toBe('{"a":1}');
  });
});

describe('describeFilters', () => {
  test('joins list values and marks absent parameters as null', () => {
    const params = validateReportParameters(pendingRejectReport, { drc_commission_rules: ['PEO TV', 'BB'] });
    expect(describeFilters(pendingRejectReport, params)).toEqual([
      { label: 'DRC Commission Rules:', value: 'PEO TV, BB' },
      { label: 'Date Range:', value: null },
    ]);
  });
});
