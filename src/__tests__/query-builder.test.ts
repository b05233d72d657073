/**
 * TESTS: QUERY BUILDER
 * Filters produced from validated parameters, and how they match documents
 */

import { anchoredPattern, buildReportFilter } from '../services/query-builder.service';
import { validateReportParameters } from '../utils/validators';
import {
  directLodReport,
  incidentDetailReport,
  openIncidentDistributionReport,
  pendingRejectReport,
} from '../reports/incident.reports';
import { batchListReport } from '../reports/case-distribution.reports';
import { requestLogReport, requestResponseLogReport } from '../reports/request.reports';
import type { ReportDefinition } from '../types/report.types';
import { matchesFilter } from './helpers/memory-store';

function filterFor(definition: ReportDefinition, raw: Record<string, unknown>) {
  return buildReportFilter(definition, validateReportParameters(definition, raw));
}

const JANUARY = {
  $gte: new Date('2025-01-01T00:00:00.000Z'),
  $lte: new Date('2025-01-31T23:59:59.000Z'),
};

describe('buildReportFilter', () => {
  test('plain value plus date range on one field', () => {
    const filter = filterFor(incidentDetailReport, {
      action_type: 'collect CPE',
      status: null,
      from_date: '2025-01-01',
      to_date: '2025-01-31',
    });

    expect(filter).toEqual({ Actions: 'collect CPE', Created_Dtm: JANUARY });
  });

  test('canonical value becomes an anchored case-insensitive pattern', () => {
    const filter = filterFor(incidentDetailReport, { action_type: 'collect arrears and CPE' });
    expect(filter).toEqual({ Actions: { $regex: '^collect arrears and CPE$', $options: 'i' } });
  });

  test('only the canonical value of a field uses a pattern', () => {
    expect(filterFor(incidentDetailReport, { status: 'Incident Open' })).toEqual({
      Incident_Status: { $regex: '^Incident Open$', $options: 'i' },
    });
    expect(filterFor(incidentDetailReport, { status: 'Reject' })).toEqual({ Incident_Status: 'Reject' });
  });

  test('list parameters match with $in on top of the fixed filter', () => {
    const filter = filterFor(pendingRejectReport, {
      drc_commission_rules: ['PEO TV', 'BB'],
      from_date: '2025-01-01',
      to_date: '2025-01-31',
    });

    expect(filter).toEqual({
      Incident_Status: { $in: ['Incident Reject'] },
      Filtered_Reason: { $in: ['PEO TV', 'BB'] },
      Rejected_Dtm: JANUARY,
    });
  });

  test('fixed filters apply with no parameters', () => {
    expect(filterFor(openIncidentDistributionReport, {})).toEqual({ Incident_Status: 'Incident Open' });
    expect(filterFor(incidentDetailReport, {})).toEqual({});
  });

  test('does not modify the definition fixed filter', () => {
    filterFor(directLodReport, { drc_commission_rules: 'BB' });
    expect(directLodReport.fixedFilter).toEqual({ Incident_Status: 'Direct LOD' });
  });

  test('two date fields combine with $or', () => {
    const filter = filterFor(requestResponseLogReport, {
      case_current_status: 'Closed',
      from_date: '2025-01-01',
      to_date: '2025-01-31',
    });

    expect(filter).toEqual({
      Status: 'Closed',
      $or: [{ 'Approved on': JANUARY }, { 'Letter issued on': JANUARY }],
    });
  });

  test('text and numeric parameters use equality', () => {
    expect(filterFor(requestLogReport, { delegate_user_id: ' user-7 ', user_interaction_type: 'RO' })).toEqual({
      delegate_user_id: 'user-7',
      'Request Type': 'RO',
    });
    expect(filterFor(batchListReport, { case_distribution_batch_id: '2' })).toEqual({ case_distribution_batch_id: 2 });
  });
});

describe('anchoredPattern', () => {
  test('escapes pattern characters', () => {
    expect(anchoredPattern('a.b (c)+')).toEqual({ $regex: '^a\\.b \\(c\\)\\+$', $options: 'i' });
  });
});

describe('filters against documents', () => {
  const canonical = filterFor(incidentDetailReport, { action_type: 'collect arrears and CPE' });

  test('the canonical pattern matches any casing of the whole value', () => {
    expect(matchesFilter({ Actions: 'Collect Arrears and CPE' }, canonical)).toBe(true);
    expect(matchesFilter({ Actions: 'collect arrears and CPE' }, canonical)).toBe(true);
  });

  test('the canonical pattern does not match a longer value', () => {
    expect(matchesFilter({ Actions: 'collect arrears and CPE later' }, canonical)).toBe(false);
  });

  test('plain values match exactly', () => {
    const filter = filterFor(incidentDetailReport, { action_type: 'collect CPE' });
    expect(matchesFilter({ Actions: 'collect CPE' }, filter)).toBe(true);
    expect(matchesFilter({ Actions: 'Collect CPE' }, filter)).toBe(false);
  });

  test('the range includes the last second of to_date', () => {
    const filter = filterFor(incidentDetailReport, { from_date: '2025-01-01', to_date: '2025-01-31' });
    expect(matchesFilter({ Created_Dtm: new Date('2025-01-31T23:59:59.000Z') }, filter)).toBe(true);
    expect(matchesFilter({ Created_Dtm: new Date('2025-02-01T00:00:00.000Z') }, filter)).toBe(false);
    expect(matchesFilter({ Created_Dtm: new Date('2024-12-31T23:59:59.000Z') }, filter)).toBe(false);
  });
});
