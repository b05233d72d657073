/**
 * QUERY BUILDER
 *
 * Turns validated report parameters into a MongoDB filter:
 * - the canonical value of a field → anchored, case-insensitive pattern
 * - any other allowed value → plain equality
 * - list parameters → $in
 * - date range → { $gte, $lte } on one field, or $or over two fields
 *
 * Separate fields combine with implicit AND.
 */

import type { Document, Filter } from 'mongodb';
import type {
  DateRange,
  DateRangeSpec,
  FieldSpec,
  FieldValue,
  ReportDefinition,
  ValidatedParams,
} from '../types/report.types';

export interface RangeCondition {
  $gte: Date;
  $lte: Date;
}

export interface AnchoredPattern {
  $regex: string;
  $options: 'i';
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function anchoredPattern(value: string): AnchoredPattern {
  return { $regex: `^${escapeRegex(value)}$`, $options: 'i' };
}

export function rangeCondition(range: DateRange): RangeCondition {
  return { $gte: range.from, $lte: range.to };
}

type FieldCondition = string | number | AnchoredPattern | { $in: string[] };

function fieldCondition(field: FieldSpec, value: FieldValue): FieldCondition {
  if (Array.isArray(value)) {
    return { $in: value };
  }
  if (field.kind === 'enum' && field.canonical !== undefined && value === field.canonical) {
    return anchoredPattern(value);
  }
  return value;
}

function applyDateRange(filter: Filter<Document>, spec: DateRangeSpec, range: DateRange): void {
  if (spec.targets.length === 2) {
    const [first, second] = spec.targets;
    filter.$or = [
      { [first]: rangeCondition(range) },
      { [second]: rangeCondition(range) },
    ];
    return;
  }
  filter[spec.targets[0]] = rangeCondition(range);
}

/**
 * Builds the filter for a report. Runs only on parameters that already
 * passed validateReportParameters.
 */
export function buildReportFilter(definition: ReportDefinition, params: ValidatedParams): Filter<Document> {
  const filter: Filter<Document> = { ...definition.fixedFilter };

  for (const field of definition.fields) {
    const value = params.values[field.param];
    if (value === undefined) continue;
    filter[field.target] = fieldCondition(field, value);
  }

  if (definition.dateRange && params.dateRange) {
    applyDateRange(filter, definition.dateRange, params.dateRange);
  }

  return filter;
}
