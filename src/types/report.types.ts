/**
 * REPORT TYPES
 * Declarative description of each export report and the context it runs in
 */

import type { Document, Filter } from 'mongodb';
import type { AppConfig } from '../config/env';
import type { DocumentStore } from '../config/database';
import type { Logger } from '../utils/logger';
import type { ReportRecord } from './entities';

/** Template task ids with a report behind them. */
export type ReportTypeId = 20 | 21 | 22 | 23 | 24 | 26 | 27 | 30 | 32 | 33 | 37 | 38 | 39 | 40;

export type AllowedValue = string | number;

// ============================================
// PARAMETERS
// ============================================

interface BaseField {
  /** Key in the task's `parameters` mapping */
  param: string;
  /** Label shown in the filter summary block */
  label: string;
  /** Document field the value is matched against */
  target: string;
}

export interface EnumField extends BaseField {
  kind: 'enum';
  allowed: readonly AllowedValue[];
  /** The one value matched through an anchored pattern instead of equality */
  canonical?: string;
}

export interface EnumListField extends BaseField {
  kind: 'enum-list';
  allowed: readonly string[];
}

export interface TextField extends BaseField {
  kind: 'text';
}

export type FieldSpec = EnumField | EnumListField | TextField;

export interface DateRangeSpec {
  fromParam: string;
  toParam: string;
  /** One field, or two fields matched with $or */
  targets: readonly [string] | readonly [string, string];
}

export type FieldValue = string | number | string[];

export interface DateRange {
  from: Date;
  to: Date;
  fromText: string;
  toText: string;
}

export interface ValidatedParams {
  /** Non-null parameter values keyed by parameter name */
  values: Record<string, FieldValue>;
  dateRange: DateRange | null;
}

// ============================================
// RENDERING
// ============================================

interface BaseColumn {
  key: string;
  header?: string;
}

export type ColumnKind = 'text' | 'identifier' | 'timestamp' | 'count' | 'currency';

export interface ValueColumn extends BaseColumn {
  kind: ColumnKind;
}

export interface PeriodColumn extends BaseColumn {
  kind: 'period';
  startKey: string;
  endKey: string;
}

export type ColumnSpec = ValueColumn | PeriodColumn;

export type TimestampFormat = 'datetime' | 'us-date';

export interface FilterSummaryEntry {
  label: string;
  value: string | null;
}

// ============================================
// DEFINITION
// ============================================

export interface ReportDefinition {
  id: ReportTypeId;
  name: string;
  collection: string;
  title: string;
  sheetName: string;
  filePrefix: string;
  fields: readonly FieldSpec[];
  dateRange?: DateRangeSpec;
  fixedFilter?: Filter<Document>;
  fixedFilterSummary?: readonly FilterSummaryEntry[];
  columns: readonly ColumnSpec[];
  timestampFormat: TimestampFormat;
  autoFilterThroughData?: boolean;
  /** Reshapes queried documents into rows before rendering */
  transform?: (records: ReportRecord[], params: ValidatedParams) => ReportRecord[];
  /** Audit key → task parameter name */
  auditFilterKeys: Readonly<Record<string, string>>;
}

// ============================================
// CONTEXT
// ============================================

export interface ReportContext {
  store: DocumentStore;
  config: AppConfig;
  logger: Logger;
  now: () => Date;
  platform: NodeJS.Platform;
}
