/**
 * REPORT RENDERER
 *
 * Lays out one worksheet per report:
 *   row 1            merged title
 *   row 2            blank
 *   rows 3..N+2      active filters (label in column 2, value in column 3)
 *   row N+3          blank (only when N > 0)
 *   header row       one cell per column
 *   data rows        one per record
 * followed by an autofilter and a final column-width pass.
 */

import ExcelJS from 'exceljs';
import { ObjectId } from 'mongodb';
import type { Logger } from '../utils/logger';
import {
  formatCurrency,
  formatIsoDate,
  formatTimestamp,
  formatUsDate,
  toInt,
} from '../utils/db-helpers';
import type { ReportRecord } from '../types/entities';
import type {
  ColumnSpec,
  FilterSummaryEntry,
  ReportDefinition,
  TimestampFormat,
  ValidatedParams,
} from '../types/report.types';

// ============================================
// STYLES
// ============================================

interface CellStyle {
  font: Partial<ExcelJS.Font>;
  fill?: ExcelJS.Fill;
  alignment: Partial<ExcelJS.Alignment>;
  border?: Partial<ExcelJS.Borders>;
}

const THIN_BORDER: Partial<ExcelJS.Borders> = {
  top: { style: 'thin' },
  left: { style: 'thin' },
  bottom: { style: 'thin' },
  right: { style: 'thin' },
};

export const STYLES = {
  mainHeader: {
    font: { name: 'Calibri', size: 16, bold: true, color: { argb: 'FFFFFFFF' } },
    fill: { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF1F4E78' } },
    alignment: { horizontal: 'center', vertical: 'middle' },
  },
  filterParameter: {
    font: { name: 'Calibri', size: 11, bold: true },
    fill: { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFD9E1F2' } },
    alignment: { horizontal: 'left', vertical: 'middle' },
  },
  filterValue: {
    font: { name: 'Calibri', size: 11 },
    fill: { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFF2F2F2' } },
    alignment: { horizontal: 'left', vertical: 'middle' },
  },
  subHeader: {
    font: { name: 'Calibri', size: 11, bold: true, color: { argb: 'FFFFFFFF' } },
    fill: { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF2F75B5' } },
    alignment: { horizontal: 'center', vertical: 'middle', wrapText: true },
    border: THIN_BORDER,
  },
  dataCell: {
    font: { name: 'Calibri', size: 11 },
    alignment: { horizontal: 'left', vertical: 'middle' },
    border: THIN_BORDER,
  },
} satisfies Record<string, CellStyle>;

export type StyleName = keyof typeof STYLES;

const HEADER_WIDTH = 20;
const MIN_WIDTH = 20;
const WIDTH_FACTOR = 1.2;

function applyStyle(cell: ExcelJS.Cell, style: CellStyle): void {
  cell.font = style.font;
  if (style.fill) cell.fill = style.fill;
  cell.alignment = style.alignment;
  if (style.border) cell.border = style.border;
}

// ============================================
// TEXT
// ============================================

/**
 * "Created_Dtm" → "Created Dtm", "case_count" → "Case Count".
 * Letters after the first of each word are lower-cased.
 */
export function toHeaderTitle(key: string): string {
  return key
    .replace(/_/g, ' ')
    .replace(/[A-Za-z]+/g, word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

function formatDate(date: Date, format: TimestampFormat): string {
  return format === 'us-date' ? formatUsDate(date) : formatTimestamp(date);
}

function formatPlain(value: unknown, format: TimestampFormat): string | number {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (value instanceof Date) return formatDate(value, format);
  if (value instanceof ObjectId) return value.toHexString();
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Projects one record field into the text or number written to the cell.
 */
export function formatCellValue(
  column: ColumnSpec,
  record: ReportRecord,
  format: TimestampFormat
): string | number {
  if (column.kind === 'period') {
    const start: unknown = record[column.startKey];
    const end: unknown = record[column.endKey];
    if (start instanceof Date && end instanceof Date) {
      return `${formatDate(start, format)} - ${formatDate(end, format)}`;
    }
    return formatPlain(record[column.key], format);
  }

  const value: unknown = record[column.key];
  if (value === null || value === undefined) return '';

  switch (column.kind) {
    case 'identifier':
      return value instanceof ObjectId ? value.toHexString() : String(value);
    case 'timestamp':
      return value instanceof Date ? formatDate(value, format) : formatPlain(value, format);
    case 'count':
      if (typeof value === 'number' || (typeof value === 'string' && /^\s*-?\d+(\.\d+)?\s*$/.test(value))) {
        return toInt(value);
      }
      return formatPlain(value, format);
    case 'currency':
      return typeof value === 'number' ? formatCurrency(value) : formatPlain(value, format);
    case 'text':
      return formatPlain(value, format);
  }
}

// ============================================
// FILTER SUMMARY
// ============================================

/**
 * Describes the filters a report ran with, in display order: fixed filters,
 * then declared parameters, then the date range. Entries with a null value
 * are not rendered.
 */
export function describeFilters(definition: ReportDefinition, params: ValidatedParams): FilterSummaryEntry[] {
  const entries: FilterSummaryEntry[] = [...(definition.fixedFilterSummary ?? [])];

  for (const field of definition.fields) {
    const value = params.values[field.param];
    entries.push({
      label: field.label,
      value: value === undefined ? null : Array.isArray(value) ? value.join(', ') : String(value),
    });
  }

  if (definition.dateRange) {
    const range = params.dateRange;
    entries.push({
      label: 'Date Range:',
      value: range ? `${formatIsoDate(range.from)} to ${formatIsoDate(range.to)}` : null,
    });
  }

  return entries;
}

// ============================================
// SHEET
// ============================================

/**
 * Adds the report worksheet to the workbook. Never throws: any failure is
 * logged and reported as false.
 */
export function renderReportSheet(
  workbook: ExcelJS.Workbook,
  definition: ReportDefinition,
  records: ReportRecord[],
  filters: FilterSummaryEntry[],
  logger: Logger
): boolean {
  try {
    const columns = definition.columns;
    const ws = workbook.addWorksheet(definition.sheetName);
    const contentLengths = new Map<number, number>();

    const write = (row: number, col: number, value: string | number, style: CellStyle): void => {
      const cell = ws.getCell(row, col);
      cell.value = value;
      applyStyle(cell, style);
      const length = value === '' ? 0 : String(value).length;
      contentLengths.set(col, Math.max(contentLengths.get(col) ?? 0, length));
    };

    // Title
    if (columns.length > 1) {
      ws.mergeCells(1, 1, 1, columns.length);
    }
    write(1, 1, definition.title, STYLES.mainHeader);

    // Active filters
    let rowIdx = 2;
    const active = filters.filter(entry => entry.value);
    if (active.length > 0) {
      rowIdx += 1;
      for (const entry of active) {
        write(rowIdx, 2, entry.label, STYLES.filterParameter);
        write(rowIdx, 3, entry.value ?? '', STYLES.filterValue);
        rowIdx += 1;
      }
    }
    rowIdx += 1;

    // Header
    const headerRow = rowIdx;
    columns.forEach((column, index) => {
      write(headerRow, index + 1, column.header ?? toHeaderTitle(column.key), STYLES.subHeader);
      ws.getColumn(index + 1).width = HEADER_WIDTH;
    });

    // Data
    for (const record of records) {
      rowIdx += 1;
      columns.forEach((column, index) => {
        write(rowIdx, index + 1, formatCellValue(column, record, definition.timestampFormat), STYLES.dataCell);
      });
    }

    ws.autoFilter = {
      from: { row: headerRow, column: 1 },
      to: { row: definition.autoFilterThroughData ? rowIdx : headerRow, column: columns.length },
    };

    for (let col = 1; col <= columns.length; col++) {
      const longest = contentLengths.get(col) ?? 0;
      ws.getColumn(col).width = Math.max(longest + 2, MIN_WIDTH) * WIDTH_FACTOR;
    }

    return true;
  } catch (error) {
    logger.error(`Error creating sheet ${definition.sheetName}:`, error);
    return false;
  }
}
