/**
 * VALIDATORS - Report Parameter Validation
 *
 * Every task parameter that reaches a query is checked here first.
 * Joi checks the shape of the raw mapping; the allowed-value and date
 * checks below raise ValidationError with the offending field.
 */

import Joi from 'joi';
import { Errors, ValidationError } from './errors';
import type { TaskParameters } from '../types/entities';
import type {
  AllowedValue,
  DateRange,
  DateRangeSpec,
  EnumField,
  EnumListField,
  FieldSpec,
  FieldValue,
  ReportDefinition,
  TextField,
  ValidatedParams,
} from '../types/report.types';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

// ============================================
// SHAPE
// ============================================

function fieldSchema(field: FieldSpec): Joi.Schema {
  switch (field.kind) {
    case 'enum':
      return Joi.alternatives().try(Joi.string(), Joi.number()).allow(null);
    case 'enum-list':
      return Joi.array().items(Joi.string()).allow(null);
    case 'text':
      return Joi.string().allow(null, '');
  }
}

/**
 * Builds the Joi schema of a report's raw parameter mapping.
 * Keys the report does not declare are ignored.
 */
export function buildParameterSchema(definition: ReportDefinition): Joi.ObjectSchema {
  const keys: Record<string, Joi.Schema> = {};
  for (const field of definition.fields) {
    keys[field.param] = fieldSchema(field);
  }
  if (definition.dateRange) {
    keys[definition.dateRange.fromParam] = Joi.string().allow(null, '');
    keys[definition.dateRange.toParam] = Joi.string().allow(null, '');
  }
  return Joi.object(keys).unknown(true);
}

function checkShape(definition: ReportDefinition, raw: TaskParameters): void {
  const { error } = buildParameterSchema(definition).validate(raw, { abortEarly: true, convert: false });
  if (!error) return;

  const detail = error.details[0];
  const param = detail ? String(detail.path[0]) : 'parameters';
  const value = detail?.context?.value;

  const range = definition.dateRange;
  if (range && (param === range.fromParam || param === range.toParam)) {
    throw Errors.InvalidDateFormat(param, value);
  }

  const field = definition.fields.find(f => f.param === param);
  if (field && field.kind !== 'text') {
    throw Errors.InvalidParameter(param, value, field.allowed);
  }
  throw new ValidationError('InvalidParameter', param, `Invalid ${param}: ${error.message}`);
}

// ============================================
// FIELD VALIDATORS
// ============================================

/**
 * Checks a value belongs to the field's enumeration. Numeric enumerations
 * also accept the decimal string form ("2" for 2).
 */
export function validateEnum(field: EnumField, value: unknown): AllowedValue {
  if (typeof value === 'string' && field.allowed.includes(value)) {
    return value;
  }
  if (typeof value === 'number' && field.allowed.includes(value)) {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    const num = parseInt(value, 10);
    if (field.allowed.includes(num)) return num;
  }
  throw Errors.InvalidParameter(field.param, value, field.allowed);
}

/**
 * Checks a non-empty list whose every element belongs to the enumeration.
 */
export function validateEnumList(field: EnumListField, value: unknown): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ValidationError(
      'InvalidParameter',
      field.param,
      `${field.param} must be a non-empty list of: ${field.allowed.map(v => `'${v}'`).join(', ')}`,
      field.allowed
    );
  }
  const result: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string' || !field.allowed.includes(item)) {
      throw Errors.InvalidParameter(field.param, item, field.allowed);
    }
    result.push(item);
  }
  return result;
}

/**
 * Checks a free-text value is a non-empty string and trims it.
 */
export function validateText(field: TextField, value: unknown): string {
  if (typeof value !== 'string' || !value.trim()) {
    throw new ValidationError('InvalidParameter', field.param, `${field.param} must be a non-empty string`);
  }
  return value.trim();
}

// ============================================
// DATES
// ============================================

/**
 * Parses a YYYY-MM-DD string into midnight UTC of that calendar day.
 * Rejects impossible dates such as 2025-02-30.
 */
export function parseCalendarDate(param: string, value: unknown): Date {
  const str = typeof value === 'string' ? value.trim() : '';
  const match = DATE_PATTERN.exec(str);
  if (!match) {
    throw Errors.InvalidDateFormat(param, value);
  }

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw Errors.InvalidDateFormat(param, value);
  }
  return date;
}

/**
 * Validates a from/to pair. The effective range runs from 00:00:00 of `from`
 * to 23:59:59 of `to`. A pair with only one side present applies no range,
 * though the present side must still parse.
 */
export function validateDateRange(spec: DateRangeSpec, raw: TaskParameters): DateRange | null {
  const rawFrom = raw[spec.fromParam];
  const rawTo = raw[spec.toParam];

  const from = isAbsent(rawFrom) ? null : parseCalendarDate(spec.fromParam, rawFrom);
  const toDay = isAbsent(rawTo) ? null : parseCalendarDate(spec.toParam, rawTo);

  if (!from || !toDay) return null;

  const to = new Date(toDay.getTime() + 24 * 60 * 60 * 1000 - 1000);
  if (to.getTime() < from.getTime()) {
    throw Errors.InvalidDateRange(spec.fromParam, spec.toParam);
  }

  return {
    from,
    to,
    fromText: String(rawFrom).trim(),
    toText: String(rawTo).trim(),
  };
}

// ============================================
// REPORT PARAMETERS
// ============================================

function validateField(field: FieldSpec, value: unknown): FieldValue {
  switch (field.kind) {
    case 'enum':
      return validateEnum(field, value);
    case 'enum-list':
      return validateEnumList(field, value);
    case 'text':
      return validateText(field, value);
  }
}

/**
 * Validates a task's raw parameters against a report definition.
 * Pure: throws ValidationError, performs no I/O.
 */
export function validateReportParameters(definition: ReportDefinition, raw: TaskParameters): ValidatedParams {
  checkShape(definition, raw);

  const values: Record<string, FieldValue> = {};
  for (const field of definition.fields) {
    const value = raw[field.param];
    if (isAbsent(value)) continue;
    values[field.param] = validateField(field, value);
  }

  const dateRange = definition.dateRange ? validateDateRange(definition.dateRange, raw) : null;

  return { values, dateRange };
}
