/**
 * REPORT SERVICE
 *
 * Runs one report end to end:
 *   validate → build filter → query → render → write file + audit
 *
 * Never throws. Validation problems are logged at warn and returned before
 * any I/O; everything after that is logged at error.
 */

import ExcelJS from 'exceljs';
import { ReportError, Errors, ValidationError, errorMessage } from '../utils/errors';
import { validateReportParameters } from '../utils/validators';
import { buildReportFilter } from './query-builder.service';
import { describeFilters, renderReportSheet } from './report-renderer.service';
import { collectAppliedFilters, writeExport } from './export-writer.service';
import type { ExportArtifact, TaskParameters } from '../types/entities';
import type { ReportContext, ReportDefinition, ValidatedParams } from '../types/report.types';

export type ReportOutcome =
  | { success: true; artifact: ExportArtifact }
  | { success: false; error: ReportError };

function toReportError(error: unknown): ReportError {
  return error instanceof ReportError ? error : new ReportError(errorMessage(error));
}

function tryValidate(definition: ReportDefinition, rawParams: TaskParameters): ValidatedParams | ReportError {
  try {
    return validateReportParameters(definition, rawParams);
  } catch (error) {
    return toReportError(error);
  }
}

export async function generateReport(
  ctx: ReportContext,
  definition: ReportDefinition,
  rawParams: TaskParameters
): Promise<ReportOutcome> {
  const { logger } = ctx;

  const params = tryValidate(definition, rawParams);
  if (params instanceof ReportError) {
    if (params instanceof ValidationError) {
      logger.warn(`${definition.name} validation error: ${params.message}`);
    } else {
      logger.error(`${definition.name} could not validate parameters: ${params.message}`);
    }
    return { success: false, error: params };
  }

  try {
    const filter = buildReportFilter(definition, params);
    logger.debug(`Executing query on ${definition.collection}`, { filter });

    const documents = await ctx.store.find(definition.collection, filter);
    const records = definition.transform ? definition.transform(documents, params) : documents;
    logger.info(`Found ${records.length} matching records for ${definition.name}`);

    const workbook = new ExcelJS.Workbook();
    if (!renderReportSheet(workbook, definition, records, describeFilters(definition, params), logger)) {
      throw Errors.Render(definition.sheetName);
    }

    const artifact = await writeExport(
      ctx,
      definition,
      workbook,
      records.length,
      collectAppliedFilters(definition, rawParams)
    );

    if (records.length === 0) {
      logger.info(`No records matched the selected filters. Exported empty table to: ${artifact.filepath}`);
    }

    return { success: true, artifact };
  } catch (error) {
    const reportError = toReportError(error);
    logger.error(`${definition.name} export failed: ${reportError.message}`, {
      code: reportError.code,
      stack: reportError.stack,
    });
    return { success: false, error: reportError };
  }
}
