/**
 * EXPORT WRITER
 * Saves rendered workbooks to the export directory and records an audit entry
 */

import fs from 'fs';
import path from 'path';
import { performance } from 'perf_hooks';
import ExcelJS from 'exceljs';
import { v4 as uuidv4 } from 'uuid';
import type { AppConfig } from '../config/env';
import { Errors, errorMessage } from '../utils/errors';
import { formatFileStamp } from '../utils/db-helpers';
import type { AppliedFilters, AuditRecord, ExportArtifact } from '../types/entities';
import type { ReportContext, ReportDefinition } from '../types/report.types';

// ============================================
// DIRECTORY
// ============================================

/**
 * Picks the export directory configured for the host OS.
 */
export function resolveExportDirectory(exportsConfig: AppConfig['exports'], platform: NodeJS.Platform): string {
  switch (platform) {
    case 'win32':
      return exportsConfig.windowsPath;
    case 'linux':
    case 'darwin':
      return exportsConfig.linuxPath;
    default:
      throw Errors.Persistence(`Unsupported platform for exports: ${platform}`);
  }
}

// ============================================
// FILE NAMES
// ============================================

const MAX_WRITE_ATTEMPTS = 5;

let lastStampMicros = 0;

/** Microseconds within the current millisecond, from the high-resolution clock. */
export function subMillisecondMicros(): number {
  return Math.floor((performance.timeOrigin + performance.now()) * 1000) % 1000;
}

/**
 * Microsecond stamp for a file name: the millisecond of `now` plus the
 * sub-millisecond digits of the high-resolution clock. Strictly increasing
 * within the process.
 */
export function nextExportStamp(now: Date, subMillisecond: number = subMillisecondMicros()): string {
  let micros = now.getTime() * 1000 + subMillisecond;
  if (micros <= lastStampMicros) {
    micros = lastStampMicros + 1;
  }
  lastStampMicros = micros;
  return formatFileStamp(micros);
}

export function buildExportFilename(prefix: string, now: Date): string {
  return `${prefix}_${nextExportStamp(now)}.xlsx`;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Creates the file exclusively, taking the next stamp when another writer
 * already holds the name. Resolves to the name written.
 */
async function writeExclusive(directory: string, prefix: string, now: Date, content: Uint8Array): Promise<string> {
  for (let attempt = 1; attempt <= MAX_WRITE_ATTEMPTS; attempt++) {
    const filename = buildExportFilename(prefix, now);
    const filepath = path.join(directory, filename);
    try {
      await fs.promises.writeFile(filepath, content, { flag: 'wx' });
      return filename;
    } catch (error) {
      if (!hasErrorCode(error, 'EEXIST')) {
        throw Errors.Persistence(`Cannot write export file ${filepath}: ${errorMessage(error)}`);
      }
    }
  }
  throw Errors.Persistence(`No free export file name for ${prefix} after ${MAX_WRITE_ATTEMPTS} attempts`);
}

// ============================================
// WRITE
// ============================================

/**
 * Raw task parameters kept for the audit entry, one key per declared filter.
 * Absent parameters are recorded as null.
 */
export function collectAppliedFilters(definition: ReportDefinition, rawParams: Record<string, unknown>): AppliedFilters {
  const applied: AppliedFilters = {};
  for (const [auditKey, param] of Object.entries(definition.auditFilterKeys)) {
    const value = rawParams[param];
    applied[auditKey] = value === undefined ? null : value;
  }
  return applied;
}

/**
 * Writes the workbook and inserts the audit record. A failure to write the
 * file is fatal to the export; a failure to insert the audit record is only
 * logged, since the file on disk is the result that counts.
 */
export async function writeExport(
  ctx: ReportContext,
  definition: ReportDefinition,
  workbook: ExcelJS.Workbook,
  recordCount: number,
  appliedFilters: AppliedFilters
): Promise<ExportArtifact> {
  const directory = path.resolve(resolveExportDirectory(ctx.config.exports, ctx.platform));
  const generatedAt = ctx.now();

  try {
    await fs.promises.mkdir(directory, { recursive: true });
  } catch (error) {
    throw Errors.Persistence(`Cannot create export directory ${directory}: ${errorMessage(error)}`);
  }

  let content: Uint8Array;
  try {
    content = new Uint8Array(await workbook.xlsx.writeBuffer());
  } catch (error) {
    throw Errors.Persistence(`Cannot serialize ${definition.sheetName} workbook: ${errorMessage(error)}`);
  }

  const filename = await writeExclusive(directory, definition.filePrefix, generatedAt, content);
  const filepath = path.join(directory, filename);

  ctx.logger.info(`Report saved: ${filepath} (${recordCount} records)`);

  const artifact: ExportArtifact = {
    exportId: uuidv4(),
    filename,
    filepath,
    generatedAt,
    recordCount,
    appliedFilters,
  };

  const audit: AuditRecord = {
    Export_Id: artifact.exportId,
    Report_Type: definition.id,
    File_Name: filename,
    File_Path: filepath,
    Export_Timestamp: generatedAt,
    Exported_Record_Count: recordCount,
    Applied_Filters: appliedFilters,
  };

  try {
    await ctx.store.insertOne(ctx.config.collections.audit, { ...audit });
  } catch (error) {
    ctx.logger.error(`Failed to record export ${filename} in ${ctx.config.collections.audit}:`, error);
  }

  return artifact;
}
