/**
 * DOMAIN TYPES - MAIN ENTITIES
 * Documents read from and written to the task queue and audit collections
 */

import type { Document, ObjectId } from 'mongodb';

// ============================================
// TASK
// ============================================
export const OPEN_STATUSES = ['Open', 'open'] as const;

export type TaskStatus = (typeof OPEN_STATUSES)[number] | 'InProgress' | 'Complete' | 'Failed';

export type TaskParameters = Record<string, unknown>;

export interface TaskDocument {
  _id?: ObjectId;
  Task_Id: string | number;
  Template_Task_Id: string | number;
  task_status: TaskStatus;
  parameters?: TaskParameters;
  task_description?: string;
  export_path?: string;
  export_filename?: string;
  export_status?: 'Generated' | 'Failed';
  claimed_by?: string;
  started_at?: Date;
  finished_at?: Date;
}

// ============================================
// REPORT RECORDS
// ============================================

/** A document read from a domain collection, consumed read-only. */
export type ReportRecord = Document;

// ============================================
// EXPORTS
// ============================================

/** Raw task parameter values as they arrived, before validation. */
export type AppliedFilters = Record<string, unknown>;

export interface ExportArtifact {
  exportId: string;
  filename: string;
  filepath: string;
  generatedAt: Date;
  recordCount: number;
  appliedFilters: AppliedFilters;
}

export interface AuditRecord {
  Export_Id: string;
  Report_Type: number;
  File_Name: string;
  File_Path: string;
  Export_Timestamp: Date;
  Exported_Record_Count: number;
  Applied_Filters: AppliedFilters;
}

// ============================================
// DISPATCH
// ============================================
export interface DispatchSummary {
  found: number;
  processed: number;
  completed: number;
  failed: number;
  skipped: number;
}
