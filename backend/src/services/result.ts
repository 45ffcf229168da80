import type {
  BatchOutcome,
  BatchStatus,
  ClearedTable,
  InsertionOutcome,
  OutcomeErrorCode,
} from '../types/import.js';

type SuccessCounts = {
  table_name: string;
  filename: string;
  total_rows: number;
  inserted_count: number;
  updated_count: number;
};

export function successOutcome(counts: SuccessCounts): InsertionOutcome {
  return {
    success: true,
    ...counts,
    error_count: 0,
    errors: [],
    error_code: null,
  };
}

type FailureDetails = {
  filename: string;
  table_name?: string;
  total_rows?: number;
  errors: string[];
  error_code: OutcomeErrorCode;
};

/** A failed file writes nothing, so the insert and update counts are always zero. */
export function failureOutcome(details: FailureDetails): InsertionOutcome {
  return {
    success: false,
    table_name: details.table_name ?? '',
    total_rows: details.total_rows ?? 0,
    inserted_count: 0,
    updated_count: 0,
    error_count: details.errors.length,
    errors: details.errors,
    filename: details.filename,
    error_code: details.error_code,
  };
}

function batchStatus(total: number, succeeded: number): BatchStatus {
  if (total === 0) return 'empty';
  if (succeeded === total) return 'succeeded';
  if (succeeded === 0) return 'failed';
  return 'partial';
}

export function summarizeBatch(
  results: InsertionOutcome[],
  clearedTables?: Record<string, ClearedTable>
): BatchOutcome {
  const successful = results.filter((result) => result.success).length;
  const outcome: BatchOutcome = {
    status: batchStatus(results.length, successful),
    total_files: results.length,
    successful_files: successful,
    failed_files: results.length - successful,
    results,
  };
  if (clearedTables) {
    outcome.cleared_tables = clearedTables;
  }
  return outcome;
}
