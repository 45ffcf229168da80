import { describe, it, expect } from 'vitest';
import { failureOutcome, successOutcome, summarizeBatch } from './result.js';

const ok = successOutcome({
  table_name: 'Global',
  filename: 'Global.xlsx',
  total_rows: 1,
  inserted_count: 1,
  updated_count: 0,
});

const failed = failureOutcome({
  filename: 'prices.xlsx',
  errors: ['unsupported filename: prices.xlsx'],
  error_code: 'unsupported_filename',
});

describe('outcomes', () => {
  it('gives failures the same shape with zero writes', () => {
    expect(failed).toEqual({
      success: false,
      table_name: '',
      total_rows: 0,
      inserted_count: 0,
      updated_count: 0,
      error_count: 1,
      errors: ['unsupported filename: prices.xlsx'],
      filename: 'prices.xlsx',
      error_code: 'unsupported_filename',
    });
  });

  it('distinguishes empty, succeeded, partial and failed batches', () => {
    expect(summarizeBatch([]).status).toBe('empty');
    expect(summarizeBatch([ok, ok]).status).toBe('succeeded');
    expect(summarizeBatch([ok, failed]).status).toBe('partial');
    expect(summarizeBatch([failed]).status).toBe('failed');
  });

  it('counts files and carries the truncation report', () => {
    const batch = summarizeBatch([ok, failed], { Global: { before: 4, after: 0 } });
    expect(batch.total_files).toBe(2);
    expect(batch.successful_files).toBe(1);
    expect(batch.failed_files).toBe(1);
    expect(batch.cleared_tables).toEqual({ Global: { before: 4, after: 0 } });
    expect(summarizeBatch([ok])).not.toHaveProperty('cleared_tables');
  });
});
