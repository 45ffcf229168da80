export type CellValue = string | number | boolean | null;

export type Grid = CellValue[][];

export type DeclaredType = 'int' | 'float' | 'bool' | 'string' | 'unknown';

export type FrameRecord = Record<string, CellValue>;

export type Frame = {
  columns: string[];
  types: Record<string, DeclaredType>;
  records: FrameRecord[];
};

export type ColumnKind = 'int' | 'float' | 'flag' | 'varchar' | 'text' | 'date';

export type ColumnDefinition = {
  name: string;
  kind: ColumnKind;
  length?: number;
};

export type TableDefinition = {
  name: string;
  columns: ColumnDefinition[];
  primaryKey: string[];
};

export type UpsertResult = 'inserted' | 'updated';

export interface ImportSession {
  upsert(table: TableDefinition, values: FrameRecord): Promise<UpsertResult>;
  count(table: TableDefinition): Promise<number>;
  clear(table: TableDefinition): Promise<void>;
}

export interface ImportDatabase {
  transaction<T>(fn: (session: ImportSession) => Promise<T>): Promise<T>;
}

export type ImportLogLevel = 'info' | 'warn' | 'error';

export type ImportLogger = (level: ImportLogLevel, message: string) => void;

export type OutcomeErrorCode =
  | 'unsupported_filename'
  | 'structural'
  | 'validation_failed'
  | 'storage'
  | 'download';

export type InsertionOutcome = {
  success: boolean;
  table_name: string;
  total_rows: number;
  inserted_count: number;
  updated_count: number;
  error_count: number;
  errors: string[];
  filename: string;
  error_code: OutcomeErrorCode | null;
};

export type BatchStatus = 'empty' | 'succeeded' | 'partial' | 'failed';

export type ClearedTable = {
  before: number;
  after: number;
};

export type BatchOutcome = {
  status: BatchStatus;
  total_files: number;
  successful_files: number;
  failed_files: number;
  results: InsertionOutcome[];
  cleared_tables?: Record<string, ClearedTable>;
};

export type ImportFileInput = {
  filename: string;
  bytes: Uint8Array;
};
