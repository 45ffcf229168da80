export type ImportErrorCode = 'structural' | 'unsupported_filename' | 'storage' | 'download';

export class ImportError extends Error {
  readonly code: ImportErrorCode;
  readonly details?: unknown;

  constructor(code: ImportErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'ImportError';
    this.code = code;
    this.details = details;
  }
}

export function structuralError(message: string, details?: unknown): ImportError {
  return new ImportError('structural', message, details);
}

export function unsupportedFilename(filename: string): ImportError {
  return new ImportError('unsupported_filename', `unsupported filename: ${filename}`);
}

export function storageError(message: string, details?: unknown): ImportError {
  return new ImportError('storage', message, details);
}

export function downloadError(message: string, details?: unknown): ImportError {
  return new ImportError('download', message, details);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
