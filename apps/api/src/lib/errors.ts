export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(404, 'NOT_FOUND', `${resource} not found`);
  }
}

export class UnsupportedFormatError extends AppError {
  constructor(fileName: string) {
    super(
      400,
      'UNSUPPORTED_FORMAT',
      'Unsupported file format. Use CSV or Excel (xlsx)',
      { fileName },
    );
  }
}

export class SchemaError extends AppError {
  constructor(public missingColumns: string[]) {
    super(
      400,
      'SCHEMA_ERROR',
      `Missing required columns: ${missingColumns.join(', ')}`,
      { missingColumns },
    );
  }
}

export class StorageUnavailableError extends AppError {
  constructor(message: string, public cause?: unknown) {
    super(503, 'STORAGE_UNAVAILABLE', message);
  }
}

// ---------------------------------------------------------------------------
// Row-level errors: absorbed into the staging ledger, never sent to clients
// ---------------------------------------------------------------------------

export class RowValidationError extends Error {
  constructor(message: string, public column?: string) {
    super(message);
    this.name = 'RowValidationError';
  }
}

export class StorageError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StorageError';
  }
}
