/**
 * Error taxonomy
 *
 * Everything thrown across a module boundary is an AppError carrying the
 * HTTP status the gateway should answer with. Row problems, duplicate SKUs
 * and unresolved images are never thrown; they end up as import summary issues.
 */

export class AppError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, status = 500, code = 'internal_error') {
    super(message);
    this.name = 'AppError';
    this.status = status;
    this.code = code;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 422, 'validation_error');
    this.name = 'ValidationError';
  }
}

/**
 * Missing CSV columns, unsupported file type or oversize file. Raised before
 * any row is processed.
 */
export class StructuralValidationError extends ValidationError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(errors.join('; '));
    this.name = 'StructuralValidationError';
    this.errors = errors;
  }
}

/** A chunk disagrees with what the ledger already recorded for its checksum. */
export class ChunkConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'chunk_conflict');
    this.name = 'ChunkConflictError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'not_found');
    this.name = 'NotFoundError';
  }
}

export class UploadNotReadyError extends AppError {
  constructor(message: string) {
    super(message, 422, 'upload_not_ready');
    this.name = 'UploadNotReadyError';
  }
}

/**
 * Missing chunk or checksum mismatch during assembly. Only ever surfaces as a
 * `failed` upload status.
 */
export class IntegrityError extends AppError {
  readonly uploadId: number;

  constructor(message: string, uploadId: number) {
    super(message, 500, 'integrity_error');
    this.name = 'IntegrityError';
    this.uploadId = uploadId;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
