/**
 * Structural checks run before an import touches any row: file type, size
 * and header. Failures throw StructuralValidationError with every problem found.
 */

import { constants } from 'fs';
import { access, stat } from 'fs/promises';
import { extname } from 'path';
import { StructuralValidationError } from '../infra/errors';
import { readHeader } from './csv-reader';
import { REQUIRED_COLUMNS } from './row-validator';

export const DEFAULT_MAX_CSV_BYTES = 100 * 1024 * 1024;

export const ALLOWED_EXTENSIONS = ['.csv', '.txt'];

export const ALLOWED_CONTENT_TYPES = [
  'text/csv',
  'text/plain',
  'application/csv',
  'application/vnd.ms-excel',
  'application/octet-stream',
];

export interface CsvFileValidationOptions {
  maxBytes?: number;
  requiredColumns?: readonly string[];
}

const UNITS = ['B', 'KB', 'MB', 'GB'];

/** 1536 -> "1.5 KB", 104857600 -> "100 MB" */
export function formatBytes(bytes: number): string {
  let scaled = Math.max(bytes, 0);
  let pow = 0;
  while (scaled >= 1024 && pow < UNITS.length - 1) {
    scaled /= 1024;
    pow++;
  }
  return `${Math.round(scaled * 100) / 100} ${UNITS[pow]}`;
}

/**
 * Check the file at `path` and return its header fields.
 */
export async function validateCsvFile(
  path: string,
  options: CsvFileValidationOptions = {},
): Promise<string[]> {
  const maxBytes = options.maxBytes ?? DEFAULT_MAX_CSV_BYTES;
  const requiredColumns = options.requiredColumns ?? REQUIRED_COLUMNS;

  let size: number;
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      throw new StructuralValidationError(['File is not readable']);
    }
    size = info.size;
    await access(path, constants.R_OK);
  } catch (err) {
    if (err instanceof StructuralValidationError) throw err;
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    throw new StructuralValidationError([code === 'ENOENT' ? 'File not found' : 'File is not readable']);
  }

  const errors: string[] = [];

  if (size > maxBytes) {
    errors.push(`File too large. Maximum size: ${formatBytes(maxBytes)}, Actual size: ${formatBytes(size)}`);
  }

  const header = (await readHeader(path)) ?? [];
  if (header.length === 0) {
    errors.push('CSV file is empty or header row cannot be read');
  } else {
    const missing = requiredColumns.filter((column) => !header.includes(column));
    if (missing.length > 0) {
      errors.push(`Missing required columns: ${missing.join(', ')}`);
      errors.push(`Found columns: ${header.join(', ')}`);
    }
  }

  if (errors.length > 0) {
    throw new StructuralValidationError(errors);
  }
  return header;
}

/**
 * Reject uploads that are clearly not CSV. Either argument may be absent;
 * only what is given is checked.
 */
export function assertCsvFileType(filename?: string, contentType?: string): void {
  const errors: string[] = [];

  if (filename) {
    const ext = extname(filename).toLowerCase();
    if (!ALLOWED_EXTENSIONS.includes(ext)) {
      errors.push(`Unsupported file type: ${ext || filename}. Expected a .csv or .txt file`);
    }
  }

  if (contentType) {
    const mime = contentType.split(';')[0].trim().toLowerCase();
    if (!ALLOWED_CONTENT_TYPES.includes(mime)) {
      errors.push(`Unsupported content type: ${mime}`);
    }
  }

  if (errors.length > 0) {
    throw new StructuralValidationError(errors);
  }
}
