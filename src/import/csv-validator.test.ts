import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { assertCsvFileType, formatBytes, validateCsvFile } from './csv-validator';
import { StructuralValidationError } from '../infra/errors';

async function structuralErrors(promise: Promise<unknown>): Promise<string[]> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof StructuralValidationError) return err.errors;
    throw err;
  }
  throw new Error('expected a StructuralValidationError');
}

describe('formatBytes', () => {
  it('uses the largest fitting unit', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(100 * 1024 * 1024)).toBe('100 MB');
    expect(formatBytes(3 * 1024 ** 4)).toBe('3072 GB');
  });
});

describe('validateCsvFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'catalog-validate-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const file = join(dir, name);
    writeFileSync(file, content);
    return file;
  }

  it('returns the header of a well-formed file', async () => {
    const file = write('ok.csv', 'sku,name,price,image\nA,Apple,1,a.png\n');

    expect(await validateCsvFile(file)).toEqual(['sku', 'name', 'price', 'image']);
  });

  it('reports a missing file', async () => {
    expect(await structuralErrors(validateCsvFile(join(dir, 'missing.csv')))).toEqual(['File not found']);
  });

  it('reports an empty file', async () => {
    const file = write('empty.csv', '');

    expect(await structuralErrors(validateCsvFile(file))).toEqual([
      'CSV file is empty or header row cannot be read',
    ]);
  });

  it('compares header names case-sensitively', async () => {
    const file = write('upper.csv', 'SKU,Name,price\nA,Apple,1\n');

    expect(await structuralErrors(validateCsvFile(file))).toEqual([
      'Missing required columns: sku, name',
      'Found columns: SKU, Name, price',
    ]);
  });

  it('reports an oversize file with both sizes', async () => {
    const file = write('big.csv', 'sku,name,price\n' + 'A,Apple,1\n'.repeat(200));

    const errors = await structuralErrors(validateCsvFile(file, { maxBytes: 1024 }));

    expect(errors).toEqual([`File too large. Maximum size: 1 KB, Actual size: 1.97 KB`]);
  });

  it('honours custom required columns', async () => {
    const file = write('custom.csv', 'sku,name,price\n');

    await expect(validateCsvFile(file, { requiredColumns: ['sku', 'stock'] })).rejects.toThrow(
      'Missing required columns: stock',
    );
  });
});

describe('assertCsvFileType', () => {
  it('accepts csv and txt files with text content types', () => {
    expect(() => assertCsvFileType('products.csv', 'text/csv')).not.toThrow();
    expect(() => assertCsvFileType('PRODUCTS.TXT', 'text/plain; charset=utf-8')).not.toThrow();
    expect(() => assertCsvFileType(undefined, 'application/vnd.ms-excel')).not.toThrow();
    expect(() => assertCsvFileType('products.csv', undefined)).not.toThrow();
  });

  it('rejects other extensions and content types', () => {
    try {
      assertCsvFileType('products.xlsx', 'application/json');
      throw new Error('expected a StructuralValidationError');
    } catch (err) {
      expect(err).toBeInstanceOf(StructuralValidationError);
      expect(err instanceof StructuralValidationError && err.errors).toEqual([
        'Unsupported file type: .xlsx. Expected a .csv or .txt file',
        'Unsupported content type: application/json',
      ]);
      expect(err instanceof StructuralValidationError && err.status).toBe(422);
    }
  });
});
