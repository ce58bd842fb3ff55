import { describe, it, expect } from 'vitest';
import { parsePrice, resolveColumns, validateRow } from './row-validator';
import type { CsvColumns } from './types';

const columns: CsvColumns = { sku: 0, name: 1, price: 2 };

describe('parsePrice', () => {
  it('accepts non-negative decimals', () => {
    expect(parsePrice('19.99')).toBe(19.99);
    expect(parsePrice('0')).toBe(0);
    expect(parsePrice('.5')).toBe(0.5);
    expect(parsePrice(' 7 ')).toBe(7);
  });

  it('rejects signs, exponents and words', () => {
    expect(parsePrice('-1')).toBeUndefined();
    expect(parsePrice('+1')).toBeUndefined();
    expect(parsePrice('1e3')).toBeUndefined();
    expect(parsePrice('abc')).toBeUndefined();
    expect(parsePrice('1,000')).toBeUndefined();
  });
});

describe('resolveColumns', () => {
  it('maps header positions and finds the image column in any case', () => {
    expect(resolveColumns(['price', 'sku', 'name', 'Image'])).toEqual({ sku: 1, name: 2, price: 0, image: 3 });
  });

  it('leaves image undefined when absent', () => {
    expect(resolveColumns(['sku', 'name', 'price'])).toEqual({ sku: 0, name: 1, price: 2, image: undefined });
  });

  it('matches required names exactly', () => {
    expect(resolveColumns(['SKU', 'name', 'price'])).toEqual({ missing: ['sku'] });
  });
});

describe('validateRow', () => {
  it('accepts a complete row', () => {
    expect(validateRow(['SKU001', 'Widget', '19.99'], columns, 1)).toEqual({
      valid: true,
      row: { rowNumber: 1, sku: 'SKU001', name: 'Widget', price: 19.99, image: undefined },
    });
  });

  it('reports too few fields', () => {
    expect(validateRow(['SKU001', 'Widget'], columns, 4)).toEqual({
      valid: false,
      issue: 'Row 4: Missing required columns. Expected: sku, name, price',
    });
  });

  it('reports empty required fields', () => {
    expect(validateRow(['', 'Widget', '1'], columns, 2)).toEqual({
      valid: false,
      issue: 'Row 2: Required fields (sku, name, price) cannot be empty',
    });
    expect(validateRow(['A', 'Widget', '  '], columns, 3)).toMatchObject({ valid: false });
  });

  it('reports a bad price', () => {
    expect(validateRow(['A', 'Widget', 'abc'], columns, 5)).toEqual({
      valid: false,
      issue: 'Row 5: Price must be a valid non-negative number',
    });
    expect(validateRow(['A', 'Widget', '-3'], columns, 6)).toMatchObject({ valid: false });
  });

  it('accepts a zero price', () => {
    expect(validateRow(['A', 'Freebie', '0'], columns, 1)).toMatchObject({ valid: true, row: { price: 0 } });
  });

  it('reads the image filename when the column exists', () => {
    const withImage: CsvColumns = { ...columns, image: 3 };

    expect(validateRow(['A', 'Widget', '1', 'photo.png'], withImage, 1)).toMatchObject({
      valid: true,
      row: { image: 'photo.png' },
    });
    expect(validateRow(['A', 'Widget', '1', ''], withImage, 1)).toMatchObject({
      valid: true,
      row: { image: undefined },
    });
    expect(validateRow(['A', 'Widget', '1'], withImage, 1)).toMatchObject({
      valid: true,
      row: { image: undefined },
    });
  });
});
