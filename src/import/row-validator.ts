/**
 * Row validation for product CSVs
 *
 * Problems are returned as `Row N: ...` issue strings, never thrown.
 */

import type { CsvColumns, RowValidation } from './types';

export const REQUIRED_COLUMNS = ['sku', 'name', 'price'] as const;

// Plain decimal: "19", "19.99", "0.5", ".5". No sign, no exponent.
const PRICE_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)$/;

export function parsePrice(raw: string): number | undefined {
  const trimmed = raw.trim();
  if (!PRICE_PATTERN.test(trimmed)) return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Locate the columns the importer reads. Required names match exactly; the
 * optional `image` column matches in any case. Returns the missing required
 * names when the header lacks some.
 */
export function resolveColumns(header: string[]): CsvColumns | { missing: string[] } {
  const trimmed = header.map((h) => h.trim());
  const missing = REQUIRED_COLUMNS.filter((name) => !trimmed.includes(name));
  if (missing.length > 0) return { missing };

  const image = trimmed.findIndex((h) => h.toLowerCase() === 'image');
  return {
    sku: trimmed.indexOf('sku'),
    name: trimmed.indexOf('name'),
    price: trimmed.indexOf('price'),
    image: image === -1 ? undefined : image,
  };
}

export function validateRow(fields: string[], columns: CsvColumns, rowNumber: number): RowValidation {
  const needed = Math.max(columns.sku, columns.name, columns.price) + 1;
  if (fields.length < needed) {
    return {
      valid: false,
      issue: `Row ${rowNumber}: Missing required columns. Expected: ${REQUIRED_COLUMNS.join(', ')}`,
    };
  }

  const sku = fields[columns.sku].trim();
  const name = fields[columns.name].trim();
  const rawPrice = fields[columns.price].trim();
  if (!sku || !name || !rawPrice) {
    return {
      valid: false,
      issue: `Row ${rowNumber}: Required fields (sku, name, price) cannot be empty`,
    };
  }

  const price = parsePrice(rawPrice);
  if (price === undefined) {
    return {
      valid: false,
      issue: `Row ${rowNumber}: Price must be a valid non-negative number`,
    };
  }

  const image = columns.image === undefined ? undefined : fields[columns.image]?.trim();

  return {
    valid: true,
    row: { rowNumber, sku, name, price, image: image ? image : undefined },
  };
}
