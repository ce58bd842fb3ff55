/**
 * CSV Product Import Types
 */

/** Header positions of the columns the importer reads (0-based). */
export interface CsvColumns {
  sku: number;
  name: number;
  price: number;
  /** Present when the header has an `image` column (any case) */
  image?: number;
}

export interface ProductImportRow {
  /** 1-based data row number (header excluded) */
  rowNumber: number;
  sku: string;
  name: string;
  price: number;
  /** Image filename to link, when the row names one */
  image?: string;
}

export type RowValidation =
  | { valid: true; row: ProductImportRow }
  | { valid: false; issue: string };

export interface ImportSummary {
  /** False only when a fatal error aborted the run */
  success: boolean;
  totalRows: number;
  importedCount: number;
  updatedCount: number;
  invalidCount: number;
  duplicateCount: number;
  imagesLinked: number;
  imagesNotFound: number;
  /** Human-readable problems, in row order */
  issues: string[];
}

export interface ImportOptions {
  /** Data rows per batch transaction. Default: 1000 */
  batchSize?: number;
}

export interface ImageLinkRequest {
  sku: string;
  filename: string;
}

export interface LinkIssue {
  sku: string;
  message: string;
}

export interface LinkTally {
  linked: number;
  notFound: number;
  issues: LinkIssue[];
}
