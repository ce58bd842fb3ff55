/**
 * Core domain types shared across uploads, media, import and products.
 */

// =============================================================================
// Uploads
// =============================================================================

export const UPLOAD_STATUSES = ['uploading', 'processing', 'completed', 'failed'] as const;

export type UploadStatus = (typeof UPLOAD_STATUSES)[number];

export function isUploadStatus(value: unknown): value is UploadStatus {
  return UPLOAD_STATUSES.some((status) => status === value);
}

/** One logical file transfer, identified by its content checksum. */
export interface Upload {
  id: number;
  checksum: string;
  originalName: string;
  totalChunks: number;
  /** Unique, ascending. */
  receivedChunks: number[];
  status: UploadStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewUpload {
  checksum: string;
  originalName: string;
  totalChunks: number;
}

// =============================================================================
// Image variants
// =============================================================================

export const VARIANT_WIDTHS = [256, 512, 1024] as const;

export type VariantWidth = (typeof VARIANT_WIDTHS)[number];

export type VariantLabel = `${VariantWidth}`;

export function variantLabel(width: VariantWidth): VariantLabel {
  return `${width}`;
}

export function isVariantLabel(value: unknown): value is VariantLabel {
  return VARIANT_WIDTHS.some((width) => String(width) === value);
}

export interface ImageVariant {
  id: number;
  uploadId: number;
  variant: VariantLabel;
  path: string;
  width: number;
  height: number;
  /** SHA-256 (hex) of the stored variant bytes */
  checksum: string;
  createdAt: Date;
}

export type NewImageVariant = Omit<ImageVariant, 'id' | 'createdAt'>;

export interface UploadWithVariants extends Upload {
  variants: ImageVariant[];
}

// =============================================================================
// Products
// =============================================================================

export interface Product {
  id: number;
  sku: string;
  name: string;
  price: number;
  primaryImageId: number | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface ProductInput {
  sku: string;
  name: string;
  price: number;
}
