/**
 * Shared helpers for route modules: async handler wrapping, parameter
 * parsing and the snake_case response shapes.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import { ValidationError } from '../infra/errors';
import type { ImageVariant, Product, UploadWithVariants } from '../types';
import type { ImportSummary } from '../import/types';

/** Forward rejected promises to the Express error handler. */
export function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

const idSchema = z.coerce.number().int().positive();

export function parseId(value: unknown, name: string): number {
  const parsed = idSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${name}: ${String(value)}`);
  }
  return parsed.data;
}

/** First value of a query parameter, when it is a plain string. */
export function queryString(value: unknown): string | undefined {
  if (Array.isArray(value)) return queryString(value[0]);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Whole number from a query parameter written in plain digits. Anything else
 * (missing, empty, signed, exponent or hex notation) comes back as NaN, which
 * request validation rejects.
 */
export function queryInteger(value: unknown): number {
  const text = queryString(value);
  return text !== undefined && /^\d+$/.test(text) ? Number(text) : Number.NaN;
}

// =============================================================================
// Response shapes
// =============================================================================

export function variantJson(variant: ImageVariant) {
  return {
    id: variant.id,
    variant: variant.variant,
    path: variant.path,
    width: variant.width,
    height: variant.height,
    checksum: variant.checksum,
  };
}

export function uploadJson(upload: UploadWithVariants) {
  return {
    id: upload.id,
    checksum: upload.checksum,
    original_name: upload.originalName,
    total_chunks: upload.totalChunks,
    received_chunks: upload.receivedChunks,
    status: upload.status,
    created_at: upload.createdAt.toISOString(),
    updated_at: upload.updatedAt.toISOString(),
    variants: upload.variants.map(variantJson),
  };
}

export function productJson(product: Product) {
  return {
    id: product.id,
    sku: product.sku,
    name: product.name,
    price: product.price,
    primary_image_id: product.primaryImageId,
    created_at: product.createdAt.toISOString(),
    updated_at: product.updatedAt.toISOString(),
  };
}

export function summaryJson(summary: ImportSummary) {
  return {
    total_rows: summary.totalRows,
    imported_count: summary.importedCount,
    updated_count: summary.updatedCount,
    invalid_count: summary.invalidCount,
    duplicate_count: summary.duplicateCount,
    images_linked: summary.imagesLinked,
    images_not_found: summary.imagesNotFound,
    issues: summary.issues,
  };
}
