/**
 * Manually point a product at an uploaded image.
 */

import type { Database } from '../db';
import type { ImageVariant, Product } from '../types';
import { NotFoundError, UploadNotReadyError } from '../infra/errors';
import { widestVariant } from '../import/image-linker';
import { createLogger } from '../utils/logger';

const logger = createLogger('attach-image');

export interface AttachImageResult {
  product: Product;
  variant: ImageVariant;
  /** False when the product already pointed at this variant */
  changed: boolean;
}

export function attachImage(db: Database, sku: string, uploadId: number, at: Date = new Date()): AttachImageResult {
  return db.transaction(() => {
    if (!db.getProduct(sku)) {
      throw new NotFoundError(`Product not found: ${sku}`);
    }

    const upload = db.getUpload(uploadId);
    if (!upload) {
      throw new NotFoundError(`Upload not found: ${uploadId}`);
    }
    if (upload.status !== 'completed') {
      throw new UploadNotReadyError(`Upload ${uploadId} is not completed (status: ${upload.status})`);
    }

    const variant = widestVariant(db.getVariants(uploadId));
    if (!variant) {
      throw new UploadNotReadyError(`No image variants found for upload: ${uploadId}`);
    }

    const changed = db.setPrimaryImage(sku, variant.id, at);
    const product = db.getProduct(sku);
    if (!product) {
      throw new NotFoundError(`Product not found: ${sku}`);
    }

    if (changed) {
      logger.info({ sku, uploadId, variantId: variant.id }, 'Primary image attached');
    }
    return { product, variant, changed };
  });
}
