/**
 * Product routes - CSV import, manual image attach, lookup
 */
import { Router, Request, Response } from 'express';
import { createWriteStream } from 'fs';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Transform, type TransformCallback } from 'stream';
import { pipeline } from 'stream/promises';
import type { Database } from '../db';
import type { ProductImporter } from '../import/product-importer';
import { assertCsvFileType, formatBytes, validateCsvFile } from '../import/csv-validator';
import { attachImage } from '../products/attach-image';
import { NotFoundError, StructuralValidationError } from '../infra/errors';
import { createLogger } from '../utils/logger';
import { asyncRoute, parseId, productJson, queryString, summaryJson, variantJson } from './http';

const logger = createLogger('products-routes');

export interface ProductRoutesOptions {
  maxCsvBytes: number;
  /** Where request bodies are spooled before import. Default: os.tmpdir() */
  tmpDir?: string;
}

/**
 * Passes bytes through until `maxBytes`, then keeps counting but drops the
 * rest so the spooled file never grows past the cap.
 */
class ByteCap extends Transform {
  received = 0;

  constructor(private readonly maxBytes: number) {
    super();
  }

  get exceeded(): boolean {
    return this.received > this.maxBytes;
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    const before = this.received;
    this.received += chunk.length;
    if (before >= this.maxBytes) {
      callback();
      return;
    }
    callback(null, this.received > this.maxBytes ? chunk.subarray(0, this.maxBytes - before) : chunk);
  }
}

export function createProductRoutes(db: Database, importer: ProductImporter, options: ProductRoutesOptions): Router {
  const router = Router();

  // POST /import/products?filename=products.csv (raw CSV body)
  router.post(
    '/import/products',
    asyncRoute(async (req: Request, res: Response) => {
      const filename = queryString(req.query.filename) ?? req.get('x-filename');
      assertCsvFileType(filename, req.get('content-type'));

      const dir = await mkdtemp(join(options.tmpDir ?? tmpdir(), 'catalog-upload-'));
      try {
        const file = join(dir, 'products.csv');
        const cap = new ByteCap(options.maxCsvBytes);
        await pipeline(req, cap, createWriteStream(file));
        if (cap.exceeded) {
          throw new StructuralValidationError([
            `File too large. Maximum size: ${formatBytes(options.maxCsvBytes)}, Actual size: ${formatBytes(cap.received)}`,
          ]);
        }

        await validateCsvFile(file, { maxBytes: options.maxCsvBytes });
        const summary = await importer.importProducts(file);
        res.status(summary.success ? 200 : 500).json({ success: summary.success, data: summaryJson(summary) });
      } finally {
        await rm(dir, { recursive: true, force: true }).catch((err: unknown) => {
          logger.warn({ dir, err }, 'Failed to remove spooled CSV');
        });
      }
    }),
  );

  // POST /products/:sku/attach-image/:uploadId
  router.post('/products/:sku/attach-image/:uploadId', (req: Request, res: Response) => {
    const result = attachImage(db, req.params.sku, parseId(req.params.uploadId, 'upload id'));
    res.json({
      success: true,
      message: result.changed ? 'Image attached to product' : 'Image was already attached to product',
      data: { product: productJson(result.product), variant: variantJson(result.variant) },
    });
  });

  // GET /products/:sku
  router.get('/products/:sku', (req: Request, res: Response) => {
    const product = db.getProduct(req.params.sku);
    if (!product) {
      throw new NotFoundError(`Product not found: ${req.params.sku}`);
    }
    res.json({ success: true, data: productJson(product) });
  });

  return router;
}
