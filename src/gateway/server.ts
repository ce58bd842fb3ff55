/**
 * HTTP server for catalog ingest
 *
 * Middleware order:
 * - Security headers
 * - Request logging (method, path, status, duration)
 * - Health check
 * - Upload and product routes
 * - Error-handling middleware
 */

import express, { Request, Response, NextFunction } from 'express';
import http from 'http';
import { createLogger } from '../utils/logger';
import { AppError, StructuralValidationError } from '../infra/errors';
import type { AppConfig } from '../utils/config';
import type { Database } from '../db';
import type { UploadLedger } from '../uploads/ledger';
import type { ProductImporter } from '../import/product-importer';
import { createUploadRoutes } from '../api/uploads.routes';
import { createProductRoutes } from '../api/products.routes';

const logger = createLogger('server');

export type ServerConfig = Pick<AppConfig, 'port' | 'nodeEnv' | 'maxChunkBytes' | 'maxCsvBytes'> & {
  /** Listen address. Defaults to 0.0.0.0 */
  host?: string;
  /** Spool directory for CSV request bodies */
  tmpDir?: string;
};

export interface ServerDeps {
  config: ServerConfig;
  db: Database;
  ledger: UploadLedger;
  importer: ProductImporter;
}

/** Status carried by errors from Express's own body parsers (413, 400, ...). */
function httpStatusOf(err: unknown): number | undefined {
  if (err instanceof AppError) return err.status;
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export function createServer(deps: ServerDeps) {
  const { config, db, ledger, importer } = deps;
  const app = express();

  // ---------------------------------------------------------------------------
  // Security headers
  // ---------------------------------------------------------------------------
  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    next();
  });

  // ---------------------------------------------------------------------------
  // Request logging
  // ---------------------------------------------------------------------------
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';
      logger[level](
        { method: req.method, path: req.path, status: res.statusCode, duration },
        '%s %s %d %dms',
        req.method,
        req.path,
        res.statusCode,
        duration,
      );
    });
    next();
  });

  // ---------------------------------------------------------------------------
  // Health check
  // ---------------------------------------------------------------------------
  app.get('/health', (_req: Request, res: Response) => {
    try {
      db.query('SELECT 1');
      res.json({ status: 'healthy', service: 'catalog-ingest', timestamp: Date.now() });
    } catch (err) {
      logger.error({ err }, 'Health check failed');
      res.status(503).json({ status: 'unhealthy', service: 'catalog-ingest', timestamp: Date.now() });
    }
  });

  // ---------------------------------------------------------------------------
  // Routes (each route picks its own body parser)
  // ---------------------------------------------------------------------------
  app.use(createUploadRoutes(ledger, { maxChunkBytes: config.maxChunkBytes }));
  app.use(createProductRoutes(db, importer, { maxCsvBytes: config.maxCsvBytes, tmpDir: config.tmpDir }));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ success: false, error: `Route not found: ${req.method} ${req.path}` });
  });

  // ---------------------------------------------------------------------------
  // Error handler (must be last)
  // ---------------------------------------------------------------------------
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    const status = httpStatusOf(err) ?? 500;
    if (status >= 500) {
      logger.error({ err: err.message, stack: err.stack, method: req.method, path: req.path }, 'Unhandled error');
    } else {
      logger.debug({ err: err.message, status, method: req.method, path: req.path }, 'Request rejected');
    }
    if (res.headersSent) return;

    if (err instanceof StructuralValidationError) {
      res.status(status).json({ success: false, errors: err.errors });
      return;
    }
    const hidden = status >= 500 && config.nodeEnv === 'production';
    res.status(status).json({
      success: false,
      error: hidden ? 'Internal server error' : err.message,
      ...(err instanceof AppError ? { code: err.code } : {}),
    });
  });

  // ---------------------------------------------------------------------------
  // Create HTTP server
  // ---------------------------------------------------------------------------
  const server = http.createServer(app);
  const host = config.host ?? '0.0.0.0';

  return {
    app,
    server,
    start(): Promise<void> {
      return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(config.port, host, () => {
          server.off('error', reject);
          logger.info({ port: config.port, host }, 'Catalog ingest server started');
          resolve();
        });
      });
    },
    stop(): Promise<void> {
      return new Promise((resolve, reject) => {
        server.close((err) => {
          if (err) {
            reject(err);
            return;
          }
          logger.info('Catalog ingest server stopped');
          resolve();
        });
      });
    },
  };
}

export type CatalogServer = ReturnType<typeof createServer>;
