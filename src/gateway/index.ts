/**
 * Gateway - wires storage, the upload pipeline, the job queue and the HTTP
 * server into one process.
 */

import { createLogger } from '../utils/logger';
import type { AppConfig } from '../utils/config';
import { createDatabase, type Database } from '../db';
import { createLocalBlobStore } from '../storage/blob-store';
import { createChunkStore } from '../uploads/chunk-store';
import { createAssembler } from '../uploads/assembler';
import { createVariantGenerator } from '../media/variant-generator';
import { createUploadProcessor } from '../uploads/processor';
import { createUploadLedger } from '../uploads/ledger';
import { createJobQueue } from '../queue/job-queue';
import { createJobHandler, createUploadDispatcher } from '../queue/worker';
import { createProductImporter, type ProductImporter } from '../import/product-importer';
import { createServer } from './server';

const logger = createLogger('gateway');

export interface Gateway {
  start(): Promise<void>;
  stop(): Promise<void>;
}

/** Open (or create) the database file named by the config. */
export async function openDatabase(config: Pick<AppConfig, 'databaseFile'>): Promise<Database> {
  return createDatabase({ file: config.databaseFile });
}

export function createImporter(db: Database, config: Pick<AppConfig, 'importBatchSize'>): ProductImporter {
  return createProductImporter({ db }, { batchSize: config.importBatchSize });
}

export async function createGateway(config: AppConfig): Promise<Gateway> {
  logger.info('Initializing catalog ingest gateway...');

  // 1. Storage
  const db = await openDatabase(config);
  const blobs = createLocalBlobStore(config.storageDir);
  const chunks = createChunkStore(blobs);
  logger.info({ databaseFile: config.databaseFile, storageDir: config.storageDir }, 'Storage ready');

  // 2. Upload pipeline behind the job queue
  const processor = createUploadProcessor({
    db,
    blobs,
    assembler: createAssembler(blobs, chunks),
    generator: createVariantGenerator({ quality: config.variantQuality }),
  });
  const jobQueue = createJobQueue(db, createJobHandler({ processor }), {
    concurrency: config.workerConcurrency,
  });
  const ledger = createUploadLedger({ db, chunks, dispatcher: createUploadDispatcher(jobQueue) });

  // 3. HTTP
  const httpServer = createServer({
    config,
    db,
    ledger,
    importer: createImporter(db, config),
  });

  let started = false;

  return {
    async start() {
      if (started) return;
      jobQueue.start();
      await httpServer.start();
      started = true;
    },

    async stop() {
      if (!started) return;
      started = false;
      logger.info('Shutting down catalog ingest gateway...');

      try {
        await httpServer.stop();
      } finally {
        // In-flight uploads finish before the database is saved and closed
        await jobQueue.stop();
        db.close();
      }
      logger.info('Gateway stopped');
    },
  };
}
