#!/usr/bin/env node
/**
 * catalog-ingest CLI
 *
 * Commands:
 * - catalog-ingest start          - Start the HTTP gateway and upload worker
 * - catalog-ingest import <file>  - Import a product CSV into the database file
 */

// Keep stdout clean for the JSON summary printed by `import`
if (process.argv.includes('import') && !process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'warn';
}

import { resolve } from 'path';
import { Command } from 'commander';
import { createGateway, createImporter, openDatabase } from '../gateway/index';
import { loadConfig } from '../utils/config';
import { logger } from '../utils/logger';
import { validateCsvFile } from '../import/csv-validator';
import { StructuralValidationError } from '../infra/errors';

const program = new Command();

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});
process.on('uncaughtException', (error) => {
  logger.error({ error }, 'Uncaught exception');
  process.exit(1);
});

program
  .name('catalog-ingest')
  .description('Chunked image uploads and streaming product CSV import')
  .version('0.1.0');

// ============================================================================
// start - Start the gateway
// ============================================================================
program
  .command('start')
  .description('Start the HTTP gateway and upload worker')
  .option('-p, --port <port>', 'Override gateway port')
  .action(async (options: { port?: string }) => {
    if (options.port) process.env.PORT = options.port;

    logger.info('Starting catalog ingest...');
    const config = loadConfig();
    const gateway = await createGateway(config);
    await gateway.start();

    logger.info({ port: config.port }, 'Catalog ingest is running');

    let shuttingDown = false;
    const shutdown = async () => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info('Shutting down...');
      try {
        await Promise.race([
          gateway.stop(),
          new Promise<void>((resolve) => setTimeout(() => { logger.warn('Shutdown timeout'); resolve(); }, 15000)),
        ]);
      } catch (e) { logger.error({ err: e }, 'Shutdown error'); }
      process.exit(0);
    };
    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
  });

// ============================================================================
// import - Offline CSV import
// ============================================================================
program
  .command('import')
  .argument('<file>', 'Path to the product CSV')
  .description('Import products from a CSV file and print the summary as JSON')
  .option('-b, --batch-size <rows>', 'Rows per batch transaction')
  .action(async (file: string, options: { batchSize?: string }) => {
    if (options.batchSize) process.env.CATALOG_IMPORT_BATCH_SIZE = options.batchSize;
    const config = loadConfig();
    const filePath = resolve(file);

    try {
      await validateCsvFile(filePath, { maxBytes: config.maxCsvBytes });
    } catch (err) {
      if (err instanceof StructuralValidationError) {
        console.error(JSON.stringify({ success: false, errors: err.errors }, null, 2));
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    const db = await openDatabase(config);
    try {
      const summary = await createImporter(db, config).importProducts(filePath);
      console.log(JSON.stringify(summary, null, 2));
      if (!summary.success) process.exitCode = 1;
    } finally {
      db.close();
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.error({ err }, 'Command failed');
  process.exit(1);
});
