/**
 * Product Importer - streams a product CSV into the catalog
 *
 * Rows are read lazily and handled in batches. Each batch runs in one
 * transaction: classify SKUs as new or existing, upsert by SKU, then link
 * images when the file has an image column. Batches already committed stay
 * committed if a later one fails.
 */

import type { Database } from '../db';
import { errorMessage } from '../infra/errors';
import { createLogger } from '../utils/logger';
import { inBatches, readCsvRecords } from './csv-reader';
import { resolveColumns, validateRow } from './row-validator';
import { createImageLinker, type ImageLinker } from './image-linker';
import type {
  CsvColumns,
  ImageLinkRequest,
  ImportOptions,
  ImportSummary,
  ProductImportRow,
} from './types';

const logger = createLogger('product-importer');

const DEFAULT_BATCH_SIZE = 1000;

export interface ProductImporter {
  importProducts(filePath: string): Promise<ImportSummary>;
}

export interface ProductImporterDeps {
  db: Database;
  linker?: ImageLinker;
}

/** An issue tied to the data row it came from. */
interface RowIssue {
  rowNumber: number;
  message: string;
}

interface ScreenedBatch {
  rows: ProductImportRow[];
  issues: RowIssue[];
}

/** State that lives for exactly one import run. */
interface ImportRun {
  columns: CsvColumns;
  seenSkus: Set<string>;
  summary: ImportSummary;
}

function emptySummary(): ImportSummary {
  return {
    success: true,
    totalRows: 0,
    importedCount: 0,
    updatedCount: 0,
    invalidCount: 0,
    duplicateCount: 0,
    imagesLinked: 0,
    imagesNotFound: 0,
    issues: [],
  };
}

export function createProductImporter(deps: ProductImporterDeps, options: ImportOptions = {}): ProductImporter {
  const { db } = deps;
  const linker = deps.linker ?? createImageLinker(db);
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;

  /** Validate and dedupe one batch of records. */
  function screen(run: ImportRun, records: string[][]): ScreenedBatch {
    const { summary } = run;
    const batch: ScreenedBatch = { rows: [], issues: [] };

    for (const fields of records) {
      summary.totalRows++;
      const rowNumber = summary.totalRows;
      const result = validateRow(fields, run.columns, rowNumber);
      if (!result.valid) {
        summary.invalidCount++;
        batch.issues.push({ rowNumber, message: result.issue });
        continue;
      }

      const { row } = result;
      if (run.seenSkus.has(row.sku)) {
        summary.duplicateCount++;
        batch.issues.push({ rowNumber, message: `Row ${rowNumber}: Duplicate SKU in CSV: ${row.sku}` });
        continue;
      }
      run.seenSkus.add(row.sku);
      batch.rows.push(row);
    }

    return batch;
  }

  /**
   * Write one batch; counts reach the summary only once the batch commits.
   * The batch's issues are added in row order, even when the write fails.
   */
  function writeBatch(run: ImportRun, batch: ScreenedBatch): void {
    const { summary } = run;
    const { rows } = batch;
    const issues = [...batch.issues];

    try {
      if (rows.length === 0) return;

      const outcome = db.transaction(() => {
        const existing = db.findExistingSkus(rows.map((r) => r.sku));
        const now = new Date();
        db.upsertProducts(
          rows.map(({ sku, name, price }) => ({ sku, name, price })),
          now,
        );

        const links: ImageLinkRequest[] =
          run.columns.image === undefined
            ? []
            : rows.flatMap((r) => (r.image ? [{ sku: r.sku, filename: r.image }] : []));
        const tally = links.length > 0 ? linker.link(links, now) : undefined;
        return { updated: existing.size, tally };
      });

      summary.updatedCount += outcome.updated;
      summary.importedCount += rows.length - outcome.updated;
      if (outcome.tally) {
        summary.imagesLinked += outcome.tally.linked;
        summary.imagesNotFound += outcome.tally.notFound;
        // SKUs are unique within a batch once duplicates are dropped
        const rowOf = new Map(rows.map((r) => [r.sku, r.rowNumber]));
        for (const { sku, message } of outcome.tally.issues) {
          issues.push({ rowNumber: rowOf.get(sku) ?? 0, message });
        }
      }
    } finally {
      issues.sort((a, b) => a.rowNumber - b.rowNumber);
      summary.issues.push(...issues.map((i) => i.message));
    }
  }

  return {
    async importProducts(filePath) {
      const summary = emptySummary();
      const startedAt = Date.now();

      const records = readCsvRecords(filePath);
      try {
        const header = await records.next();
        if (header.done) {
          throw new Error('CSV file is empty or header row cannot be read');
        }

        const columns = resolveColumns(header.value);
        if ('missing' in columns) {
          throw new Error(`Missing required columns: ${columns.missing.join(', ')}`);
        }

        const run: ImportRun = { columns, seenSkus: new Set(), summary };
        for await (const batch of inBatches(records, batchSize)) {
          writeBatch(run, screen(run, batch));
        }
      } catch (err) {
        summary.success = false;
        summary.issues.push(`Fatal error: ${errorMessage(err)}`);
        logger.error({ filePath, error: errorMessage(err) }, 'Import aborted');
      } finally {
        await records.return(undefined);
      }

      logger.info(
        {
          filePath,
          durationMs: Date.now() - startedAt,
          totalRows: summary.totalRows,
          imported: summary.importedCount,
          updated: summary.updatedCount,
          invalid: summary.invalidCount,
          duplicates: summary.duplicateCount,
        },
        'Import finished',
      );
      return summary;
    },
  };
}
