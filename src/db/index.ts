/**
 * Database - SQLite (sql.js WASM) persistence for uploads, variants and products
 *
 * The database lives in memory and, when a file is configured, is written
 * back atomically (tmp + rename) after every write outside a transaction and
 * after every commit. Statements are synchronous, so a transaction body that
 * never awaits cannot interleave with other work on the event loop.
 *
 * Each process keeps its own in-memory copy, so a file is held by one process
 * at a time through an exclusive `<file>.lock` beside it.
 */

import initSqlJs, { type Database as SqlJsDatabase, type SqlValue, type ParamsObject } from 'sql.js';
import { dirname } from 'path';
import {
  mkdirSync,
  existsSync,
  readFileSync,
  writeFileSync,
  renameSync,
  openSync,
  closeSync,
  unlinkSync,
} from 'fs';
import { createLogger } from '../utils/logger';
import { errorMessage } from '../infra/errors';
import { createMigrationRunner } from './migrations';
import {
  isUploadStatus,
  isVariantLabel,
  type ImageVariant,
  type NewImageVariant,
  type NewUpload,
  type Product,
  type ProductInput,
  type Upload,
  type UploadStatus,
  type UploadWithVariants,
} from '../types';

const logger = createLogger('db');

export type SqlParams = SqlValue[];

export type SqlRow = ParamsObject;

/** Upper bound on `?` placeholders per statement. */
const MAX_IN_PARAMS = 500;

// ---------------------------------------------------------------------------
// Database interface
// ---------------------------------------------------------------------------

export interface Database {
  close(): void;
  save(): void;

  // Raw SQL access
  /** Execute a statement; returns the number of rows it modified. */
  run(sql: string, params?: SqlParams): number;
  query(sql: string, params?: SqlParams): SqlRow[];
  /**
   * Run `fn` inside BEGIN/COMMIT, rolling back if it throws. Nested calls join
   * the outer transaction. `fn` must not await.
   */
  transaction<T>(fn: () => T): T;

  // Uploads
  getUpload(id: number): Upload | undefined;
  getUploadByChecksum(checksum: string): Upload | undefined;
  /** Insert the upload unless its checksum exists; returns the stored row either way. */
  createUploadIfAbsent(input: NewUpload): Upload;
  /** Add `index` to the received set (no-op if present); returns the updated row. */
  addReceivedChunk(id: number, index: number): Upload;
  /** Move to `to` only if the current status is one of `from`. */
  transitionUploadStatus(id: number, from: UploadStatus[], to: UploadStatus): boolean;
  listUploadsWithVariants(status: UploadStatus): UploadWithVariants[];

  // Image variants
  getVariants(uploadId: number): ImageVariant[];
  getVariant(uploadId: number, variant: string): ImageVariant | undefined;
  /** Create-if-absent on (upload_id, variant); returns whether a row was inserted. */
  insertVariantIfAbsent(variant: NewImageVariant): boolean;

  // Products
  getProduct(sku: string): Product | undefined;
  findExistingSkus(skus: string[]): Set<string>;
  /** Insert new SKUs, overwrite name/price/updated_at of existing ones. */
  upsertProducts(products: ProductInput[], at?: Date): void;
  /** Point the product at `variantId`; false when it already did (or no such SKU). */
  setPrimaryImage(sku: string, variantId: number, at?: Date): boolean;
}

export interface DatabaseOptions {
  /** Database file. Omit for a purely in-memory database. */
  file?: string;
}

// ---------------------------------------------------------------------------
// Row parsers
// ---------------------------------------------------------------------------

function requireNumber(row: SqlRow, column: string): number {
  const value = row[column];
  if (typeof value !== 'number') {
    throw new Error(`Column ${column} is not numeric`);
  }
  return value;
}

function requireString(row: SqlRow, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new Error(`Column ${column} is not text`);
  }
  return value;
}

function parseChunkList(raw: string): number[] {
  const parsed: unknown = JSON.parse(raw || '[]');
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((n): n is number => Number.isInteger(n));
}

function parseUpload(row: SqlRow | undefined): Upload | undefined {
  if (!row) return undefined;
  const status = row.status;
  if (!isUploadStatus(status)) {
    throw new Error(`Upload ${String(row.id)} has unknown status ${String(status)}`);
  }
  return {
    id: requireNumber(row, 'id'),
    checksum: requireString(row, 'checksum'),
    originalName: requireString(row, 'original_name'),
    totalChunks: requireNumber(row, 'total_chunks'),
    receivedChunks: parseChunkList(requireString(row, 'received_chunks')),
    status,
    createdAt: new Date(requireNumber(row, 'created_at')),
    updatedAt: new Date(requireNumber(row, 'updated_at')),
  };
}

function parseVariant(row: SqlRow): ImageVariant {
  const variant = row.variant;
  if (!isVariantLabel(variant)) {
    throw new Error(`Image variant ${String(row.id)} has unknown label ${String(variant)}`);
  }
  return {
    id: requireNumber(row, 'id'),
    uploadId: requireNumber(row, 'upload_id'),
    variant,
    path: requireString(row, 'path'),
    width: requireNumber(row, 'width'),
    height: requireNumber(row, 'height'),
    checksum: requireString(row, 'checksum'),
    createdAt: new Date(requireNumber(row, 'created_at')),
  };
}

function parseProduct(row: SqlRow | undefined): Product | undefined {
  if (!row) return undefined;
  const primary = row.primary_image_id;
  return {
    id: requireNumber(row, 'id'),
    sku: requireString(row, 'sku'),
    name: requireString(row, 'name'),
    price: requireNumber(row, 'price'),
    primaryImageId: typeof primary === 'number' ? primary : null,
    createdAt: new Date(requireNumber(row, 'created_at')),
    updatedAt: new Date(requireNumber(row, 'updated_at')),
  };
}

// ---------------------------------------------------------------------------
// File lock
// ---------------------------------------------------------------------------

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: alive, owned by another user
    return !(isErrnoException(err) && err.code === 'ESRCH');
  }
}

/**
 * Create `<file>.lock` holding our pid. A lock left by a process that no
 * longer exists is taken over once; a live holder makes this throw.
 */
function acquireFileLock(file: string): () => void {
  const lockPath = file + '.lock';

  for (let attempt = 0; ; attempt++) {
    try {
      const fd = openSync(lockPath, 'wx');
      try {
        writeFileSync(fd, String(process.pid));
      } finally {
        closeSync(fd);
      }
      break;
    } catch (err) {
      if (!(isErrnoException(err) && err.code === 'EEXIST')) throw err;
      const holder = Number.parseInt(readFileSync(lockPath, 'utf8'), 10);
      if (attempt === 0 && Number.isInteger(holder) && !isProcessAlive(holder)) {
        logger.warn({ file, pid: holder }, 'Removing stale database lock');
        unlinkSync(lockPath);
        continue;
      }
      const owner = Number.isInteger(holder) ? ` (pid ${holder})` : '';
      throw new Error(`Database ${file} is locked by another process${owner}`);
    }
  }

  let released = false;
  return () => {
    if (released) return;
    released = true;
    try {
      unlinkSync(lockPath);
    } catch (err) {
      logger.warn({ file, error: errorMessage(err) }, 'Could not remove database lock');
    }
  };
}

// ---------------------------------------------------------------------------
// createDatabase
// ---------------------------------------------------------------------------

/**
 * Open (or create) the database, apply pending migrations and return a handle.
 */
export async function createDatabase(options: DatabaseOptions = {}): Promise<Database> {
  const { file } = options;

  const SQL = await initSqlJs();

  let releaseLock = (): void => {};
  let db: SqlJsDatabase;
  if (file) {
    mkdirSync(dirname(file), { recursive: true });
    releaseLock = acquireFileLock(file);
  }
  try {
    if (file && existsSync(file)) {
      logger.info({ file }, 'Opening database');
      db = new SQL.Database(readFileSync(file));
    } else {
      if (file) logger.info({ file }, 'Creating database');
      db = new SQL.Database();
    }
  } catch (err) {
    releaseLock();
    throw err;
  }

  db.run('PRAGMA foreign_keys = ON');

  let transactionDepth = 0;
  let closed = false;

  // -------------------------------------------------------------------------
  // Internal helpers
  // -------------------------------------------------------------------------

  function saveDb(): void {
    if (!file || closed) return;
    const tmpPath = file + '.tmp';
    writeFileSync(tmpPath, Buffer.from(db.export()));
    renameSync(tmpPath, file);
  }

  function saveUnlessInTransaction(): void {
    if (transactionDepth === 0) saveDb();
  }

  function getAll(sql: string, params: SqlParams = []): SqlRow[] {
    const stmt = db.prepare(sql);
    try {
      stmt.bind(params);
      const results: SqlRow[] = [];
      while (stmt.step()) {
        results.push(stmt.getAsObject());
      }
      return results;
    } finally {
      stmt.free();
    }
  }

  function getOne(sql: string, params: SqlParams = []): SqlRow | undefined {
    return getAll(sql, params)[0];
  }

  function chunked<T>(items: T[], size: number): T[][] {
    const out: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
      out.push(items.slice(i, i + size));
    }
    return out;
  }

  // -------------------------------------------------------------------------
  // Build Database instance
  // -------------------------------------------------------------------------

  const instance: Database = {
    // -- Lifecycle --

    close() {
      if (closed) return;
      try {
        saveDb();
      } finally {
        closed = true;
        db.close();
        releaseLock();
      }
    },

    save() {
      saveDb();
    },

    // -- Raw SQL --

    run(sql: string, params: SqlParams = []): number {
      db.run(sql, params);
      const modified = db.getRowsModified();
      saveUnlessInTransaction();
      return modified;
    },

    query(sql: string, params: SqlParams = []): SqlRow[] {
      return getAll(sql, params);
    },

    transaction<T>(fn: () => T): T {
      if (transactionDepth > 0) {
        return fn();
      }
      db.run('BEGIN IMMEDIATE');
      transactionDepth++;
      try {
        const result = fn();
        db.run('COMMIT');
        transactionDepth--;
        saveDb();
        return result;
      } catch (err) {
        transactionDepth--;
        try {
          db.run('ROLLBACK');
        } catch (rollbackError) {
          // SQLite may already have rolled back on its own
          logger.warn({ error: rollbackError }, 'Rollback failed');
        }
        throw err;
      }
    },

    // -- Uploads --

    getUpload(id: number): Upload | undefined {
      return parseUpload(getOne('SELECT * FROM uploads WHERE id = ?', [id]));
    },

    getUploadByChecksum(checksum: string): Upload | undefined {
      return parseUpload(getOne('SELECT * FROM uploads WHERE checksum = ?', [checksum]));
    },

    createUploadIfAbsent(input: NewUpload): Upload {
      const now = Date.now();
      instance.run(
        `INSERT INTO uploads (checksum, original_name, total_chunks, received_chunks, status, created_at, updated_at)
         VALUES (?, ?, ?, '[]', 'uploading', ?, ?)
         ON CONFLICT(checksum) DO NOTHING`,
        [input.checksum, input.originalName, input.totalChunks, now, now],
      );
      const upload = instance.getUploadByChecksum(input.checksum);
      if (!upload) {
        throw new Error(`Upload for checksum ${input.checksum} could not be created`);
      }
      return upload;
    },

    addReceivedChunk(id: number, index: number): Upload {
      return instance.transaction(() => {
        const current = instance.getUpload(id);
        if (!current) {
          throw new Error(`Upload ${id} not found`);
        }
        if (current.receivedChunks.includes(index)) {
          return current;
        }
        const received = [...current.receivedChunks, index].sort((a, b) => a - b);
        const now = Date.now();
        instance.run('UPDATE uploads SET received_chunks = ?, updated_at = ? WHERE id = ?', [
          JSON.stringify(received),
          now,
          id,
        ]);
        return { ...current, receivedChunks: received, updatedAt: new Date(now) };
      });
    },

    transitionUploadStatus(id: number, from: UploadStatus[], to: UploadStatus): boolean {
      if (from.length === 0) return false;
      const placeholders = from.map(() => '?').join(', ');
      const changed = instance.run(
        `UPDATE uploads SET status = ?, updated_at = ? WHERE id = ? AND status IN (${placeholders})`,
        [to, Date.now(), id, ...from],
      );
      return changed === 1;
    },

    listUploadsWithVariants(status: UploadStatus): UploadWithVariants[] {
      const uploads = getAll('SELECT * FROM uploads WHERE status = ? ORDER BY id DESC', [status])
        .map(parseUpload)
        .filter((u): u is Upload => Boolean(u));
      if (uploads.length === 0) return [];

      const byUpload = new Map<number, ImageVariant[]>();
      for (const ids of chunked(uploads.map((u) => u.id), MAX_IN_PARAMS)) {
        const placeholders = ids.map(() => '?').join(', ');
        const rows = getAll(
          `SELECT * FROM image_variants WHERE upload_id IN (${placeholders}) ORDER BY id ASC`,
          ids,
        );
        for (const variant of rows.map(parseVariant)) {
          const list = byUpload.get(variant.uploadId) ?? [];
          list.push(variant);
          byUpload.set(variant.uploadId, list);
        }
      }

      return uploads.map((u) => ({ ...u, variants: byUpload.get(u.id) ?? [] }));
    },

    // -- Image variants --

    getVariants(uploadId: number): ImageVariant[] {
      return getAll('SELECT * FROM image_variants WHERE upload_id = ? ORDER BY id ASC', [
        uploadId,
      ]).map(parseVariant);
    },

    getVariant(uploadId: number, variant: string): ImageVariant | undefined {
      const row = getOne('SELECT * FROM image_variants WHERE upload_id = ? AND variant = ?', [
        uploadId,
        variant,
      ]);
      return row ? parseVariant(row) : undefined;
    },

    insertVariantIfAbsent(variant: NewImageVariant): boolean {
      const inserted = instance.run(
        `INSERT INTO image_variants (upload_id, variant, path, width, height, checksum, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(upload_id, variant) DO NOTHING`,
        [
          variant.uploadId,
          variant.variant,
          variant.path,
          variant.width,
          variant.height,
          variant.checksum,
          Date.now(),
        ],
      );
      return inserted === 1;
    },

    // -- Products --

    getProduct(sku: string): Product | undefined {
      return parseProduct(getOne('SELECT * FROM products WHERE sku = ?', [sku]));
    },

    findExistingSkus(skus: string[]): Set<string> {
      const found = new Set<string>();
      for (const group of chunked(skus, MAX_IN_PARAMS)) {
        const placeholders = group.map(() => '?').join(', ');
        for (const row of getAll(`SELECT sku FROM products WHERE sku IN (${placeholders})`, group)) {
          found.add(requireString(row, 'sku'));
        }
      }
      return found;
    },

    upsertProducts(products: ProductInput[], at: Date = new Date()): void {
      if (products.length === 0) return;
      const now = at.getTime();
      instance.transaction(() => {
        const stmt = db.prepare(
          `INSERT INTO products (sku, name, price, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(sku) DO UPDATE SET
             name = excluded.name,
             price = excluded.price,
             updated_at = excluded.updated_at`,
        );
        try {
          for (const product of products) {
            stmt.run([product.sku, product.name, product.price, now, now]);
          }
        } finally {
          stmt.free();
        }
      });
    },

    setPrimaryImage(sku: string, variantId: number, at: Date = new Date()): boolean {
      const changed = instance.run(
        `UPDATE products SET primary_image_id = ?, updated_at = ?
         WHERE sku = ? AND (primary_image_id IS NULL OR primary_image_id != ?)`,
        [variantId, at.getTime(), sku, variantId],
      );
      return changed === 1;
    },
  };

  try {
    createMigrationRunner(instance).migrate();
    saveDb();
  } catch (err) {
    closed = true;
    db.close();
    releaseLock();
    throw err;
  }

  return instance;
}
