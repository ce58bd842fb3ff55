/**
 * Blob Store - keyed byte storage for chunks, assembled files and variants
 *
 * Keys are relative POSIX-style paths (`uploads/chunks/7/0`, `images/7_256.jpg`).
 * `putIfAbsent` is an exclusive create: of several concurrent writers for one
 * key exactly one wins and the stored bytes are never partially written.
 */

import { randomUUID } from 'crypto';
import { mkdir, writeFile, rename, link, unlink, readFile, stat, rm } from 'fs/promises';
import { dirname, join, resolve, sep } from 'path';
import { createLogger } from '../utils/logger';

const logger = createLogger('blob-store');

export interface BlobStore {
  /** Write (or overwrite) `key`. */
  put(key: string, bytes: Buffer): Promise<void>;
  /** Write `key` only if nothing is stored there yet; returns whether this call wrote it. */
  putIfAbsent(key: string, bytes: Buffer): Promise<boolean>;
  /** Read `key`, or undefined when absent. */
  get(key: string): Promise<Buffer | undefined>;
  exists(key: string): Promise<boolean>;
  /** Remove `key` (or a whole prefix directory). Missing keys are ignored. */
  delete(key: string): Promise<void>;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function normalizeKey(key: string): string {
  const parts = key.split(/[\\/]+/).filter((p) => p.length > 0);
  if (parts.length === 0 || parts.some((p) => p === '..' || p === '.')) {
    throw new Error(`Invalid blob key: ${key}`);
  }
  return parts.join('/');
}

// =============================================================================
// Local filesystem
// =============================================================================

export function createLocalBlobStore(root: string): BlobStore {
  const base = resolve(root);

  function pathFor(key: string): string {
    const full = join(base, ...normalizeKey(key).split('/'));
    if (!full.startsWith(base + sep)) {
      throw new Error(`Blob key escapes storage root: ${key}`);
    }
    return full;
  }

  function tmpPathFor(full: string): string {
    return `${full}.${randomUUID()}.tmp`;
  }

  return {
    async put(key, bytes) {
      const full = pathFor(key);
      await mkdir(dirname(full), { recursive: true });
      const tmp = tmpPathFor(full);
      await writeFile(tmp, bytes);
      await rename(tmp, full);
    },

    async putIfAbsent(key, bytes) {
      const full = pathFor(key);
      await mkdir(dirname(full), { recursive: true });
      const tmp = tmpPathFor(full);
      await writeFile(tmp, bytes);
      try {
        // link() fails with EEXIST instead of replacing the target
        await link(tmp, full);
        return true;
      } catch (err) {
        if (isErrnoException(err) && err.code === 'EEXIST') {
          logger.debug({ key }, 'Blob already present');
          return false;
        }
        throw err;
      } finally {
        await unlink(tmp);
      }
    },

    async get(key) {
      try {
        return await readFile(pathFor(key));
      } catch (err) {
        if (isErrnoException(err) && err.code === 'ENOENT') return undefined;
        throw err;
      }
    },

    async exists(key) {
      try {
        await stat(pathFor(key));
        return true;
      } catch (err) {
        if (isErrnoException(err) && err.code === 'ENOENT') return false;
        throw err;
      }
    },

    async delete(key) {
      await rm(pathFor(key), { recursive: true, force: true });
    },
  };
}

// =============================================================================
// In-memory (tests)
// =============================================================================

export function createMemoryBlobStore(): BlobStore {
  const blobs = new Map<string, Buffer>();

  return {
    async put(key, bytes) {
      blobs.set(normalizeKey(key), Buffer.from(bytes));
    },

    async putIfAbsent(key, bytes) {
      const normalized = normalizeKey(key);
      if (blobs.has(normalized)) return false;
      blobs.set(normalized, Buffer.from(bytes));
      return true;
    },

    async get(key) {
      const stored = blobs.get(normalizeKey(key));
      return stored ? Buffer.from(stored) : undefined;
    },

    async exists(key) {
      return blobs.has(normalizeKey(key));
    },

    async delete(key) {
      const normalized = normalizeKey(key);
      for (const existing of [...blobs.keys()]) {
        if (existing === normalized || existing.startsWith(normalized + '/')) {
          blobs.delete(existing);
        }
      }
    },
  };
}
