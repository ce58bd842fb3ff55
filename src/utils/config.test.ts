import { describe, it, expect } from 'vitest';
import { homedir } from 'os';
import { join } from 'path';
import { ZodError } from 'zod';
import { loadConfig, resolveStateDir } from './config';

describe('loadConfig', () => {
  it('fills defaults under the state dir', () => {
    expect(loadConfig({ CATALOG_STATE_DIR: '/srv/catalog' })).toEqual({
      port: 18800,
      nodeEnv: 'production',
      logLevel: 'info',
      stateDir: '/srv/catalog',
      databaseFile: '/srv/catalog/catalog.db',
      storageDir: '/srv/catalog/storage',
      maxCsvBytes: 100 * 1024 * 1024,
      maxChunkBytes: 10 * 1024 * 1024,
      importBatchSize: 1000,
      workerConcurrency: 2,
      variantQuality: 85,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      CATALOG_STATE_DIR: '/srv/catalog',
      PORT: '9000',
      NODE_ENV: 'development',
      CATALOG_DB_FILE: '/data/products.db',
      CATALOG_IMPORT_BATCH_SIZE: '50',
      CATALOG_WORKER_CONCURRENCY: '4',
    });

    expect(config).toMatchObject({
      port: 9000,
      nodeEnv: 'development',
      databaseFile: '/data/products.db',
      storageDir: '/srv/catalog/storage',
      importBatchSize: 50,
      workerConcurrency: 4,
    });
  });

  it('rejects out-of-range values', () => {
    expect(() => loadConfig({ CATALOG_STATE_DIR: '/srv/catalog', CATALOG_VARIANT_QUALITY: '0' })).toThrow(ZodError);
    expect(() => loadConfig({ CATALOG_STATE_DIR: '/srv/catalog', CATALOG_IMPORT_BATCH_SIZE: 'lots' })).toThrow(
      ZodError,
    );
  });
});

describe('resolveStateDir', () => {
  it('expands a leading tilde', () => {
    expect(resolveStateDir({ CATALOG_STATE_DIR: '~/catalog' })).toBe(join(homedir(), 'catalog'));
  });

  it('defaults to a dot directory in home', () => {
    expect(resolveStateDir({})).toBe(join(homedir(), '.catalog-ingest'));
  });
});
