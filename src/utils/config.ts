/**
 * Configuration loading for catalog-ingest
 *
 * Environment is read from ~/.catalog-ingest/.env first, then the CWD .env,
 * and validated with zod. Paths default to locations under the state dir.
 */

import { homedir } from 'os';
import { join, resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

dotenvConfig({ path: join(homedir(), '.catalog-ingest', '.env') });
dotenvConfig(); // CWD fallback (won't override existing vars)

const MB = 1024 * 1024;

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.CATALOG_STATE_DIR?.trim();
  if (override) return resolveUserPath(override);
  return join(homedir(), '.catalog-ingest');
}

const configSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(18800),
  nodeEnv: z.enum(['development', 'production', 'test']).default('production'),
  logLevel: z.string().default('info'),
  stateDir: z.string().min(1),
  databaseFile: z.string().min(1),
  storageDir: z.string().min(1),
  maxCsvBytes: z.coerce.number().int().positive().default(100 * MB),
  maxChunkBytes: z.coerce.number().int().positive().default(10 * MB),
  importBatchSize: z.coerce.number().int().positive().default(1000),
  workerConcurrency: z.coerce.number().int().positive().default(2),
  variantQuality: z.coerce.number().int().min(1).max(100).default(85),
});

export type AppConfig = z.infer<typeof configSchema>;

function optionalPath(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? resolveUserPath(trimmed) : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const stateDir = resolveStateDir(env);
  return configSchema.parse({
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    stateDir,
    databaseFile: optionalPath(env.CATALOG_DB_FILE) ?? join(stateDir, 'catalog.db'),
    storageDir: optionalPath(env.CATALOG_STORAGE_DIR) ?? join(stateDir, 'storage'),
    maxCsvBytes: env.CATALOG_MAX_CSV_BYTES,
    maxChunkBytes: env.CATALOG_MAX_CHUNK_BYTES,
    importBatchSize: env.CATALOG_IMPORT_BATCH_SIZE,
    workerConcurrency: env.CATALOG_WORKER_CONCURRENCY,
    variantQuality: env.CATALOG_VARIANT_QUALITY,
  });
}
