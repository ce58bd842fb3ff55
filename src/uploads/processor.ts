/**
 * Upload Processor - turns a fully received upload into its image variants
 *
 * `process` is idempotent and safe to run any number of times, concurrently or
 * after a crash: work for one upload is serialized by a keyed mutex, variant
 * blobs and rows are create-if-absent, and a blob left behind by an earlier
 * run is reused instead of rendered again.
 */

import type { Database } from '../db';
import type { BlobStore } from '../storage/blob-store';
import type { Assembler } from './assembler';
import { variantKey, type ImageSize, type VariantGenerator } from '../media/variant-generator';
import { VARIANT_WIDTHS, variantLabel, type NewImageVariant, type VariantWidth } from '../types';
import { createKeyedMutex, type KeyedMutex } from '../utils/keyed-mutex';
import { sha256Hex } from '../utils/hash';
import { IntegrityError, errorMessage } from '../infra/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('upload-processor');

export type ProcessOutcome = 'missing' | 'skipped' | 'completed' | 'failed';

export interface UploadProcessor {
  process(uploadId: number): Promise<ProcessOutcome>;
}

export interface UploadProcessorDeps {
  db: Database;
  blobs: BlobStore;
  assembler: Assembler;
  generator: VariantGenerator;
  /** Shared lock; pass one in when several processors serve the same database. */
  mutex?: KeyedMutex<number>;
}

export function createUploadProcessor(deps: UploadProcessorDeps): UploadProcessor {
  const { db, blobs, assembler, generator } = deps;
  const mutex = deps.mutex ?? createKeyedMutex<number>();

  /** Store the rendition for `width` unless a previous run already did. */
  async function ensureVariant(
    uploadId: number,
    width: VariantWidth,
    source: Buffer,
    sourceSize: () => Promise<ImageSize>,
  ): Promise<NewImageVariant> {
    const key = variantKey(uploadId, width);
    const label = variantLabel(width);

    let stored = await blobs.get(key);
    if (!stored) {
      const rendered = await generator.generate(source, width, await sourceSize());
      if (await blobs.putIfAbsent(key, rendered.bytes)) {
        return {
          uploadId,
          variant: label,
          path: key,
          width: rendered.width,
          height: rendered.height,
          checksum: rendered.checksum,
        };
      }
      stored = await blobs.get(key);
      if (!stored) {
        throw new Error(`Variant blob ${key} vanished after write`);
      }
    }

    const size = await generator.readSize(stored);
    logger.debug({ uploadId, key }, 'Reusing stored variant');
    return {
      uploadId,
      variant: label,
      path: key,
      width: size.width,
      height: size.height,
      checksum: sha256Hex(stored),
    };
  }

  async function run(uploadId: number): Promise<ProcessOutcome> {
    const upload = db.getUpload(uploadId);
    if (!upload) {
      logger.warn({ uploadId }, 'Upload not found, nothing to process');
      return 'missing';
    }
    if (upload.status !== 'processing') {
      logger.info({ uploadId, status: upload.status }, 'Upload not awaiting processing, skipping');
      return 'skipped';
    }

    let outcome: 'completed' | 'failed';
    try {
      const assembled = await assembler.assemble(upload);

      let size: ImageSize | undefined;
      const sourceSize = async (): Promise<ImageSize> => {
        size ??= await generator.readSize(assembled.bytes);
        return size;
      };

      let created = 0;
      for (const width of VARIANT_WIDTHS) {
        if (db.getVariant(uploadId, variantLabel(width))) continue;
        const variant = await ensureVariant(uploadId, width, assembled.bytes, sourceSize);
        if (db.insertVariantIfAbsent(variant)) created++;
      }

      logger.info({ uploadId, created }, 'Upload processed');
      outcome = 'completed';
    } catch (err) {
      if (err instanceof IntegrityError) {
        logger.warn({ uploadId, error: err.message }, 'Upload failed integrity check');
      } else {
        logger.error({ uploadId, error: errorMessage(err) }, 'Upload processing failed');
      }
      outcome = 'failed';
    }

    await assembler.discard(uploadId).catch((err: unknown) => {
      logger.warn({ uploadId, error: errorMessage(err) }, 'Could not discard assembled file');
    });

    // Last step with no await after it: the job settles before a requeue can see the status
    db.transitionUploadStatus(uploadId, ['processing'], outcome);
    return outcome;
  }

  return {
    process(uploadId) {
      return mutex.runExclusive(uploadId, () => run(uploadId));
    },
  };
}
