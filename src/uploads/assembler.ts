/**
 * Assembler - joins an upload's chunks and verifies the declared checksum
 */

import { createHash } from 'crypto';
import type { BlobStore } from '../storage/blob-store';
import type { ChunkStore } from './chunk-store';
import type { Upload } from '../types';
import { IntegrityError } from '../infra/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('assembler');

export interface AssembledFile {
  /** Blob key of the assembled bytes */
  key: string;
  bytes: Buffer;
  /** Lowercase hex SHA-256 */
  checksum: string;
}

export interface Assembler {
  /**
   * Concatenate chunks 0..total-1 in order and compare the digest with the
   * upload's checksum. Throws IntegrityError on a gap or mismatch.
   */
  assemble(upload: Pick<Upload, 'id' | 'checksum' | 'totalChunks'>): Promise<AssembledFile>;
  /** Drop the assembled bytes for `uploadId` if present. */
  discard(uploadId: number): Promise<void>;
}

export function assembledKey(uploadId: number): string {
  return `uploads/assembled/${uploadId}`;
}

export function createAssembler(blobs: BlobStore, chunks: ChunkStore): Assembler {
  return {
    async assemble(upload) {
      const missing = await chunks.missing(upload.id, upload.totalChunks);
      if (missing.length > 0) {
        throw new IntegrityError(
          `Upload ${upload.id} is missing chunks: ${missing.join(', ')}`,
          upload.id,
        );
      }

      const hash = createHash('sha256');
      const parts: Buffer[] = [];
      for (let index = 0; index < upload.totalChunks; index++) {
        const part = await chunks.read(upload.id, index);
        if (!part) {
          throw new IntegrityError(`Upload ${upload.id} lost chunk ${index}`, upload.id);
        }
        hash.update(part);
        parts.push(part);
      }

      const checksum = hash.digest('hex');
      if (checksum !== upload.checksum.toLowerCase()) {
        throw new IntegrityError(
          `Checksum mismatch for upload ${upload.id}: expected ${upload.checksum}, got ${checksum}`,
          upload.id,
        );
      }

      const bytes = Buffer.concat(parts);
      const key = assembledKey(upload.id);
      await blobs.put(key, bytes);
      logger.debug({ uploadId: upload.id, size: bytes.length }, 'Upload assembled');

      return { key, bytes, checksum };
    },

    discard(uploadId) {
      return blobs.delete(assembledKey(uploadId));
    },
  };
}
