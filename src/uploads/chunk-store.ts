/**
 * Chunk Store - raw chunk bytes keyed by (upload id, index)
 */

import type { BlobStore } from '../storage/blob-store';

export function chunkKey(uploadId: number, index: number): string {
  return `uploads/chunks/${uploadId}/${index}`;
}

export interface ChunkStore {
  /** First write wins; returns whether this call stored the bytes. */
  put(uploadId: number, index: number, bytes: Buffer): Promise<boolean>;
  has(uploadId: number, index: number): Promise<boolean>;
  read(uploadId: number, index: number): Promise<Buffer | undefined>;
  /** Indices in 0..total-1 with no stored chunk, ascending. */
  missing(uploadId: number, total: number): Promise<number[]>;
}

export function createChunkStore(blobs: BlobStore): ChunkStore {
  return {
    put(uploadId, index, bytes) {
      return blobs.putIfAbsent(chunkKey(uploadId, index), bytes);
    },

    has(uploadId, index) {
      return blobs.exists(chunkKey(uploadId, index));
    },

    read(uploadId, index) {
      return blobs.get(chunkKey(uploadId, index));
    },

    async missing(uploadId, total) {
      const gaps: number[] = [];
      for (let index = 0; index < total; index++) {
        if (!(await blobs.exists(chunkKey(uploadId, index)))) {
          gaps.push(index);
        }
      }
      return gaps;
    },
  };
}
