/**
 * Upload Ledger - chunk bookkeeping and the hand-off to processing
 *
 * An upload is keyed by its checksum. Chunks may arrive in any order, more
 * than once and from concurrent requests. The received set is updated with a
 * synchronous re-read after the chunk bytes are stored, so no index is lost,
 * and only the caller whose conditional uploading -> processing update
 * succeeds dispatches the processing job.
 */

import { z } from 'zod';
import type { Database } from '../db';
import type { ChunkStore } from './chunk-store';
import type { UploadWithVariants } from '../types';
import { ChunkConflictError, NotFoundError, ValidationError } from '../infra/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('upload-ledger');

export const COMPLETED_MESSAGE = 'All chunks received. Processing images...';

/** Starts (or restarts) processing for an upload. */
export interface ProcessingDispatcher {
  dispatch(uploadId: number): void;
}

export const chunkSubmissionSchema = z.object({
  checksum: z.string().trim().min(1).max(64),
  index: z.number().int().min(0),
  totalChunks: z.number().int().min(1),
  originalName: z.string().trim().min(1).max(255),
});

export type ChunkMetadata = z.infer<typeof chunkSubmissionSchema>;

export interface ChunkSubmission extends ChunkMetadata {
  bytes: Buffer;
}

export type SubmitChunkResult =
  | {
      status: 'uploading';
      uploadId: number;
      receivedChunksCount: number;
      totalChunks: number;
      /** floor(received / total * 100) */
      progress: number;
    }
  | {
      status: 'completed';
      uploadId: number;
      message: string;
    };

export type RequeueResult = {
  uploadId: number;
  /** Whether a processing job was dispatched */
  dispatched: boolean;
  status: UploadWithVariants['status'];
};

export interface UploadLedger {
  submitChunk(submission: ChunkSubmission): Promise<SubmitChunkResult>;
  getStatus(uploadId: number): UploadWithVariants;
  /**
   * Operator action: restart processing of a failed upload, or dispatch a
   * stuck `processing` one again. Completed uploads are left alone.
   */
  requeue(uploadId: number): RequeueResult;
}

export interface UploadLedgerDeps {
  db: Database;
  chunks: ChunkStore;
  dispatcher: ProcessingDispatcher;
}

export function createUploadLedger(deps: UploadLedgerDeps): UploadLedger {
  const { db, chunks, dispatcher } = deps;

  function parseSubmission(submission: ChunkSubmission): ChunkMetadata {
    const parsed = chunkSubmissionSchema.safeParse(submission);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ValidationError(`Invalid chunk submission: ${detail}`);
    }
    if (parsed.data.index >= parsed.data.totalChunks) {
      throw new ValidationError(
        `Chunk index ${parsed.data.index} is out of range for ${parsed.data.totalChunks} chunks`,
      );
    }
    return parsed.data;
  }

  return {
    async submitChunk(submission) {
      const { checksum, index, totalChunks, originalName } = parseSubmission(submission);

      const upload = db.createUploadIfAbsent({ checksum, originalName, totalChunks });
      if (upload.totalChunks !== totalChunks) {
        throw new ChunkConflictError(
          `Upload ${upload.id} was declared with ${upload.totalChunks} chunks, not ${totalChunks}`,
        );
      }

      let current = upload;
      if (!upload.receivedChunks.includes(index)) {
        const written = await chunks.put(upload.id, index, submission.bytes);
        if (!written) {
          logger.debug({ uploadId: upload.id, index }, 'Chunk bytes already stored');
        }
        current = db.addReceivedChunk(upload.id, index);
      }

      const received = current.receivedChunks.length;
      if (received === current.totalChunks) {
        if (db.transitionUploadStatus(current.id, ['uploading'], 'processing')) {
          logger.info({ uploadId: current.id, totalChunks }, 'All chunks received');
          dispatcher.dispatch(current.id);
        }
        return { status: 'completed', uploadId: current.id, message: COMPLETED_MESSAGE };
      }

      return {
        status: 'uploading',
        uploadId: current.id,
        receivedChunksCount: received,
        totalChunks: current.totalChunks,
        progress: Math.floor((received * 100) / current.totalChunks),
      };
    },

    getStatus(uploadId) {
      const upload = db.getUpload(uploadId);
      if (!upload) {
        throw new NotFoundError(`Upload ${uploadId} not found`);
      }
      return { ...upload, variants: db.getVariants(uploadId) };
    },

    requeue(uploadId) {
      const upload = db.getUpload(uploadId);
      if (!upload) {
        throw new NotFoundError(`Upload ${uploadId} not found`);
      }

      switch (upload.status) {
        case 'uploading':
          throw new ValidationError(
            `Upload ${uploadId} is still receiving chunks (${upload.receivedChunks.length}/${upload.totalChunks})`,
          );
        case 'completed':
          return { uploadId, dispatched: false, status: 'completed' };
        case 'failed':
          if (!db.transitionUploadStatus(uploadId, ['failed'], 'processing')) {
            // Someone else moved it first
            const latest = db.getUpload(uploadId);
            return { uploadId, dispatched: false, status: latest?.status ?? 'failed' };
          }
          logger.info({ uploadId }, 'Requeueing failed upload');
          dispatcher.dispatch(uploadId);
          return { uploadId, dispatched: true, status: 'processing' };
        case 'processing':
          logger.info({ uploadId }, 'Dispatching processing upload again');
          dispatcher.dispatch(uploadId);
          return { uploadId, dispatched: true, status: 'processing' };
      }
    },
  };
}
