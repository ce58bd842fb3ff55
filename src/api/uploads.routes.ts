/**
 * Upload routes - chunk intake, status and operator requeue
 */
import express, { Router, Request, Response } from 'express';
import type { UploadLedger } from '../uploads/ledger';
import { ValidationError } from '../infra/errors';
import { asyncRoute, parseId, queryInteger, queryString, uploadJson } from './http';

export interface UploadRoutesOptions {
  maxChunkBytes: number;
}

export function createUploadRoutes(ledger: UploadLedger, options: UploadRoutesOptions): Router {
  const router = Router();

  // POST /upload/chunk?checksum=&chunk_index=&total_chunks=&original_name= (raw chunk body)
  router.post(
    '/upload/chunk',
    express.raw({ type: () => true, limit: options.maxChunkBytes }),
    asyncRoute(async (req: Request, res: Response) => {
      const bytes: unknown = req.body;
      if (!Buffer.isBuffer(bytes) || bytes.length === 0) {
        throw new ValidationError('Chunk body is empty');
      }

      const result = await ledger.submitChunk({
        checksum: queryString(req.query.checksum) ?? '',
        index: queryInteger(req.query.chunk_index),
        totalChunks: queryInteger(req.query.total_chunks),
        originalName: queryString(req.query.original_name) ?? '',
        bytes,
      });

      if (result.status === 'completed') {
        res.json({ status: result.status, upload_id: result.uploadId, message: result.message });
        return;
      }
      res.json({
        status: result.status,
        upload_id: result.uploadId,
        received_chunks_count: result.receivedChunksCount,
        total_chunks: result.totalChunks,
        progress: result.progress,
      });
    }),
  );

  // GET /uploads/:id - status and generated variants
  router.get('/uploads/:id', (req: Request, res: Response) => {
    const upload = ledger.getStatus(parseId(req.params.id, 'upload id'));
    res.json(uploadJson(upload));
  });

  // POST /uploads/:id/reprocess - restart a failed or stuck upload
  router.post('/uploads/:id/reprocess', (req: Request, res: Response) => {
    const result = ledger.requeue(parseId(req.params.id, 'upload id'));
    res.status(result.dispatched ? 202 : 200).json({
      upload_id: result.uploadId,
      dispatched: result.dispatched,
      status: result.status,
    });
  });

  return router;
}
