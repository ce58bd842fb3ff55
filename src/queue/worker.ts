/**
 * Job Queue Worker - runs queued upload processing
 *
 * Handles each job type:
 * - process_upload: assemble, verify and render variants for one upload
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';
import type { Job, JobHandler, JobQueue, JobResult } from './job-queue';
import type { UploadProcessor } from '../uploads/processor';
import type { ProcessingDispatcher } from '../uploads/ledger';

const logger = createLogger('job-worker');

// =============================================================================
// TYPES
// =============================================================================

export interface WorkerDeps {
  processor: UploadProcessor;
}

const processUploadPayload = z.object({
  uploadId: z.number().int().positive(),
});

export function processUploadDedupeKey(uploadId: number): string {
  return `process_upload:${uploadId}`;
}

// =============================================================================
// JOB HANDLERS
// =============================================================================

async function handleProcessUpload(job: Job, deps: WorkerDeps): Promise<JobResult> {
  const { uploadId } = processUploadPayload.parse(job.payload);
  const outcome = await deps.processor.process(uploadId);
  return { uploadId, outcome };
}

// =============================================================================
// WORKER FACTORY
// =============================================================================

/**
 * Create the handler passed to createJobQueue.
 */
export function createJobHandler(deps: WorkerDeps): JobHandler {
  return async (job: Job): Promise<JobResult> => {
    logger.info({ jobId: job.id, type: job.type, attempt: job.attempts }, 'Processing job');

    switch (job.type) {
      case 'process_upload':
        return handleProcessUpload(job, deps);
      default:
        throw new Error(`Unknown job type: ${String(job.type)}`);
    }
  };
}

/**
 * Dispatch processing through the queue; repeated dispatches for an upload
 * collapse into the job already waiting or running.
 */
export function createUploadDispatcher(queue: JobQueue): ProcessingDispatcher {
  return {
    dispatch(uploadId: number): void {
      queue.enqueue({
        type: 'process_upload',
        payload: { uploadId },
        dedupeKey: processUploadDedupeKey(uploadId),
      });
    },
  };
}
