/**
 * Job Queue - persistent background jobs for upload processing
 *
 * Features:
 * - In-memory queue backed by SQLite persistence (survives restart)
 * - Configurable concurrency (jobs processed in parallel)
 * - Dedupe keys: enqueueing work that is already pending returns the existing job. A running
 *   job does not absorb new work, since it may already be past the state that prompted it.
 * - Crash recovery: jobs left `running` are reset to `pending` on start
 * - `whenIdle()` for callers (and tests) that need to wait for the backlog
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { generateId } from '../utils/id';
import { errorMessage } from '../infra/errors';
import type { Database, SqlRow } from '../db';

const logger = createLogger('job-queue');

// =============================================================================
// TYPES
// =============================================================================

export const JOB_TYPES = ['process_upload'] as const;

export type JobType = (typeof JOB_TYPES)[number];

export const JOB_STATUSES = ['pending', 'running', 'completed', 'failed'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export type JobResult = Record<string, unknown>;

export interface Job {
  id: string;
  type: JobType;
  status: JobStatus;
  payload: Record<string, unknown>;
  dedupeKey?: string;
  result?: JobResult;
  error?: string;
  attempts: number;
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
}

export interface JobEnqueueInput {
  type: JobType;
  payload: Record<string, unknown>;
  /** At most one pending job exists per key. */
  dedupeKey?: string;
}

/** Returns the job's result; throwing marks the job failed. */
export type JobHandler = (job: Job) => Promise<JobResult | void>;

export interface JobQueueOptions {
  /** Jobs processed in parallel. Default: 1 */
  concurrency?: number;
  /** How often an idle queue looks for work. Default: 2000 */
  pollIntervalMs?: number;
}

export interface JobQueue {
  /** Add a job to the queue. Returns the job ID (an existing one when deduped). */
  enqueue(input: JobEnqueueInput): string;

  /** Get a specific job by ID. */
  getJob(jobId: string): Job | undefined;

  /** Most recent jobs, optionally filtered by status. */
  getJobs(status?: JobStatus): Job[];

  /** Mark a job as running. */
  markRunning(jobId: string): void;

  /** Mark a job as completed or failed. */
  markFinished(jobId: string, status: 'completed' | 'failed', result?: JobResult, error?: string): void;

  /** Get next pending job (FIFO). */
  getNextPending(): Job | undefined;

  /** Start the queue (begin processing). */
  start(): void;

  /** Stop taking new jobs; resolves once the jobs already running have settled. */
  stop(): Promise<void>;

  /** Whether the queue is currently processing. */
  isRunning(): boolean;

  /** Resolves once no job is pending or running. */
  whenIdle(): Promise<void>;
}

// =============================================================================
// ROW PARSING
// =============================================================================

const jobRowSchema = z.object({
  id: z.string(),
  type: z.enum(JOB_TYPES),
  status: z.enum(JOB_STATUSES),
  payload: z.string(),
  dedupe_key: z.string().nullable(),
  result: z.string().nullable(),
  error: z.string().nullable(),
  attempts: z.number(),
  created_at: z.number(),
  started_at: z.number().nullable(),
  completed_at: z.number().nullable(),
});

const jsonObjectSchema = z.record(z.unknown());

function parseJsonObject(text: string | null, jobId: string): Record<string, unknown> | undefined {
  if (!text) return undefined;
  try {
    const parsed = jsonObjectSchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : undefined;
  } catch (err) {
    logger.warn({ jobId, error: errorMessage(err) }, 'Stored job JSON is malformed');
    return undefined;
  }
}

function parseJobRow(row: SqlRow): Job {
  const parsed = jobRowSchema.parse(row);
  return {
    id: parsed.id,
    type: parsed.type,
    status: parsed.status,
    payload: parseJsonObject(parsed.payload, parsed.id) ?? {},
    dedupeKey: parsed.dedupe_key ?? undefined,
    result: parseJsonObject(parsed.result, parsed.id),
    error: parsed.error ?? undefined,
    attempts: parsed.attempts,
    createdAt: parsed.created_at,
    startedAt: parsed.started_at ?? undefined,
    completedAt: parsed.completed_at ?? undefined,
  };
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export function createJobQueue(
  db: Database,
  onProcessJob?: JobHandler,
  options: JobQueueOptions = {},
): JobQueue {
  const concurrency = Math.max(1, options.concurrency ?? 1);
  const pollIntervalMs = options.pollIntervalMs ?? 2000;

  let running = false;
  let pollTimer: NodeJS.Timeout | null = null;

  // In-memory cache of pending/running jobs
  const jobCache = new Map<string, Job>();
  // Jobs whose handler is in flight, with the promise that settles when it ends
  const active = new Map<string, Promise<void>>();
  let idleWaiters: Array<() => void> = [];

  function loadFromDb(): void {
    const rows = db.query(
      "SELECT * FROM jobs WHERE status IN ('pending', 'running') ORDER BY created_at ASC",
    );
    for (const row of rows) {
      const job = parseJobRow(row);
      if (active.has(job.id)) continue;
      jobCache.set(job.id, job);
    }
    // Jobs left 'running' by a crash go back to 'pending'
    for (const job of jobCache.values()) {
      if (job.status === 'running' && !active.has(job.id)) {
        job.status = 'pending';
        job.startedAt = undefined;
        persistJob(job);
        logger.warn({ jobId: job.id }, 'Reset crashed job to pending');
      }
    }
    logger.info({ loadedJobs: jobCache.size }, 'Loaded pending jobs from database');
  }

  function persistJob(job: Job): void {
    db.run(
      `INSERT INTO jobs (id, type, status, payload, dedupe_key, result, error, attempts, created_at, started_at, completed_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET
         status = excluded.status,
         result = excluded.result,
         error = excluded.error,
         attempts = excluded.attempts,
         started_at = excluded.started_at,
         completed_at = excluded.completed_at`,
      [
        job.id,
        job.type,
        job.status,
        JSON.stringify(job.payload),
        job.dedupeKey ?? null,
        job.result ? JSON.stringify(job.result) : null,
        job.error ?? null,
        job.attempts,
        job.createdAt,
        job.startedAt ?? null,
        job.completedAt ?? null,
      ],
    );
  }

  function findPendingByDedupeKey(dedupeKey: string): string | undefined {
    for (const job of jobCache.values()) {
      if (job.dedupeKey === dedupeKey && job.status === 'pending') return job.id;
    }
    const row = db.query(
      "SELECT id FROM jobs WHERE dedupe_key = ? AND status = 'pending' ORDER BY created_at ASC LIMIT 1",
      [dedupeKey],
    )[0];
    return typeof row?.id === 'string' ? row.id : undefined;
  }

  function isIdle(): boolean {
    return active.size === 0 && queue.getNextPending() === undefined;
  }

  function notifyIfIdle(): void {
    if (!isIdle()) return;
    const waiters = idleWaiters;
    idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  function runJob(job: Job, handler: JobHandler): void {
    queue.markRunning(job.id);

    const settled = handler(job)
      .then(
        (result) => {
          queue.markFinished(job.id, 'completed', typeof result === 'object' ? result : undefined);
        },
        (err: unknown) => {
          logger.error({ err, jobId: job.id }, 'Job processing failed');
          queue.markFinished(job.id, 'failed', undefined, errorMessage(err));
        },
      )
      .catch((err: unknown) => {
        logger.error({ err, jobId: job.id }, 'Could not record job outcome');
      })
      .finally(() => {
        active.delete(job.id);
        if (running) {
          // setImmediate keeps long queues off the stack
          setImmediate(processNext);
        }
        notifyIfIdle();
      });

    active.set(job.id, settled);
  }

  function processNext(): void {
    if (!running || !onProcessJob) return;

    while (active.size < concurrency) {
      const next = queue.getNextPending();
      if (!next) break;
      runJob(next, onProcessJob);
    }
  }

  const queue: JobQueue = {
    enqueue(input: JobEnqueueInput): string {
      if (input.dedupeKey) {
        const existing = findPendingByDedupeKey(input.dedupeKey);
        if (existing) {
          logger.debug({ jobId: existing, dedupeKey: input.dedupeKey }, 'Job already queued');
          return existing;
        }
      }

      const id = generateId('job');
      const job: Job = {
        id,
        type: input.type,
        status: 'pending',
        payload: input.payload,
        dedupeKey: input.dedupeKey,
        attempts: 0,
        createdAt: Date.now(),
      };

      jobCache.set(id, job);
      persistJob(job);
      logger.info({ jobId: id, type: input.type }, 'Job enqueued');

      // Kick off processing if there is a free slot
      if (running && active.size < concurrency) {
        setImmediate(processNext);
      }

      return id;
    },

    getJob(jobId: string): Job | undefined {
      const cached = jobCache.get(jobId);
      if (cached) return cached;

      // Finished jobs live only in the database
      const row = db.query('SELECT * FROM jobs WHERE id = ?', [jobId])[0];
      return row ? parseJobRow(row) : undefined;
    },

    getJobs(status?: JobStatus): Job[] {
      const rows = status
        ? db.query('SELECT * FROM jobs WHERE status = ? ORDER BY created_at DESC LIMIT 100', [status])
        : db.query('SELECT * FROM jobs ORDER BY created_at DESC LIMIT 100');
      return rows.map(parseJobRow);
    },

    markRunning(jobId: string): void {
      const job = jobCache.get(jobId);
      if (!job) return;

      job.status = 'running';
      job.startedAt = Date.now();
      job.attempts++;
      persistJob(job);
      logger.info({ jobId, attempt: job.attempts }, 'Job started');
    },

    markFinished(jobId: string, status: 'completed' | 'failed', result?: JobResult, error?: string): void {
      const job = jobCache.get(jobId);
      if (!job) return;

      job.status = status;
      job.completedAt = Date.now();
      if (result) job.result = result;
      if (error) job.error = error;

      persistJob(job);

      // Remove from in-memory cache after completion (DB has it)
      jobCache.delete(jobId);

      logger.info({ jobId, status }, 'Job finished');
    },

    getNextPending(): Job | undefined {
      let oldest: Job | undefined;
      for (const job of jobCache.values()) {
        if (job.status !== 'pending') continue;
        if (!oldest || job.createdAt < oldest.createdAt) {
          oldest = job;
        }
      }
      return oldest;
    },

    start(): void {
      if (running) return;
      running = true;

      loadFromDb();

      pollTimer = setInterval(processNext, pollIntervalMs);

      // Initial kick
      setImmediate(processNext);

      logger.info({ concurrency }, 'Job queue started');
    },

    async stop(): Promise<void> {
      if (running) {
        running = false;
        if (pollTimer) {
          clearInterval(pollTimer);
          pollTimer = null;
        }
        logger.info({ inFlight: active.size }, 'Job queue stopped');
      }
      await Promise.all(active.values());
    },

    isRunning(): boolean {
      return running;
    },

    whenIdle(): Promise<void> {
      if (isIdle()) return Promise.resolve();
      return new Promise((resolve) => {
        idleWaiters.push(resolve);
      });
    },
  };

  return queue;
}
