/**
 * BullMQ Job Queue Configuration
 *
 * Queues:
 * - award: one job per submitted attempt; workers run the award pipeline
 * - award-dead-letter: award jobs whose final attempt failed, kept for inspection
 * - maintenance: the repeatable reconciliation sweep
 *
 * Delivery is at-least-once with no ordering between jobs, so the award
 * handler is idempotent. Jobs carry the submitting request's correlation
 * metadata and run inside a logging context.
 */

import { Queue, Worker, UnrecoverableError, type Job, type ConnectionOptions } from 'bullmq';

import { env } from './env';
import { AppError, NotFoundError } from './errors';
import { createContextLogger, logger, getCurrentContext, requestContext } from './logger';
import { deadLetterTotal, jobFailureTotal } from './metrics';
import { withTimeout } from './retry';

/**
 * Job metadata for observability
 */
export interface JobMetadata {
  requestId?: string;
  userId?: string;
  createdAt: string;
}

interface BaseJobData {
  _metadata?: JobMetadata;
  attemptId?: string;
}

// Parse Redis URL for BullMQ connection
export function parseRedisUrl(url: string): ConnectionOptions {
  try {
    const parsed = new URL(url);
    return {
      host: parsed.hostname,
      port: parseInt(parsed.port, 10) || 6379,
      password: parsed.password || undefined,
      username: parsed.username || undefined,
      db: parsed.pathname.length > 1 ? parseInt(parsed.pathname.slice(1), 10) : 0,
    };
  } catch {
    // Fallback for simple host:port format
    return {
      host: 'localhost',
      port: 6379,
    };
  }
}

const connection: ConnectionOptions = parseRedisUrl(env.REDIS_URL);

export const QUEUE_NAMES = {
  AWARD: 'award',
  AWARD_DEAD_LETTER: 'award-dead-letter',
  MAINTENANCE: 'maintenance',
} as const;

export type AwardJobReason = 'submission' | 'reconcile' | 'manual';

export interface AwardJobData extends BaseJobData {
  attemptId: string;
  reason: AwardJobReason;
}

export interface DeadLetterJobData extends BaseJobData {
  attemptId: string;
  reason: string;
  attemptsMade: number;
  failedAt: string;
}

export interface ReconcileJobData extends BaseJobData {
  staleAfterSeconds: number;
  batchSize: number;
}

export interface ReconcileJobResult {
  requeued: number;
}

/**
 * Producer side of the award queue as seen by the attempt lifecycle and
 * the reconciliation sweep
 */
export interface AwardJobQueue {
  enqueue(attemptId: string, reason: AwardJobReason): Promise<void>;
  deadLetter(attemptId: string, reason: string, attemptsMade: number): Promise<void>;
}

const DEFAULT_JOB_OPTIONS = {
  attempts: env.AWARD_JOB_ATTEMPTS,
  backoff: {
    type: 'exponential' as const,
    delay: env.AWARD_JOB_BACKOFF_MS,
  },
  removeOnComplete: {
    count: 1000,
    age: 24 * 60 * 60,
  },
  removeOnFail: {
    count: 5000,
    age: 7 * 24 * 60 * 60,
  },
};

// Dead letters are only ever removed by an operator
const DEAD_LETTER_JOB_OPTIONS = {
  attempts: 1,
  removeOnComplete: false,
  removeOnFail: false,
};

const queues: Map<string, Queue> = new Map();
const workers: Map<string, Worker> = new Map();

/**
 * Capture the current request context (requestId, userId) in the job data
 */
function injectJobMetadata<T extends BaseJobData>(data: T): T {
  const ctx = getCurrentContext();

  const metadata: JobMetadata = {
    requestId: ctx?.requestId,
    userId: ctx?.userId,
    createdAt: new Date().toISOString(),
  };

  return {
    ...data,
    _metadata: metadata,
  };
}

function createJobLogger(job: Job<BaseJobData>) {
  const metadata = job.data._metadata;

  return createContextLogger({
    requestId: metadata?.requestId,
    userId: metadata?.userId,
    attemptId: job.data.attemptId,
    jobId: job.id ?? undefined,
    jobName: job.name,
    queueName: job.queueName,
  });
}

/**
 * Run a job processor inside a logging context
 */
function wrapProcessor<T extends BaseJobData, R>(
  processor: (job: Job<T>) => Promise<R>
): (job: Job<T>) => Promise<R> {
  return async (job: Job<T>) => {
    const metadata = job.data._metadata;
    const jobLogger = createJobLogger(job);

    return requestContext.run(
      {
        requestId: metadata?.requestId || job.id || 'unknown',
        userId: metadata?.userId,
        attemptId: job.data.attemptId,
        logger: jobLogger,
      },
      async () => {
        jobLogger.info({ attempt: job.attemptsMade + 1 }, `Processing job: ${job.name}`);

        const startTime = process.hrtime.bigint();
        try {
          const result = await processor(job);
          const durationMs = Number(process.hrtime.bigint() - startTime) / 1e6;

          jobLogger.info({ durationMs: Math.round(durationMs * 100) / 100 }, `Job completed: ${job.name}`);

          return result;
        } catch (error) {
          const durationMs = Number(process.hrtime.bigint() - startTime) / 1e6;

          jobLogger.error(
            {
              durationMs: Math.round(durationMs * 100) / 100,
              err: error,
              attempt: job.attemptsMade + 1,
            },
            `Job failed: ${job.name}`
          );

          throw error;
        }
      }
    );
  };
}

export function getQueue<T = unknown>(name: string): Queue<T> {
  let queue = queues.get(name);

  if (!queue) {
    queue = new Queue(name, {
      connection,
      defaultJobOptions: name === QUEUE_NAMES.AWARD_DEAD_LETTER ? DEAD_LETTER_JOB_OPTIONS : DEFAULT_JOB_OPTIONS,
    });

    queue.on('error', (err) => {
      logger.error({ err, queue: name }, 'Queue error');
    });

    queues.set(name, queue);
  }

  return queue as Queue<T>;
}

// ============================================================
// Award Queue
// ============================================================

/**
 * Enqueue an award job. Redeliveries and duplicate submissions produce
 * distinct jobs; the pipeline makes their effects idempotent.
 */
export async function addAwardJob(attemptId: string, reason: AwardJobReason): Promise<Job<AwardJobData>> {
  const queue = getQueue<AwardJobData>(QUEUE_NAMES.AWARD);
  const dataWithMetadata = injectJobMetadata<AwardJobData>({ attemptId, reason });

  logger.debug(
    { attemptId, reason, requestId: dataWithMetadata._metadata?.requestId },
    'Adding award job to queue'
  );

  return queue.add('award-attempt', dataWithMetadata);
}

export async function addDeadLetterJob(
  attemptId: string,
  reason: string,
  attemptsMade: number
): Promise<Job<DeadLetterJobData>> {
  const queue = getQueue<DeadLetterJobData>(QUEUE_NAMES.AWARD_DEAD_LETTER);

  logger.warn({ attemptId, reason, attemptsMade }, 'Moving award job to dead-letter queue');
  deadLetterTotal.inc();

  return queue.add('dead-letter', {
    attemptId,
    reason,
    attemptsMade,
    failedAt: new Date().toISOString(),
  });
}

export class BullAwardJobQueue implements AwardJobQueue {
  async enqueue(attemptId: string, reason: AwardJobReason): Promise<void> {
    await addAwardJob(attemptId, reason);
  }

  async deadLetter(attemptId: string, reason: string, attemptsMade: number): Promise<void> {
    await addDeadLetterJob(attemptId, reason, attemptsMade);
  }
}

/**
 * True when BullMQ will not run the job again
 */
export function isFinalFailure(job: Job, err: Error): boolean {
  if (err instanceof UnrecoverableError || err.name === 'UnrecoverableError') {
    return true;
  }
  return job.attemptsMade >= (job.opts.attempts ?? 1);
}

export interface AwardWorkerOptions {
  concurrency?: number;
  timeoutMs?: number;
  deadLetters?: AwardJobQueue;
  /** Runs after a job is dead-lettered, so the attempt can be kept out of reconciliation */
  onDeadLetter?: (attemptId: string) => Promise<void>;
}

/**
 * Create the award worker.
 *
 * Each run is bounded by `timeoutMs`; an expired run fails the job (which
 * is retried) without cancelling the pipeline already in flight.
 * Non-retryable errors become UnrecoverableError so BullMQ stops retrying.
 * A missing attempt completes the job with a warning; a missing challenge
 * dead-letters it at once, since retrying cannot bring the challenge back.
 */
export function createAwardWorker<R>(
  runPipeline: (attemptId: string) => Promise<R>,
  options: AwardWorkerOptions = {}
): Worker<AwardJobData, R | null> {
  const timeoutMs = options.timeoutMs ?? env.AWARD_JOB_TIMEOUT_MS;
  const deadLetters = options.deadLetters ?? new BullAwardJobQueue();

  async function moveToDeadLetter(job: Job<AwardJobData>, reason: string): Promise<void> {
    await deadLetters.deadLetter(job.data.attemptId, reason, job.attemptsMade);
    await options.onDeadLetter?.(job.data.attemptId);
  }

  const processor = wrapProcessor<AwardJobData, R | null>(async (job) => {
    try {
      return await withTimeout(runPipeline(job.data.attemptId), timeoutMs, `Award job ${job.id ?? job.data.attemptId}`);
    } catch (error) {
      if (error instanceof NotFoundError) {
        if (error.resource === 'Attempt') {
          createJobLogger(job).warn({ err: error }, 'Award job references a missing attempt, skipping');
          return null;
        }
        createJobLogger(job).warn({ err: error }, 'Award job references a missing record, dead-lettering');
        await moveToDeadLetter(job, error.message);
        return null;
      }
      if (error instanceof AppError && !error.retryable) {
        throw new UnrecoverableError(`${error.code}: ${error.message}`);
      }
      throw error;
    }
  });

  const worker = new Worker<AwardJobData, R | null>(QUEUE_NAMES.AWARD, processor, {
    connection,
    concurrency: options.concurrency ?? env.AWARD_WORKER_CONCURRENCY,
  });

  worker.on('failed', (job, err) => {
    jobFailureTotal.inc({ stage: 'worker' });

    if (!job) {
      logger.error({ err }, 'Award job failed (job unavailable)');
      return;
    }

    const jobLogger = createJobLogger(job);
    if (!isFinalFailure(job, err)) {
      jobLogger.warn({ err, attemptsMade: job.attemptsMade }, 'Award job failed, will retry');
      return;
    }

    // Unrecoverable jobs are discarded; exhausted retries are dead-lettered
    if (err instanceof UnrecoverableError || err.name === 'UnrecoverableError') {
      jobLogger.error({ err }, 'Award job discarded');
      return;
    }

    moveToDeadLetter(job, err.message).catch((dlqErr: unknown) => {
      jobLogger.error({ err: dlqErr }, 'Failed to dead-letter award job');
    });
  });

  worker.on('error', (err) => {
    logger.error({ err, queue: QUEUE_NAMES.AWARD }, 'Award worker error');
  });

  workers.set(QUEUE_NAMES.AWARD, worker);
  return worker;
}

// ============================================================
// Maintenance Queue
// ============================================================

const RECONCILE_JOB_ID = 'reconcile-stale-attempts';

/**
 * Register the repeatable reconciliation sweep
 */
export async function setupScheduledJobs(): Promise<void> {
  const queue = getQueue<ReconcileJobData>(QUEUE_NAMES.MAINTENANCE);

  await queue.add(
    'reconcile',
    injectJobMetadata<ReconcileJobData>({
      staleAfterSeconds: env.RECONCILE_STALE_AFTER_SECONDS,
      batchSize: env.RECONCILE_BATCH_SIZE,
    }),
    {
      repeat: { pattern: env.RECONCILE_CRON },
      jobId: RECONCILE_JOB_ID,
      attempts: 1,
    }
  );

  logger.info({ pattern: env.RECONCILE_CRON }, 'Scheduled reconciliation sweep');
}

export function createMaintenanceWorker(
  processor: (job: Job<ReconcileJobData>) => Promise<ReconcileJobResult>
): Worker<ReconcileJobData, ReconcileJobResult> {
  const worker = new Worker<ReconcileJobData, ReconcileJobResult>(
    QUEUE_NAMES.MAINTENANCE,
    wrapProcessor(processor),
    {
      connection,
      concurrency: 1,
    }
  );

  worker.on('completed', (job, result) => {
    createJobLogger(job).info({ requeued: result.requeued }, 'Reconciliation sweep completed');
  });

  worker.on('failed', (job, err) => {
    logger.error({ err, jobId: job?.id }, 'Reconciliation sweep failed');
  });

  worker.on('error', (err) => {
    logger.error({ err, queue: QUEUE_NAMES.MAINTENANCE }, 'Maintenance worker error');
  });

  workers.set(QUEUE_NAMES.MAINTENANCE, worker);
  return worker;
}

// ============================================================
// Queue Management
// ============================================================

export interface QueueStats {
  name: string;
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: boolean;
}

export async function getQueueStats(name: string): Promise<QueueStats> {
  const queue = getQueue(name);

  const [waiting, active, completed, failed, delayed, isPaused] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
    queue.isPaused(),
  ]);

  return {
    name,
    waiting,
    active,
    completed,
    failed,
    delayed,
    paused: isPaused,
  };
}

export async function getAllQueueStats(): Promise<QueueStats[]> {
  return Promise.all(Object.values(QUEUE_NAMES).map((name) => getQueueStats(name)));
}

export interface DeadLetterView {
  jobId: string;
  attemptId: string;
  reason: string;
  attemptsMade: number;
  failedAt: string;
}

/**
 * Dead letters sit in the waiting state: the queue has no worker
 */
export async function listDeadLetters(limit: number): Promise<DeadLetterView[]> {
  if (limit <= 0) {
    return [];
  }

  const queue = getQueue<DeadLetterJobData>(QUEUE_NAMES.AWARD_DEAD_LETTER);
  const jobs = await queue.getJobs(['waiting'], 0, limit - 1);

  return jobs.map((job) => ({
    jobId: job.id ?? '',
    attemptId: job.data.attemptId,
    reason: job.data.reason,
    attemptsMade: job.data.attemptsMade,
    failedAt: job.data.failedAt,
  }));
}

/**
 * Put a dead-lettered attempt back on the award queue and drop the dead letter
 */
export async function requeueDeadLetter(jobId: string): Promise<string | null> {
  const queue = getQueue<DeadLetterJobData>(QUEUE_NAMES.AWARD_DEAD_LETTER);
  const job = await queue.getJob(jobId);
  if (!job) {
    return null;
  }

  await addAwardJob(job.data.attemptId, 'manual');
  await job.remove();
  return job.data.attemptId;
}

/**
 * Close all workers first, then queues
 */
export async function closeQueues(): Promise<void> {
  await Promise.all([...workers.values()].map((worker) => worker.close()));
  workers.clear();

  await Promise.all([...queues.values()].map((queue) => queue.close()));
  queues.clear();
}
