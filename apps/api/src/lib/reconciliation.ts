import type { AttemptStore } from './attempt-store';
import { getContextLogger } from './logger';
import { reconciledAttemptsTotal } from './metrics';
import type { AwardJobQueue } from './queue';

export interface ReconcileOptions {
  staleAfterSeconds: number;
  batchSize: number;
  now?: Date;
}

/**
 * Re-enqueue attempts that have sat in `submitted` longer than the timeout.
 * Covers award jobs that were lost before or while running; the pipeline
 * ignores the duplicates this creates for slow but live jobs. Dead-lettered
 * attempts are left for an operator.
 */
export async function reconcileStaleAttempts(
  deps: { attempts: AttemptStore; queue: AwardJobQueue },
  options: ReconcileOptions
): Promise<number> {
  const now = options.now ?? new Date();
  const cutoff = new Date(now.getTime() - options.staleAfterSeconds * 1000);

  const stale = await deps.attempts.findStaleSubmitted(cutoff, options.batchSize);
  for (const attempt of stale) {
    await deps.queue.enqueue(attempt.id, 'reconcile');
  }

  if (stale.length > 0) {
    reconciledAttemptsTotal.inc(stale.length);
    getContextLogger().info(
      { requeued: stale.length, cutoff: cutoff.toISOString() },
      'Re-enqueued stale submitted attempts'
    );
  }

  return stale.length;
}

/**
 * Put a dead-lettered award back on the queue and make its attempt visible
 * to reconciliation again
 */
export async function releaseDeadLetter(
  deps: { attempts: AttemptStore; requeue: (jobId: string) => Promise<string | null> },
  jobId: string
): Promise<string | null> {
  const attemptId = await deps.requeue(jobId);
  if (attemptId) {
    await deps.attempts.clearDeadLettered(attemptId);
  }
  return attemptId;
}
