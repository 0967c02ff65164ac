import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';

import { InMemoryAwardQueue } from '../test/in-memory-stores';
import { InvalidStateError, NotFoundError, TransientStoreFailureError } from './errors';
import { logger, requestContext } from './logger';
import {
  QUEUE_NAMES,
  addAwardJob,
  addDeadLetterJob,
  createAwardWorker,
  getQueueStats,
  listDeadLetters,
  parseRedisUrl,
  requeueDeadLetter,
  setupScheduledJobs,
} from './queue';
import { TimeoutError } from './retry';

interface FakeJob {
  id: string;
  name: string;
  queueName: string;
  data: { attemptId: string; reason: string };
  attemptsMade: number;
  opts: { attempts: number };
}

// In-process stand-ins for the BullMQ classes the queue module constructs
const bull = vi.hoisted(() => {
  class UnrecoverableError extends Error {
    constructor(message?: string) {
      super(message);
      this.name = 'UnrecoverableError';
    }
  }

  const queues = new Map<string, MockQueue>();
  const workers = new Map<string, MockWorker>();

  class MockQueue {
    add = vi.fn(async (jobName: string, data: unknown) => ({ id: `${this.name}-job`, name: jobName, data }));
    getJob = vi.fn(async (_jobId: string): Promise<unknown> => null);
    getJobs = vi.fn(async (): Promise<unknown[]> => []);
    getWaitingCount = vi.fn(async () => 3);
    getActiveCount = vi.fn(async () => 1);
    getCompletedCount = vi.fn(async () => 42);
    getFailedCount = vi.fn(async () => 2);
    getDelayedCount = vi.fn(async () => 0);
    isPaused = vi.fn(async () => false);
    on = vi.fn();
    close = vi.fn(async () => undefined);

    constructor(readonly name: string) {
      queues.set(name, this);
    }
  }

  class MockWorker {
    readonly handlers = new Map<string, (...args: unknown[]) => void>();
    close = vi.fn(async () => undefined);

    constructor(
      readonly name: string,
      readonly processor: (job: unknown) => Promise<unknown>
    ) {
      workers.set(name, this);
    }

    on(event: string, handler: (...args: unknown[]) => void) {
      this.handlers.set(event, handler);
      return this;
    }
  }

  return { UnrecoverableError, MockQueue, MockWorker, queues, workers };
});

vi.mock('bullmq', () => ({
  Queue: bull.MockQueue,
  Worker: bull.MockWorker,
  UnrecoverableError: bull.UnrecoverableError,
}));

function fakeJob(overrides: Partial<FakeJob> = {}): FakeJob {
  return {
    id: 'job-1',
    name: 'award-attempt',
    queueName: QUEUE_NAMES.AWARD,
    data: { attemptId: 'attempt-1', reason: 'submission' },
    attemptsMade: 0,
    opts: { attempts: 5 },
    ...overrides,
  };
}

function awardWorker() {
  const worker = bull.workers.get(QUEUE_NAMES.AWARD);
  if (!worker) {
    throw new Error('award worker was not created');
  }
  return worker;
}

const settle = () => new Promise((resolve) => setImmediate(resolve));

beforeEach(() => {
  vi.clearAllMocks();
});

describe('parseRedisUrl', () => {
  it('reads host, port, credentials and database', () => {
    expect(parseRedisUrl('redis://:test-secret@cache.internal:6380/2')).toEqual({
      host: 'cache.internal',
      port: 6380,
      password: 'test-secret',
      username: undefined,
      db: 2,
    });
  });

  it('defaults the port and database', () => {
    expect(parseRedisUrl('redis://cache.internal')).toEqual({
      host: 'cache.internal',
      port: 6379,
      password: undefined,
      username: undefined,
      db: 0,
    });
  });

  it('falls back to localhost for an unparseable value', () => {
    expect(parseRedisUrl('not a url')).toEqual({ host: 'localhost', port: 6379 });
  });
});

describe('producers', () => {
  it('carries the request context into award job metadata', async () => {
    await requestContext.run({ requestId: 'req-1', userId: 'user-1', logger }, () =>
      addAwardJob('attempt-1', 'submission')
    );

    expect(bull.queues.get(QUEUE_NAMES.AWARD)?.add).toHaveBeenCalledWith('award-attempt', {
      attemptId: 'attempt-1',
      reason: 'submission',
      _metadata: { requestId: 'req-1', userId: 'user-1', createdAt: expect.any(String) },
    });
  });

  it('records dead letters on their own queue', async () => {
    await addDeadLetterJob('attempt-1', 'connection reset', 5);

    expect(bull.queues.get(QUEUE_NAMES.AWARD_DEAD_LETTER)?.add).toHaveBeenCalledWith('dead-letter', {
      attemptId: 'attempt-1',
      reason: 'connection reset',
      attemptsMade: 5,
      failedAt: expect.any(String),
    });
  });

  it('registers the reconciliation sweep as a repeatable job', async () => {
    await setupScheduledJobs();

    expect(bull.queues.get(QUEUE_NAMES.MAINTENANCE)?.add).toHaveBeenCalledWith(
      'reconcile',
      expect.objectContaining({ staleAfterSeconds: 300, batchSize: 500 }),
      { repeat: { pattern: '*/5 * * * *' }, jobId: 'reconcile-stale-attempts', attempts: 1 }
    );
  });
});

describe('createAwardWorker', () => {
  let deadLetters: InMemoryAwardQueue;
  let runPipeline: Mock<(attemptId: string) => Promise<string>>;
  let onDeadLetter: Mock<(attemptId: string) => Promise<void>>;

  beforeEach(() => {
    deadLetters = new InMemoryAwardQueue();
    runPipeline = vi.fn<(attemptId: string) => Promise<string>>(async (attemptId) => `done:${attemptId}`);
    onDeadLetter = vi.fn<(attemptId: string) => Promise<void>>(async () => undefined);
    createAwardWorker(runPipeline, { concurrency: 1, timeoutMs: 50, deadLetters, onDeadLetter });
  });

  it('runs the pipeline for the job attempt', async () => {
    await expect(awardWorker().processor(fakeJob())).resolves.toBe('done:attempt-1');
    expect(runPipeline).toHaveBeenCalledWith('attempt-1');
  });

  it('completes a job whose attempt no longer exists', async () => {
    runPipeline.mockRejectedValueOnce(new NotFoundError('Attempt', 'attempt-1'));

    await expect(awardWorker().processor(fakeJob())).resolves.toBeNull();
    expect(deadLetters.deadLetters).toEqual([]);
    expect(onDeadLetter).not.toHaveBeenCalled();
  });

  it('dead-letters a job whose challenge no longer exists', async () => {
    runPipeline.mockRejectedValueOnce(new NotFoundError('Challenge', 'challenge-1'));

    await expect(awardWorker().processor(fakeJob())).resolves.toBeNull();
    expect(deadLetters.deadLetters).toEqual([
      { attemptId: 'attempt-1', reason: "Challenge with id 'challenge-1' not found", attemptsMade: 0 },
    ]);
    expect(onDeadLetter).toHaveBeenCalledWith('attempt-1');
  });

  it('stops retrying on a non-retryable error', async () => {
    runPipeline.mockRejectedValueOnce(new InvalidStateError('Attempt has not been submitted'));

    const error = await awardWorker()
      .processor(fakeJob())
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(bull.UnrecoverableError);
    expect(error).toHaveProperty('message', 'INVALID_STATE: Attempt has not been submitted');
  });

  it('rethrows a retryable error for BullMQ to retry', async () => {
    const failure = new TransientStoreFailureError('ledger unavailable');
    runPipeline.mockRejectedValueOnce(failure);

    await expect(awardWorker().processor(fakeJob())).rejects.toBe(failure);
  });

  it('fails a run that exceeds the timeout', async () => {
    runPipeline.mockReturnValueOnce(new Promise<string>(() => undefined));

    await expect(awardWorker().processor(fakeJob())).rejects.toBeInstanceOf(TimeoutError);
  });

  it('dead-letters a job once its attempts are exhausted', async () => {
    awardWorker().handlers.get('failed')?.(fakeJob({ attemptsMade: 5 }), new Error('connection reset'));
    await settle();

    expect(deadLetters.deadLetters).toEqual([
      { attemptId: 'attempt-1', reason: 'connection reset', attemptsMade: 5 },
    ]);
    expect(onDeadLetter).toHaveBeenCalledWith('attempt-1');
  });

  it('leaves a job with attempts remaining to BullMQ', async () => {
    awardWorker().handlers.get('failed')?.(fakeJob({ attemptsMade: 2 }), new Error('connection reset'));
    await settle();

    expect(deadLetters.deadLetters).toEqual([]);
    expect(onDeadLetter).not.toHaveBeenCalled();
  });

  it('discards an unrecoverable job without dead-lettering it', async () => {
    awardWorker().handlers.get('failed')?.(
      fakeJob({ attemptsMade: 1 }),
      new bull.UnrecoverableError('INVALID_STATE: Attempt has not been submitted')
    );
    await settle();

    expect(deadLetters.deadLetters).toEqual([]);
  });
});

describe('queue administration', () => {
  it('reports queue counts', async () => {
    expect(await getQueueStats(QUEUE_NAMES.AWARD)).toEqual({
      name: QUEUE_NAMES.AWARD,
      waiting: 3,
      active: 1,
      completed: 42,
      failed: 2,
      delayed: 0,
      paused: false,
    });
  });

  it('moves a dead letter back onto the award queue', async () => {
    await addDeadLetterJob('attempt-9', 'connection reset', 5);
    const remove = vi.fn(async () => undefined);
    bull.queues.get(QUEUE_NAMES.AWARD_DEAD_LETTER)?.getJob.mockResolvedValueOnce({
      id: 'dl-1',
      data: { attemptId: 'attempt-9', reason: 'connection reset', attemptsMade: 5, failedAt: '2026-03-02T10:00:00Z' },
      remove,
    });

    expect(await requeueDeadLetter('dl-1')).toBe('attempt-9');
    expect(bull.queues.get(QUEUE_NAMES.AWARD)?.add).toHaveBeenCalledWith(
      'award-attempt',
      expect.objectContaining({ attemptId: 'attempt-9', reason: 'manual' })
    );
    expect(remove).toHaveBeenCalledTimes(1);
  });

  it('lists dead letters up to the limit', async () => {
    await addDeadLetterJob('attempt-9', 'connection reset', 5);
    const deadLetterQueue = bull.queues.get(QUEUE_NAMES.AWARD_DEAD_LETTER);
    deadLetterQueue?.getJobs.mockResolvedValueOnce([
      {
        id: 'dl-1',
        data: { attemptId: 'attempt-9', reason: 'connection reset', attemptsMade: 5, failedAt: '2026-03-02T10:00:00Z' },
      },
    ]);

    expect(await listDeadLetters(3)).toEqual([
      {
        jobId: 'dl-1',
        attemptId: 'attempt-9',
        reason: 'connection reset',
        attemptsMade: 5,
        failedAt: '2026-03-02T10:00:00Z',
      },
    ]);
    expect(deadLetterQueue?.getJobs).toHaveBeenCalledWith(['waiting'], 0, 2);
  });

  it('lists nothing for a zero limit', async () => {
    await addDeadLetterJob('attempt-9', 'connection reset', 5);

    expect(await listDeadLetters(0)).toEqual([]);
    expect(bull.queues.get(QUEUE_NAMES.AWARD_DEAD_LETTER)?.getJobs).not.toHaveBeenCalled();
  });

  it('returns null for an unknown dead letter', async () => {
    await addDeadLetterJob('attempt-9', 'connection reset', 5);

    expect(await requeueDeadLetter('dl-missing')).toBeNull();
  });
});
