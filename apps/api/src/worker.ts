/**
 * Standalone award worker.
 *
 * Runs the award pipeline and the reconciliation sweep without the HTTP
 * server, for deployments that scale workers separately
 * (RUN_WORKER_IN_PROCESS=false on the API).
 */

import 'dotenv/config';

import { closeDatabaseConnection } from './db';
import { env } from './lib/env';
import { logger } from './lib/logger';
import { closeQueues, createAwardWorker, createMaintenanceWorker, setupScheduledJobs } from './lib/queue';
import { closeRedis } from './lib/redis';
import { createServices } from './lib/services';

async function start() {
  if (env.RANK_CACHE_DRIVER === 'memory') {
    logger.warn('RANK_CACHE_DRIVER=memory in a separate worker process: the API will not see its leaderboard');
  }

  const services = createServices();

  createAwardWorker((attemptId) => services.pipeline.process(attemptId), {
    onDeadLetter: (attemptId) => services.markDeadLettered(attemptId),
  });
  createMaintenanceWorker(async (job) => ({
    requeued: await services.reconcile(job.data.staleAfterSeconds, job.data.batchSize),
  }));
  await setupScheduledJobs();

  logger.info({ concurrency: env.AWARD_WORKER_CONCURRENCY }, 'Award worker started');

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info(`Received ${signal}, draining workers...`);

      const shutdown = async () => {
        await closeQueues();
        await closeRedis();
        await closeDatabaseConnection();
      };

      shutdown()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during worker shutdown');
          process.exit(1);
        });
    });
  }
}

start().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start award worker');
  process.exit(1);
});
