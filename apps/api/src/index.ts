import 'dotenv/config';

import { buildApp } from './app';
import { closeDatabaseConnection } from './db';
import { env } from './lib/env';
import { logger } from './lib/logger';
import { closeQueues, createAwardWorker, createMaintenanceWorker, setupScheduledJobs } from './lib/queue';
import { closeRedis } from './lib/redis';
import { createServices } from './lib/services';

const PORT = parseInt(env.PORT, 10);
const HOST = env.HOST;

async function start() {
  const services = createServices();
  const app = await buildApp(services);

  // Single-process deployments run the award worker beside the API
  if (env.RUN_WORKER_IN_PROCESS) {
    createAwardWorker((attemptId) => services.pipeline.process(attemptId), {
      onDeadLetter: (attemptId) => services.markDeadLettered(attemptId),
    });
    createMaintenanceWorker(async (job) => ({
      requeued: await services.reconcile(job.data.staleAfterSeconds, job.data.batchSize),
    }));
    await setupScheduledJobs();
    logger.info({ concurrency: env.AWARD_WORKER_CONCURRENCY }, 'Award worker running in process');
  }

  // Graceful shutdown handling
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

  for (const signal of signals) {
    process.once(signal, () => {
      logger.info(`Received ${signal}, shutting down gracefully...`);

      const shutdown = async () => {
        await app.close();
        await closeQueues();
        await closeRedis();
        await closeDatabaseConnection();
      };

      shutdown()
        .then(() => {
          logger.info('Server closed successfully');
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        });
    });
  }

  process.on('uncaughtException', (err) => {
    logger.fatal({ err }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  await app.listen({ port: PORT, host: HOST });
  logger.info(`Questline API running on http://${HOST}:${PORT}`);
  logger.info(`Environment: ${env.NODE_ENV}`);
}

start().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
