import type { FastifyInstance } from 'fastify';

interface HealthResponse {
  status: 'ok' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  checks?: {
    database: boolean;
    redis: boolean;
  };
}

export async function healthRoutes(app: FastifyInstance) {
  // Simple health check - always returns 200 if server is up
  app.get('/api/health', async (): Promise<HealthResponse> => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '0.1.0',
      uptime: process.uptime(),
    };
  });

  // Readiness check - verifies Postgres and Redis
  app.get('/api/health/ready', async (request, reply): Promise<HealthResponse> => {
    const [database, redis] = await Promise.all([
      app.services.health.database(),
      app.services.health.redis(),
    ]);
    const checks = { database, redis };

    const isHealthy = database && redis;
    if (!isHealthy) {
      reply.status(503);
    }

    return {
      status: isHealthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '0.1.0',
      uptime: process.uptime(),
      checks,
    };
  });

  // Liveness probe - just confirms the process is running
  app.get('/api/health/live', async () => {
    return { status: 'alive' };
  });
}
