import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { createHttpMetrics } from './metrics/registry.js';
import { askRoutes, type AskHandler } from './routes/ask.js';
import { healthRoutes, type HealthInfo } from './routes/health.js';
import { metricsRoutes } from './routes/metrics.js';

export interface AppOptions {
  orchestrator: AskHandler;
  health: HealthInfo;
  /** Pino level, or false to disable request logging */
  logLevel: string | false;
  rateLimitMax: number;
  /** Register prom-client's process metrics on this app's registry */
  defaultMetrics?: boolean;
}

export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logLevel === false ? false : { level: options.logLevel },
  });

  const metrics = createHttpMetrics({ defaultMetrics: options.defaultMetrics });

  // Security headers (JSON API, no CSP needed)
  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  // Global rate limiting (per IP)
  await app.register(rateLimit, {
    global: true,
    max: options.rateLimitMax,
    timeWindow: '1 minute',
  });

  app.addHook('onResponse', async (request, reply) => {
    const labels = {
      method: request.method,
      route: request.routeOptions.url ?? 'unmatched',
      status_code: String(reply.statusCode),
    };
    metrics.requestsTotal.inc(labels);
    metrics.requestDuration.observe(labels, reply.elapsedTime / 1000);
  });

  // Global error handler: hide details of unexpected errors
  app.setErrorHandler((error: FastifyError, _request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      app.log.error(error);
      reply.status(statusCode).send({ error: 'Internal server error' });
    } else {
      reply.status(statusCode).send({ error: error.message });
    }
  });

  // Also served at the root for callers that predate the /api prefix
  for (const prefix of ['/api', '']) {
    await app.register(healthRoutes(options.health), { prefix });
    await app.register(askRoutes(options.orchestrator, metrics), { prefix });
  }
  await app.register(metricsRoutes(metrics.registry));

  return app;
}
