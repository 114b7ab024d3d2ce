import type { FastifyPluginAsync } from 'fastify';

export interface HealthInfo {
  backends: { loki: string; prometheus: string };
  model: string;
}

export const healthRoutes = (info: HealthInfo): FastifyPluginAsync => async (app) => {
  app.get('/health', async () => ({
    status: 'ok' as const,
    timestamp: new Date().toISOString(),
    backends: info.backends,
    model: info.model,
  }));
};
