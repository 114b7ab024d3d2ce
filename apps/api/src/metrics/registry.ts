import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const METRIC_PREFIX = 'cluster_query_router_';

export interface HttpMetrics {
  registry: Registry;
  requestsTotal: Counter<'method' | 'route' | 'status_code'>;
  requestDuration: Histogram<'method' | 'route' | 'status_code'>;
  askOutcomes: Counter<'route' | 'outcome'>;
}

/**
 * One registry per app instance so several apps (tests) never share counters.
 */
export function createHttpMetrics(options: { defaultMetrics?: boolean } = {}): HttpMetrics {
  const registry = new Registry();

  if (options.defaultMetrics) {
    collectDefaultMetrics({ register: registry, prefix: METRIC_PREFIX });
  }

  return {
    registry,
    requestsTotal: new Counter({
      name: `${METRIC_PREFIX}http_requests_total`,
      help: 'HTTP requests handled, by method, route and status code',
      labelNames: ['method', 'route', 'status_code'] as const,
      registers: [registry],
    }),
    requestDuration: new Histogram({
      name: `${METRIC_PREFIX}http_request_duration_seconds`,
      help: 'HTTP request duration in seconds',
      labelNames: ['method', 'route', 'status_code'] as const,
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60],
      registers: [registry],
    }),
    askOutcomes: new Counter({
      name: `${METRIC_PREFIX}ask_outcomes_total`,
      help: 'Ask requests by matched route and outcome',
      labelNames: ['route', 'outcome'] as const,
      registers: [registry],
    }),
  };
}
