// apps/api/src/deterministicRouter/routes.ts
import { mentions, mentionsWord } from './question.js';
import type { ParsedQuestion, Route } from './types.js';

// A named pod or a search phrase makes it a log question
function asksForLogs(q: ParsedQuestion): boolean {
  return q.podName !== '' || q.searchQuery !== '';
}

function namespaceSelector(namespace: string): string {
  return namespace ? `,namespace="${namespace}"` : '';
}

/**
 * Ordered route table. The first route whose predicate matches wins, so
 * moving an entry changes which backend answers overlapping questions.
 */
export const ROUTES: readonly Route[] = Object.freeze<Route[]>([
  {
    id: 'prometheus.health_check',
    backend: 'prometheus',
    description: 'Prometheus server health',
    example: 'Is Prometheus healthy?',
    matches: (q) =>
      mentions(q.text, 'prometheus', 'metrics') && mentions(q.text, 'health', 'healthy', 'up'),
    template: () => ({ tool: 'health_check' }),
  },
  {
    id: 'prometheus.get_targets',
    backend: 'prometheus',
    description: 'Prometheus scrape target status',
    example: 'Which scrape targets are down?',
    matches: (q) => !asksForLogs(q) && mentionsWord(q.text, 'scrape', 'target', 'targets'),
    template: () => ({ tool: 'get_targets' }),
  },
  {
    id: 'prometheus.list_metrics',
    backend: 'prometheus',
    description: 'Metric names Prometheus knows about',
    example: 'What metrics are available?',
    matches: (q) =>
      !asksForLogs(q) &&
      mentions(q.text, 'list metrics', 'available metrics', 'which metrics', 'what metrics', 'metric names'),
    template: () => ({ tool: 'list_metrics' }),
  },
  {
    id: 'loki.list_namespaces',
    backend: 'loki',
    description: 'Namespaces that have logs in Loki',
    example: 'Which namespaces are sending logs?',
    matches: (q) => q.text.includes('namespaces'),
    template: () => ({ tool: 'list_namespaces' }),
  },
  {
    id: 'loki.find_pod_restarts',
    backend: 'loki',
    description: 'Pod restarts, crashes and OOM kills',
    example: 'Which pods restarted in the last 6 hours?',
    matches: (q) => mentions(q.text, 'restart', 'restarts', 'crash', 'crashing', 'crashloop', 'oomkilled'),
    template: (q) => ({ tool: 'find_pod_restarts', namespace: q.namespace, hours: q.hours }),
  },
  {
    id: 'prometheus.execute_range_query',
    backend: 'prometheus',
    description: 'CPU usage per namespace over the look-back window',
    example: 'Show CPU usage in the payments namespace for the last 3 hours',
    matches: (q) => !asksForLogs(q) && mentionsWord(q.text, 'cpu'),
    template: (q) => ({
      tool: 'execute_range_query',
      promql: `sum by (namespace) (rate(container_cpu_usage_seconds_total{container!=""${namespaceSelector(q.namespace)}}[5m]))`,
      hours: q.hours,
    }),
  },
  {
    id: 'prometheus.execute_query',
    backend: 'prometheus',
    description: 'Pods using the most memory',
    example: 'Which pods are using the most memory?',
    matches: (q) => !asksForLogs(q) && mentionsWord(q.text, 'memory'),
    template: (q) => ({
      tool: 'execute_query',
      promql: `topk(10, sum by (namespace, pod) (container_memory_working_set_bytes{container!=""${namespaceSelector(q.namespace)}}))`,
    }),
  },
  {
    id: 'loki.get_pod_logs',
    backend: 'loki',
    description: 'Recent logs from one pod',
    example: 'Show logs from checkout-7d9f in the shop namespace',
    matches: (q) => q.podName !== '',
    template: (q) => ({ tool: 'get_pod_logs', namespace: q.namespace, hours: q.hours, podName: q.podName }),
  },
  {
    id: 'loki.search_logs',
    backend: 'loki',
    description: 'Log lines containing a phrase',
    example: 'Find logs containing "connection refused"',
    matches: (q) => q.searchQuery !== '',
    template: (q) => ({ tool: 'search_logs', namespace: q.namespace, hours: q.hours, query: q.searchQuery }),
  },
  {
    id: 'loki.get_error_summary',
    backend: 'loki',
    description: 'Error summary across the cluster or a namespace',
    example: 'What errors are happening in my cluster right now?',
    matches: (q) => mentions(q.text, 'error', 'errors', 'exception', 'exceptions', 'panic', 'fatal'),
    template: (q) => ({ tool: 'get_error_summary', namespace: q.namespace, hours: q.hours }),
  },
]);
