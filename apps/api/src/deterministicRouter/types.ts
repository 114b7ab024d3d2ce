// apps/api/src/deterministicRouter/types.ts
import type { BackendName, RouteId } from '@cluster-query-router/shared';

/**
 * Facts extracted from one question. Everything here is derived from the
 * question text alone.
 */
export interface ParsedQuestion {
  raw: string;
  /** Lower-cased, punctuation stripped, whitespace collapsed */
  text: string;
  /** Empty string means all namespaces */
  namespace: string;
  hours: number;
  podName: string;
  searchQuery: string;
}

/**
 * Log backend queries - one variant per Loki MCP tool
 */
export type LogQuery =
  | { tool: 'list_namespaces' }
  | { tool: 'find_pod_restarts'; namespace: string; hours: number }
  | { tool: 'get_error_summary'; namespace: string; hours: number }
  | { tool: 'get_pod_logs'; namespace: string; hours: number; podName: string }
  | { tool: 'search_logs'; namespace: string; hours: number; query: string };

/**
 * Metrics backend queries - one variant per Prometheus MCP tool
 */
export type MetricsQuery =
  | { tool: 'health_check' }
  | { tool: 'get_targets' }
  | { tool: 'list_metrics' }
  | { tool: 'execute_query'; promql: string }
  | { tool: 'execute_range_query'; promql: string; hours: number };

export interface BackendQueries {
  loki: LogQuery;
  prometheus: MetricsQuery;
}

interface RouteOf<B extends BackendName> {
  readonly id: RouteId;
  readonly backend: B;
  readonly description: string;
  readonly example: string;
  matches(question: ParsedQuestion): boolean;
  template(question: ParsedQuestion): BackendQueries[B];
}

/**
 * Route - discriminated on backend so the template's query type follows it
 */
export type Route = RouteOf<'loki'> | RouteOf<'prometheus'>;

export type MatchOutcome =
  | { type: 'matched'; route: Route; question: ParsedQuestion }
  | { type: 'no_match'; question: ParsedQuestion; route?: never };
