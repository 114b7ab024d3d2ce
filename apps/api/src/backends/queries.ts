import type { LogQuery, MetricsQuery, ParsedQuestion, Route } from '../deterministicRouter/index.js';
import type { ToolCall } from './types.js';

const RANGE_QUERY_POINTS = 120;
const MIN_RANGE_STEP_SECONDS = 60;

export function rangeStepSeconds(hours: number): number {
  return Math.max(MIN_RANGE_STEP_SECONDS, Math.ceil((hours * 3600) / RANGE_QUERY_POINTS));
}

export function buildLokiCall(query: LogQuery): ToolCall {
  switch (query.tool) {
    case 'list_namespaces':
      return { tool: query.tool, arguments: {} };
    case 'find_pod_restarts':
    case 'get_error_summary':
      return { tool: query.tool, arguments: { namespace: query.namespace, hours: query.hours } };
    case 'get_pod_logs':
      return {
        tool: query.tool,
        arguments: { namespace: query.namespace, hours: query.hours, pod_name: query.podName },
      };
    case 'search_logs':
      return {
        tool: query.tool,
        arguments: { namespace: query.namespace, hours: query.hours, query: query.query },
      };
    default:
      return assertNever(query);
  }
}

export function buildPrometheusCall(query: MetricsQuery, now: Date): ToolCall {
  switch (query.tool) {
    case 'health_check':
    case 'get_targets':
    case 'list_metrics':
      return { tool: query.tool, arguments: {} };
    case 'execute_query':
      return { tool: query.tool, arguments: { query: query.promql } };
    case 'execute_range_query': {
      const start = new Date(now.getTime() - query.hours * 3_600_000);
      return {
        tool: query.tool,
        arguments: {
          query: query.promql,
          start: start.toISOString(),
          end: now.toISOString(),
          step: `${rangeStepSeconds(query.hours)}s`,
        },
      };
    }
    default:
      return assertNever(query);
  }
}

/**
 * Turn a matched route into the MCP tools/call request for its backend.
 */
export function buildToolCall(route: Route, question: ParsedQuestion, now: Date): ToolCall {
  switch (route.backend) {
    case 'loki':
      return buildLokiCall(route.template(question));
    case 'prometheus':
      return buildPrometheusCall(route.template(question), now);
    default:
      return assertNever(route);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled backend query: ${JSON.stringify(value)}`);
}
