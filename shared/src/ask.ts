export type BackendName = 'loki' | 'prometheus';

export type RouteId =
  | 'prometheus.health_check'
  | 'prometheus.get_targets'
  | 'prometheus.list_metrics'
  | 'loki.list_namespaces'
  | 'loki.find_pod_restarts'
  | 'prometheus.execute_range_query'
  | 'prometheus.execute_query'
  | 'loki.get_pod_logs'
  | 'loki.search_logs'
  | 'loki.get_error_summary';

export interface AskRequest {
  question: string;
}

export type SummaryStatus = 'ok' | 'unavailable';

export interface AskResponse {
  question: string;
  route: RouteId;
  backend: BackendName;
  tool: string;
  toolArgs: Record<string, unknown>;
  /** Verbatim tool output, present whenever the backend call succeeded */
  rawResult: string;
  summary: string;
  summaryStatus: SummaryStatus;
  summaryError?: string;
}

export interface RecognizedQuestion {
  route: RouteId;
  backend: BackendName;
  description: string;
  example: string;
}

export interface NoRouteMatchBody {
  error: 'no_route_match';
  message: string;
  recognizedQuestions: RecognizedQuestion[];
}

export interface ToolInvocationFailedBody {
  error: 'tool_invocation_failed';
  message: string;
  route: RouteId;
  backend: BackendName;
  tool: string;
  detail: string;
}

export type AskErrorBody = NoRouteMatchBody | ToolInvocationFailedBody;
