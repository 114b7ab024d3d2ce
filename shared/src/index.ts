export type {
  AskErrorBody,
  AskRequest,
  AskResponse,
  BackendName,
  NoRouteMatchBody,
  RecognizedQuestion,
  RouteId,
  SummaryStatus,
  ToolInvocationFailedBody,
} from './ask.js';
