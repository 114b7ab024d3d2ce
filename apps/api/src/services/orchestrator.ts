import type { AskResponse, RecognizedQuestion, RouteId } from '@cluster-query-router/shared';
import type { ToolInvocationError, ToolInvoker } from '../backends/index.js';
import { describeRoutes, matchRoute, ROUTES, type Route } from '../deterministicRouter/index.js';
import type { ToolOutputSummarizer } from '../llm/summarizer.js';
import type { SummaryResult } from '../llm/types.js';

export const SUMMARY_UNAVAILABLE = 'Summary unavailable.';

/**
 * Ask outcome - discriminated union. Only `answered` carries tool output;
 * the two failure variants have no summary field at all.
 */
export type AskOutcome =
  | { type: 'answered'; response: AskResponse }
  | { type: 'no_route'; question: string; recognized: RecognizedQuestion[] }
  | { type: 'tool_error'; question: string; route: RouteId; error: ToolInvocationError };

export interface OrchestratorDeps {
  backends: ToolInvoker;
  summarizer: ToolOutputSummarizer;
  /** Ordered route table, defaults to the built-in one */
  routes?: readonly Route[];
}

export class Orchestrator {
  private readonly backends: ToolInvoker;
  private readonly summarizer: ToolOutputSummarizer;
  private readonly routes: readonly Route[];

  constructor(deps: OrchestratorDeps) {
    this.backends = deps.backends;
    this.summarizer = deps.summarizer;
    this.routes = deps.routes ?? ROUTES;
  }

  /**
   * match -> invoke -> summarize. Routing and backend failures end the
   * request; a summarization failure only degrades the summary.
   */
  async ask(question: string): Promise<AskOutcome> {
    // 1. Route
    const outcome = matchRoute(this.routes, question);
    if (outcome.type === 'no_match') {
      console.info(`[orchestrator] No route for question: ${JSON.stringify(question)}`);
      return { type: 'no_route', question, recognized: describeRoutes(this.routes) };
    }
    const { route } = outcome;

    // 2. Backend call
    const result = await this.backends.invoke(route, question);
    if (!result.ok) {
      return { type: 'tool_error', question, route: route.id, error: result.error };
    }

    // 3. Summary (never fatal)
    const summary = await this.summarizer.summarize(result).catch((error: unknown): SummaryResult => ({
      ok: false,
      error: { code: 'UNKNOWN', message: error instanceof Error ? error.message : String(error) },
    }));

    return {
      type: 'answered',
      response: {
        question,
        route: route.id,
        backend: result.backend,
        tool: result.tool,
        toolArgs: result.arguments,
        rawResult: result.payload,
        ...(summary.ok
          ? { summary: summary.text, summaryStatus: 'ok' as const }
          : { summary: SUMMARY_UNAVAILABLE, summaryStatus: 'unavailable' as const, summaryError: summary.error.message }),
      },
    };
  }
}
