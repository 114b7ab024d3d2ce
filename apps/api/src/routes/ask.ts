import type { FastifyPluginAsync } from 'fastify';
import type { AskResponse, NoRouteMatchBody, ToolInvocationFailedBody } from '@cluster-query-router/shared';
import { z } from 'zod';
import type { HttpMetrics } from '../metrics/registry.js';
import type { AskOutcome } from '../services/orchestrator.js';
import { parseOrReply400 } from './validation.js';

const AskRequestSchema = z.object({
  question: z.string().refine((question) => question.trim().length > 0, 'question must not be empty'),
});

export interface AskHandler {
  ask(question: string): Promise<AskOutcome>;
}

export const askRoutes = (
  orchestrator: AskHandler,
  metrics: Pick<HttpMetrics, 'askOutcomes'>,
): FastifyPluginAsync => async (app) => {
  app.post('/ask', async (request, reply) => {
    const parsed = parseOrReply400(reply, AskRequestSchema, request.body);
    if (!parsed) return;

    const outcome = await orchestrator.ask(parsed.question);

    switch (outcome.type) {
      case 'answered': {
        metrics.askOutcomes.inc({
          route: outcome.response.route,
          outcome: outcome.response.summaryStatus === 'ok' ? 'answered' : 'answered_without_summary',
        });
        const body: AskResponse = outcome.response;
        return reply.status(200).send(body);
      }
      case 'no_route': {
        metrics.askOutcomes.inc({ route: 'none', outcome: 'no_route' });
        const body: NoRouteMatchBody = {
          error: 'no_route_match',
          message: 'No deterministic route matched this question',
          recognizedQuestions: outcome.recognized,
        };
        return reply.status(400).send(body);
      }
      case 'tool_error': {
        metrics.askOutcomes.inc({ route: outcome.route, outcome: 'tool_error' });
        request.log.warn({ route: outcome.route, error: outcome.error }, 'Tool call failed');
        const body: ToolInvocationFailedBody = {
          error: 'tool_invocation_failed',
          message: `Tool call failed: ${outcome.error.message}`,
          route: outcome.route,
          backend: outcome.error.backend,
          tool: outcome.error.tool,
          detail: outcome.error.detail,
        };
        return reply.status(502).send(body);
      }
    }
  });
};
