// apps/api/src/deterministicRouter/index.ts
import type { RecognizedQuestion, RouteId } from '@cluster-query-router/shared';
import { parseQuestion } from './question.js';
import { ROUTES } from './routes.js';
import type { MatchOutcome, Route } from './types.js';

/**
 * Match a question against an ordered route list.
 * This is pure code - no LLM, no I/O, no clock.
 */
export function matchRoute(routes: readonly Route[], question: string): MatchOutcome {
  const parsed = parseQuestion(question);

  for (const route of routes) {
    if (route.matches(parsed)) {
      return { type: 'matched', route, question: parsed };
    }
  }

  return { type: 'no_match', question: parsed };
}

export function match(question: string): MatchOutcome {
  return matchRoute(ROUTES, question);
}

export function findRoute(id: RouteId): Route | undefined {
  return ROUTES.find((route) => route.id === id);
}

/**
 * Question forms the router understands, in evaluation order
 */
export function describeRoutes(routes: readonly Route[] = ROUTES): RecognizedQuestion[] {
  return routes.map((route) => ({
    route: route.id,
    backend: route.backend,
    description: route.description,
    example: route.example,
  }));
}

export { ROUTES } from './routes.js';
export { parseQuestion, normalizeQuestion } from './question.js';
export * from './types.js';
