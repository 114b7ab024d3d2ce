import type { BackendName } from '@cluster-query-router/shared';
import { parseQuestion, type Route } from '../deterministicRouter/index.js';
import { toInvocationError } from './errors.js';
import { buildToolCall } from './queries.js';
import type { ToolCaller, ToolResult } from './types.js';

export interface BackendClientOptions {
  callers: Record<BackendName, ToolCaller>;
  now?: () => Date;
}

export interface ToolInvoker {
  invoke(route: Route, question: string): Promise<ToolResult>;
}

/**
 * Runs the tool a route is bound to. One attempt per request; failures come
 * back as data, never as exceptions.
 */
export class BackendClient implements ToolInvoker {
  private readonly callers: Record<BackendName, ToolCaller>;
  private readonly now: () => Date;

  constructor(options: BackendClientOptions) {
    this.callers = options.callers;
    this.now = options.now ?? (() => new Date());
  }

  async invoke(route: Route, question: string): Promise<ToolResult> {
    const call = buildToolCall(route, parseQuestion(question), this.now());
    const caller = this.callers[route.backend];

    try {
      const payload = await caller.callTool(call.tool, call.arguments);
      return { ok: true, backend: route.backend, ...call, payload };
    } catch (error) {
      const failure = toInvocationError(route.backend, call.tool, error);
      console.warn(`[backend:${route.backend}] ${call.tool} failed (${failure.code}): ${failure.detail}`);
      return { ok: false, backend: route.backend, ...call, error: failure };
    }
  }
}

export { buildLokiCall, buildPrometheusCall, buildToolCall, rangeStepSeconds } from './queries.js';
export { classifyInvocationError, describeError, toInvocationError } from './errors.js';
export type * from './types.js';
