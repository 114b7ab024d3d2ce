import { describe, expect, it, vi } from 'vitest';
import { CallToolResultSchema, ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { StreamableHTTPError } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { match, type Route } from '../deterministicRouter/index.js';
import { McpResponseError, McpToolError } from '../mcp/index.js';
import { BackendClient, classifyInvocationError } from './index.js';
import type { ToolCaller } from './types.js';

function routeFor(question: string): Route {
  const outcome = match(question);
  if (outcome.type !== 'matched') throw new Error(`no route for "${question}"`);
  return outcome.route;
}

function fakeCaller(name: string): ToolCaller & { callTool: ReturnType<typeof vi.fn> } {
  return { name, callTool: vi.fn() };
}

function connectionRefused(port: number): TypeError {
  const cause = new Error(`connect ECONNREFUSED 10.0.0.7:${port}`);
  return new TypeError('fetch failed', { cause });
}

describe('BackendClient', () => {
  const now = () => new Date('2026-10-19T12:00:00.000Z');

  it('returns the verbatim payload from the routed backend', async () => {
    const loki = fakeCaller('loki');
    const prometheus = fakeCaller('prometheus');
    prometheus.callTool.mockResolvedValue('{"data":{"result":[]}}');
    const client = new BackendClient({ callers: { loki, prometheus }, now });
    const question = 'Show CPU usage in the payments namespace for the last 3 hours';

    const result = await client.invoke(routeFor(question), question);

    expect(result).toEqual({
      ok: true,
      backend: 'prometheus',
      tool: 'execute_range_query',
      arguments: {
        query: 'sum by (namespace) (rate(container_cpu_usage_seconds_total{container!="",namespace="payments"}[5m]))',
        start: '2026-10-19T09:00:00.000Z',
        end: '2026-10-19T12:00:00.000Z',
        step: '90s',
      },
      payload: '{"data":{"result":[]}}',
    });
    expect(loki.callTool).not.toHaveBeenCalled();
  });

  it('treats an empty payload as success', async () => {
    const loki = fakeCaller('loki');
    loki.callTool.mockResolvedValue('');
    const client = new BackendClient({ callers: { loki, prometheus: fakeCaller('prometheus') }, now });
    const question = 'What errors are happening in my cluster right now?';

    const result = await client.invoke(routeFor(question), question);

    expect(result.ok).toBe(true);
    expect(result.payload).toBe('');
    expect(loki.callTool).toHaveBeenCalledWith('get_error_summary', { namespace: '', hours: 1 });
  });

  it('reports an unreachable metrics backend with the raw detail', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const prometheus = fakeCaller('prometheus');
    prometheus.callTool.mockRejectedValue(connectionRefused(8080));
    const client = new BackendClient({ callers: { loki: fakeCaller('loki'), prometheus }, now });

    const result = await client.invoke(routeFor('Is Prometheus up?'), 'Is Prometheus up?');

    expect(result.ok).toBe(false);
    expect(result.error).toEqual({
      backend: 'prometheus',
      tool: 'health_check',
      code: 'NETWORK',
      message: 'prometheus backend unreachable while calling health_check',
      detail: 'fetch failed (connect ECONNREFUSED 10.0.0.7:8080)',
    });
    expect(prometheus.callTool).toHaveBeenCalledTimes(1);
  });

  it('does not retry a failed call', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const loki = fakeCaller('loki');
    loki.callTool.mockRejectedValue(new McpToolError('query parse error'));
    const client = new BackendClient({ callers: { loki, prometheus: fakeCaller('prometheus') }, now });

    const result = await client.invoke(routeFor('Which namespaces are sending logs?'), 'Which namespaces are sending logs?');

    expect(result.error?.code).toBe('TOOL_ERROR');
    expect(result.error?.detail).toBe('query parse error');
    expect(loki.callTool).toHaveBeenCalledTimes(1);
  });
});

describe('classifyInvocationError', () => {
  it('classifies transport, protocol and tool failures', () => {
    expect(classifyInvocationError(new McpError(ErrorCode.RequestTimeout, 'Request timed out'))).toBe('TIMEOUT');
    expect(classifyInvocationError(new StreamableHTTPError(503, 'Error POSTing to endpoint (HTTP 503)'))).toBe('HTTP');
    expect(classifyInvocationError(connectionRefused(8000))).toBe('NETWORK');
    expect(classifyInvocationError(new McpResponseError('Malformed MCP tool result'))).toBe('MALFORMED');
    expect(classifyInvocationError(new McpToolError('bad'))).toBe('TOOL_ERROR');
    expect(classifyInvocationError(new Error('The operation was aborted due to timeout'))).toBe('TIMEOUT');
    expect(classifyInvocationError('weird')).toBe('UNKNOWN');
  });

  it('classifies a tool result rejected by the SDK schema as malformed', async () => {
    const parsed = CallToolResultSchema.safeParse({ content: 'text' });
    expect(parsed.success).toBe(false);
    expect(classifyInvocationError(parsed.error)).toBe('MALFORMED');

    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const loki = fakeCaller('loki');
    loki.callTool.mockRejectedValue(parsed.error);
    const client = new BackendClient({ callers: { loki, prometheus: fakeCaller('prometheus') } });
    const question = 'What errors are happening in my cluster right now?';

    const result = await client.invoke(routeFor(question), question);

    expect(result.ok).toBe(false);
    expect(result.error?.code).toBe('MALFORMED');
    expect(result.error?.message).toBe('loki backend returned a malformed response while calling get_error_summary');
  });
});
