import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from './app.js';
import { BackendClient, type ToolCaller } from './backends/index.js';
import { Summarizer } from './llm/summarizer.js';
import type { SummaryModelAdapter } from './llm/types.js';
import { Orchestrator } from './services/orchestrator.js';

const ERRORS_QUESTION = 'What errors are happening in my cluster right now?';

function fakeCaller(name: string): ToolCaller & { callTool: ReturnType<typeof vi.fn> } {
  return { name, callTool: vi.fn() };
}

describe('cluster query router API', () => {
  let app: FastifyInstance;
  let loki: ReturnType<typeof fakeCaller>;
  let prometheus: ReturnType<typeof fakeCaller>;
  let model: SummaryModelAdapter & { complete: ReturnType<typeof vi.fn> };

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    loki = fakeCaller('loki');
    prometheus = fakeCaller('prometheus');
    model = { name: 'ollama', complete: vi.fn() };

    const orchestrator = new Orchestrator({
      backends: new BackendClient({ callers: { loki, prometheus } }),
      summarizer: new Summarizer(model, 'phi4-mini:latest'),
    });

    app = await buildApp({
      orchestrator,
      health: {
        backends: { loki: 'http://loki-mcp.test:8000', prometheus: 'http://prometheus-mcp.test:8080' },
        model: 'phi4-mini:latest',
      },
      logLevel: false,
      rateLimitMax: 100,
    });
  });

  afterEach(async () => {
    await app.close();
  });

  it('answers a log question with route, raw payload and summary', async () => {
    loki.callTool.mockResolvedValue('payments-api: 14 errors (connection refused)');
    model.complete.mockResolvedValue({ content: '- payments-api is failing', finishReason: 'stop' });

    const response = await app.inject({ method: 'POST', url: '/api/ask', payload: { question: ERRORS_QUESTION } });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      question: ERRORS_QUESTION,
      route: 'loki.get_error_summary',
      backend: 'loki',
      tool: 'get_error_summary',
      toolArgs: { namespace: '', hours: 1 },
      rawResult: 'payments-api: 14 errors (connection refused)',
      summary: '- payments-api is failing',
      summaryStatus: 'ok',
    });
    expect(loki.callTool).toHaveBeenCalledWith('get_error_summary', { namespace: '', hours: 1 });
  });

  it('rejects unrecognized questions without calling a backend', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/ask',
      payload: { question: 'What is the weather today?' },
    });

    expect(response.statusCode).toBe(400);
    const body = response.json();
    expect(body.error).toBe('no_route_match');
    expect(body.message).toBe('No deterministic route matched this question');
    expect(body.recognizedQuestions).toHaveLength(10);
    expect(body.recognizedQuestions[0]).toEqual({
      route: 'prometheus.health_check',
      backend: 'prometheus',
      description: 'Prometheus server health',
      example: 'Is Prometheus healthy?',
    });
    expect(loki.callTool).not.toHaveBeenCalled();
    expect(prometheus.callTool).not.toHaveBeenCalled();
  });

  it('fails with 502 naming the metrics backend when it is unreachable', async () => {
    prometheus.callTool.mockRejectedValue(
      new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 10.0.0.7:8080') }),
    );

    const response = await app.inject({ method: 'POST', url: '/api/ask', payload: { question: 'Is Prometheus up?' } });

    expect(response.statusCode).toBe(502);
    expect(response.json()).toEqual({
      error: 'tool_invocation_failed',
      message: 'Tool call failed: prometheus backend unreachable while calling health_check',
      route: 'prometheus.health_check',
      backend: 'prometheus',
      tool: 'health_check',
      detail: 'fetch failed (connect ECONNREFUSED 10.0.0.7:8080)',
    });
    expect(model.complete).not.toHaveBeenCalled();
  });

  it('still succeeds with the raw payload when the model is unreachable', async () => {
    loki.callTool.mockResolvedValue('payments-api: 14 errors (connection refused)');
    model.complete.mockRejectedValue(new Error('connect ECONNREFUSED 10.0.0.9:11434'));

    const response = await app.inject({ method: 'POST', url: '/api/ask', payload: { question: ERRORS_QUESTION } });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.rawResult).toBe('payments-api: 14 errors (connection refused)');
    expect(body.summary).toBe('Summary unavailable.');
    expect(body.summaryStatus).toBe('unavailable');
    expect(body.summaryError).toBe('connect ECONNREFUSED 10.0.0.9:11434');
  });

  it('echoes the question exactly as it was sent', async () => {
    loki.callTool.mockResolvedValue('payments-api: 14 errors (connection refused)');
    model.complete.mockResolvedValue({ content: '- payments-api is failing', finishReason: 'stop' });
    const sent = `  ${ERRORS_QUESTION}\n`;

    const response = await app.inject({ method: 'POST', url: '/api/ask', payload: { question: sent } });

    expect(response.statusCode).toBe(200);
    expect(response.json().question).toBe(sent);
    expect(response.json().route).toBe('loki.get_error_summary');
  });

  it('serves ask and health at the root paths too', async () => {
    loki.callTool.mockResolvedValue('payments-api: 14 errors (connection refused)');
    model.complete.mockResolvedValue({ content: '- payments-api is failing', finishReason: 'stop' });

    const ask = await app.inject({ method: 'POST', url: '/ask', payload: { question: ERRORS_QUESTION } });
    expect(ask.statusCode).toBe(200);
    expect(ask.json().summary).toBe('- payments-api is failing');

    const health = await app.inject({ method: 'GET', url: '/health' });
    expect(health.statusCode).toBe(200);
    expect(health.json().status).toBe('ok');
  });

  it('validates the request body', async () => {
    const missing = await app.inject({ method: 'POST', url: '/api/ask', payload: {} });
    expect(missing.statusCode).toBe(400);
    expect(missing.json().error).toBe('Invalid request');
    expect(missing.json().details[0].path).toBe('question');

    const blank = await app.inject({ method: 'POST', url: '/api/ask', payload: { question: '   ' } });
    expect(blank.statusCode).toBe(400);
    expect(blank.json().details).toEqual([{ path: 'question', message: 'question must not be empty' }]);
    expect(loki.callTool).not.toHaveBeenCalled();
  });

  it('reports health with the configured endpoints', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/health' });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.status).toBe('ok');
    expect(body.backends).toEqual({ loki: 'http://loki-mcp.test:8000', prometheus: 'http://prometheus-mcp.test:8080' });
    expect(body.model).toBe('phi4-mini:latest');
  });

  it('exposes request and outcome metrics', async () => {
    loki.callTool.mockResolvedValue('payments-api: 14 errors (connection refused)');
    model.complete.mockResolvedValue({ content: '- payments-api is failing', finishReason: 'stop' });
    await app.inject({ method: 'POST', url: '/api/ask', payload: { question: ERRORS_QUESTION } });

    const response = await app.inject({ method: 'GET', url: '/metrics' });

    expect(response.statusCode).toBe(200);
    const lines = response.body.split('\n');
    expect(lines).toContain('cluster_query_router_http_requests_total{method="POST",route="/api/ask",status_code="200"} 1');
    expect(lines).toContain('cluster_query_router_http_request_duration_seconds_count{method="POST",route="/api/ask",status_code="200"} 1');
    expect(lines).toContain('cluster_query_router_ask_outcomes_total{route="loki.get_error_summary",outcome="answered"} 1');
  });
});
