import type { BackendName } from '@cluster-query-router/shared';
import { StreamableHTTPError } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { McpResponseError, McpToolError } from '../mcp/index.js';
import type { ToolInvocationError, ToolInvocationErrorCode } from './types.js';

const NETWORK_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH', 'ETIMEDOUT'];

/**
 * Error message plus the message of its cause, e.g.
 * "fetch failed (connect ECONNREFUSED 10.0.0.7:8000)"
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const cause = error.cause;
  if (cause instanceof Error && cause.message && cause.message !== error.message) {
    return `${error.message} (${cause.message})`;
  }
  return error.message;
}

export function classifyInvocationError(error: unknown): ToolInvocationErrorCode {
  if (error instanceof McpToolError) return 'TOOL_ERROR';
  if (error instanceof McpResponseError) return 'MALFORMED';
  // The SDK rejects a tools/call result that fails its zod schema
  if (error instanceof ZodError || (error instanceof Error && error.name === 'ZodError')) return 'MALFORMED';
  if (error instanceof McpError && error.code === ErrorCode.RequestTimeout) return 'TIMEOUT';
  if (error instanceof StreamableHTTPError) return 'HTTP';
  if (!(error instanceof Error)) return 'UNKNOWN';

  const msg = describeError(error).toLowerCase();
  if (msg.includes('timed out') || msg.includes('timeout') || error.name === 'AbortError') return 'TIMEOUT';
  if (NETWORK_CODES.some((code) => msg.includes(code.toLowerCase())) || msg.includes('fetch failed')) {
    return 'NETWORK';
  }
  if (/\bhttp \d{3}\b/.test(msg)) return 'HTTP';
  return 'UNKNOWN';
}

const CODE_MESSAGES: Record<ToolInvocationErrorCode, string> = {
  TIMEOUT: 'timed out',
  NETWORK: 'unreachable',
  HTTP: 'returned an error status',
  TOOL_ERROR: 'reported a tool error',
  MALFORMED: 'returned a malformed response',
  UNKNOWN: 'failed',
};

export function toInvocationError(backend: BackendName, tool: string, error: unknown): ToolInvocationError {
  const code = classifyInvocationError(error);
  return {
    backend,
    tool,
    code,
    message: `${backend} backend ${CODE_MESSAGES[code]} while calling ${tool}`,
    detail: describeError(error),
  };
}
