import type { BackendName } from '@cluster-query-router/shared';

export interface ToolCall {
  tool: string;
  arguments: Record<string, unknown>;
}

export type ToolInvocationErrorCode =
  | 'TIMEOUT'
  | 'NETWORK'
  | 'HTTP'
  | 'TOOL_ERROR'
  | 'MALFORMED'
  | 'UNKNOWN';

export interface ToolInvocationError {
  backend: BackendName;
  tool: string;
  code: ToolInvocationErrorCode;
  message: string;
  /** Raw error text, kept verbatim for operators */
  detail: string;
}

export interface ToolSuccess extends ToolCall {
  ok: true;
  backend: BackendName;
  /** Verbatim tool output */
  payload: string;
  error?: never;
}

export interface ToolFailure extends ToolCall {
  ok: false;
  backend: BackendName;
  error: ToolInvocationError;
  payload?: never;
}

export type ToolResult = ToolSuccess | ToolFailure;

/**
 * Anything that can run one named tool and hand back its text output.
 * McpClient is the production implementation.
 */
export interface ToolCaller {
  readonly name: string;
  callTool(tool: string, args: Record<string, unknown>): Promise<string>;
}
