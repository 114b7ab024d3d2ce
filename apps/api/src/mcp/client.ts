/**
 * MCP Client
 *
 * Calls a single tool on an MCP server over the streamable HTTP transport.
 * Every call opens its own session and closes it afterwards, so no state
 * is shared between requests.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { z } from 'zod';
import { mcpEndpoint, type McpServerConfig } from './config.js';

const CLIENT_INFO = { name: 'cluster-query-router', version: '0.1.0' };

const ToolCallResultSchema = z
  .object({
    content: z
      .array(z.object({ type: z.string(), text: z.string().optional() }).passthrough())
      .optional(),
    structuredContent: z.record(z.unknown()).optional(),
    isError: z.boolean().optional(),
  })
  .passthrough();

/** The tool itself reported failure (`isError: true`) */
export class McpToolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'McpToolError';
  }
}

/** The server answered with something that is not a tool result */
export class McpResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'McpResponseError';
  }
}

export interface McpSession {
  callTool(name: string, args: Record<string, unknown>, timeoutMs: number): Promise<unknown>;
  close(): Promise<void>;
}

export type McpSessionFactory = (endpoint: URL, timeoutMs: number) => Promise<McpSession>;

export const openStreamableHttpSession: McpSessionFactory = async (endpoint, timeoutMs) => {
  const client = new Client(CLIENT_INFO, { capabilities: {} });
  const transport = new StreamableHTTPClientTransport(endpoint);

  try {
    await client.connect(transport, { timeout: timeoutMs });
  } catch (error) {
    try {
      await client.close();
    } catch (closeError) {
      console.warn(`[mcp] Error closing ${endpoint.href} after failed connect:`, closeError);
    }
    throw error;
  }

  return {
    callTool: (name, args, timeout) => client.callTool({ name, arguments: args }, undefined, { timeout }),
    close: () => client.close(),
  };
};

/**
 * Reduce a tools/call result to the text the tool produced.
 * Order: structuredContent.result, then text blocks, then the whole result as JSON.
 */
export function extractToolPayload(result: unknown): string {
  const parsed = ToolCallResultSchema.safeParse(result);
  if (!parsed.success) {
    throw new McpResponseError(`Malformed MCP tool result: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }

  const { content = [], structuredContent, isError } = parsed.data;
  const textChunks = content
    .filter((item) => item.type === 'text')
    .map((item) => item.text ?? '');

  if (isError) {
    const detail = structuredContent?.result ?? textChunks.filter(Boolean).join('\n');
    throw new McpToolError(stringifyPayload(detail) || 'MCP tool call failed');
  }

  if (structuredContent && 'result' in structuredContent) {
    return stringifyPayload(structuredContent.result);
  }

  if (textChunks.length > 0) {
    return textChunks.filter(Boolean).join('\n');
  }

  return JSON.stringify(parsed.data);
}

function stringifyPayload(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return '';
  return JSON.stringify(value);
}

export class McpClient {
  readonly config: McpServerConfig;
  readonly endpoint: URL;
  private readonly openSession: McpSessionFactory;

  constructor(config: McpServerConfig, openSession: McpSessionFactory = openStreamableHttpSession) {
    this.config = config;
    this.endpoint = mcpEndpoint(config.baseUrl);
    this.openSession = openSession;
  }

  get name(): string {
    return this.config.name;
  }

  /**
   * Call a tool on the MCP server and return its text payload.
   * Throws on transport failures, timeouts, malformed results and tool errors.
   */
  async callTool(name: string, args: Record<string, unknown>): Promise<string> {
    const session = await this.openSession(this.endpoint, this.config.timeoutMs);

    try {
      const result = await session.callTool(name, args, this.config.timeoutMs);
      return extractToolPayload(result);
    } finally {
      try {
        await session.close();
      } catch (error) {
        console.warn(`[mcp:${this.config.name}] Error during disconnect:`, error);
      }
    }
  }
}
