/**
 * MCP Server Configuration
 *
 * One streamable-HTTP MCP server per monitoring backend.
 */

import type { BackendName } from '@cluster-query-router/shared';

export interface McpServerConfig {
  /** Backend this server answers for (also used as the log tag) */
  name: BackendName;
  /** Base URL of the server; the MCP endpoint lives at `<baseUrl>/mcp` */
  baseUrl: string;
  /** Deadline for each MCP request (initialize and tools/call) */
  timeoutMs: number;
}

export function mcpEndpoint(baseUrl: string): URL {
  return new URL(`${baseUrl.replace(/\/+$/, '')}/mcp`);
}

export function buildMcpServerConfigs(options: {
  lokiMcpUrl: string;
  prometheusMcpUrl: string;
  backendTimeoutMs: number;
}): Record<BackendName, McpServerConfig> {
  return {
    loki: { name: 'loki', baseUrl: options.lokiMcpUrl, timeoutMs: options.backendTimeoutMs },
    prometheus: { name: 'prometheus', baseUrl: options.prometheusMcpUrl, timeoutMs: options.backendTimeoutMs },
  };
}
