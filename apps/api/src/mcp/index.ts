export { McpClient, McpResponseError, McpToolError, extractToolPayload, openStreamableHttpSession } from './client.js';
export { buildMcpServerConfigs, mcpEndpoint } from './config.js';
export type { McpServerConfig } from './config.js';
export type { McpSession, McpSessionFactory } from './client.js';
