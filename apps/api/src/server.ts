import { buildApp } from './app.js';
import { BackendClient } from './backends/index.js';
import { loadConfig, validateRequiredEnv } from './config.js';
import { OllamaProvider } from './llm/providers/ollama.js';
import { Summarizer } from './llm/summarizer.js';
import { McpClient, buildMcpServerConfigs } from './mcp/index.js';
import { Orchestrator } from './services/orchestrator.js';

const config = loadConfig();

const validation = validateRequiredEnv(config);
for (const warning of validation.warnings) {
  console.warn(`[config] ${warning.key}: ${warning.reason}`);
}
if (!validation.ok) {
  for (const error of validation.errors) {
    console.error(`[config] ${error.key}: ${error.reason}`);
  }
  process.exit(1);
}

const mcpConfigs = buildMcpServerConfigs(config);
const backends = new BackendClient({
  callers: {
    loki: new McpClient(mcpConfigs.loki),
    prometheus: new McpClient(mcpConfigs.prometheus),
  },
});

const summarizer = new Summarizer(
  new OllamaProvider({ baseUrl: config.ollamaUrl, timeoutMs: config.ollamaTimeoutMs }),
  config.ollamaModel,
);

const app = await buildApp({
  orchestrator: new Orchestrator({ backends, summarizer }),
  health: {
    backends: { loki: config.lokiMcpUrl, prometheus: config.prometheusMcpUrl },
    model: config.ollamaModel,
  },
  logLevel: config.logLevel,
  rateLimitMax: config.rateLimitMax,
  defaultMetrics: true,
});

const start = async () => {
  try {
    await app.listen({ port: config.port, host: config.host });
    console.log(`Cluster query router running on http://${config.host}:${config.port}`);
    console.log(`Environment: ${config.nodeEnv}`);
    console.log(`Loki MCP: ${mcpConfigs.loki.baseUrl}, Prometheus MCP: ${mcpConfigs.prometheus.baseUrl}`);
    console.log(`Summaries: ${config.ollamaModel} via ${config.ollamaUrl}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

// Graceful shutdown
const shutdown = async () => {
  console.log('Shutting down...');
  try {
    await app.close();
  } catch (err) {
    console.error('Error during shutdown:', err);
    process.exit(1);
  }
  process.exit(0);
};

process.on('SIGTERM', () => void shutdown());
process.on('SIGINT', () => void shutdown());

await start();
