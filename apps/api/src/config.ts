import { config as loadEnv } from "dotenv";
import { resolve } from "path";

// Load .env from the working directory
loadEnv({ path: resolve(process.cwd(), ".env") });

export interface Config {
  nodeEnv: string;
  host: string;
  port: number;
  logLevel: string;

  // Monitoring backends (MCP servers)
  lokiMcpUrl: string;
  prometheusMcpUrl: string;
  backendTimeoutMs: number;

  // Local summarization model
  ollamaUrl: string;
  ollamaModel: string;
  ollamaTimeoutMs: number;

  // HTTP
  rateLimitMax: number;
}

export interface EnvValidationIssue {
  key: string;
  reason: string;
}

export interface EnvValidationResult {
  ok: boolean;
  errors: EnvValidationIssue[];
  warnings: EnvValidationIssue[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const nodeEnv = env.NODE_ENV || "development";

  return {
    nodeEnv,
    host: env.HOST || "0.0.0.0",
    port: parseInt(env.PORT || "8080", 10),
    logLevel: env.LOG_LEVEL || (nodeEnv === "development" ? "info" : "warn"),

    lokiMcpUrl: env.LOKI_MCP_URL || "http://loki-mcp.monitoring.svc.cluster.local:8000",
    prometheusMcpUrl: env.PROMETHEUS_MCP_URL || "http://prometheus-mcp.monitoring.svc.cluster.local:8080",
    backendTimeoutMs: parseInt(env.BACKEND_TIMEOUT_MS || "30000", 10),

    ollamaUrl: env.OLLAMA_URL || "http://ollama-external.ai.svc.cluster.local:11434",
    ollamaModel: env.OLLAMA_MODEL || "phi4-mini:latest",
    ollamaTimeoutMs: parseInt(env.OLLAMA_TIMEOUT_MS || "60000", 10),

    rateLimitMax: parseInt(env.RATE_LIMIT_MAX || "300", 10),
  };
}

export function validateRequiredEnv(currentConfig: Config): EnvValidationResult {
  const errors: EnvValidationIssue[] = [];
  const warnings: EnvValidationIssue[] = [];

  const urls: Array<[string, string]> = [
    ["LOKI_MCP_URL", currentConfig.lokiMcpUrl],
    ["PROMETHEUS_MCP_URL", currentConfig.prometheusMcpUrl],
    ["OLLAMA_URL", currentConfig.ollamaUrl],
  ];
  for (const [key, value] of urls) {
    if (!isHttpUrl(value)) {
      errors.push({ key, reason: `Expected an http(s) URL, got "${value}".` });
    }
  }

  const positives: Array<[string, number]> = [
    ["PORT", currentConfig.port],
    ["BACKEND_TIMEOUT_MS", currentConfig.backendTimeoutMs],
    ["OLLAMA_TIMEOUT_MS", currentConfig.ollamaTimeoutMs],
    ["RATE_LIMIT_MAX", currentConfig.rateLimitMax],
  ];
  for (const [key, value] of positives) {
    if (!Number.isInteger(value) || value <= 0) {
      errors.push({ key, reason: "Must be a positive integer." });
    }
  }

  if (!currentConfig.ollamaModel.trim()) {
    errors.push({ key: "OLLAMA_MODEL", reason: "A model identifier is required for summaries." });
  }

  if (currentConfig.ollamaTimeoutMs > 120_000) {
    warnings.push({
      key: "OLLAMA_TIMEOUT_MS",
      reason: "Summaries wait longer than two minutes before degrading.",
    });
  }

  return {
    ok: errors.length === 0,
    errors,
    warnings,
  };
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}
