import type { ToolSuccess } from '../backends/index.js';

export const SUMMARY_SYSTEM_PROMPT = [
  'You are summarizing real Kubernetes ops tool output.',
  'Use only the provided tool result.',
  'Do not invent facts.',
  'If the tool result is empty, say that clearly.',
  'Return exactly 3 short bullet points.',
].join('\n');

const SOURCE_LABELS: Record<ToolSuccess['backend'], string> = {
  loki: 'Loki log query',
  prometheus: 'Prometheus metrics query',
};

export function buildSummaryContent(result: ToolSuccess): string {
  return `Source: ${SOURCE_LABELS[result.backend]} (${result.tool})\n\nTool result:\n${result.payload}\n`;
}

export function emptyResultSummary(result: ToolSuccess): string {
  return `The ${result.backend} tool ${result.tool} returned no data.`;
}
