import type { ToolSuccess } from '../backends/index.js';
import { classifyModelError } from './errors.js';
import { buildSummaryContent, emptyResultSummary, SUMMARY_SYSTEM_PROMPT } from './prompt.js';
import type { SummaryModelAdapter, SummaryResult } from './types.js';

export interface ToolOutputSummarizer {
  summarize(result: ToolSuccess): Promise<SummaryResult>;
}

/**
 * Turns raw tool output into a short prose summary.
 * Only successful tool results are accepted; failures never reach the model.
 */
export class Summarizer implements ToolOutputSummarizer {
  constructor(
    private readonly adapter: SummaryModelAdapter,
    private readonly model: string,
  ) {}

  async summarize(result: ToolSuccess): Promise<SummaryResult> {
    if (!result.payload.trim()) {
      return { ok: true, text: emptyResultSummary(result) };
    }

    try {
      const response = await this.adapter.complete({
        model: this.model,
        systemPrompt: SUMMARY_SYSTEM_PROMPT,
        content: buildSummaryContent(result),
      });

      const text = response.content.trim();
      if (!text) {
        return {
          ok: false,
          error: { code: 'EMPTY_RESPONSE', message: `${this.adapter.name} returned an empty summary` },
        };
      }
      return { ok: true, text };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[summarizer] ${this.adapter.name} call failed, summary unavailable:`, message);
      return { ok: false, error: { code: classifyModelError(error), message } };
    }
  }
}
