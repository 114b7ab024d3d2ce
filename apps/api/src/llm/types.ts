/**
 * Model request for summarization. It carries a system prompt and the data
 * to summarize; there is no field for tools, tool choice or the user's question.
 */
export interface SummarizeRequest {
  model: string;
  systemPrompt: string;
  content: string;
}

export interface SummarizeResponse {
  content: string;
  finishReason: string | null;
}

export interface SummaryModelAdapter {
  readonly name: string;
  complete(request: SummarizeRequest): Promise<SummarizeResponse>;
}

export type SummarizationErrorCode = 'TIMEOUT' | 'NETWORK' | 'HTTP' | 'EMPTY_RESPONSE' | 'UNKNOWN';

export interface SummarizationError {
  code: SummarizationErrorCode;
  message: string;
}

export type SummaryResult =
  | { ok: true; text: string; error?: never }
  | { ok: false; error: SummarizationError; text?: never };
