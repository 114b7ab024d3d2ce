import OpenAI from 'openai';
import type { SummarizeRequest, SummarizeResponse, SummaryModelAdapter } from '../types.js';

export interface OllamaProviderOptions {
  /** Ollama base URL, e.g. http://localhost:11434 */
  baseUrl: string;
  timeoutMs: number;
  /** Pre-built client, used by tests */
  client?: OpenAI;
}

/**
 * Local model via Ollama's OpenAI-compatible API (`<baseUrl>/v1`).
 */
export class OllamaProvider implements SummaryModelAdapter {
  readonly name = 'ollama' as const;
  private readonly client: OpenAI;
  private readonly timeoutMs: number;

  constructor(options: OllamaProviderOptions) {
    this.timeoutMs = options.timeoutMs;
    this.client = options.client ?? new OpenAI({
      // Ollama ignores the key but the SDK requires one
      apiKey: 'ollama',
      baseURL: `${options.baseUrl.replace(/\/+$/, '')}/v1`,
      maxRetries: 0,
      timeout: options.timeoutMs,
    });
  }

  async complete(request: SummarizeRequest): Promise<SummarizeResponse> {
    const response = await this.client.chat.completions.create(
      {
        model: request.model,
        stream: false,
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.content },
        ],
      },
      { timeout: this.timeoutMs, maxRetries: 0 },
    );

    const choice = response.choices[0];
    return {
      content: choice?.message.content ?? '',
      finishReason: choice?.finish_reason ?? null,
    };
  }
}
