import { APIConnectionError, APIConnectionTimeoutError, APIError } from 'openai';
import type { SummarizationErrorCode } from './types.js';

export function classifyModelError(error: unknown): SummarizationErrorCode {
  if (error instanceof APIConnectionTimeoutError) return 'TIMEOUT';
  if (error instanceof APIConnectionError) return 'NETWORK';
  if (error instanceof APIError) return 'HTTP';
  if (error instanceof Error && /timed? ?out/i.test(error.message)) return 'TIMEOUT';
  return 'UNKNOWN';
}
