// apps/api/src/deterministicRouter/question.ts
import type { ParsedQuestion } from './types.js';

export const DEFAULT_LOOKBACK_HOURS = 1;
export const MAX_LOOKBACK_HOURS = 720;

const NAMESPACE_PATTERNS = [
  /(?:in|from) (?:the )?(?!the )([a-z0-9-]+) namespace/,
  /namespace ([a-z0-9-]+)/,
];

// A name directly followed by "namespace" is a namespace, not a pod
const POD_PATTERNS = [
  /logs from (?:the )?(?!the )([a-z0-9-*]+)(?![a-z0-9-*]| namespace)/,
  /logs for (?:the )?(?!the )([a-z0-9-*]+)(?![a-z0-9-*]| namespace)/,
  /pod ([a-z0-9-*]+)(?![a-z0-9-*]| namespace)/,
];

const SEARCH_PATTERNS = [
  /search for ([a-z0-9 _.-]+)/,
  /find logs containing ([a-z0-9 _.-]+)/,
  /containing ([a-z0-9 _.-]+)/,
  /mentions ([a-z0-9 _.-]+)/,
];

export function normalizeQuestion(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\-\s"]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function mentions(text: string, ...terms: string[]): boolean {
  return terms.some((term) => text.includes(term));
}

/**
 * Whole-word variant of `mentions`. Hyphens count as part of a word, so
 * "cpu" does not match inside a name such as "cpu-throttler".
 */
export function mentionsWord(text: string, ...words: string[]): boolean {
  return words.some((word) => new RegExp(`(?<![a-z0-9-])${word}(?![a-z0-9-])`).test(text));
}

export function extractNamespace(text: string): string {
  for (const pattern of NAMESPACE_PATTERNS) {
    const match = pattern.exec(text);
    if (match) return match[1];
  }
  return '';
}

export function extractHours(text: string): number {
  const hours = /(?:last|past) (\d+) hours?/.exec(text);
  if (hours) return clampHours(Number.parseInt(hours[1], 10));

  const days = /(?:last|past) (\d+) days?/.exec(text);
  if (days) return clampHours(Number.parseInt(days[1], 10) * 24);

  // "right now" and "currently" fall through to the default window
  return DEFAULT_LOOKBACK_HOURS;
}

function clampHours(value: number): number {
  if (!Number.isFinite(value)) return MAX_LOOKBACK_HOURS;
  return Math.min(MAX_LOOKBACK_HOURS, Math.max(1, value));
}

export function extractPodName(text: string): string {
  for (const pattern of POD_PATTERNS) {
    const match = pattern.exec(text);
    if (match) return match[1];
  }
  return '';
}

/**
 * Search phrases come from the raw question so quoted text keeps its case.
 */
export function extractSearchQuery(raw: string): string {
  const quoted = /"([^"]+)"/.exec(raw);
  if (quoted && quoted[1].trim()) {
    return quoted[1].trim();
  }

  const lowered = raw.toLowerCase();
  for (const pattern of SEARCH_PATTERNS) {
    const match = pattern.exec(lowered);
    if (match && match[1].trim()) return match[1].trim();
  }

  if (lowered.includes('timeout')) return 'timeout';
  return '';
}

export function parseQuestion(raw: string): ParsedQuestion {
  const text = normalizeQuestion(raw);
  return {
    raw,
    text,
    namespace: extractNamespace(text),
    hours: extractHours(text),
    podName: extractPodName(text),
    searchQuery: extractSearchQuery(raw),
  };
}
