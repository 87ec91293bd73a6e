// ============================================================================
// chatdeck - Gemini Summarizer
// ============================================================================

import { SummaryRequestError } from '../utils/errors.js';
import { isRecord } from '../utils/json-file.js';
import {
  DEFAULT_SUMMARY_ENDPOINT,
  DEFAULT_SUMMARY_MODEL,
  DEFAULT_SUMMARY_TIMEOUT_MS,
} from '../config/env-loader.js';

/**
 * Turns a conversation's opening message into a short label
 */
export interface Summarizer {
  /** Rejects with SummaryRequestError on any failure */
  summarize(message: string): Promise<string>;
}

export interface GeminiSummarizerOptions {
  apiKey: string;
  model?: string;
  endpoint?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export function buildSummaryPrompt(message: string): string {
  return `Summarize this chat message in 3-6 words. Just the topic, no fluff:\n\n${message}`;
}

/**
 * Text of the first candidate part, trimmed and unquoted
 */
export function extractSummaryText(body: unknown): string {
  const candidates = isRecord(body) ? body.candidates : undefined;
  const first: unknown = Array.isArray(candidates) ? candidates[0] : undefined;
  const content = isRecord(first) ? first.content : undefined;
  const parts = isRecord(content) ? content.parts : undefined;
  const part: unknown = Array.isArray(parts) ? parts[0] : undefined;
  const text = isRecord(part) ? part.text : undefined;

  if (typeof text !== 'string') {
    throw new SummaryRequestError('Malformed summary response');
  }

  const summary = text.trim().replace(/^"+|"+$/g, '').trim();
  if (!summary) {
    throw new SummaryRequestError('Empty summary response');
  }
  return summary;
}

export class GeminiSummarizer implements Summarizer {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GeminiSummarizerOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_SUMMARY_MODEL;
    this.endpoint = options.endpoint ?? DEFAULT_SUMMARY_ENDPOINT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SUMMARY_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get url(): string {
    return `${this.endpoint}/models/${encodeURIComponent(this.model)}:generateContent?key=${encodeURIComponent(this.apiKey)}`;
  }

  async summarize(message: string): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          contents: [{ parts: [{ text: buildSummaryPrompt(message) }] }],
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new SummaryRequestError('Summary request failed', undefined, { cause: error });
    }

    if (!response.ok) {
      throw new SummaryRequestError(`Summary request returned HTTP ${response.status}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new SummaryRequestError('Summary response is not JSON', response.status, { cause: error });
    }

    return extractSummaryText(body);
  }
}
