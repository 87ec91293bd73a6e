// ============================================================================
// chatdeck - Summary Generator
// Fills cache misses with a bounded batch of summarization requests
// ============================================================================

import {
  isPlaceholderMessage,
  noopLogger,
  type Conversation,
  type Logger,
} from '../types/chat-types.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { errorMessage } from '../utils/errors.js';
import { DEFAULT_SUMMARY_CONCURRENCY } from '../config/env-loader.js';
import type { Summarizer } from './gemini-client.js';
import type { SummaryCache } from './summary-cache.js';

export interface SummaryRequest {
  id: string;
  message: string;
}

export interface GenerationReport {
  requested: number;
  generated: number;
  failed: number;
}

export type ProgressListener = (completed: number, total: number) => void;

export interface SummaryGeneratorOptions {
  concurrency?: number;
  logger?: Logger;
}

export class SummaryGenerator {
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(
    private readonly summarizer: Summarizer,
    private readonly cache: SummaryCache,
    options: SummaryGeneratorOptions = {}
  ) {
    this.concurrency = options.concurrency ?? DEFAULT_SUMMARY_CONCURRENCY;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Conversations with real opening text and no cached summary, in order
   */
  pending(conversations: readonly Conversation[]): SummaryRequest[] {
    const seen = new Set<string>();
    const requests: SummaryRequest[] = [];
    for (const conversation of conversations) {
      if (this.cache.has(conversation.id) || seen.has(conversation.id)) continue;
      if (isPlaceholderMessage(conversation.message)) continue;
      seen.add(conversation.id);
      requests.push({ id: conversation.id, message: conversation.message });
    }
    return requests;
  }

  /**
   * Summarize every pending conversation. A failed item keeps showing its
   * raw text; results are merged into the cache once the batch is done.
   */
  async generateMissing(
    conversations: readonly Conversation[],
    onProgress?: ProgressListener
  ): Promise<GenerationReport> {
    const requests = this.pending(conversations);
    if (requests.length === 0) {
      return { requested: 0, generated: 0, failed: 0 };
    }

    onProgress?.(0, requests.length);

    const results = await mapWithConcurrency(
      requests,
      this.concurrency,
      (request) => this.summarizer.summarize(request.message),
      onProgress
    );

    const summaries = new Map<string, string>();
    let failed = 0;
    results.forEach((result, index) => {
      const { id } = requests[index];
      if (result.status === 'fulfilled') {
        summaries.set(id, result.value);
      } else {
        failed++;
        this.logger.debug('Summary failed', { id, error: errorMessage(result.reason) });
      }
    });

    if (summaries.size > 0) {
      await this.cache.merge(summaries);
    }

    this.logger.info('Summary batch finished', {
      requested: requests.length,
      generated: summaries.size,
      failed,
    });

    return { requested: requests.length, generated: summaries.size, failed };
  }
}
