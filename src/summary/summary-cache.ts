// ============================================================================
// chatdeck - Summary Cache
// Conversation id → short summary, persisted as one flat JSON object
// ============================================================================

import { noopLogger, type Logger } from '../types/chat-types.js';
import { isRecord, readJsonFile, writeJsonFile } from '../utils/json-file.js';

/**
 * Keep only string values of a persisted cache object
 */
export function parseSummaryEntries(raw: unknown): Map<string, string> {
  const entries = new Map<string, string>();
  if (!isRecord(raw)) {
    return entries;
  }
  for (const [id, summary] of Object.entries(raw)) {
    if (typeof summary === 'string') {
      entries.set(id, summary);
    }
  }
  return entries;
}

/**
 * Entries are never invalidated. Writes merge with whatever is on disk and
 * replace the file as a whole, so a failed or interrupted batch leaves the
 * previously cached entries intact.
 */
export class SummaryCache {
  private entries = new Map<string, string>();

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = noopLogger
  ) {}

  async load(): Promise<void> {
    this.entries = parseSummaryEntries(await readJsonFile(this.filePath));
    this.logger.debug('Summary cache loaded', { entries: this.entries.size });
  }

  get(id: string): string | undefined {
    return this.entries.get(id);
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Merge new summaries into the cache and flush it once
   */
  async merge(summaries: ReadonlyMap<string, string>): Promise<void> {
    const onDisk = parseSummaryEntries(await readJsonFile(this.filePath));
    const merged = new Map<string, string>([...onDisk, ...this.entries, ...summaries]);

    await writeJsonFile(this.filePath, Object.fromEntries(merged));
    this.entries = merged;

    this.logger.info('Summary cache saved', {
      added: summaries.size,
      entries: merged.size,
    });
  }
}
