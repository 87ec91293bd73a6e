// ============================================================================
// chatdeck - JSONL Reader
// ============================================================================

import { promises as fs } from 'fs';
import * as readline from 'readline';
import { isRecord } from '../utils/json-file.js';

export interface ReadWindow {
  /** Byte offset to start from; a partial first line is skipped */
  start?: number;

  /** Stop once this many bytes of lines have been consumed */
  maxBytes: number;

  /** Called when reading stops at `maxBytes` before the end of the file */
  onTruncated?: () => void;
}

/**
 * Yield the JSON object on each line of a transcript within a byte window.
 * Blank lines, malformed JSON and non-object values are skipped.
 */
export async function* readJsonlRecords(
  filePath: string,
  window: ReadWindow
): AsyncGenerator<Record<string, unknown>> {
  const start = window.start ?? 0;
  // Opening first makes a missing file reject here rather than inside readline
  const handle = await fs.open(filePath, 'r');
  const stream = handle.createReadStream({ encoding: 'utf-8', start });
  const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });

  let bytesRead = 0;
  let skipPartial = start > 0;

  try {
    for await (const line of lines) {
      if (skipPartial) {
        skipPartial = false;
        continue;
      }

      bytesRead += Buffer.byteLength(line, 'utf-8') + 1;
      if (bytesRead > window.maxBytes) {
        window.onTruncated?.();
        break;
      }

      const trimmed = line.trim();
      if (!trimmed) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        continue;
      }
      if (isRecord(parsed)) {
        yield parsed;
      }
    }
  } finally {
    lines.close();
    stream.destroy();
  }
}
