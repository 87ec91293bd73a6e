// ============================================================================
// chatdeck - JSON File Helpers
// ============================================================================

import { promises as fs } from 'fs';
import * as path from 'path';
import { isErrnoException } from './errors.js';

/**
 * Read and parse a JSON file. Missing files and unparseable content both
 * yield `undefined`; other I/O errors propagate.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch {
    return undefined;
  }
}

/**
 * Replace a JSON file as a whole: write a sibling temp file, then rename
 * it over the target.
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
  await fs.rename(tempPath, filePath);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
