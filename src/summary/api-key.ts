// ============================================================================
// chatdeck - Summarization API Key Storage
// ============================================================================

import { promises as fs } from 'fs';
import * as path from 'path';
import { isErrnoException } from '../utils/errors.js';

export class ApiKeyStore {
  constructor(
    private readonly keyFile: string,
    private readonly envKey?: string
  ) {}

  get location(): string {
    return this.keyFile;
  }

  /**
   * The environment key wins over the key file; blank counts as absent
   */
  async load(): Promise<string | null> {
    if (this.envKey) {
      return this.envKey;
    }
    try {
      const key = (await fs.readFile(this.keyFile, 'utf-8')).trim();
      return key || null;
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  async save(key: string): Promise<void> {
    await fs.mkdir(path.dirname(this.keyFile), { recursive: true });
    await fs.writeFile(this.keyFile, `${key.trim()}\n`, { encoding: 'utf-8', mode: 0o600 });
  }
}
