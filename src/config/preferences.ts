/**
 * Preference Store for chatdeck
 *
 * Holds the sort order and the two toggles. Loaded once at startup and
 * written back as a whole file after every change.
 */

import {
  DEFAULT_PREFERENCES,
  SORT_MODES,
  isSortMode,
  noopLogger,
  type Logger,
  type Preferences,
  type SortMode,
} from '../types/chat-types.js';
import { isRecord, readJsonFile, writeJsonFile } from '../utils/json-file.js';

/**
 * Narrow persisted JSON to preferences, falling back per field
 */
export function parsePreferences(raw: unknown): Preferences {
  if (!isRecord(raw)) {
    return { ...DEFAULT_PREFERENCES };
  }

  const { sort, skipPermissions, aiSummaries } = raw;

  return {
    sort: isSortMode(sort) ? sort : DEFAULT_PREFERENCES.sort,
    skipPermissions: typeof skipPermissions === 'boolean'
      ? skipPermissions
      : DEFAULT_PREFERENCES.skipPermissions,
    aiSummaries: typeof aiSummaries === 'boolean'
      ? aiSummaries
      : DEFAULT_PREFERENCES.aiSummaries,
  };
}

export function nextSortMode(mode: SortMode): SortMode {
  const index = SORT_MODES.indexOf(mode);
  return SORT_MODES[(index + 1) % SORT_MODES.length];
}

export class PreferencesStore {
  private current: Preferences = { ...DEFAULT_PREFERENCES };

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = noopLogger
  ) {}

  async load(): Promise<Preferences> {
    this.current = parsePreferences(await readJsonFile(this.filePath));
    this.logger.debug('Preferences loaded', { ...this.current });
    return this.get();
  }

  get(): Preferences {
    return { ...this.current };
  }

  get sort(): SortMode {
    return this.current.sort;
  }

  get skipPermissions(): boolean {
    return this.current.skipPermissions;
  }

  get aiSummaries(): boolean {
    return this.current.aiSummaries;
  }

  async update(changes: Partial<Preferences>): Promise<Preferences> {
    this.current = { ...this.current, ...changes };
    await writeJsonFile(this.filePath, this.current);
    this.logger.debug('Preferences saved', { ...this.current });
    return this.get();
  }

  async cycleSort(): Promise<SortMode> {
    const { sort } = await this.update({ sort: nextSortMode(this.current.sort) });
    return sort;
  }

  async toggleSkipPermissions(): Promise<boolean> {
    const { skipPermissions } = await this.update({ skipPermissions: !this.current.skipPermissions });
    return skipPermissions;
  }

  async setSummaries(enabled: boolean): Promise<boolean> {
    const { aiSummaries } = await this.update({ aiSummaries: enabled });
    return aiSummaries;
  }

  async toggleSummaries(): Promise<boolean> {
    return this.setSummaries(!this.current.aiSummaries);
  }
}
