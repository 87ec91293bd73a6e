// ============================================================================
// chatdeck - Browser Context
// The state object every view receives; nothing here is a module singleton
// ============================================================================

import type { EnvConfig } from '../config/env-loader.js';
import type { PreferencesStore } from '../config/preferences.js';
import type { ProjectPathResolver } from '../projects/path-resolver.js';
import type { ProjectScanner } from '../projects/project-scanner.js';
import type { ApiKeyStore } from '../summary/api-key.js';
import type { Summarizer } from '../summary/gemini-client.js';
import type { SummaryCache } from '../summary/summary-cache.js';
import type { ConversationStore } from '../transcripts/conversation-store.js';
import type { Logger, Project } from '../types/chat-types.js';
import type { FuzzyFinder } from '../ui/fzf.js';
import type { Prompter, Screen } from '../ui/prompts.js';
import type { ProgressFactory } from '../ui/ui.js';
import type { LaunchRequest, Launcher } from './launcher.js';

export interface BrowserContext {
  config: EnvConfig;
  logger: Logger;

  preferences: PreferencesStore;
  summaries: SummaryCache;
  apiKeys: ApiKeyStore;

  resolver: ProjectPathResolver;
  scanner: ProjectScanner;
  conversations: ConversationStore;
  launcher: Launcher;

  finder: FuzzyFinder;
  prompter: Prompter;
  screen: Screen;
  progress: ProgressFactory;

  createSummarizer(apiKey: string): Summarizer;

  /** Finder preview command for a map file listing one transcript per line */
  previewCommand(mapFile: string): string;

  openFolder(directory: string): void;

  /** Directory the browser was started from */
  cwd: string;
}

/**
 * What a view asks the browser to do next
 */
export type Transition =
  | { kind: 'projects' }
  | { kind: 'chats'; project: Project }
  | { kind: 'launch'; request: LaunchRequest }
  | { kind: 'exit' };

export const PROJECT_VIEW_EXPECT_KEYS = ['tab', 'ctrl-n', 'ctrl-f', 'ctrl-p', 'ctrl-e'];

export const CHAT_VIEW_EXPECT_KEYS = ['bs', 'ctrl-d', 'ctrl-x', 'ctrl-p', 'ctrl-s', 'ctrl-n'];
