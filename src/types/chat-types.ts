// ============================================================================
// chatdeck - Shared Types
// Projects, conversations and persisted preference state
// ============================================================================

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Logger interface for dependency injection
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

// ============================================================================
// Projects
// ============================================================================

/**
 * How a project path was recovered from its encoded storage name
 */
export type ResolutionSource = 'literal' | 'filesystem' | 'home' | 'unresolved';

export interface ResolvedProjectPath {
  /** Absolute path (a best-effort literal decode when nothing matched) */
  path: string;

  /** Whether the path exists as a directory */
  exists: boolean;

  source: ResolutionSource;
}

/**
 * A directory under the projects root grouping conversation files
 */
export interface Project {
  /** Encoded directory name, e.g. "-home-alice-my-app" */
  encodedName: string;

  /** Absolute path of the storage directory holding the transcripts */
  storageDir: string;

  /** Resolved working directory the conversations belong to */
  realPath: string;

  /** Name shown in the project list ("~/my-app", "/srv/app") */
  displayName: string;

  /** The resolved working directory no longer exists */
  missing: boolean;

  conversationCount: number;

  /** Newest transcript mtime in epoch milliseconds, 0 when empty */
  lastActivity: number;
}

export type SortMode = 'name' | 'chats' | 'recent';

export const SORT_MODES: readonly SortMode[] = ['name', 'chats', 'recent'];

export const SORT_LABELS: Record<SortMode, string> = {
  name: 'A-Z',
  chats: 'Most chats',
  recent: 'Recent',
};

// ============================================================================
// Conversations
// ============================================================================

export const EMPTY_SESSION_TEXT = '(empty session)';
export const RESUMED_SESSION_TEXT = '(resumed session)';

export type MessageRole = 'user' | 'assistant';

export interface ChatMessage {
  role: MessageRole;
  text: string;
  /** ISO timestamp as recorded, empty when absent */
  timestamp: string;
}

/**
 * Preview metadata for one transcript file
 */
export interface Conversation {
  /** File stem, used as the session id and summary cache key */
  id: string;

  filePath: string;

  /** Sibling directory with the same stem holding sub-agent data */
  sidecarDir: string;

  /** "YYYY-MM-DD HH:MM", empty when no timestamp was recorded */
  date: string;

  sizeBytes: number;

  /** Human size label ("512B", "12K", "3M") */
  size: string;

  /** First user message, or a placeholder when there is none */
  message: string;

  /** No user text and no assistant reply */
  trulyEmpty: boolean;

  /** First recorded timestamp, "0" when absent (sort key) */
  timestamp: string;
}

// ============================================================================
// Preferences
// ============================================================================

export interface Preferences {
  sort: SortMode;
  skipPermissions: boolean;
  aiSummaries: boolean;
}

export const DEFAULT_PREFERENCES: Preferences = {
  sort: 'name',
  skipPermissions: false,
  aiSummaries: false,
};

export function isSortMode(value: unknown): value is SortMode {
  return typeof value === 'string' && (SORT_MODES as readonly string[]).includes(value);
}

export function isPlaceholderMessage(message: string): boolean {
  return message === EMPTY_SESSION_TEXT || message === RESUMED_SESSION_TEXT;
}
