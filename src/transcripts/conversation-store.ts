// ============================================================================
// chatdeck - Conversation Store
// Lists, deletes and purges the transcripts of one project
// ============================================================================

import { promises as fs, type Dirent } from 'fs';
import * as path from 'path';
import { noopLogger, type Conversation, type Logger } from '../types/chat-types.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { errorMessage } from '../utils/errors.js';
import { TRANSCRIPT_EXTENSION } from '../projects/project-scanner.js';
import { parseConversation } from './transcript-parser.js';

const PARSE_CONCURRENCY = 8;

export interface DeletionFailure {
  conversation: Conversation;
  error: string;
}

export interface DeletionReport {
  deleted: Conversation[];
  failed: DeletionFailure[];
}

/**
 * Conversations with no user text and no assistant reply
 */
export function emptyConversations(conversations: readonly Conversation[]): Conversation[] {
  return conversations.filter((conversation) => conversation.trulyEmpty);
}

export function totalSize(conversations: readonly Conversation[]): number {
  return conversations.reduce((sum, conversation) => sum + conversation.sizeBytes, 0);
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

export class ConversationStore {
  constructor(private readonly logger: Logger = noopLogger) {}

  /**
   * Parse every transcript in a storage directory, newest first.
   * Files that cannot be parsed are left out.
   */
  async list(storageDir: string): Promise<Conversation[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(storageDir, { withFileTypes: true });
    } catch (error) {
      this.logger.warn('Cannot read project directory', { storageDir, error: errorMessage(error) });
      return [];
    }

    const files = entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(TRANSCRIPT_EXTENSION))
      .map((entry) => path.join(storageDir, entry.name));

    const results = await mapWithConcurrency(files, PARSE_CONCURRENCY, parseConversation);

    const conversations: Conversation[] = [];
    results.forEach((result, index) => {
      if (result.status === 'fulfilled' && result.value) {
        conversations.push(result.value);
      } else {
        this.logger.debug('Skipping unparseable transcript', { file: files[index] });
      }
    });

    return conversations.sort((a, b) =>
      a.timestamp < b.timestamp ? 1 : a.timestamp > b.timestamp ? -1 : 0
    );
  }

  /**
   * Delete transcripts and their sidecar directories. Each failure is
   * recorded and the remaining deletions still run.
   */
  async delete(conversations: readonly Conversation[]): Promise<DeletionReport> {
    const report: DeletionReport = { deleted: [], failed: [] };

    for (const conversation of conversations) {
      try {
        await fs.unlink(conversation.filePath);
        report.deleted.push(conversation);
        this.logger.info('Deleted conversation', { id: conversation.id });
      } catch (error) {
        report.failed.push({ conversation, error: errorMessage(error) });
        this.logger.warn('Failed to delete conversation', {
          id: conversation.id,
          error: errorMessage(error),
        });
      }

      try {
        if (await isDirectory(conversation.sidecarDir)) {
          await fs.rm(conversation.sidecarDir, { recursive: true, force: true });
        }
      } catch (error) {
        this.logger.warn('Failed to remove sidecar directory', {
          dir: conversation.sidecarDir,
          error: errorMessage(error),
        });
      }
    }

    return report;
  }

  /**
   * Delete every truly empty conversation, leaving the rest untouched
   */
  async purgeEmpty(conversations: readonly Conversation[]): Promise<DeletionReport> {
    return this.delete(emptyConversations(conversations));
  }
}
