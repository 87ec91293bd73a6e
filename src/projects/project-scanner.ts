// ============================================================================
// chatdeck - Project Scanner
// ============================================================================

import { promises as fs, type Dirent } from 'fs';
import * as path from 'path';
import { noopLogger, type Logger, type Project, type SortMode } from '../types/chat-types.js';
import { errorMessage } from '../utils/errors.js';
import { encodeName, ProjectPathResolver } from './path-resolver.js';

export const TRANSCRIPT_EXTENSION = '.jsonl';

interface TranscriptStats {
  count: number;
  newest: number;
}

export class ProjectScanner {
  constructor(
    private readonly projectsDir: string,
    private readonly resolver: ProjectPathResolver = new ProjectPathResolver(),
    private readonly logger: Logger = noopLogger
  ) {}

  async exists(): Promise<boolean> {
    try {
      return (await fs.stat(this.projectsDir)).isDirectory();
    } catch {
      return false;
    }
  }

  /**
   * List every project directory. Directories that cannot be read are
   * skipped; unresolvable paths are kept and flagged as missing.
   */
  async listProjects(): Promise<Project[]> {
    const entries = await fs.readdir(this.projectsDir, { withFileTypes: true });
    const projects: Project[] = [];

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;

      const storageDir = path.join(this.projectsDir, entry.name);
      const stats = await this.countTranscripts(storageDir);
      if (!stats) continue;

      const resolved = await this.resolver.resolve(entry.name);
      projects.push({
        encodedName: entry.name,
        storageDir,
        realPath: resolved.path,
        displayName: this.resolver.displayName(resolved.path),
        missing: !resolved.exists,
        conversationCount: stats.count,
        lastActivity: stats.newest,
      });
    }

    this.logger.debug('Projects scanned', { count: projects.length });
    return projects;
  }

  /**
   * Storage directory the chat CLI would use for a working directory
   */
  storageDirFor(workingDir: string): string {
    return path.join(this.projectsDir, encodeName(workingDir));
  }

  /**
   * Create the storage entry for a folder so it is listed before its first chat
   */
  async ensureProjectEntry(workingDir: string): Promise<string> {
    const storageDir = this.storageDirFor(workingDir);
    await fs.mkdir(storageDir, { recursive: true });
    return storageDir;
  }

  /**
   * Most recently modified transcript of a project, null when it has none
   */
  async newestTranscript(project: Project): Promise<string | null> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(project.storageDir, { withFileTypes: true });
    } catch (error) {
      this.logger.warn('Cannot read project directory', {
        storageDir: project.storageDir,
        error: errorMessage(error),
      });
      return null;
    }

    let newest: string | null = null;
    let newestTime = -1;
    for (const entry of entries) {
      if (!entry.isFile() || !entry.name.endsWith(TRANSCRIPT_EXTENSION)) continue;
      const filePath = path.join(project.storageDir, entry.name);
      try {
        const { mtimeMs } = await fs.stat(filePath);
        if (mtimeMs > newestTime) {
          newest = filePath;
          newestTime = mtimeMs;
        }
      } catch (error) {
        this.logger.debug('Transcript vanished during scan', { file: entry.name, error: errorMessage(error) });
      }
    }
    return newest;
  }

  /**
   * Remove a project's storage directory and everything in it
   */
  async removeProject(project: Project): Promise<void> {
    await fs.rm(project.storageDir, { recursive: true, force: true });
    this.logger.info('Removed project storage', { storageDir: project.storageDir });
  }

  private async countTranscripts(storageDir: string): Promise<TranscriptStats | null> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(storageDir, { withFileTypes: true });
    } catch (error) {
      this.logger.warn('Skipping unreadable project directory', {
        storageDir,
        error: errorMessage(error),
      });
      return null;
    }

    let count = 0;
    let newest = 0;
    for (const entry of entries) {
      if (!entry.isFile() || !entry.name.endsWith(TRANSCRIPT_EXTENSION)) continue;
      count++;
      try {
        const stat = await fs.stat(path.join(storageDir, entry.name));
        newest = Math.max(newest, stat.mtimeMs);
      } catch (error) {
        // Removed between readdir and stat
        this.logger.debug('Transcript vanished during scan', { file: entry.name, error: errorMessage(error) });
      }
    }

    return { count, newest };
  }
}

/**
 * Order projects for display without mutating the input
 */
export function sortProjects(projects: readonly Project[], mode: SortMode): Project[] {
  const byName = (a: Project, b: Project): number => {
    const left = a.displayName.toLowerCase();
    const right = b.displayName.toLowerCase();
    return left < right ? -1 : left > right ? 1 : 0;
  };

  const sorted = [...projects];
  switch (mode) {
    case 'name':
      return sorted.sort(byName);
    case 'chats':
      return sorted.sort((a, b) => b.conversationCount - a.conversationCount || byName(a, b));
    case 'recent':
      return sorted.sort((a, b) => b.lastActivity - a.lastActivity);
  }
}
