// ============================================================================
// ProjectScanner Tests
// ============================================================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { ProjectScanner, sortProjects } from '../src/projects/project-scanner.js';
import { ProjectPathResolver, encodeName } from '../src/projects/path-resolver.js';
import type { Project } from '../src/types/chat-types.js';

function makeProject(displayName: string, conversationCount: number, lastActivity: number): Project {
  return {
    encodedName: encodeName(displayName),
    storageDir: `/store/${encodeName(displayName)}`,
    realPath: displayName,
    displayName,
    missing: false,
    conversationCount,
    lastActivity,
  };
}

describe('sortProjects', () => {
  const projects = [
    makeProject('~/zeta', 3, 300),
    makeProject('~/Alpha', 12, 100),
    makeProject('~/beta', 12, 200),
  ];

  it('should sort by name case-insensitively', () => {
    expect(sortProjects(projects, 'name').map((p) => p.displayName)).toEqual(['~/Alpha', '~/beta', '~/zeta']);
  });

  it('should sort by chat count, breaking ties by name', () => {
    expect(sortProjects(projects, 'chats').map((p) => p.displayName)).toEqual(['~/Alpha', '~/beta', '~/zeta']);
  });

  it('should sort by most recent activity', () => {
    expect(sortProjects(projects, 'recent').map((p) => p.displayName)).toEqual(['~/zeta', '~/beta', '~/Alpha']);
  });

  it('should not mutate its input', () => {
    sortProjects(projects, 'recent');
    expect(projects.map((p) => p.displayName)).toEqual(['~/zeta', '~/Alpha', '~/beta']);
  });
});

describe('ProjectScanner', () => {
  let testDir: string;
  let projectsDir: string;
  let scanner: ProjectScanner;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'chatdeckscan'));
    projectsDir = path.join(testDir, 'projects');
    await fs.mkdir(projectsDir, { recursive: true });
    scanner = new ProjectScanner(projectsDir, new ProjectPathResolver({ homeDir: testDir }));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('should report whether the projects directory exists', async () => {
    expect(await scanner.exists()).toBe(true);
    const missing = new ProjectScanner(path.join(testDir, 'nowhere'));
    expect(await missing.exists()).toBe(false);
  });

  it('should list projects with counts and resolved paths', async () => {
    const workDir = path.join(testDir, 'ws', 'my-app');
    await fs.mkdir(workDir, { recursive: true });
    const storage = await scanner.ensureProjectEntry(workDir);
    await fs.writeFile(path.join(storage, 'a.jsonl'), '{}\n');
    await fs.writeFile(path.join(storage, 'b.jsonl'), '{}\n');
    await fs.writeFile(path.join(storage, 'notes.txt'), 'ignored');
    await fs.utimes(path.join(storage, 'b.jsonl'), 1_700_000_000, 1_700_000_000);
    await fs.utimes(path.join(storage, 'a.jsonl'), 1_600_000_000, 1_600_000_000);

    const projects = await scanner.listProjects();

    expect(projects).toHaveLength(1);
    expect(projects[0]).toEqual({
      encodedName: encodeName(workDir),
      storageDir: storage,
      realPath: workDir,
      displayName: '~/ws/my-app',
      missing: false,
      conversationCount: 2,
      lastActivity: 1_700_000_000_000,
    });
  });

  it('should flag projects whose directory no longer exists', async () => {
    await fs.mkdir(path.join(projectsDir, '-gone-zz-place'));

    const [project] = await scanner.listProjects();

    expect(project.missing).toBe(true);
    expect(project.realPath).toBe('/gone/zz/place');
    expect(project.conversationCount).toBe(0);
    expect(project.lastActivity).toBe(0);
  });

  it('should skip plain files in the projects directory', async () => {
    await fs.writeFile(path.join(projectsDir, 'stray.txt'), 'x');
    expect(await scanner.listProjects()).toEqual([]);
  });

  it('should derive the storage directory from a working directory', () => {
    expect(scanner.storageDirFor('/srv/my_app')).toBe(path.join(projectsDir, '-srv-my-app'));
  });

  it('should find the most recently modified transcript', async () => {
    const storage = await scanner.ensureProjectEntry('/srv/app');
    await fs.writeFile(path.join(storage, 'old.jsonl'), '{}\n');
    await fs.writeFile(path.join(storage, 'new.jsonl'), '{}\n');
    await fs.writeFile(path.join(storage, 'notes.txt'), 'ignored');
    await fs.utimes(path.join(storage, 'old.jsonl'), 1_600_000_000, 1_600_000_000);
    await fs.utimes(path.join(storage, 'new.jsonl'), 1_700_000_000, 1_700_000_000);
    await fs.utimes(path.join(storage, 'notes.txt'), 1_800_000_000, 1_800_000_000);
    const [project] = await scanner.listProjects();

    expect(await scanner.newestTranscript(project)).toBe(path.join(storage, 'new.jsonl'));
  });

  it('should report no transcript for an empty project', async () => {
    await scanner.ensureProjectEntry('/srv/empty');
    const [project] = await scanner.listProjects();

    expect(await scanner.newestTranscript(project)).toBeNull();
  });

  it('should remove a project storage directory', async () => {
    const storage = await scanner.ensureProjectEntry('/srv/empty');
    const [project] = await scanner.listProjects();

    await scanner.removeProject(project);

    await expect(fs.access(storage)).rejects.toThrow();
    expect(await scanner.listProjects()).toEqual([]);
  });
});
