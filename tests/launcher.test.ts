// ============================================================================
// Launcher and Preview Command Tests
// ============================================================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import {
  Launcher,
  SKIP_PERMISSIONS_FLAG,
  buildChatArgs,
  fileManagerCommand,
  resolveLaunchDirectory,
} from '../src/browser/launcher.js';
import {
  buildPreviewCommand,
  lookupMapEntry,
  previewColumns,
  shellQuote,
} from '../src/browser/preview-command.js';

describe('buildChatArgs', () => {
  it('should build resume and skip-permissions arguments', () => {
    expect(buildChatArgs({ skipPermissions: false })).toEqual([]);
    expect(buildChatArgs({ resumeId: 'abc', skipPermissions: false })).toEqual(['--resume', 'abc']);
    expect(buildChatArgs({ resumeId: 'abc', skipPermissions: true })).toEqual(['--resume', 'abc', SKIP_PERMISSIONS_FLAG]);
  });
});

describe('fileManagerCommand', () => {
  it('should pick the platform file manager', () => {
    expect(fileManagerCommand('C:\\work', 'win32', false)).toEqual({ command: 'explorer', args: ['C:\\work'] });
    expect(fileManagerCommand('/work', 'darwin', false)).toEqual({ command: 'open', args: ['/work'] });
    expect(fileManagerCommand('/work', 'linux', false)).toEqual({ command: 'xdg-open', args: ['/work'] });
  });
});

describe('Launcher', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'chatdeck-launch-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  async function transcriptWithCwd(cwd: string): Promise<string> {
    const filePath = path.join(testDir, 'session.jsonl');
    await fs.writeFile(filePath, JSON.stringify({ type: 'user', cwd, message: { content: 'hi' } }) + '\n');
    return filePath;
  }

  it('should prefer the working directory recorded in the transcript', async () => {
    const recorded = path.join(testDir, 'recorded');
    await fs.mkdir(recorded);
    const sessionFile = await transcriptWithCwd(recorded);

    expect(await resolveLaunchDirectory('/project/path', sessionFile)).toBe(recorded);
  });

  it('should keep the recorded directory even when it no longer exists', async () => {
    const moved = path.join(testDir, 'moved-app');
    const sessionFile = await transcriptWithCwd(moved);

    expect(await resolveLaunchDirectory('/decoded/moved/app', sessionFile)).toBe(moved);
  });

  it('should fall back to the project path when no directory is recorded', async () => {
    const sessionFile = path.join(testDir, 'nocwd.jsonl');
    await fs.writeFile(sessionFile, JSON.stringify({ type: 'user', message: { content: 'hi' } }) + '\n');

    expect(await resolveLaunchDirectory('/project/path', sessionFile)).toBe('/project/path');
    expect(await resolveLaunchDirectory('/project/path')).toBe('/project/path');
  });

  it('should recreate a missing recorded directory on hand-off', async () => {
    const moved = path.join(testDir, 'moved-app');
    const sessionFile = await transcriptWithCwd(moved);
    const resumeFile = path.join(testDir, 'resume.txt');
    const launcher = new Launcher({ chatCommand: 'claude', resumeFile, allowSkipPermissions: true });

    const request = await launcher.request('/decoded/moved/app', { resumeId: 'session', skipPermissions: false }, sessionFile);
    await launcher.handOff(request);

    expect(request.directory).toBe(moved);
    expect((await fs.stat(moved)).isDirectory()).toBe(true);
    expect(await fs.readFile(resumeFile, 'utf-8')).toBe(`${moved}\nclaude --resume session`);
  });

  it('should drop skip-permissions when it is not allowed', async () => {
    const launcher = new Launcher({ chatCommand: 'claude', allowSkipPermissions: false });

    const request = await launcher.request('/work', { resumeId: 'abc', skipPermissions: true });

    expect(request).toEqual({ directory: '/work', command: 'claude', args: ['--resume', 'abc'] });
  });

  it('should write the hand-off to the resume file and create the directory', async () => {
    const resumeFile = path.join(testDir, 'resume.txt');
    const directory = path.join(testDir, 'new', 'dir');
    const launcher = new Launcher({ chatCommand: 'claude', resumeFile, allowSkipPermissions: true });

    const request = await launcher.request(directory, { resumeId: 'abc', skipPermissions: true });
    const code = await launcher.handOff(request);

    expect(code).toBe(0);
    expect(await fs.readFile(resumeFile, 'utf-8')).toBe(
      `${directory}\nclaude --resume abc --dangerously-skip-permissions`
    );
    expect((await fs.stat(directory)).isDirectory()).toBe(true);
  });
});

describe('preview command', () => {
  it('should quote for POSIX shells', () => {
    expect(shellQuote('a"b$c', 'linux')).toBe('"a\\"b\\$c"');
    expect(shellQuote('C:\\x y', 'win32')).toBe('"C:\\x y"');
  });

  it('should invoke the running program with the row placeholder', () => {
    const command = buildPreviewCommand('/tmp/map', {
      execPath: '/usr/bin/node',
      execArgv: ['--import', 'tsx'],
      script: '/opt/chatdeck/index.js',
      platform: 'linux',
    });

    expect(command).toBe('"/usr/bin/node" "--import" "tsx" "/opt/chatdeck/index.js" --preview-idx {1} "/tmp/map"');
  });

  it('should prefer the preview width the finder reports', () => {
    expect(previewColumns({ FZF_PREVIEW_COLUMNS: '55' })).toBe(55);
  });

  describe('lookupMapEntry', () => {
    let testDir: string;
    let mapFile: string;

    beforeEach(async () => {
      testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'chatdeck-map-'));
      mapFile = path.join(testDir, 'map');
      await fs.writeFile(mapFile, '/store/a.jsonl\n/store/b.jsonl\n');
    });

    afterEach(async () => {
      await fs.rm(testDir, { recursive: true, force: true });
    });

    it('should return the path on the given line', async () => {
      expect(await lookupMapEntry(mapFile, 0)).toBe('/store/a.jsonl');
      expect(await lookupMapEntry(mapFile, 1)).toBe('/store/b.jsonl');
    });

    it('should return null out of range', async () => {
      expect(await lookupMapEntry(mapFile, 2)).toBeNull();
      expect(await lookupMapEntry(mapFile, 9)).toBeNull();
      expect(await lookupMapEntry(mapFile, -1)).toBeNull();
    });
  });
});
