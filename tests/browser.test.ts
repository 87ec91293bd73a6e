// ============================================================================
// Browser Flow Tests
// Drives the project and chat views with a scripted finder and prompter
// ============================================================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { stripVTControlCharacters } from 'util';
import path from 'path';
import os from 'os';
import { Browser } from '../src/browser/browser.js';
import type { BrowserContext } from '../src/browser/context.js';
import { Launcher } from '../src/browser/launcher.js';
import { loadEnvConfig } from '../src/config/env-loader.js';
import { PreferencesStore } from '../src/config/preferences.js';
import { ProjectPathResolver } from '../src/projects/path-resolver.js';
import { ProjectScanner } from '../src/projects/project-scanner.js';
import { ApiKeyStore } from '../src/summary/api-key.js';
import { SummaryCache } from '../src/summary/summary-cache.js';
import { ConversationStore } from '../src/transcripts/conversation-store.js';
import type { FinderOptions, FinderResult, FuzzyFinder } from '../src/ui/fzf.js';
import type { Prompter, Screen } from '../src/ui/prompts.js';
import { silentProgress } from '../src/ui/ui.js';
import { noopLogger } from '../src/types/chat-types.js';

type FinderStep = (lines: string[]) => FinderResult;

class ScriptedFinder implements FuzzyFinder {
  readonly calls: Array<{ lines: string[]; options: FinderOptions }> = [];

  constructor(private readonly steps: FinderStep[]) {}

  async select(lines: readonly string[], options: FinderOptions): Promise<FinderResult> {
    const plain = lines.map((line) => stripVTControlCharacters(line));
    this.calls.push({ lines: plain, options });
    const step = this.steps.shift();
    if (!step) {
      throw new Error('Finder called more often than scripted');
    }
    return step([...lines]);
  }
}

class ScriptedPrompter implements Prompter {
  pauses = 0;

  constructor(private readonly answers: string[] = []) {}

  async ask(): Promise<string> {
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error('Prompter asked more often than scripted');
    }
    return answer;
  }

  async confirm(): Promise<boolean> {
    return (await this.ask()) === 'y';
  }

  async pause(): Promise<void> {
    this.pauses++;
  }
}

class RecordingScreen implements Screen {
  readonly output: string[] = [];

  clear(): void {}

  print(text: string = ''): void {
    this.output.push(stripVTControlCharacters(text));
  }

  columns(): number {
    return 120;
  }
}

function press(key: string, match?: string): FinderStep {
  return (lines) => {
    const line = match === undefined
      ? lines[0]
      : lines.find((candidate) => stripVTControlCharacters(candidate).includes(match));
    return { key, selections: line === undefined ? [] : [line] };
  };
}

function userRecord(text: string, timestamp: string, cwd: string): string {
  return JSON.stringify({ type: 'user', timestamp, cwd, message: { content: text } }) + '\n';
}

describe('Browser', () => {
  let testDir: string;
  let workDir: string;
  let storageDir: string;
  let emptyStorageDir: string;
  let scanner: ProjectScanner;
  let screen: RecordingScreen;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'chatdeckbrowser'));
    const config = loadEnvConfig({}, testDir, 'linux');
    scanner = new ProjectScanner(config.projectsDir, new ProjectPathResolver({ homeDir: testDir }));
    screen = new RecordingScreen();

    workDir = path.join(testDir, 'ws', 'app');
    await fs.mkdir(workDir, { recursive: true });
    storageDir = await scanner.ensureProjectEntry(workDir);
    await fs.writeFile(path.join(storageDir, 'first.jsonl'), userRecord('Fix login', '2024-01-02T10:00:00Z', workDir));
    await fs.writeFile(path.join(storageDir, 'second.jsonl'), userRecord('Add tests', '2024-01-01T10:00:00Z', workDir));

    const emptyDir = path.join(testDir, 'ws', 'empty');
    await fs.mkdir(emptyDir, { recursive: true });
    emptyStorageDir = await scanner.ensureProjectEntry(emptyDir);
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  function createContext(finder: FuzzyFinder, prompter: Prompter): BrowserContext {
    const config = loadEnvConfig({}, testDir, 'linux');
    const resolver = new ProjectPathResolver({ homeDir: testDir });
    return {
      config,
      logger: noopLogger,
      preferences: new PreferencesStore(config.preferencesFile),
      summaries: new SummaryCache(config.summaryCacheFile),
      apiKeys: new ApiKeyStore(config.keyFile),
      resolver,
      scanner,
      conversations: new ConversationStore(),
      launcher: new Launcher({ chatCommand: 'claude', allowSkipPermissions: true }),
      finder,
      prompter,
      screen,
      progress: silentProgress,
      createSummarizer: () => ({
        summarize: async (message: string) => `About ${message}`,
      }),
      previewCommand: (mapFile) => `preview ${mapFile}`,
      openFolder: () => {},
      cwd: testDir,
    };
  }

  async function runBrowser(steps: FinderStep[], answers: string[] = []) {
    const finder = new ScriptedFinder(steps);
    const prompter = new ScriptedPrompter(answers);
    const ctx = createContext(finder, prompter);
    const browser = new Browser(ctx);
    await browser.load();
    const request = await browser.run();
    return { request, finder, prompter, ctx };
  }

  it('should resume the chosen conversation in its recorded directory', async () => {
    const { request, finder } = await runBrowser([
      press('', 'ws/app'),
      press('', 'Fix login'),
    ]);

    expect(request).toEqual({ directory: workDir, command: 'claude', args: ['--resume', 'first'] });
    expect(finder.calls[1].lines).toHaveLength(2);
    expect(finder.calls[1].lines[0]).toContain('Fix login');
    expect(finder.calls[1].options.multi).toBe(true);
  });

  it('should persist the sort order and quit on escape', async () => {
    const { request, finder, ctx } = await runBrowser([
      press('tab'),
      press('esc'),
    ]);

    expect(request).toBeNull();
    expect(stripVTControlCharacters(finder.calls[1].options.header)).toContain('Most chats');

    const reloaded = new PreferencesStore(ctx.config.preferencesFile);
    expect((await reloaded.load()).sort).toBe('chats');
  });

  it('should delete the selected conversation after confirmation', async () => {
    const { request, finder, prompter } = await runBrowser(
      [
        press('', 'ws/app'),
        press('ctrl-x', 'Add tests'),
        press('esc'),
      ],
      ['y']
    );

    expect(request).toBeNull();
    await expect(fs.access(path.join(storageDir, 'second.jsonl'))).rejects.toThrow();
    expect(finder.calls[2].lines).toHaveLength(1);
    expect(screen.output).toContain('  Deleted 1 conversation.');
    expect(prompter.pauses).toBe(1);
  });

  it('should keep empty sessions when the purge is declined', async () => {
    await fs.writeFile(path.join(storageDir, 'blank.jsonl'), '');

    const { request, finder } = await runBrowser(
      [
        press('', 'ws/app'),
        press('ctrl-d'),
        press('esc'),
      ],
      ['n']
    );

    expect(request).toBeNull();
    expect(screen.output).toContain('  Cancelled.');
    await expect(fs.access(path.join(storageDir, 'blank.jsonl'))).resolves.toBeUndefined();
    expect(finder.calls[2].lines).toHaveLength(3);
  });

  it('should turn summaries back off when no key is given', async () => {
    const { ctx } = await runBrowser(
      [
        press('', 'ws/app'),
        press('ctrl-s'),
        press('esc'),
      ],
      ['']
    );

    expect(ctx.preferences.aiSummaries).toBe(false);
    expect(await ctx.apiKeys.load()).toBeNull();
  });

  it('should store a pasted key and show generated summaries', async () => {
    const { finder, ctx } = await runBrowser(
      [
        press('', 'ws/app'),
        press('ctrl-s'),
        press('esc'),
      ],
      ['test-secret']
    );

    expect(ctx.preferences.aiSummaries).toBe(true);
    expect(await ctx.apiKeys.load()).toBe('test-secret');
    expect(finder.calls[2].lines[0]).toContain('About Fix login');
    expect(finder.calls[2].lines[1]).toContain('About Add tests');
    expect(ctx.summaries.get('first')).toBe('About Fix login');
  });

  it('should offer to remove a project without conversations', async () => {
    const { finder } = await runBrowser(
      [
        press('', 'ws/empty'),
        press('esc'),
      ],
      ['y']
    );

    await expect(fs.access(emptyStorageDir)).rejects.toThrow();
    expect(screen.output).toContain('  Deleted folder.');
    expect(finder.calls[1].lines).toHaveLength(1);
  });

  it('should start a new session in the highlighted project', async () => {
    const { request } = await runBrowser([
      press('ctrl-p'),
      press('ctrl-n', 'ws/app'),
    ]);

    expect(request).toEqual({ directory: workDir, command: 'claude', args: ['--dangerously-skip-permissions'] });
  });

  describe('with a project whose folder was renamed', () => {
    let movedDir: string;

    beforeEach(async () => {
      movedDir = path.join(testDir, 'moved-app');
      const movedStorage = await scanner.ensureProjectEntry(movedDir);
      await fs.writeFile(path.join(movedStorage, 'old.jsonl'), userRecord('Old work', '2023-06-01T10:00:00Z', movedDir));
    });

    it('should resume in the recorded directory rather than the decoded path', async () => {
      const { request } = await runBrowser([
        press('', 'moved'),
        press('', 'Old work'),
      ]);

      expect(request).toEqual({ directory: movedDir, command: 'claude', args: ['--resume', 'old'] });
    });

    it('should start a new session from the project list in the recorded directory', async () => {
      const { request } = await runBrowser([press('ctrl-n', 'moved')]);

      expect(request).toEqual({ directory: movedDir, command: 'claude', args: [] });
    });

    it('should start a new session from the chat list in the recorded directory', async () => {
      const { request } = await runBrowser([
        press('', 'moved'),
        press('ctrl-n'),
      ]);

      expect(request).toEqual({ directory: movedDir, command: 'claude', args: [] });
    });
  });

  it('should create a new folder and start a session there', async () => {
    const { request } = await runBrowser([press('ctrl-f')], ['fresh']);

    const folder = path.join(testDir, 'fresh');
    expect(request).toEqual({ directory: folder, command: 'claude', args: [] });
    expect((await fs.stat(folder)).isDirectory()).toBe(true);
    expect((await fs.stat(scanner.storageDirFor(folder))).isDirectory()).toBe(true);
  });

  it('should go back to the project list on backspace', async () => {
    const { request, finder } = await runBrowser([
      press('', 'ws/app'),
      press('bs'),
      press('esc'),
    ]);

    expect(request).toBeNull();
    expect(finder.calls[2].options.prompt).toBe(' Projects > ');
  });
});
