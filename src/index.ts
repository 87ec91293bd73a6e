#!/usr/bin/env node
/**
 * chatdeck - Browse and manage Claude Code conversations
 *
 * Usage:
 *   chatdeck              - Open the project list
 *   chatdeck --set-key    - Store the Gemini API key used for summaries
 */

import * as os from 'os';
import { Command, Option } from 'commander';
import { loadDotEnv, loadEnvConfig, type EnvConfig } from './config/env-loader.js';
import { PreferencesStore } from './config/preferences.js';
import { ProjectPathResolver } from './projects/path-resolver.js';
import { ProjectScanner } from './projects/project-scanner.js';
import { ApiKeyStore } from './summary/api-key.js';
import { GeminiSummarizer } from './summary/gemini-client.js';
import { SummaryCache } from './summary/summary-cache.js';
import { ConversationStore } from './transcripts/conversation-store.js';
import { Browser } from './browser/browser.js';
import type { BrowserContext } from './browser/context.js';
import { promptForApiKey } from './browser/key-prompt.js';
import {
  CHAT_CLI_INSTALL_HINTS,
  Launcher,
  commandExists,
  openInFileManager,
} from './browser/launcher.js';
import {
  buildPreviewCommand,
  currentInvocation,
  lookupMapEntry,
  printPreview,
} from './browser/preview-command.js';
import {
  FZF_BINARY,
  FZF_INSTALL_HINTS,
  FzfFinder,
  detectFzfVersion,
  type FzfVersion,
} from './ui/fzf.js';
import { ReadlinePrompter, TerminalScreen } from './ui/prompts.js';
import { createKeyBindingsTable, errorBox, spinnerProgress, successBox } from './ui/ui.js';
import { Logger } from './utils/logger.js';
import { DependencyMissingError, errorMessage } from './utils/errors.js';

const VERSION = '1.0.0';

interface CliOptions {
  setKey?: boolean;
  preview?: string;
  previewIdx?: string[];
}

function createProgram(): Command {
  return new Command()
    .name('chatdeck')
    .description('Browse and manage Claude Code conversations')
    .version(VERSION)
    .option('--set-key', 'Set/update Gemini API key for AI summaries')
    .addOption(new Option('--preview <file>', 'Render a transcript preview').hideHelp())
    .addOption(new Option('--preview-idx <args...>', 'Render the preview of a map file entry').hideHelp())
    .addHelpText('after', `\nKey bindings:\n${createKeyBindingsTable()}\n\nRequires fzf and the claude CLI on PATH.`);
}

async function runPreviewIndex(args: string[]): Promise<void> {
  const [rawIndex, mapFile] = args;
  if (rawIndex === undefined || mapFile === undefined) {
    return;
  }
  const filePath = await lookupMapEntry(mapFile, Number(rawIndex));
  if (filePath) {
    await printPreview(filePath);
  }
}

async function setKey(config: EnvConfig): Promise<void> {
  const store = new ApiKeyStore(config.keyFile);
  const key = await promptForApiKey(new ReadlinePrompter(), new TerminalScreen(), store);
  if (key) {
    console.log(successBox('Gemini API key configured.'));
  }
}

function requireDependencies(config: EnvConfig): FzfVersion {
  const version = detectFzfVersion();
  if (!version) {
    throw new DependencyMissingError(FZF_BINARY, FZF_INSTALL_HINTS);
  }
  if (!commandExists(config.chatCommand)) {
    throw new DependencyMissingError(config.chatCommand, CHAT_CLI_INSTALL_HINTS);
  }
  return version;
}

async function runBrowser(config: EnvConfig, logger: Logger): Promise<number> {
  const resolver = new ProjectPathResolver();
  const scanner = new ProjectScanner(config.projectsDir, resolver, logger);

  if (!(await scanner.exists())) {
    console.log('No Claude Code projects found.');
    console.log(`Expected: ${config.projectsDir}`);
    return 0;
  }

  const fzfVersion = requireDependencies(config);
  const screen = new TerminalScreen();
  const launcher = new Launcher({ chatCommand: config.chatCommand, resumeFile: config.resumeFile }, logger);
  const self = currentInvocation();

  const ctx: BrowserContext = {
    config,
    logger,
    preferences: new PreferencesStore(config.preferencesFile, logger),
    summaries: new SummaryCache(config.summaryCacheFile, logger),
    apiKeys: new ApiKeyStore(config.keyFile, config.apiKey),
    resolver,
    scanner,
    conversations: new ConversationStore(logger),
    launcher,
    finder: new FzfFinder(fzfVersion, () => screen.columns(), logger),
    prompter: new ReadlinePrompter(),
    screen,
    progress: spinnerProgress,
    createSummarizer: (apiKey) => new GeminiSummarizer({
      apiKey,
      model: config.summaryModel,
      endpoint: config.summaryEndpoint,
      timeoutMs: config.summaryTimeoutMs,
    }),
    previewCommand: (mapFile) => buildPreviewCommand(mapFile, self),
    openFolder: (directory) => openInFileManager(directory, logger),
    cwd: process.cwd(),
  };

  const browser = new Browser(ctx);
  await browser.load();
  const request = await browser.run();
  if (!request) {
    return 0;
  }

  screen.clear();
  return launcher.handOff(request);
}

async function main(): Promise<number> {
  loadDotEnv();
  const config = loadEnvConfig(process.env, os.homedir());

  const program = createProgram();
  program.parse();
  const options = program.opts<CliOptions>();

  if (options.preview) {
    await printPreview(options.preview);
    return 0;
  }
  if (options.previewIdx) {
    await runPreviewIndex(options.previewIdx);
    return 0;
  }
  if (options.setKey) {
    await setKey(config);
    return 0;
  }

  const logger = new Logger({ level: config.logLevel, file: config.logFile });
  return runBrowser(config, logger);
}

main().then(
  (code) => {
    process.exit(code);
  },
  (error: unknown) => {
    if (error instanceof DependencyMissingError) {
      console.error(errorBox(`${error.binary} not found on PATH`, error.installHints));
    } else {
      console.error(errorBox(errorMessage(error)));
    }
    process.exit(1);
  }
);
