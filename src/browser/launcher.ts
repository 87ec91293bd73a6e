// ============================================================================
// chatdeck - Launcher
// Hands the terminal over to the chat CLI
// ============================================================================

import { spawn, execFileSync } from 'child_process';
import { promises as fs } from 'fs';
import * as os from 'os';
import { noopLogger, type Logger } from '../types/chat-types.js';
import { DependencyMissingError, errorMessage, isErrnoException } from '../utils/errors.js';
import { readRecordedCwd } from '../transcripts/transcript-parser.js';

export const SKIP_PERMISSIONS_FLAG = '--dangerously-skip-permissions';

export const CHAT_CLI_INSTALL_HINTS = [
  'npm install -g @anthropic-ai/claude-code',
  'Set CHATDECK_CHAT_COMMAND to the chat CLI executable',
];

export interface LaunchRequest {
  /** Working directory the chat CLI starts in */
  directory: string;
  command: string;
  args: string[];
}

export interface LaunchOptions {
  /** Session id to resume; omitted for a new session */
  resumeId?: string;
  skipPermissions: boolean;
}

export interface LauncherConfig {
  chatCommand: string;
  /** Write the hand-off here instead of spawning */
  resumeFile?: string;

  /** The chat CLI refuses to skip permission prompts for root */
  allowSkipPermissions?: boolean;
}

export function canSkipPermissions(): boolean {
  return process.getuid?.() !== 0;
}

export function buildChatArgs(options: LaunchOptions): string[] {
  const args: string[] = [];
  if (options.resumeId) {
    args.push('--resume', options.resumeId);
  }
  if (options.skipPermissions) {
    args.push(SKIP_PERMISSIONS_FLAG);
  }
  return args;
}

/**
 * The working directory recorded in the transcript, otherwise the project's
 * resolved path. A recorded directory that no longer exists is still
 * returned; `handOff` recreates it.
 */
export async function resolveLaunchDirectory(
  projectPath: string,
  sessionFile?: string,
  logger: Logger = noopLogger
): Promise<string> {
  if (!sessionFile) {
    return projectPath;
  }
  const recorded = await readRecordedCwd(sessionFile);
  if (recorded) {
    return recorded;
  }
  logger.debug('No working directory recorded', { sessionFile });
  return projectPath;
}

export class Launcher {
  constructor(
    private readonly config: LauncherConfig,
    private readonly logger: Logger = noopLogger
  ) {}

  async request(directory: string, options: LaunchOptions, sessionFile?: string): Promise<LaunchRequest> {
    const allowSkip = this.config.allowSkipPermissions ?? canSkipPermissions();
    if (options.skipPermissions && !allowSkip) {
      this.logger.warn('Skip-permissions mode is not available to the root user');
    }
    return {
      directory: await resolveLaunchDirectory(directory, sessionFile, this.logger),
      command: this.config.chatCommand,
      args: buildChatArgs({ ...options, skipPermissions: options.skipPermissions && allowSkip }),
    };
  }

  /**
   * Run the chat CLI and resolve with its exit code. A missing working
   * directory is recreated first.
   */
  async handOff(request: LaunchRequest): Promise<number> {
    await fs.mkdir(request.directory, { recursive: true });

    if (this.config.resumeFile) {
      const commandLine = [request.command, ...request.args].join(' ');
      await fs.writeFile(this.config.resumeFile, `${request.directory}\n${commandLine}`, 'utf-8');
      this.logger.info('Wrote resume file', { file: this.config.resumeFile, directory: request.directory });
      return 0;
    }

    this.logger.info('Launching chat CLI', { ...request });

    return new Promise((resolve, reject) => {
      const child = spawn(request.command, request.args, {
        cwd: request.directory,
        stdio: 'inherit',
      });

      child.on('error', (error) => {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          reject(new DependencyMissingError(request.command, CHAT_CLI_INSTALL_HINTS));
        } else {
          reject(error);
        }
      });

      child.on('close', (code) => {
        resolve(code ?? 1);
      });
    });
  }
}

// ============================================================================
// System Helpers
// ============================================================================

/**
 * Whether an executable is on PATH
 */
export function commandExists(command: string, platform: NodeJS.Platform = process.platform): boolean {
  try {
    execFileSync(platform === 'win32' ? 'where' : 'which', [command], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

export function isWsl(platform: NodeJS.Platform = process.platform): boolean {
  if (platform !== 'linux') return false;
  return Boolean(process.env.WSL_DISTRO_NAME) || os.release().toLowerCase().includes('microsoft');
}

export interface FileManagerCommand {
  command: string;
  args: string[];
}

export function fileManagerCommand(
  directory: string,
  platform: NodeJS.Platform,
  wsl: boolean
): FileManagerCommand {
  if (platform === 'win32') {
    return { command: 'explorer', args: [directory] };
  }
  if (wsl) {
    const windowsPath = execFileSync('wslpath', ['-w', directory], { encoding: 'utf-8' }).trim();
    return { command: 'explorer.exe', args: [windowsPath] };
  }
  if (platform === 'darwin') {
    return { command: 'open', args: [directory] };
  }
  return { command: 'xdg-open', args: [directory] };
}

/**
 * Open a directory in the desktop file manager without waiting for it.
 * Failures are logged, never thrown.
 */
export function openInFileManager(directory: string, logger: Logger = noopLogger): void {
  let target: FileManagerCommand;
  try {
    target = fileManagerCommand(directory, process.platform, isWsl());
  } catch (error) {
    logger.warn('Cannot open file manager', { directory, error: errorMessage(error) });
    return;
  }

  const child = spawn(target.command, target.args, { detached: true, stdio: 'ignore' });
  child.on('error', (error) => {
    logger.warn('Cannot open file manager', { directory, command: target.command, error: errorMessage(error) });
  });
  child.unref();
}
