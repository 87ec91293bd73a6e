// ============================================================================
// chatdeck - Fuzzy Finder Driver
// Feeds lines to fzf and reads back the pressed key and selections
// ============================================================================

import { spawn, execFileSync } from 'child_process';
import { noopLogger, type Logger } from '../types/chat-types.js';
import { DependencyMissingError, errorMessage, isErrnoException } from '../utils/errors.js';
import { isCompact } from './format.js';

export const FZF_BINARY = 'fzf';

export const FZF_INSTALL_HINTS = [
  'Ubuntu/Debian: sudo apt install fzf',
  'macOS:         brew install fzf',
  'Windows:       winget install fzf',
];

/** Key reported when the finder is dismissed */
export const CANCEL_KEY = 'esc';

export const FZF_COLORS = [
  'fg:#c0caf5',
  'bg:#1a1b26',
  'hl:#bb9af7',
  'fg+:#c0caf5',
  'bg+:#292e42',
  'hl+:#7dcfff',
  'info:#7aa2f7',
  'prompt:#7dcfff',
  'pointer:#ff007c',
  'marker:#9ece6a',
  'spinner:#9ece6a',
  'header:#565f89',
  'border:#27a1b9',
  'gutter:#1a1b26',
].join(',');

export interface FzfVersion {
  major: number;
  minor: number;
}

export interface FinderOptions {
  header: string;
  prompt?: string;
  multi?: boolean;
  expectKeys?: string[];
  /** Shell command run by fzf; `{1}` expands to the row index */
  previewCommand?: string;
  borderLabel?: string;
}

export interface FinderResult {
  /** Pressed expect key, '' for enter, CANCEL_KEY when dismissed */
  key: string;

  /** Selected raw lines, row index field included */
  selections: string[];
}

export interface FuzzyFinder {
  select(lines: readonly string[], options: FinderOptions): Promise<FinderResult>;
}

export interface FzfEnvironment {
  version: FzfVersion;
  columns: number;
}

/**
 * "0.44.1 (brew)" → { major: 0, minor: 44 }; unknown output reads as 0.0
 */
export function parseFzfVersion(output: string): FzfVersion {
  const match = /^(\d+)\.(\d+)/.exec(output.trim());
  if (!match) {
    return { major: 0, minor: 0 };
  }
  return { major: Number(match[1]), minor: Number(match[2]) };
}

export function versionAtLeast(version: FzfVersion, major: number, minor: number): boolean {
  return version.major > major || (version.major === major && version.minor >= minor);
}

export function buildFzfArgs(options: FinderOptions, env: FzfEnvironment): string[] {
  const compact = isCompact(env.columns);
  const labels = versionAtLeast(env.version, 0, 35);

  const args = [
    '--header', options.header,
    '--header-first',
    '--reverse',
    '--no-sort',
    '--prompt', options.prompt ?? ' ',
    '--pointer', '>',
    '--marker', '*',
    '--border', labels ? 'rounded' : 'sharp',
    '--margin', compact ? '0,1' : '1,2',
    '--padding', '0,1',
    '--info', versionAtLeast(env.version, 0, 39) ? 'inline-right' : 'inline',
    '--color', FZF_COLORS,
    '--ansi',
    '--delimiter', '\t',
    '--with-nth', '2..',
  ];

  if (labels) {
    args.push('--border-label-pos', '3');
    if (options.borderLabel) {
      args.push('--border-label', ` ${options.borderLabel} `);
    }
  }

  const binds = ['ctrl-a:select-all'];
  if (options.multi) {
    args.push('--multi');
    binds.push('space:toggle+down');
  }
  if (options.expectKeys && options.expectKeys.length > 0) {
    args.push('--expect', options.expectKeys.join(','));
  }
  args.push('--bind', binds.join(','));

  if (options.previewCommand && !compact) {
    args.push(
      '--preview', options.previewCommand,
      '--preview-window', env.columns < 100 ? 'bottom:40%:wrap:border-top' : 'right:50%:wrap:border-left'
    );
  }

  return args;
}

/**
 * With expect keys the first output line is the pressed key (empty for enter)
 */
export function parseFzfOutput(stdout: string, hasExpectKeys: boolean): FinderResult {
  const lines = stdout.split('\n');
  if (hasExpectKeys) {
    return {
      key: (lines[0] ?? '').trim(),
      selections: lines.slice(1).filter((line) => line.trim() !== ''),
    };
  }
  return { key: '', selections: lines.filter((line) => line.trim() !== '') };
}

/**
 * Installed fzf version, or null when fzf is not on PATH
 */
export function detectFzfVersion(): FzfVersion | null {
  try {
    return parseFzfVersion(execFileSync(FZF_BINARY, ['--version'], { encoding: 'utf-8' }));
  } catch {
    return null;
  }
}

export class FzfFinder implements FuzzyFinder {
  constructor(
    private readonly version: FzfVersion,
    private readonly columns: () => number = () => process.stdout.columns || 80,
    private readonly logger: Logger = noopLogger
  ) {}

  select(lines: readonly string[], options: FinderOptions): Promise<FinderResult> {
    const args = buildFzfArgs(options, { version: this.version, columns: this.columns() });
    const hasExpectKeys = (options.expectKeys?.length ?? 0) > 0;

    return new Promise((resolve, reject) => {
      // stderr stays on the terminal: fzf draws its interface there
      const child = spawn(FZF_BINARY, args, { stdio: ['pipe', 'pipe', 'inherit'] });
      let stdout = '';

      child.stdout.setEncoding('utf-8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });

      child.stdin.on('error', (error) => {
        // fzf may exit before reading all input
        this.logger.debug('fzf input closed early', { error: errorMessage(error) });
      });

      child.on('error', (error) => {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          reject(new DependencyMissingError(FZF_BINARY, FZF_INSTALL_HINTS));
        } else {
          reject(error);
        }
      });

      child.on('close', (code) => {
        if (code !== 0) {
          this.logger.debug('fzf dismissed', { code });
          resolve({ key: CANCEL_KEY, selections: [] });
          return;
        }
        resolve(parseFzfOutput(stdout, hasExpectKeys));
      });

      child.stdin.end(lines.join('\n'));
    });
  }
}
