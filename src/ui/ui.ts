// ============================================================================
// chatdeck - UI Utilities
// ============================================================================

import ora, { type Ora } from 'ora';
import Table from 'cli-table3';
import boxen from 'boxen';
import figures from 'figures';
import chalk from 'chalk';

// ============================================================================
// Icons
// ============================================================================

export const icons = {
  bullet: figures.bullet,
  remove: chalk.red(figures.cross),
};

// ============================================================================
// Spinners
// ============================================================================

export function createSpinner(text: string): Ora {
  return ora({
    text,
    spinner: 'dots',
    color: 'cyan',
  });
}

/**
 * Running status line for long operations
 */
export interface Progress {
  update(text: string): void;
  done(text?: string): void;
}

export type ProgressFactory = (text: string) => Progress;

export const spinnerProgress: ProgressFactory = (text) => {
  const spinner = createSpinner(text).start();
  return {
    update: (next) => {
      spinner.text = next;
    },
    done: (final) => {
      if (final) {
        spinner.succeed(final);
      } else {
        spinner.stop();
      }
    },
  };
};

export const silentProgress: ProgressFactory = () => ({
  update: () => {},
  done: () => {},
});

// ============================================================================
// Boxes
// ============================================================================

export function errorBox(message: string, suggestions?: string[]): string {
  let content = chalk.red(message);

  if (suggestions && suggestions.length > 0) {
    content += '\n\n' + chalk.yellow('Try:');
    for (const suggestion of suggestions) {
      content += `\n  ${icons.bullet} ${suggestion}`;
    }
  }

  return boxen(content, {
    padding: { left: 1, right: 1, top: 0, bottom: 0 },
    margin: { top: 1, bottom: 1, left: 0, right: 0 },
    borderStyle: 'round',
    borderColor: 'red',
    title: 'Error',
    titleAlignment: 'left',
  });
}

export function successBox(message: string): string {
  return boxen(chalk.green(message), {
    padding: { left: 1, right: 1, top: 0, bottom: 0 },
    margin: { top: 0, bottom: 0, left: 0, right: 0 },
    borderStyle: 'round',
    borderColor: 'green',
  });
}

/**
 * Red box listing what is about to be deleted
 */
export function deletionBox(title: string, subtitle: string, lines: string[]): string {
  const content = [chalk.red.bold(title), chalk.dim(subtitle), '', ...lines].join('\n');

  return boxen(content, {
    padding: { left: 1, right: 1, top: 0, bottom: 0 },
    margin: { top: 1, bottom: 1, left: 1, right: 0 },
    borderStyle: 'round',
    borderColor: 'red',
    title: 'Delete',
    titleAlignment: 'left',
  });
}

// ============================================================================
// Help Display
// ============================================================================

export const PROJECT_VIEW_KEYS: Array<[string, string]> = [
  ['enter', 'Browse conversations in selected project'],
  ['ctrl-n', 'Start new session in selected project'],
  ['ctrl-f', 'Create new project folder'],
  ['ctrl-e', 'Open project folder in file manager'],
  ['ctrl-p', 'Toggle skip-permissions mode'],
  ['tab', 'Cycle sort order (A-Z / Most chats / Recent)'],
  ['esc', 'Quit'],
];

export const CHAT_VIEW_KEYS: Array<[string, string]> = [
  ['enter', 'Resume highlighted conversation'],
  ['ctrl-n', 'Start new session in current project'],
  ['space', 'Toggle selection'],
  ['ctrl-a', 'Select all'],
  ['ctrl-s', 'Toggle AI summaries'],
  ['ctrl-p', 'Toggle skip-permissions mode'],
  ['ctrl-x', 'Delete selected conversations'],
  ['ctrl-d', 'Purge empty sessions (no real content)'],
  ['backspace', 'Back to project list'],
  ['esc', 'Quit'],
];

export function createKeyBindingsTable(): string {
  const table = new Table({
    style: {
      head: [],
      border: ['gray'],
    },
    colWidths: [14, 48],
  });

  table.push([chalk.cyan('Project view'), '']);
  for (const [key, description] of PROJECT_VIEW_KEYS) {
    table.push([`  ${key}`, description]);
  }
  table.push(['', ''], [chalk.cyan('Chat view'), '']);
  for (const [key, description] of CHAT_VIEW_KEYS) {
    table.push([`  ${key}`, description]);
  }

  return table.toString();
}
