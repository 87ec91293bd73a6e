// ============================================================================
// chatdeck - Line Formatting
// Finder lines for the project and chat views
// ============================================================================

import chalk from 'chalk';
import { isPlaceholderMessage, type Conversation, type Project } from '../types/chat-types.js';
import { InvalidSelectionError } from '../utils/errors.js';
import { icons } from './ui.js';

/** Below this width dates and the preview pane are dropped */
export const COMPACT_WIDTH = 70;

export function isCompact(columns: number): boolean {
  return columns < COMPACT_WIDTH;
}

function spaces(count: number): string {
  return ' '.repeat(Math.max(0, count));
}

function clip(text: string, max: number): string {
  return text.length > max ? text.slice(0, Math.max(0, max - 1)) + '~' : text;
}

// ============================================================================
// Row Index
// ============================================================================

/**
 * Prefix a line with its row index as a hidden tab-delimited field
 */
export function withRowIndex(index: number, line: string): string {
  return `${index}\t${line}`;
}

export function parseRowIndex(line: string): number {
  const match = /^(\d+)\t/.exec(line);
  if (!match) {
    throw new InvalidSelectionError(line);
  }
  return Number(match[1]);
}

// ============================================================================
// Projects
// ============================================================================

function countColor(count: number): (text: string) => string {
  if (count < 10) return chalk.green;
  if (count < 30) return chalk.yellow;
  return chalk.red;
}

export function formatProjectLine(project: Project, maxNameLength: number, columns: number): string {
  const name = project.displayName;
  let displayName = name;
  let padding = maxNameLength - name.length + 2;

  if (isCompact(columns)) {
    const maxName = columns - 16;
    displayName = clip(name, maxName);
    padding = Math.min(maxName, maxNameLength) - displayName.length + 2;
  }

  const count = String(project.conversationCount).padStart(3);

  if (project.missing) {
    return '  ' + chalk.magenta(`${displayName}${spaces(padding)}${count} chats`);
  }
  if (project.conversationCount === 0) {
    return '  ' + chalk.dim(`${displayName}${spaces(padding)}  0 chats`);
  }
  return `  ${chalk.bold.white(displayName)}${spaces(padding)}${countColor(project.conversationCount)(count)} ${chalk.dim('chats')}`;
}

// ============================================================================
// Conversations
// ============================================================================

export function indexWidth(total: number): number {
  return String(Math.max(total - 1, 0)).length;
}

/**
 * One chat row. A summary, when given, replaces the raw message in cyan;
 * placeholder rows are dimmed and never show a summary.
 */
export function formatChatLine(
  index: number,
  conversation: Conversation,
  idxWidth: number,
  columns: number,
  summary?: string
): string {
  const idx = String(index).padStart(idxWidth);
  const size = conversation.size.padStart(4);
  const placeholder = isPlaceholderMessage(conversation.message);

  if (isCompact(columns)) {
    if (placeholder) {
      return ' ' + chalk.dim(`${idx} ${size} ${conversation.message}`);
    }
    const text = clip(summary ?? conversation.message, columns - idxWidth - 12);
    return ` ${idx} ${chalk.yellow(size)} ${summary ? chalk.cyan(text) : text}`;
  }

  const date = conversation.date.padEnd(16);
  if (placeholder) {
    return '  ' + chalk.dim(`${idx}  ${date}  ${size}  ${conversation.message}`);
  }
  const display = summary ? chalk.cyan(summary) : conversation.message;
  return `  ${idx}  ${chalk.dim(date)}  ${chalk.yellow(size)}  ${display}`;
}

/**
 * Row of the deletion confirmation list
 */
export function formatDeletionLine(conversation: Conversation): string {
  const date = (conversation.date || ' '.repeat(14)).padEnd(16);
  return `  ${icons.remove}  ${chalk.dim(date)}  ${chalk.yellow(conversation.size.padStart(4))}  ${conversation.message.slice(0, 65)}`;
}

export function formatTotalSize(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${Math.floor(bytes / 1024)}KB`;
  return `${Math.floor(bytes / (1024 * 1024))}MB`;
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
