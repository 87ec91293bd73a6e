// ============================================================================
// chatdeck - Conversation Preview
// Rendered into the finder's preview pane
// ============================================================================

import { promises as fs } from 'fs';
import { stripVTControlCharacters } from 'util';
import chalk from 'chalk';
import type { ChatMessage } from '../types/chat-types.js';
import { isRecord } from '../utils/json-file.js';
import { readJsonlRecords } from './jsonl-reader.js';
import { SYSTEM_TAGS, messageContent } from './transcript-parser.js';

export const PREVIEW_FIRST_N = 3;
export const PREVIEW_LAST_N = 4;

const HEAD_BYTES = 100_000;
const TAIL_BYTES = 200_000;
const TIMESTAMP_WIDTH = 12;
const MAX_LINES = 5;
const MAX_CHARS = 300;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const ISO_PATTERN = /^\d{4}-(\d{2})-(\d{2})[T ](\d{2}:\d{2})/;

// ============================================================================
// Text cleanup
// ============================================================================

export function cleanText(text: string): string {
  return stripVTControlCharacters(text.replace(/<[^>]+>/g, ''))
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function extractText(content: unknown): string {
  if (typeof content === 'string') {
    return content;
  }
  if (Array.isArray(content)) {
    const parts: string[] = [];
    for (const part of content) {
      if (!isRecord(part) || part.type !== 'text') continue;
      const text = part.text;
      if (typeof text === 'string') {
        parts.push(text);
      }
    }
    return parts.join('\n');
  }
  return '';
}

function containsSystemTag(value: unknown): boolean {
  if (typeof value !== 'string') return false;
  const text = value;
  return SYSTEM_TAGS.some((tag) => text.includes(tag));
}

export function isSystemContent(content: unknown): boolean {
  if (typeof content === 'string') {
    return containsSystemTag(content);
  }
  if (Array.isArray(content)) {
    return content.some((part) => isRecord(part) && (containsSystemTag(part.text) || containsSystemTag(part.content)));
  }
  return false;
}

/**
 * "Jan 15 10:30", or blank padding when the timestamp is absent or invalid
 */
export function formatPreviewTimestamp(timestamp: string): string {
  const match = ISO_PATTERN.exec(timestamp);
  const month = match ? MONTHS[parseInt(match[1], 10) - 1] : undefined;
  if (!match || !month) {
    return ' '.repeat(TIMESTAMP_WIDTH);
  }
  return `${month} ${match[2]} ${match[3]}`;
}

export function truncatePreviewText(text: string): string {
  let lines = text.split('\n');
  let remaining = 0;
  if (lines.length > MAX_LINES) {
    remaining = lines.length - MAX_LINES;
    lines = lines.slice(0, MAX_LINES);
  }
  let result = lines.join('\n');
  if (result.length > MAX_CHARS) {
    result = result.slice(0, MAX_CHARS);
  }
  if (remaining) {
    result += `\n${chalk.dim(`+${remaining} more lines`)}`;
  }
  return result;
}

// ============================================================================
// Reading
// ============================================================================

/**
 * User and assistant messages within a byte window of a transcript
 */
export async function readPreviewMessages(
  filePath: string,
  start: number,
  maxBytes: number
): Promise<ChatMessage[]> {
  const messages: ChatMessage[] = [];

  for await (const record of readJsonlRecords(filePath, { start, maxBytes })) {
    const role = record.type;
    if (role !== 'user' && role !== 'assistant') continue;

    const content = messageContent(record);
    if (role === 'user' && isSystemContent(content)) continue;

    const text = cleanText(extractText(content));
    if (!text) continue;

    const timestamp = record.timestamp;
    messages.push({
      role,
      text,
      timestamp: typeof timestamp === 'string' ? timestamp : '',
    });
  }

  return messages;
}

// ============================================================================
// Rendering
// ============================================================================

export function renderMessage(message: ChatMessage): string {
  const label = message.role === 'user'
    ? chalk.green.bold('You   ')
    : chalk.magenta.bold('Claude');
  const lines = [`  ${label}  ${chalk.dim(formatPreviewTimestamp(message.timestamp))}`];
  for (const line of truncatePreviewText(message.text).split('\n')) {
    lines.push(`    ${line}`);
  }
  return lines.join('\n');
}

function renderSection(messages: ChatMessage[], separator: string): string[] {
  const out: string[] = [];
  messages.forEach((message, index) => {
    out.push(renderMessage(message));
    if (index < messages.length - 1) {
      out.push(separator);
    }
  });
  return out;
}

async function fileSize(filePath: string): Promise<number | null> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile() ? stat.size : null;
  } catch {
    return null;
  }
}

/**
 * Preview of a transcript: the opening messages and the most recent ones
 */
export async function renderPreview(filePath: string, columns: number): Promise<string> {
  const size = await fileSize(filePath);
  if (size === null) {
    return `  ${chalk.dim('File not found')}`;
  }

  const width = Math.max(columns - 3, 20);
  const separator = `  ${chalk.dim.cyan('~'.repeat(width))}`;

  const head = await readPreviewMessages(filePath, 0, HEAD_BYTES);
  const tailStart = Math.max(0, size - TAIL_BYTES);
  const tail = tailStart > 0 ? await readPreviewMessages(filePath, tailStart, TAIL_BYTES) : [];

  if (head.length === 0 && tail.length === 0) {
    return `\n  ${chalk.dim('No messages')}`;
  }

  const out: string[] = [''];
  if (tailStart === 0) {
    if (head.length <= PREVIEW_FIRST_N + PREVIEW_LAST_N) {
      out.push(...renderSection(head, separator));
    } else {
      const skipped = head.length - PREVIEW_FIRST_N - PREVIEW_LAST_N;
      out.push(...renderSection(head.slice(0, PREVIEW_FIRST_N), separator));
      out.push('', `  ${chalk.dim.yellow(`        ~ ${skipped} skipped`)}`, '');
      out.push(...renderSection(head.slice(-PREVIEW_LAST_N), separator));
    }
  } else {
    out.push(...renderSection(head.slice(0, PREVIEW_FIRST_N), separator));
    out.push('', `  ${chalk.dim.yellow('        ~  ...  ')}`, '');
    out.push(...renderSection(tail.slice(-PREVIEW_LAST_N), separator));
  }
  out.push('');

  return out.join('\n');
}
