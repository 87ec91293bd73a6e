// ============================================================================
// chatdeck - Transcript Parser
// Extracts preview metadata from one conversation file
// ============================================================================

import { promises as fs } from 'fs';
import * as path from 'path';
import {
  EMPTY_SESSION_TEXT,
  RESUMED_SESSION_TEXT,
  type Conversation,
} from '../types/chat-types.js';
import { isRecord } from '../utils/json-file.js';
import { readJsonlRecords } from './jsonl-reader.js';

// ============================================================================
// Constants
// ============================================================================

/** Metadata scan stops after this many bytes */
export const METADATA_SCAN_BYTES = 200_000;

export const MAX_MESSAGE_LENGTH = 120;

/** Markers of command output and injected context rather than typed text */
export const SYSTEM_TAGS = ['<local-command-', '<command-name>', '<system-reminder>'];

const ISO_PATTERN = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2})/;
const ZONE_PATTERN = /(Z|[+-]\d{2}:?\d{2})$/i;

// ============================================================================
// Content helpers
// ============================================================================

export function isSystemText(text: string): boolean {
  return SYSTEM_TAGS.some((tag) => text.includes(tag));
}

/**
 * Display text of a user message: the string content, or the first text
 * part of array content, skipping system messages
 */
export function extractUserText(content: unknown): string {
  if (typeof content === 'string') {
    const text = content.trim();
    return text && !isSystemText(text) ? text : '';
  }

  if (Array.isArray(content)) {
    for (const part of content) {
      if (!isRecord(part) || part.type !== 'text') continue;
      const raw = part.text;
      if (typeof raw !== 'string') continue;
      const text = raw.trim();
      if (text && !isSystemText(text)) {
        return text;
      }
    }
  }

  return '';
}

/**
 * `message.content` of a transcript record, when present
 */
export function messageContent(record: Record<string, unknown>): unknown {
  const message = record.message;
  return isRecord(message) ? message.content : undefined;
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes}B`;
  }
  if (bytes < 1024 * 1024) {
    return `${Math.floor(bytes / 1024)}K`;
  }
  return `${Math.floor(bytes / (1024 * 1024))}M`;
}

/**
 * "YYYY-MM-DD HH:MM" in UTC. Timestamps without a zone are taken as UTC.
 */
export function formatDate(timestamp: string): string {
  if (!timestamp) return '';
  const match = ISO_PATTERN.exec(timestamp);
  if (!match) {
    return timestamp.slice(0, 16);
  }
  if (ZONE_PATTERN.test(timestamp)) {
    const parsed = new Date(timestamp);
    if (!isNaN(parsed.getTime())) {
      return parsed.toISOString().slice(0, 16).replace('T', ' ');
    }
  }
  return `${match[1]} ${match[2]}`;
}

export function truncateMessage(message: string): string {
  const flat = message.replace(/\n/g, ' ').trim();
  if (flat.length > MAX_MESSAGE_LENGTH) {
    return `${flat.slice(0, MAX_MESSAGE_LENGTH - 3)}...`;
  }
  return flat;
}

export function conversationId(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Read preview metadata from a transcript. Returns null when the file
 * cannot be read at all.
 */
export async function parseConversation(filePath: string): Promise<Conversation | null> {
  let sizeBytes: number;
  try {
    sizeBytes = (await fs.stat(filePath)).size;
  } catch {
    return null;
  }

  let firstUserMessage = '';
  let timestamp = '';
  let hasAssistant = false;
  let truncated = false;
  const window = {
    maxBytes: METADATA_SCAN_BYTES,
    onTruncated: () => {
      truncated = true;
    },
  };

  try {
    for await (const record of readJsonlRecords(filePath, window)) {
      const recorded = record.timestamp;
      if (!timestamp && typeof recorded === 'string' && recorded) {
        timestamp = recorded;
      }
      if (record.type === 'assistant') {
        hasAssistant = true;
      }
      if (record.type === 'user') {
        const text = extractUserText(messageContent(record));
        if (text) {
          firstUserMessage = text;
          break;
        }
      }
    }
  } catch {
    return null;
  }

  let message = truncateMessage(firstUserMessage);
  let trulyEmpty = false;
  if (!message) {
    message = timestamp ? RESUMED_SESSION_TEXT : EMPTY_SESSION_TEXT;
    // Only a complete read can prove there is nothing to keep
    trulyEmpty = !hasAssistant && !truncated;
  }

  const extension = path.extname(filePath);
  return {
    id: conversationId(filePath),
    filePath,
    sidecarDir: filePath.slice(0, filePath.length - extension.length),
    date: formatDate(timestamp),
    sizeBytes,
    size: formatSize(sizeBytes),
    message,
    trulyEmpty,
    timestamp: timestamp || '0',
  };
}

/**
 * Working directory recorded in the first record that carries one
 */
export async function readRecordedCwd(filePath: string): Promise<string | null> {
  try {
    for await (const record of readJsonlRecords(filePath, { maxBytes: Number.MAX_SAFE_INTEGER })) {
      if ('cwd' in record) {
        const cwd = record.cwd;
        return typeof cwd === 'string' && cwd ? cwd : null;
      }
    }
  } catch {
    return null;
  }
  return null;
}
