// ============================================================================
// chatdeck - Preview Command
// The finder runs this program again to render the highlighted transcript
// ============================================================================

import { promises as fs } from 'fs';
import { renderPreview } from '../transcripts/preview.js';

export interface SelfInvocation {
  execPath: string;
  execArgv: string[];
  script: string;
  platform: NodeJS.Platform;
}

export function currentInvocation(): SelfInvocation {
  return {
    execPath: process.execPath,
    execArgv: process.execArgv,
    script: process.argv[1] ?? '',
    platform: process.platform,
  };
}

export function shellQuote(value: string, platform: NodeJS.Platform): string {
  if (platform === 'win32') {
    return `"${value}"`;
  }
  return `"${value.replace(/(["\\$`])/g, '\\$1')}"`;
}

/**
 * Shell command for the finder's preview pane; `{1}` is the hidden row index
 */
export function buildPreviewCommand(mapFile: string, self: SelfInvocation): string {
  const quote = (value: string): string => shellQuote(value, self.platform);
  return [
    quote(self.execPath),
    ...self.execArgv.map(quote),
    quote(self.script),
    '--preview-idx',
    '{1}',
    quote(mapFile),
  ].join(' ');
}

/**
 * Transcript path on the given line of a map file, null when out of range
 */
export async function lookupMapEntry(mapFile: string, index: number): Promise<string | null> {
  if (!Number.isInteger(index) || index < 0) {
    return null;
  }
  const lines = (await fs.readFile(mapFile, 'utf-8')).split('\n');
  const entry = lines[index]?.trim();
  return entry ? entry : null;
}

export function previewColumns(env: NodeJS.ProcessEnv = process.env): number {
  const fromFinder = parseInt(env.FZF_PREVIEW_COLUMNS ?? '', 10);
  if (fromFinder > 0) {
    return fromFinder;
  }
  return process.stdout.columns ? Math.floor(process.stdout.columns / 2) : 40;
}

export async function printPreview(filePath: string): Promise<void> {
  process.stdout.write(`${await renderPreview(filePath, previewColumns())}\n`);
}
