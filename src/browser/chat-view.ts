// ============================================================================
// chatdeck - Chat View
// Conversations of one project: resume, summarize, delete and purge
// ============================================================================

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import chalk from 'chalk';
import type { Conversation, Project } from '../types/chat-types.js';
import { SummaryGenerator } from '../summary/summary-generator.js';
import {
  emptyConversations,
  totalSize,
  type DeletionReport,
} from '../transcripts/conversation-store.js';
import {
  formatChatLine,
  formatDeletionLine,
  formatTotalSize,
  indexWidth,
  parseRowIndex,
  plural,
  withRowIndex,
} from '../ui/format.js';
import { CANCEL_KEY } from '../ui/fzf.js';
import { deletionBox } from '../ui/ui.js';
import { errorMessage } from '../utils/errors.js';
import { CHAT_VIEW_EXPECT_KEYS, type BrowserContext, type Transition } from './context.js';
import { promptForApiKey } from './key-prompt.js';

type DeletionMode = 'delete' | 'purge';

/**
 * What the finder loop settled on before the view reloads
 */
type ChatOutcome =
  | { kind: 'leave'; transition: Transition }
  | { kind: 'remove'; mode: DeletionMode; targets: Conversation[] };

export function chatViewHeader(ctx: BrowserContext, project: Project, conversations: readonly Conversation[]): string {
  const key = chalk.dim;
  const perms = ctx.preferences.skipPermissions ? chalk.green('perms') : chalk.dim('perms');
  const ai = ctx.preferences.aiSummaries ? chalk.green('ai') : chalk.dim('ai');
  const empty = emptyConversations(conversations).length;
  const purgeHint = empty > 0 ? `  ${key('^d')} purge ${empty} empty` : '';

  return [
    `  ${chalk.bold(project.displayName)}  ${chalk.dim(`${conversations.length} chats`)}`,
    `  ${key('ret')} go ${key('^n')} new ${key('^p')} ${perms} ${key('^s')} ${ai} ${key('^x')} del ${key('bs')} back${purgeHint}`,
  ].join('\n');
}

export function buildChatLines(ctx: BrowserContext, conversations: readonly Conversation[]): string[] {
  const width = indexWidth(conversations.length);
  const columns = ctx.screen.columns();
  return conversations.map((conversation, index) => {
    const summary = ctx.preferences.aiSummaries ? ctx.summaries.get(conversation.id) : undefined;
    return withRowIndex(index, formatChatLine(index, conversation, width, columns, summary));
  });
}

/**
 * Summarize conversations missing from the cache, showing progress
 */
export async function generateSummaries(
  ctx: BrowserContext,
  apiKey: string,
  conversations: readonly Conversation[]
): Promise<void> {
  const generator = new SummaryGenerator(ctx.createSummarizer(apiKey), ctx.summaries, {
    concurrency: ctx.config.summaryConcurrency,
    logger: ctx.logger,
  });

  const pending = generator.pending(conversations).length;
  if (pending === 0) {
    return;
  }

  const progress = ctx.progress(`Summarizing 0/${pending}...`);
  try {
    const report = await generator.generateMissing(conversations, (completed, total) => {
      progress.update(`Summarizing ${completed}/${total}...`);
    });
    progress.done(`Summarized ${report.generated}/${report.requested}`);
    if (report.failed > 0) {
      ctx.logger.warn('Some summaries could not be generated', { failed: report.failed });
    }
  } catch (error) {
    progress.done();
    throw error;
  }
}

/**
 * Flip summaries; turning them on without a stored key asks for one, and an
 * empty answer turns them back off
 */
export async function toggleSummaries(ctx: BrowserContext, conversations: readonly Conversation[]): Promise<void> {
  const enabled = await ctx.preferences.toggleSummaries();
  if (!enabled) {
    return;
  }

  const apiKey = (await ctx.apiKeys.load()) ?? (await promptForApiKey(ctx.prompter, ctx.screen, ctx.apiKeys));
  if (!apiKey) {
    await ctx.preferences.setSummaries(false);
    return;
  }
  await generateSummaries(ctx, apiKey, conversations);
}

async function writePreviewMap(conversations: readonly Conversation[]): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'chatdeck-'));
  const mapFile = path.join(dir, 'previews.txt');
  await fs.writeFile(mapFile, conversations.map((conversation) => conversation.filePath).join('\n') + '\n', 'utf-8');
  return mapFile;
}

/**
 * Run the finder until a key leaves the view or asks for a deletion
 */
async function selectAction(
  ctx: BrowserContext,
  project: Project,
  conversations: Conversation[],
  mapFile: string
): Promise<ChatOutcome> {
  let lines = buildChatLines(ctx, conversations);

  for (;;) {
    const { key, selections } = await ctx.finder.select(lines, {
      header: chatViewHeader(ctx, project, conversations),
      prompt: ' ',
      multi: true,
      expectKeys: CHAT_VIEW_EXPECT_KEYS,
      previewCommand: ctx.previewCommand(mapFile),
    });
    const chosen = selections
      .map((line) => conversations[parseRowIndex(line)])
      .filter((conversation): conversation is Conversation => conversation !== undefined);

    switch (key) {
      case CANCEL_KEY:
        return { kind: 'leave', transition: { kind: 'exit' } };

      case 'ctrl-p':
        await ctx.preferences.toggleSkipPermissions();
        continue;

      case 'ctrl-s':
        await toggleSummaries(ctx, conversations);
        lines = buildChatLines(ctx, conversations);
        continue;

      case 'ctrl-n': {
        // Newest first: a missing project starts where its latest session ran
        const request = await ctx.launcher.request(
          project.realPath,
          { skipPermissions: ctx.preferences.skipPermissions },
          project.missing ? conversations[0]?.filePath : undefined
        );
        return { kind: 'leave', transition: { kind: 'launch', request } };
      }

      case 'ctrl-d': {
        const targets = emptyConversations(conversations);
        if (targets.length === 0) continue;
        return { kind: 'remove', mode: 'purge', targets };
      }

      case 'ctrl-x':
        if (chosen.length === 0) continue;
        return { kind: 'remove', mode: 'delete', targets: chosen };

      case '': {
        const [target] = chosen;
        if (!target) {
          return { kind: 'leave', transition: { kind: 'projects' } };
        }
        const request = await ctx.launcher.request(
          project.realPath,
          { resumeId: target.id, skipPermissions: ctx.preferences.skipPermissions },
          target.filePath
        );
        return { kind: 'leave', transition: { kind: 'launch', request } };
      }

      default:
        return { kind: 'leave', transition: { kind: 'projects' } };
    }
  }
}

/**
 * Show what is about to go, ask, and delete on "y"
 */
export async function confirmAndDelete(
  ctx: BrowserContext,
  project: Project,
  mode: DeletionMode,
  targets: Conversation[],
  conversations: readonly Conversation[]
): Promise<DeletionReport | null> {
  const noun = plural(targets.length, 'conversation');

  ctx.screen.clear();
  ctx.screen.print(
    deletionBox(
      `Delete ${noun}  (${formatTotalSize(totalSize(targets))})`,
      `from ${project.displayName}`,
      targets.map(formatDeletionLine)
    )
  );

  const confirmed = await ctx.prompter.confirm(
    `  ${chalk.bold('Confirm delete?')} ${chalk.red('y')}${chalk.dim('/')}${chalk.green('N')} `
  );
  if (!confirmed) {
    ctx.screen.print();
    ctx.screen.print(`  ${chalk.dim('Cancelled.')}`);
    ctx.screen.print();
    await ctx.prompter.pause();
    return null;
  }

  const report = mode === 'purge'
    ? await ctx.conversations.purgeEmpty(conversations)
    : await ctx.conversations.delete(targets);

  for (const failure of report.failed) {
    ctx.screen.print(`  ${chalk.red(`Error: ${failure.conversation.id}: ${failure.error}`)}`);
  }
  ctx.screen.print();
  ctx.screen.print(`  ${chalk.green.bold(`Deleted ${plural(report.deleted.length, 'conversation')}.`)}`);
  ctx.screen.print();
  await ctx.prompter.pause();
  return report;
}

/**
 * Stays on one project until the user goes back, quits or launches a session.
 * The list is re-read from disk after every deletion.
 */
export async function runChatView(ctx: BrowserContext, project: Project): Promise<Transition> {
  for (;;) {
    const progress = ctx.progress(`Loading ${project.displayName}...`);
    const conversations = await ctx.conversations.list(project.storageDir);
    progress.done();

    if (conversations.length === 0) {
      return { kind: 'projects' };
    }

    if (ctx.preferences.aiSummaries) {
      const apiKey = await ctx.apiKeys.load();
      if (apiKey) {
        await generateSummaries(ctx, apiKey, conversations);
      }
    }

    const mapFile = await writePreviewMap(conversations);
    let outcome: ChatOutcome;
    try {
      ctx.screen.clear();
      outcome = await selectAction(ctx, project, conversations, mapFile);
    } finally {
      await fs.rm(path.dirname(mapFile), { recursive: true, force: true }).catch((error: unknown) => {
        ctx.logger.debug('Cannot remove preview map', { mapFile, error: errorMessage(error) });
      });
    }

    if (outcome.kind === 'leave') {
      return outcome.transition;
    }
    await confirmAndDelete(ctx, project, outcome.mode, outcome.targets, conversations);
  }
}
