// ============================================================================
// chatdeck - Project View
// ============================================================================

import { promises as fs } from 'fs';
import * as path from 'path';
import * as os from 'os';
import chalk from 'chalk';
import { SORT_LABELS, type Project } from '../types/chat-types.js';
import { expandHome } from '../config/env-loader.js';
import { sortProjects } from '../projects/project-scanner.js';
import { formatProjectLine, parseRowIndex, withRowIndex } from '../ui/format.js';
import { CANCEL_KEY } from '../ui/fzf.js';
import { errorMessage } from '../utils/errors.js';
import { PROJECT_VIEW_EXPECT_KEYS, type BrowserContext, type Transition } from './context.js';

function toggleIndicator(label: string, on: boolean): string {
  return on ? chalk.green(label) : chalk.dim(label);
}

export function projectViewHeader(ctx: BrowserContext, projects: readonly Project[]): string {
  const total = projects.reduce((sum, project) => sum + project.conversationCount, 0);
  const perms = toggleIndicator('perms', ctx.preferences.skipPermissions);
  const sort = chalk.cyan(SORT_LABELS[ctx.preferences.sort]);
  const key = chalk.dim;

  return [
    `  ${chalk.dim(`${total} chats, ${projects.length} projects`)}`,
    `  ${key('enter')} open  ${key('^n')} new  ${key('^f')} folder  ${key('^e')} explorer  ${key('^p')} ${perms}  ${key('tab')} ${sort}  ${key('esc')} quit`,
  ].join('\n');
}

/**
 * Project at the row a finder line points to
 */
function projectAt(sorted: readonly Project[], line: string | undefined): Project | undefined {
  return line === undefined ? undefined : sorted[parseRowIndex(line)];
}

async function launchNew(ctx: BrowserContext, directory: string, sessionFile?: string): Promise<Transition> {
  const request = await ctx.launcher.request(
    directory,
    { skipPermissions: ctx.preferences.skipPermissions },
    sessionFile
  );
  return { kind: 'launch', request };
}

/**
 * New session in a listed project. For a missing project the directory
 * recorded in its newest transcript beats the decoded path.
 */
async function launchInProject(ctx: BrowserContext, project: Project): Promise<Transition> {
  if (!project.missing) {
    return launchNew(ctx, project.realPath);
  }
  const newest = await ctx.scanner.newestTranscript(project);
  return launchNew(ctx, project.realPath, newest ?? undefined);
}

/**
 * Ask for a folder, create it and its storage entry, then start a session there
 */
async function createFolder(ctx: BrowserContext): Promise<Transition> {
  ctx.screen.clear();
  ctx.screen.print();
  ctx.screen.print(`  ${chalk.bold('New project folder')}`);
  const answer = await ctx.prompter.ask(`  ${chalk.dim('Enter path (~ allowed):')} `);
  if (!answer) {
    return { kind: 'projects' };
  }

  const folder = path.resolve(ctx.cwd, expandHome(answer, os.homedir()));
  try {
    await fs.mkdir(folder, { recursive: true });
    await ctx.scanner.ensureProjectEntry(folder);
  } catch (error) {
    ctx.logger.warn('Cannot create project folder', { folder, error: errorMessage(error) });
    ctx.screen.print();
    ctx.screen.print(`  ${chalk.red(`Error: ${errorMessage(error)}`)}`);
    ctx.screen.print();
    await ctx.prompter.pause();
    return { kind: 'projects' };
  }

  return launchNew(ctx, folder);
}

/**
 * Offer to remove the storage folder of a project without conversations
 */
async function offerEmptyProjectRemoval(ctx: BrowserContext, project: Project): Promise<Transition> {
  ctx.screen.clear();
  ctx.screen.print();
  ctx.screen.print(`  ${chalk.bold(project.displayName)}  ${chalk.dim('has no conversations.')}`);
  ctx.screen.print();

  if (await ctx.prompter.confirm(`  ${chalk.dim('Delete empty folder? (y/N):')} `)) {
    await ctx.scanner.removeProject(project);
    ctx.screen.print();
    ctx.screen.print(`  ${chalk.green.bold('Deleted folder.')}`);
  } else {
    ctx.screen.print();
    ctx.screen.print(`  ${chalk.dim('Skipped.')}`);
  }
  ctx.screen.print();
  await ctx.prompter.pause();
  return { kind: 'projects' };
}

/**
 * One round of the project list
 */
export async function runProjectView(ctx: BrowserContext): Promise<Transition> {
  const projects = await ctx.scanner.listProjects();
  if (projects.length === 0) {
    ctx.screen.print('No chats found.');
    return { kind: 'exit' };
  }

  const sorted = sortProjects(projects, ctx.preferences.sort);
  const columns = ctx.screen.columns();
  const maxNameLength = Math.max(...projects.map((project) => project.displayName.length));
  const lines = sorted.map((project, index) =>
    withRowIndex(index, formatProjectLine(project, maxNameLength, columns))
  );

  ctx.screen.clear();
  const { key, selections } = await ctx.finder.select(lines, {
    header: projectViewHeader(ctx, projects),
    prompt: ' Projects > ',
    expectKeys: PROJECT_VIEW_EXPECT_KEYS,
    borderLabel: ctx.resolver.displayName(ctx.cwd),
  });
  const highlighted = projectAt(sorted, selections[0]);

  switch (key) {
    case CANCEL_KEY:
      return { kind: 'exit' };

    case 'tab':
      await ctx.preferences.cycleSort();
      return { kind: 'projects' };

    case 'ctrl-p':
      await ctx.preferences.toggleSkipPermissions();
      return { kind: 'projects' };

    case 'ctrl-e':
      if (highlighted && !highlighted.missing) {
        ctx.openFolder(highlighted.realPath);
      } else if (highlighted) {
        ctx.logger.warn('Project folder does not exist', { path: highlighted.realPath });
      }
      return { kind: 'projects' };

    case 'ctrl-n':
      return highlighted ? launchInProject(ctx, highlighted) : launchNew(ctx, ctx.cwd);

    case 'ctrl-f':
      return createFolder(ctx);

    case '':
      if (!highlighted) {
        return { kind: 'exit' };
      }
      if (highlighted.conversationCount === 0) {
        return offerEmptyProjectRemoval(ctx, highlighted);
      }
      return { kind: 'chats', project: highlighted };

    default:
      return { kind: 'projects' };
  }
}
