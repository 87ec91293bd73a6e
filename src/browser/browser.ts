// ============================================================================
// chatdeck - Browser
// Drives the project and chat views until the user quits or launches
// ============================================================================

import type { BrowserContext, Transition } from './context.js';
import type { LaunchRequest } from './launcher.js';
import { runChatView } from './chat-view.js';
import { runProjectView } from './project-view.js';

export class Browser {
  constructor(private readonly ctx: BrowserContext) {}

  /**
   * Load persisted preferences and cached summaries
   */
  async load(): Promise<void> {
    await this.ctx.preferences.load();
    await this.ctx.summaries.load();
  }

  /**
   * Resolves with the session to start, or null when the user quit
   */
  async run(): Promise<LaunchRequest | null> {
    let state: Transition = { kind: 'projects' };

    for (;;) {
      this.ctx.logger.debug('Browser state', { state: state.kind });
      switch (state.kind) {
        case 'projects':
          state = await runProjectView(this.ctx);
          break;
        case 'chats':
          state = await runChatView(this.ctx, state.project);
          break;
        case 'launch':
          return state.request;
        case 'exit':
          return null;
      }
    }
  }
}
