// ============================================================================
// chatdeck - API Key Prompt
// ============================================================================

import chalk from 'chalk';
import type { ApiKeyStore } from '../summary/api-key.js';
import type { Prompter, Screen } from '../ui/prompts.js';

/**
 * Ask for a summarization key and store it. Resolves to null when the
 * answer is empty.
 */
export async function promptForApiKey(
  prompter: Prompter,
  screen: Screen,
  store: ApiKeyStore
): Promise<string | null> {
  screen.print();
  const key = await prompter.ask(`  ${chalk.bold('Paste Gemini API key:')} `);
  if (!key) {
    screen.print(`  ${chalk.dim('Cancelled.')}`);
    return null;
  }
  await store.save(key);
  screen.print(`  ${chalk.green(`Key saved to ${store.location}`)}`);
  screen.print();
  return key;
}
