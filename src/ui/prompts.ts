// ============================================================================
// chatdeck - Terminal Prompts
// ============================================================================

import * as readline from 'readline';
import chalk from 'chalk';

/**
 * Line-based questions asked outside the finder
 */
export interface Prompter {
  /** Answer with surrounding whitespace removed */
  ask(question: string): Promise<string>;

  /** True only for y / yes */
  confirm(question: string): Promise<boolean>;

  pause(message?: string): Promise<void>;
}

/**
 * Plain output between finder runs
 */
export interface Screen {
  clear(): void;
  print(text?: string): void;
  columns(): number;
}

export class ReadlinePrompter implements Prompter {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  ask(question: string): Promise<string> {
    return new Promise((resolve) => {
      const rl = readline.createInterface({
        input: this.input,
        output: this.output
      });
      rl.question(question, (answer) => {
        rl.close();
        resolve(answer.trim());
      });
    });
  }

  async confirm(question: string): Promise<boolean> {
    const answer = (await this.ask(question)).toLowerCase();
    return answer === 'y' || answer === 'yes';
  }

  async pause(message: string = 'Press Enter...'): Promise<void> {
    await this.ask(`  ${chalk.dim(message)}`);
  }
}

export class TerminalScreen implements Screen {
  clear(): void {
    console.clear();
  }

  print(text: string = ''): void {
    console.log(text);
  }

  columns(): number {
    return process.stdout.columns || 80;
  }
}
