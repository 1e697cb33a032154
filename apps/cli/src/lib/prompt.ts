/**
 * Terminal prompts
 */

import chalk from 'chalk';
import { createInterface } from 'node:readline';
import type { Prompter } from '@encodeq/core';

/**
 * Prompter on stdin/stdout. Ctrl+C or end of input at a prompt answers
 * "q", so every prompt can be backed out of.
 */
export class ReadlinePrompter implements Prompter {
  ask(question: string): Promise<string> {
    const rl = createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    return new Promise((resolve) => {
      rl.once('SIGINT', () => {
        process.stdout.write('\n');
        rl.close();
      });
      // Fires after an answer too; the promise is settled by then
      rl.once('close', () => resolve('q'));
      rl.question(chalk.bold(question), (answer) => {
        resolve(answer);
        rl.close();
      });
    });
  }

  say(message: string): void {
    console.log(message);
  }
}
