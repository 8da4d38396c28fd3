/**
 * Interactive prompts
 */

import readline from 'node:readline';
import inquirer from 'inquirer';

export type ConfirmPrompt = (message: string) => Promise<boolean>;

type PromptInput = NodeJS.ReadableStream & { isTTY?: boolean };

/** Only a single `y` or `Y` counts as yes. */
export function isAffirmative(answer: string): boolean {
  return /^[Yy]$/.test(answer.trim());
}

/** First line of `input`; empty when the stream ends without one. */
export function readAnswerLine(input: NodeJS.ReadableStream): Promise<string> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({ input, terminal: false });
    rl.once('line', (line) => {
      resolve(line);
      rl.close();
    });
    rl.once('close', () => resolve(''));
  });
}

/**
 * Asks through inquirer on a terminal. Piped or closed stdin (cron, CI,
 * `</dev/null`) is read as a single line instead; end of input means no.
 */
export function createConfirmPrompt(
  input: PromptInput = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): ConfirmPrompt {
  return async (message) => {
    if (!input.isTTY) {
      output.write(`${message} (y/n) `);
      const answer = await readAnswerLine(input);
      output.write('\n');
      return isAffirmative(answer);
    }

    const { answer } = await inquirer.prompt<{ answer: string }>([{
      type: 'input',
      name: 'answer',
      message: `${message} (y/n)`,
    }]);

    return isAffirmative(answer);
  };
}

export const askYesNo: ConfirmPrompt = createConfirmPrompt();
