import { createInterface } from 'node:readline/promises';

export interface Prompter {
  ask(question: string): Promise<string>;
  confirm(question: string): Promise<boolean>;
}

/**
 * Prompts on the terminal. `ask` also reads piped input and returns an empty
 * string once the input has ended. `confirm` declines without a TTY, since
 * nobody is there to approve a save.
 */
export function createPrompter(
  input: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  async function ask(question: string): Promise<string> {
    const rl = createInterface({ input, output });
    let ended = false;
    const closed = new Promise<string>((resolve) =>
      rl.once('close', () => {
        ended = true;
        resolve('');
      })
    );
    const answer = rl.question(question).catch((error: unknown) => {
      if (ended) {
        return '';
      }
      throw error;
    });

    try {
      return await Promise.race([answer, closed]);
    } finally {
      rl.close();
    }
  }

  async function confirm(question: string): Promise<boolean> {
    if (!input.isTTY) {
      return false;
    }
    const answer = await ask(`${question} [y/N] `);
    return answer.trim().toLowerCase() === 'y';
  }

  return { ask, confirm };
}
