import { createInterface } from 'node:readline/promises';
import { confirm, input, select } from '@inquirer/prompts';
import ora from 'ora';
import { editText } from './utils/editor.js';
import { runEffect } from './utils/run.js';

/**
 * Everything the prompts do with the terminal.
 */
export interface ShellIO {
  /** one command line; undefined at end of input */
  readLine(prompt: string): Promise<string | undefined>;
  print(text: string): void;
  ask(message: string, defaultValue?: string): Promise<string>;
  confirm(message: string): Promise<boolean>;
  /** pick one of `options`, or type something else */
  choose(message: string, options: readonly string[], defaultValue?: string): Promise<string>;
  /** open the editor on `text`; comment lines are dropped from the result */
  edit(text: string): Promise<string>;
  withSpinner<A>(text: string, task: () => Promise<A>): Promise<A>;
}

const OTHER = '\u0000other';

export class TerminalIO implements ShellIO {
  readLine(prompt: string): Promise<string | undefined> {
    // a fresh interface per line leaves stdin free for the question prompts in between
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    return new Promise((resolve) => {
      let answered = false;
      rl.on('close', () => {
        if (!answered) resolve(undefined);
      });
      rl.question(prompt).then(
        (answer) => {
          answered = true;
          rl.close();
          resolve(answer);
        },
        () => resolve(undefined),
      );
    });
  }

  print(text: string): void {
    console.log(text);
  }

  ask(message: string, defaultValue?: string): Promise<string> {
    return input({ message, default: defaultValue });
  }

  confirm(message: string): Promise<boolean> {
    return confirm({ message, default: false });
  }

  async choose(message: string, options: readonly string[], defaultValue?: string): Promise<string> {
    if (options.length === 0) return this.ask(message, defaultValue);

    const sorted = [...options].sort();
    const picked = await select({
      message,
      default: defaultValue,
      choices: [...sorted.map((value) => ({ name: value, value })), { name: '(type your own)', value: OTHER }],
    });
    return picked === OTHER ? this.ask(message, defaultValue) : picked;
  }

  edit(text: string): Promise<string> {
    return runEffect(editText(text));
  }

  async withSpinner<A>(text: string, task: () => Promise<A>): Promise<A> {
    const spinner = ora(text).start();
    try {
      const result = await task();
      spinner.stop();
      return result;
    } catch (error) {
      spinner.fail();
      throw error;
    }
  }
}
