import chalk from 'chalk';
import type { Effect } from 'effect';
import type { CardService } from '../../lib/card-service.js';
import type { JiraClient } from '../../lib/jira-client.js';
import type { DomainResolver } from '../../lib/resolver.js';
import type { ShellIO } from '../shell-io.js';
import { splitCommandLine } from '../utils/args.js';
import { runEffect } from '../utils/run.js';
import { type CommandSpec, describeCommands, resolveCommand } from './commands.js';

export interface ShellContext {
  client: JiraClient;
  resolver: DomainResolver;
  cards: CardService;
  io: ShellIO;
}

export type CommandOutcome = 'quit' | 'continue';

/**
 * A read-dispatch loop over a static command table. Errors end the command, never the loop.
 */
export abstract class BasePrompt<C extends CommandSpec> {
  protected abstract readonly commands: readonly C[];

  constructor(protected readonly ctx: ShellContext) {}

  protected abstract promptText(): string;

  protected abstract execute(command: C['name'], args: string[]): Promise<CommandOutcome>;

  async loop(): Promise<void> {
    for (;;) {
      const line = await this.ctx.io.readLine(this.promptText());
      if (line === undefined) return;
      if ((await this.runLine(line)) === 'quit') return;
    }
  }

  runLine(line: string): Promise<CommandOutcome> {
    return this.runWords(splitCommandLine(line));
  }

  async runWords(words: readonly string[]): Promise<CommandOutcome> {
    const [word, ...args] = words;
    if (word === undefined) return 'continue';

    const command = resolveCommand(this.commands, word);
    if (!command) {
      this.ctx.io.print(chalk.yellow(`Unknown command: ${word}. Type 'help' for the list.`));
      return 'continue';
    }

    try {
      return await this.execute(command.name, args);
    } catch (error) {
      this.report(error);
      return 'continue';
    }
  }

  protected printCommands(): void {
    this.ctx.io.print(describeCommands(this.commands));
  }

  protected run<A, E>(effect: Effect.Effect<A, E>, spinnerText?: string): Promise<A> {
    return spinnerText ? this.ctx.io.withSpinner(spinnerText, () => runEffect(effect)) : runEffect(effect);
  }

  protected report(error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.ctx.io.print(chalk.red(`Error: ${message}`));
  }
}
