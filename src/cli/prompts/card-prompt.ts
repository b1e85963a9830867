import chalk from 'chalk';
import { issueCollection } from '../../lib/collections/issues.js';
import { parseWorklogText, worklogCollection } from '../../lib/collections/worklogs.js';
import { InvalidLabelError } from '../../lib/errors.js';
import type { Issue } from '../../lib/jira-client.js';
import { BasePrompt, type CommandOutcome, type ShellContext } from './base-prompt.js';
import { CARD_COMMANDS, type CardCommandName } from './commands.js';

const words = (text: string) => text.split(/\s+/).filter((word) => word.length > 0);

/**
 * Commands against a single card.
 */
export class CardPrompt extends BasePrompt<(typeof CARD_COMMANDS)[number]> {
  protected readonly commands = CARD_COMMANDS;

  constructor(
    ctx: ShellContext,
    private issue: Issue,
  ) {
    super(ctx);
  }

  get key(): string {
    return this.issue.key;
  }

  async start(): Promise<void> {
    this.ctx.io.print(`\nIn card prompt for '${this.key}'; commands you can use here:\n`);
    this.printCommands();
    this.ctx.io.print("\nUse 'quit' to return to the main prompt.\n");
    await this.loop();
  }

  protected promptText(): string {
    return `(card ${this.key}) `;
  }

  protected async execute(command: CardCommandName, args: string[]): Promise<CommandOutcome> {
    switch (command) {
      case 'ls':
        await this.reloadIssue();
        this.ctx.io.print(issueCollection([this.issue]).render(false));
        break;
      case 'logwork':
        await this.logWork(args);
        break;
      case 'lswork': {
        const worklogs = await this.run(this.ctx.cards.worklogsFor(this.key), 'Loading worklogs...');
        this.ctx.io.print(worklogCollection(worklogs).render());
        break;
      }
      case 'editwork':
        await this.editWork();
        break;
      case 'timeleft': {
        const time = args.length > 0 ? args.join(' ') : await this.ctx.io.ask('Enter time left (e.g. 2h30m):');
        await this.run(this.ctx.cards.editRemainingTime(this.key, time), 'Updating remaining time...');
        await this.reloadIssue();
        break;
      }
      case 'component': {
        const text =
          args.join(' ') ||
          (await this.ctx.io.choose('Enter component', Object.keys(this.ctx.resolver.componentLabelsMap)));
        const name = await this.run(this.ctx.cards.updateComponent(this.key, text), 'Updating component...');
        this.ctx.io.print(`Component set to ${name}`);
        break;
      }
      case 'addlabels':
        await this.addLabels(args);
        break;
      case 'rmlabels': {
        const labels = args.length > 0 ? args : words(await this.ctx.io.ask('Enter label names (separated by space):'));
        await this.run(this.ctx.cards.removeLabels(this.key, labels), 'Removing labels...');
        break;
      }
      case 'status':
        await this.changeStatus(args.join(' '));
        break;
      case 'done': {
        const status = await this.run(this.ctx.cards.done(this.key), 'Closing...');
        this.ctx.io.print(`${this.key} moved to ${status}`);
        break;
      }
      case 'backlog':
        await this.run(this.ctx.cards.moveToBacklog(this.key), 'Moving to backlog...');
        this.ctx.io.print(`${this.key} moved to the backlog`);
        break;
      case 'pull': {
        const sprint = await this.run(this.ctx.cards.pullIntoCurrentSprint(this.key), 'Pulling into sprint...');
        this.ctx.io.print(`${this.key} pulled into ${sprint}`);
        break;
      }
      case 'remove':
        if (!(await this.ctx.io.confirm(`Delete ${this.key}?`))) {
          this.ctx.io.print('Cancelled');
          break;
        }
        await this.run(this.ctx.cards.remove(this.key), 'Deleting...');
        this.ctx.io.print('Deleted card, returning to main prompt...');
        return 'quit';
      case 'assign':
        await this.assign(args[0]);
        break;
      case 'help':
        this.printCommands();
        break;
      case 'quit':
        return 'quit';
    }
    return 'continue';
  }

  private async reloadIssue(): Promise<void> {
    this.issue = await this.run(this.ctx.cards.getIssue(this.key), `Loading ${this.key}...`);
  }

  private async logWork(args: string[]): Promise<void> {
    const [first, ...rest] = args;
    const time = first ?? (await this.ctx.io.ask('Enter time spent (e.g. 2h30m):'));
    const comment = rest.length > 0 ? rest.join(' ') : await this.ctx.io.ask('Enter comment:');
    await this.run(this.ctx.cards.logWork(this.key, time, comment), 'Logging work...');
  }

  private async editWork(): Promise<void> {
    const current = await this.run(this.ctx.cards.worklogsFor(this.key), 'Loading worklogs...');
    const edited = await this.ctx.io.edit(worklogCollection(current).toText());
    const entries = parseWorklogText(edited);

    this.ctx.io.print('\nNew worklog data will be:\n');
    this.ctx.io.print(edited);
    if (!(await this.ctx.io.confirm('Are you sure you want to update worklogs?'))) {
      this.ctx.io.print('Cancelled');
      return;
    }
    await this.run(this.ctx.cards.replaceWorklogs(this.key, current, entries), 'Updating worklogs...');
  }

  private async addLabels(args: string[]): Promise<void> {
    let labels = args;
    if (labels.length === 0) {
      const component = this.issue.fields.components[0]?.name.toLowerCase();
      labels = component
        ? words(await this.ctx.io.choose('Select label', this.ctx.resolver.componentLabelsMap[component] ?? []))
        : words(await this.ctx.io.ask('Enter label(s):'));
    }

    try {
      await this.run(this.ctx.cards.addLabels(this.key, labels), 'Adding labels...');
    } catch (error) {
      if (!(error instanceof InvalidLabelError)) throw error;
      this.ctx.io.print(chalk.yellow(error.message));
      if (await this.ctx.io.confirm('Add these labels anyway?')) {
        await this.run(this.ctx.cards.addLabels(this.key, labels, true), 'Adding labels...');
      }
    }
    await this.reloadIssue();
  }

  private async changeStatus(text: string): Promise<void> {
    const available = await this.run(this.ctx.resolver.availableTransitions(this.key), 'Loading transitions...');
    let id = text ? this.ctx.resolver.resolveStatusId(available, text) : undefined;

    if (!id) {
      if (text) this.ctx.io.print(`"${text}" is an invalid status for this issue.`);
      this.ctx.io.print('Available statuses:\n');
      for (const status of available) {
        this.ctx.io.print(`  ${status.localNum}) ${status.friendlyName}`);
      }
      while (!id) {
        const answer = await this.ctx.io.ask('Select new status (enter number from above, blank to cancel):');
        if (!answer.trim()) {
          this.ctx.io.print('Status unchanged.');
          return;
        }
        id = this.ctx.resolver.resolveStatusId(available, answer);
      }
    }

    await this.run(this.ctx.client.transitionIssueEffect(this.key, id), 'Changing status...');
  }

  private async assign(user: string | undefined): Promise<void> {
    const assignee = user ?? (await this.ctx.io.ask('Enter assignee user id: [blank to unassign]'));
    if (!assignee && !(await this.ctx.io.confirm('Leaving assignee blank would unassign the card. Continue?'))) {
      this.ctx.io.print('Assignment did not change.');
      return;
    }
    await this.run(this.ctx.cards.assign(this.key, assignee || null), 'Assigning...');
  }
}
