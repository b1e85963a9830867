import chalk from 'chalk';
import { Effect, Schema } from 'effect';
import { parse } from 'yaml';
import type { NewIssue } from '../../lib/card-service.js';
import { issueCollection } from '../../lib/collections/issues.js';
import type { ResourceCollection } from '../../lib/collections/resource-collection.js';
import { worklogCollection } from '../../lib/collections/worklogs.js';
import { InvalidLabelError, ParseError } from '../../lib/errors.js';
import type { Issue } from '../../lib/jira-client.js';
import { parseOptions } from '../utils/args.js';
import { BasePrompt, type CommandOutcome } from './base-prompt.js';
import { CardPrompt } from './card-prompt.js';
import { MAIN_COMMANDS, type MainCommandName } from './commands.js';

export const ISSUE_TYPES = ['Task', 'Story', 'Bug', 'Epic'];

export const ISSUE_TEMPLATE = `# Fill in the new card. Lines starting with '#' are ignored.
# Leave a value empty to use the default shown next to it.
summary:
details:
component:
label:
# default: yourself
assignee:
# sprint name, number or 'backlog'; default: the current sprint
sprint:
# e.g. 2h30m
timeleft:
# Task, Story, Bug or Epic; default: Task
issuetype:
`;

const OptionalText = Schema.optional(Schema.NullOr(Schema.Union(Schema.String, Schema.Number)));

const IssueTemplateSchema = Schema.Struct({
  summary: Schema.Union(Schema.String, Schema.Number),
  details: OptionalText,
  component: OptionalText,
  label: OptionalText,
  assignee: OptionalText,
  sprint: OptionalText,
  timeleft: OptionalText,
  issuetype: OptionalText,
});

const text = (value: string | number | null | undefined) =>
  value === null || value === undefined || String(value).trim() === '' ? undefined : String(value).trim();

/**
 * Read a filled-in issue template.
 *
 * @throws ParseError when the text is not a mapping with a summary
 */
export function parseIssueTemplate(source: string): NewIssue {
  let data: unknown;
  try {
    data = parse(source);
  } catch (error) {
    throw new ParseError(`The card template is not valid YAML: ${error}`, error);
  }
  const decoded = Schema.decodeUnknownEither(IssueTemplateSchema)(data);
  if (decoded._tag === 'Left') {
    throw new ParseError(`The card template needs at least a summary: ${decoded.left.message}`, decoded.left);
  }
  const t = decoded.right;
  const label = text(t.label);
  return {
    summary: String(t.summary),
    details: text(t.details),
    component: text(t.component),
    labels: label ? [label] : undefined,
    assignee: text(t.assignee),
    sprint: text(t.sprint),
    timeleft: text(t.timeleft),
    issuetype: text(t.issuetype),
  };
}

const LS_OPTIONS = [
  { short: 'u', long: 'user' },
  { short: 's', long: 'sprint' },
  { short: 'S', long: 'status' },
  { short: 't', long: 'text' },
];

const NEW_OPTIONS = [
  { short: 'e', long: 'editor', flag: true },
  { short: 's', long: 'summary' },
  { short: 'd', long: 'details' },
  { short: 'c', long: 'component' },
  { short: 'l', long: 'label' },
  { short: 'a', long: 'assignee' },
  { short: 'S', long: 'sprint' },
  { short: 'T', long: 'timeleft' },
  { short: 't', long: 'issue-type' },
];

export class MainPrompt extends BasePrompt<(typeof MAIN_COMMANDS)[number]> {
  protected readonly commands = MAIN_COMMANDS;
  private issues: ResourceCollection<Issue> | undefined;

  async start(): Promise<void> {
    this.ctx.io.print('\nWelcome to sprintdeck!\n');
    this.ctx.io.print('You are in the main prompt; commands you can use here:\n');
    this.printCommands();
    this.ctx.io.print("\nUse 'quit' to exit. Use 'help' to see this list again.\n");
    await this.reload();
    await this.loop();
  }

  get issueTable(): ResourceCollection<Issue> | undefined {
    return this.issues;
  }

  protected promptText(): string {
    return '(sprintdeck) ';
  }

  protected async execute(command: MainCommandName, args: string[]): Promise<CommandOutcome> {
    switch (command) {
      case 'reload':
        this.ctx.resolver.reload();
        this.ctx.client.reset();
        await this.reload();
        break;
      case 'ls':
        await this.list(args);
        break;
      case 'card':
        await this.card(args);
        break;
      case 'new':
        await this.create(args);
        break;
      case 'todayswork':
      case 'yesterdayswork': {
        const table = this.requireTable();
        if (!table) break;
        const worklogs = await this.run(
          command === 'todayswork'
            ? this.ctx.cards.todaysWorklogs(table.entries)
            : this.ctx.cards.yesterdaysWorklogs(table.entries),
          'Loading worklogs...',
        );
        this.ctx.io.print(worklogCollection(worklogs).render());
        break;
      }
      case 'help':
        this.printCommands();
        break;
      case 'quit':
        return 'quit';
    }
    return 'continue';
  }

  private async reload(): Promise<void> {
    const { resolver, client } = this.ctx;
    const info = await this.run(
      Effect.all({
        user: client.getCurrentUserIdEffect(),
        project: resolver.projectInfo(),
        board: resolver.boardInfo(),
        sprint: resolver.resolveCurrentSprint(),
      }),
      'Connecting to jira & gathering some info...',
    );
    this.ctx.io.print(`UserID: ${info.user}`);
    this.ctx.io.print(`Project ID: ${info.project.id}`);
    this.ctx.io.print(`Board ID: ${info.board.id}`);
    this.ctx.io.print(`Current sprint name: ${info.sprint.name}`);
    this.ctx.io.print(`Current sprint ID: ${info.sprint.id}`);
  }

  private requireTable(): ResourceCollection<Issue> | undefined {
    if (!this.issues) {
      this.ctx.io.print("No issue table generated yet. Run 'ls' first");
    }
    return this.issues;
  }

  private async list(args: string[]): Promise<void> {
    const { values } = parseOptions(args, LS_OPTIONS);
    const issues = await this.run(
      this.ctx.cards.listIssues({
        assignee: values.user,
        sprint: values.sprint,
        status: values.status,
        text: values.text,
      }),
      'Searching...',
    );
    this.issues = issueCollection(issues);
    this.ctx.io.print(this.issues.render());
  }

  private async card(args: string[]): Promise<void> {
    const table = this.requireTable();
    if (!table) return;

    const [number, ...rest] = args;
    if (number === undefined || !/^\d+$/.test(number)) {
      this.ctx.io.print('Usage: card N [command...]');
      return;
    }
    const prompt = new CardPrompt(this.ctx, table.select(Number.parseInt(number, 10)));
    if (rest.length > 0) {
      await prompt.runWords(rest);
    } else {
      await prompt.start();
    }
  }

  private async create(args: string[]): Promise<void> {
    const { values, flags } = parseOptions(args, NEW_OPTIONS);
    const defaults = await this.run(
      Effect.all({ user: this.ctx.client.getCurrentUserIdEffect(), sprint: this.ctx.resolver.resolveCurrentSprint() }),
    );

    let input: NewIssue;
    if (flags.has('editor')) {
      input = parseIssueTemplate(await this.ctx.io.edit(ISSUE_TEMPLATE));
    } else if (values.summary) {
      input = {
        summary: values.summary,
        details: values.details,
        component: values.component,
        labels: values.label ? [values.label] : undefined,
        assignee: values.assignee,
        sprint: values.sprint,
        timeleft: values.timeleft,
        issuetype: values['issue-type'],
      };
    } else {
      input = await this.askForIssue(defaults.user, defaults.sprint.name);
    }

    const issue: NewIssue = {
      ...input,
      assignee: input.assignee || defaults.user,
      // the current sprint is the default; resolving its name again could match a longer one
      sprint: input.sprint === defaults.sprint.name ? undefined : input.sprint,
      issuetype: input.issuetype || 'Task',
    };

    const key = await this.createWithLabelCheck(issue);
    this.ctx.io.print(chalk.green(`Created ${key}`));
  }

  private async askForIssue(user: string, sprint: string): Promise<NewIssue> {
    const { io, resolver } = this.ctx;
    io.print('Enter issue details below.');
    const summary = await io.ask('Summary/title:');
    const details = await io.ask('Details:', '');
    const component = await io.choose('Enter component', Object.keys(resolver.componentLabelsMap));
    const label = await io.choose('Enter label', resolver.componentLabelsMap[component.toLowerCase()] ?? []);
    const assignee = await io.ask('Assignee:', user);
    const sprintText = await io.ask("Sprint name, id, or 'backlog':", sprint);
    const timeleft = await io.ask('Time left (e.g. 2h30m):', '');
    const issuetype = await io.choose('Enter issue type', ISSUE_TYPES, 'Task');

    return {
      summary,
      details: details || undefined,
      component: component || undefined,
      labels: label ? [label] : undefined,
      assignee,
      sprint: sprintText,
      timeleft: timeleft || undefined,
      issuetype,
    };
  }

  private async createWithLabelCheck(issue: NewIssue): Promise<string> {
    try {
      return await this.run(this.ctx.cards.createIssue(issue), 'Creating card...');
    } catch (error) {
      if (!(error instanceof InvalidLabelError)) throw error;
      this.ctx.io.print(chalk.yellow(error.message));
      if (await this.ctx.io.confirm('Use these labels anyway?')) {
        return this.run(this.ctx.cards.createIssue({ ...issue, forceLabels: true }), 'Creating card...');
      }
      this.ctx.io.print("Removed labels from the issue, please use 'addlabels' later to add proper labels");
      return this.run(this.ctx.cards.createIssue({ ...issue, labels: undefined, forceLabels: true }), 'Creating card...');
    }
  }
}
