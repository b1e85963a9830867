import { stripVTControlCharacters } from 'node:util';
import type { ShellContext } from '../cli/prompts/base-prompt.js';
import type { ShellIO } from '../cli/shell-io.js';
import { CardService } from '../lib/card-service.js';
import type { ComponentLabels, Config } from '../lib/config.js';
import { JiraClient, type SessionOptions, type SessionPrompter } from '../lib/jira-client.js';
import { createMemoryLogger, type LogEntry } from '../lib/logging.js';
import { DomainResolver } from '../lib/resolver.js';
import { JIRA_URL } from './mocks/handlers.js';

export function testConfig(overrides: Partial<Config> = {}): Config {
  return {
    jiraUrl: JIRA_URL,
    auth: { mode: 'basic', username: 'tester', password: 'test-secret' },
    verifySsl: true,
    board: 'Team Board',
    project: 'PROJ',
    labelCheck: true,
    excludedTransitionMarker: 'Parallel Team',
    logLevel: 'fatal',
    ...overrides,
  };
}

export const TEST_LABELS: ComponentLabels = {
  Backend: ['api', 'db'],
  Frontend: ['ux'],
};

/**
 * Answers session questions from fixed lists and remembers what was asked.
 */
export class ScriptedPrompter implements SessionPrompter {
  readonly asked: string[] = [];

  constructor(
    private readonly passwords: string[] = [],
    private readonly confirms: boolean[] = [],
  ) {}

  async password(message: string): Promise<string> {
    this.asked.push(message);
    const answer = this.passwords.shift();
    if (answer === undefined) throw new Error(`No scripted password for: ${message}`);
    return answer;
  }

  async confirm(message: string): Promise<boolean> {
    this.asked.push(message);
    const answer = this.confirms.shift();
    if (answer === undefined) throw new Error(`No scripted confirmation for: ${message}`);
    return answer;
  }

  async waitForEnter(message: string): Promise<void> {
    this.asked.push(message);
  }
}

export interface TestShell extends ShellContext {
  entries: LogEntry[];
}

export function createTestShell(
  options: { config?: Partial<Config>; labels?: ComponentLabels; io?: ShellIO; session?: Partial<SessionOptions> } = {},
): TestShell {
  const config = testConfig(options.config);
  const { logger, entries } = createMemoryLogger('trace');
  const client = new JiraClient({ config, logger, prompter: new ScriptedPrompter(), ...options.session });
  const resolver = new DomainResolver(client, config, options.labels ?? TEST_LABELS, logger);
  const cards = new CardService(client, resolver, logger);
  return { client, resolver, cards, io: options.io ?? new ScriptedIO(), entries };
}

/**
 * A terminal that replays scripted input and collects everything printed, without colors.
 */
export class ScriptedIO implements ShellIO {
  readonly output: string[] = [];
  readonly questions: string[] = [];
  /** what the editor was opened on, in order */
  readonly edited: string[] = [];

  constructor(
    private readonly script: {
      lines?: string[];
      answers?: string[];
      confirms?: boolean[];
      edits?: ((text: string) => string)[];
    } = {},
  ) {}

  async readLine(_prompt: string): Promise<string | undefined> {
    return this.script.lines?.shift();
  }

  print(text: string): void {
    this.output.push(stripVTControlCharacters(text));
  }

  async ask(message: string, defaultValue?: string): Promise<string> {
    this.questions.push(message);
    const answer = this.script.answers?.shift();
    if (answer === undefined) throw new Error(`No scripted answer for: ${message}`);
    return answer === '' && defaultValue !== undefined ? defaultValue : answer;
  }

  async confirm(message: string): Promise<boolean> {
    this.questions.push(message);
    const answer = this.script.confirms?.shift();
    if (answer === undefined) throw new Error(`No scripted confirmation for: ${message}`);
    return answer;
  }

  choose(message: string, _options: readonly string[], defaultValue?: string): Promise<string> {
    return this.ask(message, defaultValue);
  }

  async edit(text: string): Promise<string> {
    this.edited.push(text);
    const change = this.script.edits?.shift();
    if (!change) throw new Error('No scripted edit');
    return change(text);
  }

  withSpinner<A>(_text: string, task: () => Promise<A>): Promise<A> {
    return task();
  }

  get text(): string {
    return this.output.join('\n');
  }
}
