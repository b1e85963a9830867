export interface CommandSpec {
  readonly name: string;
  readonly aliases: readonly string[];
  readonly usage: string;
  readonly help: string;
}

export const MAIN_COMMANDS = [
  { name: 'reload', aliases: ['r'], usage: 'reload', help: 're-initialize the tracker connection' },
  {
    name: 'ls',
    aliases: ['l'],
    usage: 'ls [-u user] [-s sprint] [-S status] [-t text]',
    help: 'list cards, filtered on assignee, sprint, status or text',
  },
  { name: 'card', aliases: ['c'], usage: 'card N [command...]', help: 'enter the card prompt or run one command on card N' },
  {
    name: 'new',
    aliases: ['n'],
    usage: 'new [-e] [-s summary] [-d details] [-c component] [-l label] [-a assignee] [-S sprint] [-T timeleft] [-t type]',
    help: 'create a card in a sprint or the backlog',
  },
  { name: 'todayswork', aliases: ['tw'], usage: 'todayswork', help: "show today's worklogs for the listed cards" },
  { name: 'yesterdayswork', aliases: ['yw'], usage: 'yesterdayswork', help: "show yesterday's worklogs for the listed cards" },
  { name: 'help', aliases: ['?'], usage: 'help', help: 'show this list' },
  { name: 'quit', aliases: ['q'], usage: 'quit', help: 'exit' },
] as const satisfies readonly CommandSpec[];

export const CARD_COMMANDS = [
  { name: 'ls', aliases: ['l'], usage: 'ls', help: 're-load this card and show it' },
  { name: 'logwork', aliases: ['log'], usage: 'logwork [time] [comment...]', help: 'log work' },
  { name: 'lswork', aliases: ['lsw'], usage: 'lswork', help: 'show the work log' },
  { name: 'editwork', aliases: ['e'], usage: 'editwork', help: 'edit the full work log in $EDITOR' },
  { name: 'timeleft', aliases: ['t'], usage: 'timeleft [time]', help: 'set the remaining estimate' },
  { name: 'component', aliases: ['c'], usage: 'component [name]', help: 'set the component' },
  { name: 'addlabels', aliases: ['al'], usage: 'addlabels [label...]', help: 'add labels' },
  { name: 'rmlabels', aliases: ['rl'], usage: 'rmlabels [label...]', help: 'remove labels' },
  { name: 'status', aliases: ['s'], usage: 'status [name or number]', help: 'change the status' },
  { name: 'done', aliases: ['d'], usage: 'done', help: "set time left to 0 and status to 'done'" },
  { name: 'backlog', aliases: ['b'], usage: 'backlog', help: 'move this card to the backlog' },
  { name: 'pull', aliases: ['p'], usage: 'pull', help: 'pull this card into the current sprint' },
  { name: 'remove', aliases: ['r'], usage: 'remove', help: 'delete this card' },
  { name: 'assign', aliases: ['a'], usage: 'assign [user]', help: 'assign this card, or unassign it' },
  { name: 'help', aliases: ['?'], usage: 'help', help: 'show this list' },
  { name: 'quit', aliases: ['q', 'exit'], usage: 'quit', help: 'return to the main prompt' },
] as const satisfies readonly CommandSpec[];

export type MainCommandName = (typeof MAIN_COMMANDS)[number]['name'];
export type CardCommandName = (typeof CARD_COMMANDS)[number]['name'];

/**
 * Look a typed word up by command name or alias.
 */
export function resolveCommand<C extends CommandSpec>(table: readonly C[], word: string): C | undefined {
  const wanted = word.toLowerCase();
  return table.find((command) => command.name === wanted || command.aliases.some((alias) => alias === wanted));
}

export function describeCommands(table: readonly CommandSpec[]): string {
  const width = Math.max(...table.map((command) => command.usage.length));
  return table
    .map((command) => {
      const aliases = command.aliases.length > 0 ? ` (${command.aliases.join(', ')})` : '';
      return `  ${command.usage.padEnd(width)}  ${command.help}${aliases}`;
    })
    .join('\n');
}
