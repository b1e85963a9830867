import { describe, expect, it } from 'vitest';
import { CARD_COMMANDS, describeCommands, MAIN_COMMANDS, resolveCommand } from './commands.js';

describe('resolveCommand', () => {
  it('finds commands by name or alias in any case', () => {
    expect(resolveCommand(MAIN_COMMANDS, 'todayswork')?.name).toBe('todayswork');
    expect(resolveCommand(MAIN_COMMANDS, 'TW')?.name).toBe('todayswork');
    expect(resolveCommand(CARD_COMMANDS, 'exit')?.name).toBe('quit');
    expect(resolveCommand(CARD_COMMANDS, 'log')?.name).toBe('logwork');
  });

  it('keeps the tables apart', () => {
    expect(resolveCommand(MAIN_COMMANDS, 'exit')).toBeUndefined();
    expect(resolveCommand(CARD_COMMANDS, 'new')).toBeUndefined();
  });

  it('has no alias used twice in a table', () => {
    for (const table of [MAIN_COMMANDS, CARD_COMMANDS]) {
      const words = table.flatMap((command) => [command.name, ...command.aliases]);
      expect(new Set(words).size).toBe(words.length);
    }
  });
});

describe('describeCommands', () => {
  it('aligns help after the usage column', () => {
    const text = describeCommands([
      { name: 'ls', aliases: ['l'], usage: 'ls', help: 'list' },
      { name: 'quit', aliases: [], usage: 'quit', help: 'exit' },
    ]);

    expect(text).toBe('  ls    list (l)\n  quit  exit');
  });
});
