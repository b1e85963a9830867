import { describe, expect, it } from 'vitest';
import { parseOptions, splitCommandLine } from './args.js';

describe('splitCommandLine', () => {
  it('splits on whitespace', () => {
    expect(splitCommandLine('  ls -u  bob ')).toEqual(['ls', '-u', 'bob']);
    expect(splitCommandLine('')).toEqual([]);
  });

  it('groups quoted words', () => {
    expect(splitCommandLine('new -s "Fix the login" -d \'say "hi"\'')).toEqual(['new', '-s', 'Fix the login', '-d', 'say "hi"']);
    expect(splitCommandLine('log 1h "a \\"quoted\\" word"')).toEqual(['log', '1h', 'a "quoted" word']);
    expect(splitCommandLine('log 1h ""')).toEqual(['log', '1h', '']);
  });

  it('escapes with a backslash', () => {
    expect(splitCommandLine('log 1h fixed\\ it')).toEqual(['log', '1h', 'fixed it']);
  });
});

const specs = [
  { short: 's', long: 'sprint' },
  { short: 'e', long: 'editor', flag: true },
];

describe('parseOptions', () => {
  it('reads short, long and inline forms', () => {
    expect(parseOptions(['-s', '5', 'rest'], specs)).toEqual({ values: { sprint: '5' }, flags: new Set(), positionals: ['rest'] });
    expect(parseOptions(['--sprint', 'backlog'], specs).values).toEqual({ sprint: 'backlog' });
    expect(parseOptions(['--sprint=Sprint 5'], specs).values).toEqual({ sprint: 'Sprint 5' });
  });

  it('collects flags', () => {
    expect(parseOptions(['-e'], specs).flags).toEqual(new Set(['editor']));
  });

  it('rejects unknown and incomplete options', () => {
    expect(() => parseOptions(['-x'], specs)).toThrow('Unknown option: -x');
    expect(() => parseOptions(['--sprint'], specs)).toThrow('Option --sprint needs a value');
  });
});
