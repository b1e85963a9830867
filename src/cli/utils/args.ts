/**
 * Split a command line into words. Single and double quotes group words; a backslash
 * escapes the next character.
 */
export function splitCommandLine(line: string): string[] {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quote: '"' | "'" | undefined;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '\\' && i + 1 < line.length && quote !== "'") {
      current += line[++i];
      inWord = true;
    } else if (quote) {
      if (ch === quote) quote = undefined;
      else current += ch;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) words.push(current);
      current = '';
      inWord = false;
    } else {
      current += ch;
      inWord = true;
    }
  }
  if (inWord) words.push(current);
  return words;
}

export interface OptionSpec {
  short?: string;
  long: string;
  /** takes no value */
  flag?: boolean;
}

export interface ParsedOptions {
  values: Record<string, string>;
  flags: Set<string>;
  positionals: string[];
}

/**
 * Parse `-s value`, `--sprint value` and `--sprint=value` options. Unknown options are errors.
 *
 * @throws Error naming the unknown or incomplete option
 */
export function parseOptions(args: readonly string[], specs: readonly OptionSpec[]): ParsedOptions {
  const values: Record<string, string> = {};
  const flags = new Set<string>();
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('-') || arg === '-') {
      positionals.push(arg);
      continue;
    }

    const [name, inline] = arg.startsWith('--') ? splitInline(arg.slice(2)) : [arg.slice(1), undefined];
    const spec = specs.find((s) => (arg.startsWith('--') ? s.long === name : s.short === name));
    if (!spec) throw new Error(`Unknown option: ${arg}`);

    if (spec.flag) {
      flags.add(spec.long);
      continue;
    }
    const value = inline ?? args[++i];
    if (value === undefined) throw new Error(`Option ${arg} needs a value`);
    values[spec.long] = value;
  }

  return { values, flags, positionals };
}

function splitInline(option: string): [string, string | undefined] {
  const eq = option.indexOf('=');
  return eq === -1 ? [option, undefined] : [option.slice(0, eq), option.slice(eq + 1)];
}
