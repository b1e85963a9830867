import { spawn } from 'node:child_process';
import { readFile, unlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Effect } from 'effect';
import { FileError } from '../../lib/errors.js';
import { splitCommandLine } from './args.js';

/**
 * Drop lines whose first non-blank character is '#'.
 */
export function stripCommentLines(text: string): string {
  return text
    .split('\n')
    .filter((line) => !line.trimStart().startsWith('#'))
    .join('\n');
}

/**
 * The editor command and its arguments, `file` last. `$EDITOR` may carry its own flags, e.g. "code --wait".
 */
export function editorCommand(file: string, editor: string | undefined): [string, string[]] {
  const [command = 'vi', ...args] = splitCommandLine(editor ?? '');
  return [command, [...args, file]];
}

function runEditor(file: string): Promise<void> {
  const [command, args] = editorCommand(file, process.env.EDITOR);
  return new Promise((resolve, reject) => {
    // no shell, so the path reaches the editor as one argument whatever it contains
    const child = spawn(command, args, { stdio: 'inherit' });
    child.on('error', reject);
    child.on('exit', (code) => (code === 0 ? resolve() : reject(new Error(`${command} exited with code ${code}`))));
  });
}

/**
 * Open $EDITOR (vi by default) on `initial` and return the saved text without comment lines.
 */
export function editText(initial: string, extension = '.yaml'): Effect.Effect<string, FileError> {
  return Effect.tryPromise({
    try: async () => {
      const file = join(tmpdir(), `sprintdeck-${process.pid}-${Date.now()}${extension}`);
      await writeFile(file, initial, 'utf-8');
      try {
        await runEditor(file);
        return stripCommentLines(await readFile(file, 'utf-8'));
      } finally {
        await unlink(file);
      }
    },
    catch: (error) => new FileError(`Failed to edit text: ${error}`, error),
  });
}
