import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, ConfigManager, DEFAULT_CONFIG_TEMPLATE } from '../lib/config.js';
import { ScriptedIO } from '../test/test-helpers.js';
import { loadSettings } from './setup.js';

let dir: string;
let manager: ConfigManager;

const config = {
  jiraUrl: 'https://jira.test',
  auth: { mode: 'basic', username: 'tester' },
  board: 'Team Board',
  project: 'PROJ',
};

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'sprintdeck-setup-'));
  manager = new ConfigManager({ configFile: join(dir, 'config.json'), labelsFile: join(dir, 'labels.json') });
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('loadSettings', () => {
  it('loads existing files without asking', async () => {
    writeFileSync(manager.configFile, JSON.stringify(config));
    writeFileSync(manager.labelsFile, JSON.stringify({ Backend: ['api'] }));
    const io = new ScriptedIO();

    const settings = await loadSettings(manager, io);

    expect(settings.config.board).toBe('Team Board');
    expect(settings.componentLabels).toEqual({ Backend: ['api'] });
    expect(io.output).toEqual([]);
  });

  it('warns about unknown config keys', async () => {
    writeFileSync(manager.configFile, JSON.stringify({ ...config, colour: 'blue' }));
    writeFileSync(manager.labelsFile, '{}');
    const io = new ScriptedIO();

    await loadSettings(manager, io);

    expect(io.output).toEqual(["Warning: unknown config key 'colour' ignored"]);
  });

  it('creates a missing config from the edited template', async () => {
    const io = new ScriptedIO({ confirms: [true, false], edits: [() => JSON.stringify(config)] });

    const settings = await loadSettings(manager, io);

    expect(JSON.parse(io.edited[0])).toEqual(DEFAULT_CONFIG_TEMPLATE);
    expect(JSON.parse(readFileSync(manager.configFile, 'utf-8'))).toEqual(config);
    expect(settings.config.project).toBe('PROJ');
    expect(settings.componentLabels).toEqual({});
    expect(io.output).toEqual([
      `No configuration found at ${manager.configFile}`,
      `Saved ${manager.configFile}`,
      `No component labels found at ${manager.labelsFile}`,
      'Warning: no component labels loaded; label checks and suggestions are off',
    ]);
  });

  it('creates missing labels from the edited template', async () => {
    writeFileSync(manager.configFile, JSON.stringify(config));
    const io = new ScriptedIO({ confirms: [true], edits: [() => '{"Frontend": ["ux"]}'] });

    const settings = await loadSettings(manager, io);

    expect(settings.componentLabels).toEqual({ Frontend: ['ux'] });
    expect(io.output.at(-1)).toBe(`Saved ${manager.labelsFile}`);
  });

  it('stops when the user will not create a config', async () => {
    const io = new ScriptedIO({ confirms: [false] });

    await expect(loadSettings(manager, io)).rejects.toThrow(ConfigError);
    expect(manager.configExists()).toBe(false);
  });
});
