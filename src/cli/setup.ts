import chalk from 'chalk';
import {
  type ComponentLabels,
  type Config,
  type ConfigManager,
  DEFAULT_CONFIG_TEMPLATE,
  DEFAULT_LABELS_TEMPLATE,
} from '../lib/config.js';
import { ConfigError } from '../lib/errors.js';
import type { ShellIO } from './shell-io.js';
import { runEffect } from './utils/run.js';

export interface Settings {
  config: Config;
  componentLabels: ComponentLabels;
}

const json = (value: unknown) => `${JSON.stringify(value, null, 2)}\n`;

/**
 * Load config.json and labels.json, offering to create each one in the editor when it is missing.
 */
export async function loadSettings(manager: ConfigManager, io: ShellIO): Promise<Settings> {
  if (!manager.configExists()) {
    io.print(`No configuration found at ${manager.configFile}`);
    if (!(await io.confirm('Create it now in your editor?'))) {
      throw new ConfigError(`Cannot start without a configuration; create ${manager.configFile} first`);
    }
    await runEffect(manager.writeConfigEffect(await io.edit(json(DEFAULT_CONFIG_TEMPLATE))));
    io.print(chalk.green(`Saved ${manager.configFile}`));
  }

  const config = await runEffect(
    manager.getConfigEffect((key) => io.print(chalk.yellow(`Warning: unknown config key '${key}' ignored`))),
  );

  if (!manager.labelsExist()) {
    io.print(`No component labels found at ${manager.labelsFile}`);
    if (await io.confirm('Create them now in your editor?')) {
      await runEffect(manager.writeLabelsEffect(await io.edit(json(DEFAULT_LABELS_TEMPLATE))));
      io.print(chalk.green(`Saved ${manager.labelsFile}`));
    } else {
      io.print(chalk.yellow('Warning: no component labels loaded; label checks and suggestions are off'));
    }
  }

  const componentLabels = await runEffect(manager.getComponentLabelsEffect());
  return { config, componentLabels };
}
