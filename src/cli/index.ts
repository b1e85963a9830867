import chalk from 'chalk';
import { CardService } from '../lib/card-service.js';
import { ConfigManager } from '../lib/config.js';
import { JiraClient } from '../lib/jira-client.js';
import { createLogger, defaultLogConfig, isLogLevel } from '../lib/logging.js';
import { DomainResolver } from '../lib/resolver.js';
import { MainPrompt } from './prompts/main-prompt.js';
import { loadSettings } from './setup.js';
import { TerminalIO } from './shell-io.js';
import { parseOptions } from './utils/args.js';

function showHelp() {
  console.log(`
${chalk.bold('sprintdeck - interactive sprint board shell')}

${chalk.yellow('Usage:')}
  sprintdeck [options]

${chalk.yellow('Options:')}
  -c, --config-file <path>    Use this config file instead of ~/.sprintdeck/config.json
  -l, --labels-file <path>    Use this labels file instead of ~/.sprintdeck/labels.json
  -h, --help                  Show this help message

${chalk.yellow('Environment:')}
  SPRINTDECK_CONFIG_DIR       Directory holding config.json and labels.json
  SPRINTDECK_LOG_LEVEL        trace, debug, info, warn, error or fatal
  SPRINTDECK_LOG_DETAILED     Set to 1 for timestamped log lines
  EDITOR                      Editor for templates and worklogs (default: vi)
`);
}

async function main() {
  const { values, flags } = parseOptions(process.argv.slice(2), [
    { short: 'c', long: 'config-file' },
    { short: 'l', long: 'labels-file' },
    { short: 'h', long: 'help', flag: true },
  ]);
  if (flags.has('help')) {
    showHelp();
    return;
  }

  const io = new TerminalIO();
  const manager = new ConfigManager({ configFile: values['config-file'], labelsFile: values['labels-file'] });
  const { config, componentLabels } = await loadSettings(manager, io);

  // the environment wins over the config file
  const logConfig = defaultLogConfig();
  const logger = createLogger({
    ...logConfig,
    level: isLogLevel(process.env.SPRINTDECK_LOG_LEVEL) ? logConfig.level : config.logLevel,
  });

  const client = new JiraClient({ config, logger });
  const resolver = new DomainResolver(client, config, componentLabels, logger);
  const cards = new CardService(client, resolver, logger);

  await new MainPrompt({ client, resolver, cards, io }).start();
}

main().catch((error) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
  process.exit(1);
});
