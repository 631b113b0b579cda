import type { Command } from 'commander';
import chalk from 'chalk';
import {
  CONFIG_KEYS,
  getConfigPath,
  isConfigKey,
  loadConfig,
  setConfigValue,
} from '../config.js';
import { errorMessage } from '../sync/errors.js';

function formatValue(value: unknown): string {
  return value === undefined ? chalk.dim('(not set)') : String(value);
}

export function registerConfigCommands(program: Command): void {
  const config = program
    .command('config')
    .description('Manage the persisted configuration file')
    .addHelpText('after', `
EXAMPLES
  metasync config set region eu-west-1
  metasync config set cacheEnabled true
  metasync config get cacheDir
  metasync config list
  metasync config path

KEYS
  ${CONFIG_KEYS.join(', ')}`);

  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', 'Configuration key (e.g., region, cacheEnabled)')
    .argument('<value>', 'Configuration value')
    .action((key: string, value: string) => {
      try {
        setConfigValue(key, value);
        console.log(chalk.green(`Set ${chalk.bold(key)} in ${getConfigPath()}`));
      } catch (err) {
        console.error(chalk.red(errorMessage(err)));
        process.exitCode = 1;
      }
    });

  config
    .command('get')
    .description('Print the effective value of a configuration key')
    .argument('<key>', 'Configuration key to read')
    .action((key: string) => {
      if (!isConfigKey(key)) {
        console.error(chalk.red(`Unknown config key "${key}"`));
        process.exitCode = 1;
        return;
      }
      const value = loadConfig()[key];
      if (value !== undefined) {
        console.log(String(value));
      } else {
        console.log(chalk.yellow(`Key "${key}" is not set`));
      }
    });

  config
    .command('list')
    .description('List every effective configuration value')
    .action(() => {
      const effective = loadConfig();
      console.log(chalk.bold(`Config file: ${getConfigPath()}\n`));
      for (const key of CONFIG_KEYS) {
        console.log(`  ${chalk.cyan(key)}: ${formatValue(effective[key])}`);
      }
    });

  config
    .command('path')
    .description('Print the configuration file path')
    .action(() => {
      console.log(getConfigPath());
    });
}
