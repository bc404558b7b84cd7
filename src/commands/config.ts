import { Command } from 'commander';
import chalk from 'chalk';
import { prompts, logger } from '../ui/index.js';
import { collapsePath } from '../lib/paths.js';
import { getConfigValue, loadConfig, resetConfig, resolveConfigPath, setConfigValue } from '../lib/config.js';
import type { GlobalOptions } from '../types.js';

const runConfigShow = async (options: GlobalOptions): Promise<void> => {
  const config = await loadConfig(options.config);

  prompts.intro('coffer config');
  console.log();
  console.log(chalk.dim('Configuration file:'), collapsePath(await resolveConfigPath(options.config)));
  console.log();
  console.log(JSON.stringify(config, null, 2));
};

const runConfigGet = async (key: string, options: GlobalOptions): Promise<void> => {
  const value = await getConfigValue(key, options.config);

  if (typeof value === 'object' && value !== null) {
    console.log(JSON.stringify(value, null, 2));
  } else {
    console.log(String(value));
  }
};

const runConfigSet = async (key: string, value: string, options: GlobalOptions): Promise<void> => {
  await setConfigValue(key, value, options.config);
  logger.success(`Set ${key} = ${JSON.stringify(await getConfigValue(key, options.config))}`);
};

const runConfigReset = async (options: GlobalOptions): Promise<void> => {
  if (!options.yes) {
    const confirm = await prompts.confirm('Reset configuration to defaults? This cannot be undone.', false);
    if (!confirm) {
      prompts.cancel('Operation cancelled');
    }
  }

  await resetConfig(options.config);
  logger.success('Configuration reset to defaults');
};

export const configCommand = new Command('config')
  .description('Manage coffer configuration')
  .addCommand(
    new Command('show')
      .description('Show the resolved configuration')
      .action(async (_options: GlobalOptions, command: Command) => {
        await runConfigShow(command.optsWithGlobals<GlobalOptions>());
      })
  )
  .addCommand(
    new Command('get')
      .description('Get a config value')
      .argument('<key>', 'Config key (e.g., "create.onFailure")')
      .action(async (key: string, _options: GlobalOptions, command: Command) => {
        await runConfigGet(key, command.optsWithGlobals<GlobalOptions>());
      })
  )
  .addCommand(
    new Command('set')
      .description('Set a config value')
      .argument('<key>', 'Config key')
      .argument('<value>', 'Value to set')
      .action(async (key: string, value: string, _options: GlobalOptions, command: Command) => {
        await runConfigSet(key, value, command.optsWithGlobals<GlobalOptions>());
      })
  )
  .addCommand(
    new Command('reset')
      .description('Reset configuration to defaults')
      .action(async (_options: GlobalOptions, command: Command) => {
        await runConfigReset(command.optsWithGlobals<GlobalOptions>());
      })
  );
