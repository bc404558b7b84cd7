#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import {
  createCommand,
  openCommand,
  closeCommand,
  unmountCommand,
  keysCommand,
  sealCommand,
  unsealCommand,
  listCommand,
  statusCommand,
  recoverCommand,
  configCommand,
} from './commands/index.js';
import { handleError } from './errors.js';
import { VERSION, DESCRIPTION, APP_NAME } from './constants.js';
import { loadConfig } from './lib/config.js';
import { customHelp } from './ui/banner.js';
import type { GlobalOptions } from './types.js';

const program = new Command();

program
  .name(APP_NAME)
  .description(DESCRIPTION)
  .version(VERSION, '-v, --version', 'Display version number')
  .option('-y, --yes', 'Answer confirmations without prompting (busy mounts are never forced)')
  .option('-c, --config <path>', 'Use this configuration file')
  .configureOutput({
    outputError: (str, write) => write(chalk.red(str)),
  })
  .addHelpText('beforeAll', customHelp(VERSION))
  .helpOption('-h, --help', 'Display this help message')
  .showHelpAfterError(false);

// Override default help to use our custom version
program.configureHelp({
  formatHelp: () => '',
});

// Apply UI settings before any command prints
program.hook('preAction', async (_program, actionCommand) => {
  const config = await loadConfig(actionCommand.optsWithGlobals<GlobalOptions>().config);
  if (!config.ui.colors) {
    chalk.level = 0;
  }
  if (config.ui.verbose) {
    process.env.DEBUG ??= '1';
  }
});

// Register commands
program.addCommand(createCommand);
program.addCommand(openCommand);
program.addCommand(closeCommand);
program.addCommand(unmountCommand);
program.addCommand(keysCommand);
program.addCommand(sealCommand);
program.addCommand(unsealCommand);
program.addCommand(listCommand);
program.addCommand(statusCommand);
program.addCommand(recoverCommand);
program.addCommand(configCommand);

// Global error handling
process.on('uncaughtException', handleError);
process.on('unhandledRejection', (reason) => {
  handleError(reason instanceof Error ? reason : new Error(String(reason)));
});

// Parse and execute
program.parseAsync(process.argv).catch(handleError);
