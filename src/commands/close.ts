import { Command } from 'commander';
import { contextFromOptions } from '../lib/context.js';
import { logger } from '../ui/index.js';
import type { GlobalOptions } from '../types.js';

const runClose = async (name: string, options: GlobalOptions): Promise<void> => {
  const { lifecycle } = await contextFromOptions(options);

  const closed = await lifecycle.close(name);
  if (closed) {
    logger.success(`Closed ${name}`);
  } else {
    logger.info(`${name} is not open`);
  }
};

export const closeCommand = new Command('close')
  .description('Unmount a container if mounted, then close its mapping')
  .argument('<name>', 'Container name')
  .action(async (name: string, _options: GlobalOptions, command: Command) => {
    await runClose(name, command.optsWithGlobals<GlobalOptions>());
  });
