import { Command } from 'commander';
import { contextFromOptions } from '../lib/context.js';
import { formatPath, logger } from '../ui/index.js';
import type { GlobalOptions } from '../types.js';

const runUnmount = async (name: string, options: GlobalOptions): Promise<void> => {
  const { lifecycle } = await contextFromOptions(options);
  const { mountPath } = lifecycle.handle(name);

  const result = await lifecycle.unmount(name);
  switch (result) {
    case null:
      logger.info(`${name} is not mounted`);
      break;
    case 'forced':
      logger.warning(`Detached ${formatPath(mountPath)} lazily; it disappears once no process uses it`);
      break;
    case 'unmounted':
      logger.success(`Unmounted ${name}; the mapping stays open`);
      break;
  }
};

export const unmountCommand = new Command('unmount')
  .description('Unmount a container, leaving its mapping open')
  .argument('<name>', 'Container name')
  .action(async (name: string, _options: GlobalOptions, command: Command) => {
    await runUnmount(name, command.optsWithGlobals<GlobalOptions>());
  });
