import { Command } from 'commander';
import { contextFromOptions } from '../lib/context.js';
import { collapsePath } from '../lib/paths.js';
import { formatPath, logger, withSpinner } from '../ui/index.js';
import type { GlobalOptions, UnsealOptions } from '../types.js';

const runSeal = async (name: string, options: GlobalOptions): Promise<void> => {
  const { lifecycle } = await contextFromOptions(options);

  const sealedPath = await withSpinner(`Sealing ${name}...`, () => lifecycle.seal(name), {
    successText: `Sealed ${name}`,
  });
  logger.info(`Sealed copy: ${formatPath(collapsePath(sealedPath))}`);
  logger.dim('  The container file itself was left in place');
};

const runUnseal = async (name: string, options: UnsealOptions): Promise<void> => {
  const { lifecycle } = await contextFromOptions(options);

  const restoredPath = await withSpinner(
    `Unsealing ${name}${options.master ? ' with the master key' : ''}...`,
    () => lifecycle.unseal(name, { useMaster: options.master === true }),
    { successText: `Unsealed ${name}` }
  );
  logger.info(`Restored: ${formatPath(collapsePath(restoredPath))}`);
};

export const sealCommand = new Command('seal')
  .description('Encrypt a closed container file into a sealed copy')
  .argument('<name>', 'Container name')
  .action(async (name: string, _options: GlobalOptions, command: Command) => {
    await runSeal(name, command.optsWithGlobals<GlobalOptions>());
  });

export const unsealCommand = new Command('unseal')
  .description('Restore a container file from its sealed copy')
  .argument('<name>', 'Container name')
  .option('-m, --master', 'Unseal with the master key instead of the container key')
  .action(async (name: string, _options: UnsealOptions, command: Command) => {
    await runUnseal(name, command.optsWithGlobals<UnsealOptions>());
  });
