import { Command, Option } from 'commander';
import { contextFromOptions } from '../lib/context.js';
import { collapsePath } from '../lib/paths.js';
import { formatPath, logger } from '../ui/index.js';
import type { OpenOptions } from '../types.js';

const runOpen = async (name: string, options: OpenOptions): Promise<void> => {
  const { lifecycle, keyStore } = await contextFromOptions(options);
  const keyFilePath = options.master ? keyStore.masterPaths().privatePath : options.key;

  if (options.mount === false) {
    const result = await lifecycle.open(name, keyFilePath);
    if (result.staleClosed) {
      logger.warning(`A stale mapping ${result.handle.mappingName} was closed first`);
    }
    logger.success(`Opened ${name} as ${result.handle.devicePath}`);
    logger.dim(`  key: ${collapsePath(result.keyFilePath)}`);
    return;
  }

  const result = await lifecycle.openAndMount(name, keyFilePath);
  if (result.staleClosed) {
    logger.warning(`A stale mapping ${result.handle.mappingName} was closed first`);
  }
  logger.success(`Opened ${name} and mounted it at ${formatPath(result.mountPath)}`);
  logger.dim(`  key: ${collapsePath(result.keyFilePath)}`);
};

export const openCommand = new Command('open')
  .description('Open a container and mount it')
  .argument('<name>', 'Container name')
  .option('-k, --key <path>', 'Key file to open with (default: the container key)')
  .addOption(new Option('-m, --master', 'Open with the master key').conflicts('key'))
  .option('--no-mount', 'Open the mapping without mounting it')
  .action(async (name: string, _options: OpenOptions, command: Command) => {
    await runOpen(name, command.optsWithGlobals<OpenOptions>());
  });
