import { Command } from 'commander';
import { CAPACITY_UNIT_BYTES } from '../constants.js';
import { contextFromOptions } from '../lib/context.js';
import { CREATE_STEPS } from '../lib/lifecycle.js';
import { parseSize } from '../lib/size.js';
import { collapsePath } from '../lib/paths.js';
import { createProgressTracker, formatBytes, formatPath, logger, colors as c } from '../ui/index.js';
import type { CreateOptions } from '../types.js';

const runCreate = async (name: string, options: CreateOptions): Promise<void> => {
  const sizeMiB = parseSize(options.size);
  const { lifecycle, config } = await contextFromOptions(options);

  const tracker = createProgressTracker(CREATE_STEPS, {
    title: `Creating ${name} (${formatBytes(sizeMiB * CAPACITY_UNIT_BYTES)})`,
  });
  tracker.start();

  try {
    const result = await lifecycle.create(name, sizeMiB, {
      onStep: (index, _step, status) => tracker.update(index, status),
    });
    tracker.complete(`${name} is mounted at ${formatPath(result.mountPath)}`);

    logger.blank();
    console.log(c.muted('Container: '), collapsePath(result.handle.containerPath));
    console.log(c.muted('Mapping:   '), result.handle.mappingName);
    console.log(c.muted('Key:       '), collapsePath(result.keyPair.privatePath));
    if (result.masterCreated) {
      logger.info(`A master key was created in ${collapsePath(config.paths.keysDir)}`);
    }
  } catch (error) {
    tracker.fail(`Could not create ${name}`);
    throw error;
  }
};

export const createCommand = new Command('create')
  .description('Create, format, open and mount a new encrypted container')
  .argument('<name>', 'Container name')
  .requiredOption('-s, --size <size>', 'Capacity in MiB, or with a unit (512M, 2G)')
  .action(async (name: string, _options: CreateOptions, command: Command) => {
    await runCreate(name, command.optsWithGlobals<CreateOptions>());
  });
