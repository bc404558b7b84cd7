import { Command } from 'commander';
import { contextFromOptions } from '../lib/context.js';
import { collapsePath } from '../lib/paths.js';
import { RotationInconsistentError, type RotationOutcome } from '../errors.js';
import { formatCount, formatPath, logger, printTable, colors as c, icons } from '../ui/index.js';
import type { GlobalOptions, KeyAddOptions, KeyRemoveOptions, MasterKeyOptions } from '../types.js';

const mark = (done: boolean): string => (done ? icons.success : c.muted('-'));

const printOutcomes = (outcomes: RotationOutcome[]): void => {
  printTable(outcomes, {
    columns: [
      { header: 'Container', value: (o) => o.name },
      { header: 'New master enrolled', value: (o) => mark(o.enrolled) },
      { header: 'Old master removed', value: (o) => mark(o.oldSlotRemoved) },
      { header: 'Error', value: (o) => (o.error ? c.error(o.error) : '') },
    ],
  });
};

const runGenerate = async (name: string, options: GlobalOptions): Promise<void> => {
  const { lifecycle } = await contextFromOptions(options);
  const result = await lifecycle.generateKeyPair(name);

  if (!result.created) {
    logger.info(`Kept the existing key pair for ${name}`);
    return;
  }
  logger.success(`Generated a key pair for ${name}`);
  logger.dim(`  private: ${collapsePath(result.paths.privatePath)}`);
  logger.dim(`  public:  ${collapsePath(result.paths.publicPath)}`);
};

const runMaster = async (options: MasterKeyOptions): Promise<void> => {
  // Replacing an existing master takes --force, even under --yes
  const { lifecycle } = options.force
    ? await contextFromOptions({ ...options, yes: true }, { confirm: true })
    : await contextFromOptions(options, { confirm: false });
  const result = await lifecycle.createMasterKey();

  if (!result.created) {
    logger.info('Kept the existing master key');
    return;
  }
  logger.success(`Master key written to ${formatPath(collapsePath(result.paths.privatePath))}`);
  logger.dim('  Containers created before this need `coffer keys rotate-master` to use it');
};

const runAdd = async (name: string, options: KeyAddOptions): Promise<void> => {
  const { lifecycle } = await contextFromOptions(options);
  await lifecycle.enrollKey(name, options.auth, options.new);
  logger.success(`Enrolled ${collapsePath(options.new)} in ${name}`);
};

const runRemove = async (name: string, options: KeyRemoveOptions): Promise<void> => {
  const { lifecycle } = await contextFromOptions(options);
  await lifecycle.removeKey(name, options.key);
  logger.success(`Removed the keyslot of ${collapsePath(options.key)} from ${name}`);
};

const runList = async (name: string, options: GlobalOptions): Promise<void> => {
  const { lifecycle, config } = await contextFromOptions(options);
  const report = await lifecycle.dumpKeyslots(name);

  console.log(c.bold(name), c.muted(`(${formatCount(report.keyslots.length, 'keyslot')})`));
  console.log(c.muted('  occupied slots:'), report.keyslots.join(', ') || 'none');
  if (config.ui.verbose) {
    logger.blank();
    console.log(report.raw);
  }
};

const runRotateMaster = async (names: string[], options: GlobalOptions): Promise<void> => {
  const { lifecycle } = await contextFromOptions(options);

  try {
    const report = await lifecycle.rotateMaster(names);
    printOutcomes(report.outcomes);
    logger.blank();
    logger.success(`Master key rotated across ${formatCount(report.outcomes.length, 'container')}`);
  } catch (error) {
    if (error instanceof RotationInconsistentError) {
      printOutcomes(error.outcomes);
      logger.blank();
    }
    throw error;
  }
};

export const keysCommand = new Command('keys')
  .description('Manage container keys and the master key')
  .addCommand(
    new Command('generate')
      .description('Generate a key pair for a container')
      .argument('<name>', 'Container name')
      .action(async (name: string, _options: GlobalOptions, command: Command) => {
        await runGenerate(name, command.optsWithGlobals<GlobalOptions>());
      })
  )
  .addCommand(
    new Command('master')
      .description('Create the master key pair')
      .option('-f, --force', 'Replace an existing master key without asking')
      .action(async (_options: MasterKeyOptions, command: Command) => {
        await runMaster(command.optsWithGlobals<MasterKeyOptions>());
      })
  )
  .addCommand(
    new Command('add')
      .description('Enroll another key file in a container')
      .argument('<name>', 'Container name')
      .requiredOption('-a, --auth <path>', 'A key file already enrolled')
      .requiredOption('-n, --new <path>', 'The key file to enroll')
      .action(async (name: string, _options: KeyAddOptions, command: Command) => {
        await runAdd(name, command.optsWithGlobals<KeyAddOptions>());
      })
  )
  .addCommand(
    new Command('remove')
      .description('Remove the keyslot opened by a key file')
      .argument('<name>', 'Container name')
      .requiredOption('-k, --key <path>', 'Key file whose keyslot is removed')
      .action(async (name: string, _options: KeyRemoveOptions, command: Command) => {
        await runRemove(name, command.optsWithGlobals<KeyRemoveOptions>());
      })
  )
  .addCommand(
    new Command('list')
      .description('Show the keyslot table of a container')
      .argument('<name>', 'Container name')
      .action(async (name: string, _options: GlobalOptions, command: Command) => {
        await runList(name, command.optsWithGlobals<GlobalOptions>());
      })
  )
  .addCommand(
    new Command('rotate-master')
      .description('Enroll a new master key in containers, then retire the old one')
      .argument('<names...>', 'Containers enrolled with the current master key')
      .action(async (names: string[], _options: GlobalOptions, command: Command) => {
        await runRotateMaster(names, command.optsWithGlobals<GlobalOptions>());
      })
  );
