import { Command } from 'commander';
import { contextFromOptions } from '../lib/context.js';
import { collapsePath } from '../lib/paths.js';
import { formatBytes, formatCount, formatState, printTable, prompts, colors as c, icons } from '../ui/index.js';
import type { LifecycleManager } from '../lib/lifecycle.js';
import type { ListOptions } from '../types.js';

const listContainers = async (lifecycle: LifecycleManager, json: boolean): Promise<void> => {
  const containers = await lifecycle.listContainers();
  if (json) {
    console.log(JSON.stringify(containers, null, 2));
    return;
  }

  prompts.intro('coffer list');
  if (containers.length === 0) {
    prompts.log.warning('No containers found');
    prompts.note("Run 'coffer create <name> --size <size>' to create one", 'Tip');
    return;
  }

  printTable(containers, {
    columns: [
      { header: 'Name', value: (row) => c.bold(row.name) },
      { header: 'State', value: (row) => formatState(row.state) },
      { header: 'Size', value: (row) => (row.sizeBytes > 0 ? formatBytes(row.sizeBytes) : '-'), align: 'right' },
      { header: 'Sealed', value: (row) => (row.sealed ? icons.success : '') },
      { header: 'Path', value: (row) => c.muted(collapsePath(row.path)) },
    ],
  });
  console.log();
  prompts.outro(formatCount(containers.length, 'container'));
};

const listMappings = async (lifecycle: LifecycleManager, json: boolean): Promise<void> => {
  const mappings = await lifecycle.listMappings();
  if (json) {
    console.log(JSON.stringify(mappings, null, 2));
    return;
  }

  if (mappings.length === 0) {
    prompts.log.info('No managed mappings are active');
    return;
  }
  mappings.forEach((mapping) => console.log(`${icons.bullet} ${mapping}`));
};

const listMounts = async (lifecycle: LifecycleManager, json: boolean): Promise<void> => {
  const mounts = await lifecycle.listMounts();
  if (json) {
    console.log(JSON.stringify(mounts, null, 2));
    return;
  }

  if (mounts.length === 0) {
    prompts.log.info('No managed volumes are mounted');
    return;
  }
  printTable(mounts, {
    columns: [
      { header: 'Mount point', value: (row) => row.mountPath },
      { header: 'Device', value: (row) => c.muted(row.device) },
      { header: 'Type', value: (row) => row.fsType },
    ],
  });
};

const runList = async (options: ListOptions): Promise<void> => {
  const { lifecycle } = await contextFromOptions(options);
  const json = options.json === true;

  if (options.mappings) {
    await listMappings(lifecycle, json);
  } else if (options.mounts) {
    await listMounts(lifecycle, json);
  } else {
    await listContainers(lifecycle, json);
  }
};

export const listCommand = new Command('list')
  .description('List containers, active mappings or mounted volumes')
  .option('--mappings', 'Show active managed mappings')
  .option('--mounts', 'Show mounted managed volumes')
  .option('--json', 'Output as JSON')
  .action(async (_options: ListOptions, command: Command) => {
    await runList(command.optsWithGlobals<ListOptions>());
  });
