import { Command } from 'commander';
import { contextFromOptions } from '../lib/context.js';
import { formatCount, logger, printTable, prompts, colors as c } from '../ui/index.js';
import type { BulkReport, GlobalOptions } from '../types.js';

/**
 * Print the end-of-run summary. Any failure makes the process exit with 1.
 */
export const printBulkReport = (title: string, report: BulkReport): void => {
  if (report.succeeded.length === 0 && report.failed.length === 0) {
    prompts.log.info('Nothing to do: no managed mappings or mounts are live');
    return;
  }

  const rows = [
    ...report.succeeded.map((target) => ({ target, result: c.success('ok'), error: '' })),
    ...report.failed.map((f) => ({ target: f.target, result: c.error(`${f.step} failed`), error: f.error })),
  ];
  printTable(rows, {
    columns: [
      { header: 'Target', value: (row) => row.target },
      { header: 'Result', value: (row) => row.result },
      { header: 'Error', value: (row) => c.muted(row.error) },
    ],
  });
  logger.blank();

  if (report.failed.length > 0) {
    logger.error(
      `${title}: ${formatCount(report.succeeded.length, 'success', 'successes')}, ${formatCount(report.failed.length, 'failure')}`
    );
    process.exitCode = 1;
  } else {
    logger.success(`${title}: ${formatCount(report.succeeded.length, 'target')} done`);
  }
};

const runCloseAll = async (options: GlobalOptions): Promise<void> => {
  const { lifecycle } = await contextFromOptions(options);
  printBulkReport('Close all', await lifecycle.closeAllMappings());
};

const runUnmountAll = async (options: GlobalOptions): Promise<void> => {
  const { lifecycle } = await contextFromOptions(options);
  printBulkReport('Unmount all', await lifecycle.unmountAllVolumes());
};

export const recoverCommand = new Command('recover')
  .description('Bulk recovery from the live mapping and mount state')
  .addCommand(
    new Command('close-all')
      .description('Unmount and close every managed mapping')
      .action(async (_options: GlobalOptions, command: Command) => {
        await runCloseAll(command.optsWithGlobals<GlobalOptions>());
      })
  )
  .addCommand(
    new Command('unmount-all')
      .description('Unmount every managed volume, leaving mappings open')
      .action(async (_options: GlobalOptions, command: Command) => {
        await runUnmountAll(command.optsWithGlobals<GlobalOptions>());
      })
  );
