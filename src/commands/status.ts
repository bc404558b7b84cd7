import { Command } from 'commander';
import { contextFromOptions } from '../lib/context.js';
import { getRecentAuditEntries, type AuditEntry } from '../lib/audit.js';
import { collapsePath } from '../lib/paths.js';
import { formatState, prompts, sectionHeader, colors as c } from '../ui/index.js';
import type { GlobalOptions } from '../types.js';

const RECENT_ENTRIES = 5;

const formatEntry = (entry: AuditEntry): string => {
  const outcome =
    entry.outcome === 'success'
      ? c.success(entry.outcome)
      : entry.outcome === 'failure'
        ? c.error(entry.outcome)
        : c.warning(entry.outcome);
  const details = entry.details ? c.muted(` ${entry.details}`) : '';
  return `  ${c.muted(entry.timestamp)} ${entry.operation} ${outcome}${details}`;
};

const runStatus = async (name: string, options: GlobalOptions): Promise<void> => {
  const { lifecycle, keyStore, config } = await contextFromOptions(options);
  const handle = lifecycle.handle(name);
  const state = await lifecycle.state(name);

  prompts.intro(`coffer status ${name}`);
  console.log(c.muted('State:     '), formatState(state));
  console.log(c.muted('Container: '), collapsePath(handle.containerPath));
  console.log(c.muted('Mapping:   '), handle.devicePath);
  console.log(c.muted('Mount:     '), handle.mountPath);
  console.log(c.muted('Key:       '), collapsePath(keyStore.derivePaths(name).privatePath));

  if (state !== 'unprovisioned' && state !== 'allocated') {
    const report = await lifecycle.dumpKeyslots(name);
    console.log(c.muted('Keyslots:  '), report.keyslots.join(', ') || 'none');
  }

  const entries = await getRecentAuditEntries(config.paths.logFile, RECENT_ENTRIES, name);
  if (entries.length > 0) {
    sectionHeader('Recent activity');
    entries.forEach((entry) => console.log(formatEntry(entry)));
  }
  console.log();
};

export const statusCommand = new Command('status')
  .description('Show the state, keyslots and recent activity of a container')
  .argument('<name>', 'Container name')
  .action(async (name: string, _options: GlobalOptions, command: Command) => {
    await runStatus(name, command.optsWithGlobals<GlobalOptions>());
  });
