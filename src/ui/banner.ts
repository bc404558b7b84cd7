import chalk from 'chalk';
import boxen from 'boxen';
import { boxStyles } from './theme.js';

export const customHelp = (version: string): string => {
  const title = boxen(chalk.cyan.bold('coffer') + chalk.dim(` v${version}`), boxStyles.header);

  const quickStart = `
${chalk.bold.cyan('Quick Start:')}
  ${chalk.cyan('coffer create vault --size 1G')}   Create, open and mount a container
  ${chalk.cyan('coffer close vault')}              Unmount and close it
  ${chalk.cyan('coffer open vault')}               Open and mount it again
`;

  const commands = `
${chalk.bold.cyan('Commands:')}
  ${chalk.cyan('Containers')}
    create <name>        Create a new encrypted container
    open <name>          Open (and mount) a container
    unmount <name>       Unmount without closing
    close <name>         Unmount and close a container
    list                 List containers, mappings or mounts
    status <name>        Show state, keyslots and recent activity

  ${chalk.cyan('Keys')}
    keys generate <name> Generate a container key pair
    keys master          Create the master key pair
    keys add <name>      Enroll another key file
    keys remove <name>   Remove a keyslot
    keys list <name>     Show the keyslot table
    keys rotate-master   Rotate the master key across containers

  ${chalk.cyan('Sealing')}
    seal <name>          Encrypt a closed container file to <file>.enc
    unseal <name>        Restore a container from its sealed copy

  ${chalk.cyan('Recovery')}
    recover close-all    Unmount and close every managed mapping
    recover unmount-all  Unmount every managed volume

  ${chalk.cyan('Configuration')}
    config               Manage coffer configuration
`;

  const footer = `
${chalk.dim('Run')} ${chalk.cyan('coffer <command> --help')} ${chalk.dim('for detailed command info')}
`;

  return `${title}\n${quickStart}${commands}${footer}`;
};
