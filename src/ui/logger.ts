import chalk from 'chalk';

/** Plain console output outside clack's framed sections */
export const logger = {
  info: (msg: string): void => {
    console.log(chalk.blue('ℹ'), msg);
  },

  success: (msg: string): void => {
    console.log(chalk.green('✓'), msg);
  },

  warning: (msg: string): void => {
    console.log(chalk.yellow('⚠'), msg);
  },

  error: (msg: string): void => {
    console.log(chalk.red('✗'), msg);
  },

  // Shown with DEBUG set, or ui.verbose in the config
  debug: (msg: string): void => {
    if (process.env.DEBUG) {
      console.log(chalk.gray('⚙'), chalk.gray(msg));
    }
  },

  dim: (msg: string): void => {
    console.log(chalk.dim(msg));
  },

  blank: (): void => {
    console.log();
  },
};
