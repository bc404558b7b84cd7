import chalk from 'chalk';
import ora, { type Ora } from 'ora';

/**
 * Step-by-step progress for multi-step operations, with "[X/Y]" indicators
 */

export type ProgressStatus = 'pending' | 'in_progress' | 'completed' | 'error';

export interface ProgressTrackerOptions {
  title?: string;
  showIndex?: boolean;
}

export interface ProgressTracker {
  start: () => void;
  update: (index: number, status: ProgressStatus, message?: string) => void;
  complete: (message?: string) => void;
  fail: (message?: string) => void;
}

const ICONS: Record<ProgressStatus, string> = {
  pending: chalk.dim('○'),
  in_progress: chalk.cyan('●'),
  completed: chalk.green('✓'),
  error: chalk.red('✗'),
};

export const createProgressTracker = (
  labels: readonly string[],
  options: ProgressTrackerOptions = {}
): ProgressTracker => {
  const { title, showIndex = true } = options;
  const total = labels.length;
  const statuses: ProgressStatus[] = labels.map(() => 'pending');
  let spinner: Ora | null = null;
  let currentIndex = -1;

  const prefix = (index: number): string => (showIndex ? chalk.dim(`[${index + 1}/${total}]`) + ' ' : '');

  const stopSpinner = (): void => {
    if (spinner) {
      spinner.stop();
      spinner = null;
    }
  };

  return {
    start: () => {
      if (title) {
        console.log();
        console.log(chalk.bold.cyan(title));
        console.log(chalk.dim('─'.repeat(50)));
      }
    },

    update: (index: number, status: ProgressStatus, message?: string) => {
      statuses[index] = status;

      if (status === 'in_progress') {
        stopSpinner();
        currentIndex = index;
        spinner = ora({
          text: `${prefix(index)}${message || labels[index]}`,
          color: 'cyan',
          spinner: 'dots',
          indent: 2,
        }).start();
      } else if (status === 'completed' || status === 'error') {
        if (currentIndex === index) {
          stopSpinner();
        }
        console.log(`  ${ICONS[status]} ${prefix(index)}${labels[index]}`);
      }
    },

    complete: (message?: string) => {
      stopSpinner();
      console.log();
      console.log(chalk.green('✓'), message || 'Completed successfully');
    },

    fail: (message?: string) => {
      stopSpinner();
      console.log();
      console.log(chalk.red('✗'), message || 'Operation failed');
    },
  };
};
