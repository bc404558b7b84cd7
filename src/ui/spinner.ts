import ora from 'ora';
import chalk from 'chalk';

/**
 * Run `task` behind a spinner that ends as succeeded or failed with the task.
 * Not for operations that may prompt: the spinner owns the line.
 */
export const withSpinner = async <T>(
  text: string,
  task: () => Promise<T>,
  options: { successText?: string } = {}
): Promise<T> => {
  const spinner = ora({ text, color: 'cyan', spinner: 'dots' }).start();

  try {
    const result = await task();
    spinner.succeed(chalk.green(options.successText ?? text));
    return result;
  } catch (error) {
    spinner.fail(chalk.red(text));
    throw error;
  }
};
