import * as p from '@clack/prompts';
import chalk from 'chalk';

export interface SelectOption {
  value: string;
  label: string;
  hint?: string;
}

/**
 * clack wrappers. Ctrl-C at any question ends the run through `cancel`.
 */
export const prompts = {
  intro: (title: string): void => {
    p.intro(chalk.bgCyan(chalk.black(` ${title} `)));
  },

  outro: (message: string): void => {
    p.outro(chalk.green(message));
  },

  note: (message: string, title?: string): void => {
    p.note(message, title);
  },

  confirm: async (message: string, initial = false): Promise<boolean> => {
    const answer = await p.confirm({ message, initialValue: initial });
    return p.isCancel(answer) ? prompts.cancel() : answer;
  },

  select: async (message: string, options: SelectOption[]): Promise<string> => {
    const choice = await p.select<SelectOption[], string>({ message, options });
    return p.isCancel(choice) ? prompts.cancel() : choice;
  },

  text: async (message: string, options: { placeholder?: string } = {}): Promise<string> => {
    const answer = await p.text({ message, placeholder: options.placeholder });
    return p.isCancel(answer) ? prompts.cancel() : answer;
  },

  cancel: (message = 'Operation cancelled'): never => {
    p.cancel(message);
    process.exit(0);
  },

  log: {
    info: (message: string): void => {
      p.log.info(message);
    },
    warning: (message: string): void => {
      p.log.warning(message);
    },
    message: (message: string): void => {
      p.log.message(message);
    },
  },
};
