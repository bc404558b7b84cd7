/**
 * The only interactive capability the lifecycle manager needs, injected so
 * that the manager itself never touches the terminal.
 */

import { prompts } from '../ui/prompts.js';
import { formatPath } from '../ui/theme.js';
import type { ProcessInfo } from './providers/types.js';

export type BusyResolution = 'force' | 'abort';

export interface BusyMount {
  mountPath: string;
  processes: ProcessInfo[];
}

export interface ConfirmationProvider {
  /** Yes/no question; false means the caller declined */
  confirm(message: string): Promise<boolean>;

  /** Ask once for a file path; null when none is given */
  requestPath(message: string): Promise<string | null>;

  /** Decide what to do with a busy mount: forced detach or abort */
  resolveBusy(busy: BusyMount): Promise<BusyResolution>;
}

export interface StaticAnswers {
  confirm?: boolean;
  path?: string | null;
  busy?: BusyResolution;
}

/**
 * Fixed answers, for `--yes` runs and scripted use. A busy mount is never
 * force-detached unless explicitly configured to.
 */
export const createStaticConfirmations = (answers: StaticAnswers = {}): ConfirmationProvider => ({
  confirm: async () => answers.confirm ?? false,
  requestPath: async () => answers.path ?? null,
  resolveBusy: async () => answers.busy ?? 'abort',
});

export const describeHolders = (processes: ProcessInfo[]): string[] =>
  processes.map((p) => `${p.command} (pid ${p.pid})`);

export const createInteractiveConfirmations = (): ConfirmationProvider => ({
  confirm: (message) => prompts.confirm(message, false),

  requestPath: async (message) => {
    const answer = await prompts.text(message, { placeholder: '/path/to/key.pem' });
    return answer.trim() || null;
  },

  resolveBusy: async ({ mountPath, processes }) => {
    prompts.log.warning(`${formatPath(mountPath)} is busy`);
    if (processes.length > 0) {
      prompts.log.message(describeHolders(processes).map((h) => `  ${h}`).join('\n'));
    }
    const choice = await prompts.select('How should this mount be handled?', [
      { value: 'abort', label: 'Abort', hint: 'leave it mounted' },
      { value: 'force', label: 'Force detach', hint: 'lazy unmount, open files stay valid' },
    ]);
    return choice === 'force' ? 'force' : 'abort';
  },
});
