/**
 * Runs the external tools coffer drives (cryptsetup, mount, mkfs, ...).
 *
 * Arguments are passed as an argv array, never through a shell. Key
 * material is only ever referenced by path.
 */

import { spawn } from 'child_process';
import { ProviderCommandError } from '../errors.js';

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandOptions {
  /** Prefix the command with `sudo -n` */
  sudo?: boolean;
}

/** Children still running after this long are killed */
const COMMAND_TIMEOUT = 5 * 60 * 1000;

/**
 * Reject arguments that no legitimate path or name contains.
 */
export const validateArg = (arg: string, name: string): void => {
  if (arg.length === 0) {
    throw new Error(`${name} cannot be empty`);
  }
  if (arg.length > 4096) {
    throw new Error(`${name} too long (max 4096 characters)`);
  }
  // eslint-disable-next-line no-control-regex
  if (/[\x00-\x1F\x7F]/.test(arg)) {
    throw new Error(`${name} contains invalid control characters`);
  }
};

/**
 * Run a command to completion. Never throws on a nonzero exit: callers that
 * branch on the exit code (status checks) read it from the result.
 */
export const runCommand = async (
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> => {
  validateArg(command, 'command');
  args.forEach((arg, i) => validateArg(arg, `argument ${i + 1} of ${command}`));

  const [file, argv] = options.sudo ? ['sudo', ['-n', command, ...args]] : [command, args];

  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(file, argv, {
      stdio: ['ignore', 'pipe', 'pipe'],
      timeout: COMMAND_TIMEOUT,
    });

    let stdout = '';
    let stderr = '';
    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (error) => {
      reject(new ProviderCommandError(command, null, `failed to spawn: ${error.message}`));
    });

    child.on('close', (code, signal) => {
      if (code === null) {
        reject(new ProviderCommandError(command, null, `terminated by ${signal ?? 'signal'}`));
        return;
      }
      resolve({ stdout, stderr, exitCode: code });
    });

  });
};

/**
 * Run a command and turn a nonzero exit into a ProviderCommandError.
 */
export const runChecked = async (
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> => {
  const result = await runCommand(command, args, options);
  if (result.exitCode !== 0) {
    throw new ProviderCommandError(command, result.exitCode, result.stderr);
  }
  return result;
};
