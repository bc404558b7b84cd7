/**
 * Linux filesystem and mount surface: fallocate, df, mkfs, mount, umount,
 * chown and fuser, plus the kernel mount table in /proc/mounts.
 */

import { readFile, rm } from 'fs/promises';
import { userInfo } from 'os';
import { runCommand, runChecked, type CommandOptions } from '../exec.js';
import { ProviderCommandError } from '../../errors.js';
import type {
  MountEntry,
  ProcessInfo,
  SystemProvider,
  UnmountOptions,
} from './types.js';

const PROC_MOUNTS = '/proc/mounts';

/** /proc/mounts escapes space, tab, newline and backslash as octal */
const unescapeMountField = (field: string): string =>
  field.replace(/\\([0-7]{3})/g, (_, octal: string) => String.fromCharCode(parseInt(octal, 8)));

export const parseMountTable = (content: string): MountEntry[] =>
  content
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
    .flatMap((line) => {
      const [device, mountPath, fsType] = line.split(/\s+/);
      if (!device || !mountPath || !fsType) {
        return [];
      }
      return [
        {
          device: unescapeMountField(device),
          mountPath: unescapeMountField(mountPath),
          fsType,
        },
      ];
    });

/**
 * Available bytes from `df --output=avail -B1 <path>`.
 */
export const parseDfAvailable = (output: string): number => {
  const lines = output.trim().split('\n');
  const value = Number(lines[lines.length - 1]?.trim());
  if (!Number.isFinite(value)) {
    throw new Error(`Unexpected df output: ${output.trim()}`);
  }
  return value;
};

/**
 * PIDs from `fuser -m`, which appends access letters such as "1234c".
 */
export const parseFuserPids = (output: string): number[] =>
  output
    .trim()
    .split(/\s+/)
    .map((token) => /^(\d+)/.exec(token)?.[1])
    .filter((pid): pid is string => Boolean(pid))
    .map(Number);

export interface LinuxSystemOptions {
  sudo?: boolean;
}

export class LinuxSystemProvider implements SystemProvider {
  private privileged: CommandOptions;

  constructor(options: LinuxSystemOptions = {}) {
    this.privileged = { sudo: options.sudo ?? true };
  }

  async allocate(path: string, bytes: number): Promise<void> {
    await runChecked('fallocate', ['-l', String(bytes), path]);
  }

  async freeSpace(path: string): Promise<number> {
    const { stdout } = await runChecked('df', ['--output=avail', '-B1', path]);
    return parseDfAvailable(stdout);
  }

  async makeFilesystem(devicePath: string, fsType: string): Promise<void> {
    await runChecked(`mkfs.${fsType}`, ['-q', devicePath], this.privileged);
  }

  async makeDirectory(path: string): Promise<void> {
    await runChecked('mkdir', ['-p', path], this.privileged);
  }

  async mount(devicePath: string, mountPath: string): Promise<void> {
    await runChecked('mount', [devicePath, mountPath], this.privileged);
  }

  async unmount(mountPath: string, options: UnmountOptions = {}): Promise<void> {
    // -f only affects network filesystems; a busy local mount needs a lazy detach
    const args = options.force ? ['-l', mountPath] : [mountPath];
    await runChecked('umount', args, this.privileged);
  }

  async listMounts(): Promise<MountEntry[]> {
    return parseMountTable(await readFile(PROC_MOUNTS, 'utf-8'));
  }

  async chown(path: string, owner: string, recursive: boolean): Promise<void> {
    const args = recursive ? ['-R', `${owner}:${owner}`, path] : [`${owner}:${owner}`, path];
    await runChecked('chown', args, this.privileged);
  }

  async processesUsing(path: string): Promise<ProcessInfo[]> {
    const result = await runCommand('fuser', ['-m', path], this.privileged);
    // fuser exits 1 when nothing holds the path
    if (result.exitCode === 1 && !result.stdout.trim()) {
      return [];
    }
    if (result.exitCode !== 0) {
      throw new ProviderCommandError('fuser', result.exitCode, result.stderr);
    }

    return Promise.all(
      parseFuserPids(result.stdout).map(async (pid) => ({
        pid,
        command: await readFile(`/proc/${pid}/comm`, 'utf-8').then(
          (comm) => comm.trim(),
          () => 'unknown'
        ),
      }))
    );
  }

  invokingUser(): string {
    return process.env.SUDO_USER || userInfo().username;
  }

  async removeFile(path: string): Promise<void> {
    await rm(path);
  }
}
