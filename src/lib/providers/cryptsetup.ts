/**
 * LUKS block encryption through `cryptsetup` and `dmsetup`
 */

import { runCommand, runChecked, type CommandOptions } from '../exec.js';
import { pathExists } from '../paths.js';
import { KeyFileNotFoundError, ProviderCommandError } from '../../errors.js';
import type { BlockEncryptionProvider, KeyslotReport, MappingStatus } from './types.js';

const CRYPTSETUP = 'cryptsetup';
const DMSETUP = 'dmsetup';

// `cryptsetup status` exits with 4 for an inactive device
const STATUS_INACTIVE = 4;

/**
 * Occupied slot indices from a `luksDump`, LUKS1 or LUKS2 layout.
 */
export const parseKeyslots = (dump: string): number[] => {
  const slots = new Set<number>();
  let inKeyslotSection = false;

  for (const line of dump.split('\n')) {
    // LUKS1: "Key Slot 3: ENABLED"
    const luks1 = /^Key Slot (\d+): ENABLED/.exec(line);
    if (luks1) {
      slots.add(Number(luks1[1]));
      continue;
    }

    // LUKS2: section headers are unindented, slots are "  3: luks2"
    if (/^\S/.test(line)) {
      inKeyslotSection = line.startsWith('Keyslots:');
      continue;
    }
    if (inKeyslotSection) {
      const luks2 = /^\s+(\d+): \S+/.exec(line);
      if (luks2) {
        slots.add(Number(luks2[1]));
      }
    }
  }

  return [...slots].sort((a, b) => a - b);
};

/**
 * Mapping names from `dmsetup ls --target crypt`.
 */
export const parseMappingList = (output: string): string[] => {
  const trimmed = output.trim();
  if (!trimmed || /^No devices found/i.test(trimmed)) {
    return [];
  }
  return trimmed
    .split('\n')
    .map((line) => line.trim().split(/\s+/)[0])
    .filter((name): name is string => Boolean(name));
};

export interface CryptsetupOptions {
  sudo?: boolean;
}

export class CryptsetupProvider implements BlockEncryptionProvider {
  readonly name = 'cryptsetup (LUKS2)';

  private commandOptions: CommandOptions;

  constructor(options: CryptsetupOptions = {}) {
    this.commandOptions = { sudo: options.sudo ?? true };
  }

  async format(containerPath: string, keyFilePath: string): Promise<void> {
    await this.requireKeyFile(keyFilePath, 'Initial');
    await runChecked(
      CRYPTSETUP,
      ['--batch-mode', 'luksFormat', '--type', 'luks2', containerPath, '--key-file', keyFilePath],
      this.commandOptions
    );
  }

  async open(containerPath: string, mappingName: string, keyFilePath: string): Promise<void> {
    await runChecked(
      CRYPTSETUP,
      ['open', '--type', 'luks', containerPath, mappingName, '--key-file', keyFilePath],
      this.commandOptions
    );
  }

  async close(mappingName: string): Promise<void> {
    await runChecked(CRYPTSETUP, ['close', mappingName], this.commandOptions);
  }

  async addKey(
    containerPath: string,
    existingKeyFilePath: string,
    newKeyFilePath: string
  ): Promise<void> {
    await this.requireKeyFile(existingKeyFilePath, 'Authenticating');
    await this.requireKeyFile(newKeyFilePath, 'New');
    await runChecked(
      CRYPTSETUP,
      ['--batch-mode', 'luksAddKey', '--key-file', existingKeyFilePath, containerPath, newKeyFilePath],
      this.commandOptions
    );
  }

  async removeKey(containerPath: string, keyFilePath: string): Promise<void> {
    await this.requireKeyFile(keyFilePath, 'Removed');
    await runChecked(
      CRYPTSETUP,
      ['--batch-mode', 'luksRemoveKey', containerPath, keyFilePath],
      this.commandOptions
    );
  }

  async testKey(containerPath: string, keyFilePath: string): Promise<boolean> {
    await this.requireKeyFile(keyFilePath, 'Tested');
    const result = await runCommand(
      CRYPTSETUP,
      ['open', '--test-passphrase', containerPath, '--key-file', keyFilePath],
      this.commandOptions
    );
    return result.exitCode === 0;
  }

  async status(mappingName: string): Promise<MappingStatus> {
    const result = await runCommand(CRYPTSETUP, ['status', mappingName], this.commandOptions);
    if (result.exitCode === 0) {
      return 'active';
    }
    if (result.exitCode === STATUS_INACTIVE || /inactive/.test(result.stdout)) {
      return 'absent';
    }
    throw new ProviderCommandError(`${CRYPTSETUP} status`, result.exitCode, result.stderr);
  }

  async listActiveMappings(): Promise<string[]> {
    const { stdout } = await runChecked(DMSETUP, ['ls', '--target', 'crypt'], this.commandOptions);
    return parseMappingList(stdout);
  }

  async dumpKeyslots(containerPath: string): Promise<KeyslotReport> {
    const { stdout } = await runChecked(CRYPTSETUP, ['luksDump', containerPath], this.commandOptions);
    return { containerPath, keyslots: parseKeyslots(stdout), raw: stdout };
  }

  async isFormatted(containerPath: string): Promise<boolean> {
    const result = await runCommand(CRYPTSETUP, ['isLuks', containerPath], this.commandOptions);
    return result.exitCode === 0;
  }

  private async requireKeyFile(path: string, role: string): Promise<void> {
    if (!(await pathExists(path))) {
      throw new KeyFileNotFoundError(path, role);
    }
  }
}
