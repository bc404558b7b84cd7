/**
 * On-disk registry of per-container key pairs and the single master key pair
 *
 * Layout:
 *   <keysDir>/<name>/priv/<name>_private.pem   (700 dir, 600 file)
 *   <keysDir>/<name>/pub/<name>_public.pem     (755 dir, 644 file)
 *   <keysDir>/master/...                       same shape, name "master"
 *
 * The private PEM is also the key file enrolled in a container's keyslots.
 */

import { mkdir, writeFile, chmod, rename, rm, readFile } from 'fs/promises';
import { dirname, join } from 'path';
import {
  MASTER_KEY_NAME,
  PRIVATE_DIR,
  PUBLIC_DIR,
  PENDING_KEY_MARKER,
  PRIVATE_DIR_MODE,
  PRIVATE_FILE_MODE,
  PUBLIC_DIR_MODE,
  PUBLIC_FILE_MODE,
} from '../../constants.js';
import { PathConflictError, KeyFileNotFoundError, errorMessage } from '../../errors.js';
import { pathExists, isFile, validateContainerName } from '../paths.js';
import type { KeyPairPaths } from '../../types.js';
import type { KeyPairMaterial, KeyWrappingProvider } from '../providers/types.js';
import type { ConfirmationProvider } from '../confirmations.js';

export interface MasterKeyResult {
  created: boolean;
  paths: KeyPairPaths;
}

const keyPairPaths = (keysDir: string, name: string, marker = ''): KeyPairPaths => ({
  privatePath: join(keysDir, name, PRIVATE_DIR, `${name}_private${marker}.pem`),
  publicPath: join(keysDir, name, PUBLIC_DIR, `${name}_public${marker}.pem`),
});

const ensureDirWithMode = async (dir: string, mode: number): Promise<void> => {
  try {
    await mkdir(dir, { recursive: true, mode });
    // mkdir's mode is filtered by the umask
    await chmod(dir, mode);
  } catch (error) {
    throw new PathConflictError(dir, errorMessage(error));
  }
};

export class KeyStore {
  constructor(
    private keysDir: string,
    private wrapper: KeyWrappingProvider,
    private bits: number
  ) {}

  /** Pure path derivation, no I/O */
  derivePaths(name: string): KeyPairPaths {
    validateContainerName(name);
    return keyPairPaths(this.keysDir, name);
  }

  masterPaths(): KeyPairPaths {
    return keyPairPaths(this.keysDir, MASTER_KEY_NAME);
  }

  /** Where a rotation stages the next master key before promoting it */
  pendingMasterPaths(): KeyPairPaths {
    return keyPairPaths(this.keysDir, MASTER_KEY_NAME, PENDING_KEY_MARKER);
  }

  async keyPairExists(name: string): Promise<boolean> {
    return isFile(this.derivePaths(name).privatePath);
  }

  async masterKeyExists(): Promise<boolean> {
    return isFile(this.masterPaths().privatePath);
  }

  async pendingMasterExists(): Promise<boolean> {
    return isFile(this.pendingMasterPaths().privatePath);
  }

  async createKeyPair(name: string): Promise<KeyPairPaths> {
    const paths = this.derivePaths(name);
    await this.writeKeyPair(paths, await this.wrapper.generateKeyPair(this.bits));
    return paths;
  }

  /**
   * Create the master key pair. When one already exists the caller is asked
   * first; a decline keeps the existing pair and is not an error.
   */
  async createMasterKeyPair(confirmations: ConfirmationProvider): Promise<MasterKeyResult> {
    const paths = this.masterPaths();

    if (await this.masterKeyExists()) {
      const replace = await confirmations.confirm(
        'A master key already exists. Replace it? Containers enrolled with it will need rotation.'
      );
      if (!replace) {
        return { created: false, paths };
      }
    }

    await this.writeKeyPair(paths, await this.wrapper.generateKeyPair(this.bits));
    return { created: true, paths };
  }

  async createPendingMasterKeyPair(): Promise<KeyPairPaths> {
    const paths = this.pendingMasterPaths();
    await this.writeKeyPair(paths, await this.wrapper.generateKeyPair(this.bits));
    return paths;
  }

  /**
   * Replace the canonical master with the pending one by rename, so there is
   * never a moment with two candidate master files at the canonical path.
   */
  async promotePendingMaster(): Promise<KeyPairPaths> {
    const pending = this.pendingMasterPaths();
    const canonical = this.masterPaths();

    if (!(await pathExists(pending.privatePath))) {
      throw new KeyFileNotFoundError(pending.privatePath, 'Pending master');
    }

    await rename(pending.privatePath, canonical.privatePath);
    if (await pathExists(pending.publicPath)) {
      await rename(pending.publicPath, canonical.publicPath);
    }
    return canonical;
  }

  /** Delete a container's key pair directory */
  async removeKeyPair(name: string): Promise<void> {
    const { privatePath } = this.derivePaths(name);
    await rm(dirname(dirname(privatePath)), { recursive: true, force: true });
  }

  async readPublicKey(paths: KeyPairPaths): Promise<string> {
    if (!(await pathExists(paths.publicPath))) {
      throw new KeyFileNotFoundError(paths.publicPath, 'Public');
    }
    return readFile(paths.publicPath, 'utf-8');
  }

  async readPrivateKey(paths: KeyPairPaths): Promise<string> {
    if (!(await pathExists(paths.privatePath))) {
      throw new KeyFileNotFoundError(paths.privatePath, 'Private');
    }
    return readFile(paths.privatePath, 'utf-8');
  }

  private async writeKeyPair(paths: KeyPairPaths, material: KeyPairMaterial): Promise<void> {
    // The pair's own directory stays traversable so pub/ is readable
    await ensureDirWithMode(dirname(dirname(paths.privatePath)), PUBLIC_DIR_MODE);
    await ensureDirWithMode(dirname(paths.privatePath), PRIVATE_DIR_MODE);
    await ensureDirWithMode(dirname(paths.publicPath), PUBLIC_DIR_MODE);

    await writeFile(paths.privatePath, material.privateKey, { mode: PRIVATE_FILE_MODE });
    await chmod(paths.privatePath, PRIVATE_FILE_MODE);
    await writeFile(paths.publicPath, material.publicKey, { mode: PUBLIC_FILE_MODE });
    await chmod(paths.publicPath, PUBLIC_FILE_MODE);
  }
}
