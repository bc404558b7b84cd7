/**
 * Mount manager: binds opened mappings to directories under the mount root
 */

import { join } from 'path';
import { MountFailedError, PathConflictError, ProviderCommandError, UnmountBusyError, errorMessage } from '../errors.js';
import { containerNameFromMapping, devicePathFor, isDirectory, isPathWithin, pathExists } from './paths.js';
import { describeHolders, type ConfirmationProvider } from './confirmations.js';
import { logger } from '../ui/logger.js';
import type { MountEntry, ProcessInfo, SystemProvider } from './providers/types.js';

export type UnmountResult = 'unmounted' | 'forced';

const isBusyError = (error: unknown): boolean =>
  error instanceof ProviderCommandError && /busy/i.test(error.stderr);

export class MountManager {
  constructor(
    private system: SystemProvider,
    private confirmations: ConfirmationProvider,
    private mountRoot: string,
    private containerSuffix: string
  ) {}

  /** `vaultA_mapper` and `vaultA.img_mapper` both mount at `<mountRoot>/vaultA` */
  mountPathFor(mappingName: string): string {
    return join(this.mountRoot, containerNameFromMapping(mappingName, this.containerSuffix));
  }

  /**
   * Mount `/dev/mapper/<mappingName>` and hand the tree to the invoking user.
   * On a failed mount the directory is left in place.
   */
  async mount(mappingName: string): Promise<string> {
    const mountPath = this.mountPathFor(mappingName);
    const devicePath = devicePathFor(mappingName);

    await this.ensureDirectory(this.mountRoot);
    await this.ensureDirectory(mountPath);

    try {
      await this.system.mount(devicePath, mountPath);
    } catch (error) {
      throw new MountFailedError(devicePath, mountPath, errorMessage(error));
    }

    await this.system.chown(mountPath, this.system.invokingUser(), true);
    logger.debug(`Mounted ${devicePath} at ${mountPath}`);
    return mountPath;
  }

  /**
   * Detach `mountPath`. A busy target is reported with the processes holding
   * it and resolved by the confirmation provider: forced detach or abort.
   */
  async unmount(mountPath: string): Promise<UnmountResult> {
    try {
      await this.system.unmount(mountPath);
      return 'unmounted';
    } catch (error) {
      if (!isBusyError(error)) {
        throw error;
      }
    }

    const processes = await this.holdersOf(mountPath);
    const resolution = await this.confirmations.resolveBusy({ mountPath, processes });
    if (resolution === 'abort') {
      throw new UnmountBusyError(mountPath, describeHolders(processes));
    }

    await this.system.unmount(mountPath, { force: true });
    return 'forced';
  }

  /** Where a device is mounted, or null */
  async mountPointOf(devicePath: string): Promise<string | null> {
    const mounts = await this.system.listMounts();
    return mounts.find((entry) => entry.device === devicePath)?.mountPath ?? null;
  }

  /** Live mounts below the mount root */
  async listManagedMounts(): Promise<MountEntry[]> {
    const mounts = await this.system.listMounts();
    return mounts.filter(
      (entry) => entry.mountPath !== this.mountRoot && isPathWithin(entry.mountPath, this.mountRoot)
    );
  }

  private async holdersOf(mountPath: string): Promise<ProcessInfo[]> {
    try {
      return await this.system.processesUsing(mountPath);
    } catch (error) {
      logger.warning(`Could not list processes using ${mountPath}: ${errorMessage(error)}`);
      return [];
    }
  }

  private async ensureDirectory(path: string): Promise<void> {
    if ((await pathExists(path)) && !(await isDirectory(path))) {
      throw new PathConflictError(path, 'a file occupies the mount directory path');
    }
    try {
      await this.system.makeDirectory(path);
    } catch (error) {
      throw new PathConflictError(path, errorMessage(error));
    }
  }
}
