/**
 * Lifecycle manager: the only component that coordinates more than one
 * collaborator in a single operation.
 *
 * Container state is never cached here. Every operation derives it from the
 * block-encryption provider, the mount table and the filesystem, and every
 * state-changing operation is recorded in the audit log, failures included.
 */

import { readdir, stat } from 'fs/promises';
import { basename, dirname } from 'path';
import { ensureDir } from 'fs-extra';
import { CAPACITY_UNIT_BYTES, DEVICE_MAPPER_DIR, SEALED_SUFFIX } from '../constants.js';
import {
  CofferError,
  ContainerBusyError,
  ContainerExistsError,
  ContainerNotFoundError,
  InsufficientSpaceError,
  InvalidSizeError,
  KeyFileNotFoundError,
  KeyNotFoundError,
  LastKeyslotError,
  OpenFailedError,
  PathConflictError,
  RotationInconsistentError,
  UserDeclinedError,
  errorMessage,
  type RotationOutcome,
} from '../errors.js';
import {
  createContainerHandle,
  devicePathFor,
  containerNameFromMapping,
  expandPath,
  isFile,
  isManagedMapping,
  isPathWithin,
  pathExists,
  validateContainerName,
} from './paths.js';
import { KeyedLock } from './lock.js';
import { sealFile, unsealFile, type KeyStore, type SealRecipient } from './crypto/index.js';
import { logger } from '../ui/logger.js';
import type { AuditOperation, AuditOutcome, AuditSink } from './audit.js';
import type { ConfirmationProvider } from './confirmations.js';
import type { MountManager, UnmountResult } from './mount.js';
import type { BlockEncryptionProvider, KeyslotReport, KeyWrappingProvider, MountEntry, SystemProvider } from './providers/types.js';
import type { CreateFailurePolicy } from '../schemas/config.schema.js';
import type {
  BulkFailure,
  BulkReport,
  ContainerHandle,
  ContainerState,
  ContainerSummary,
  KeyPairPaths,
} from '../types.js';

// ============================================================================
// Types
// ============================================================================

export interface LifecycleSettings {
  containerRoot: string;
  mountRoot: string;
  containerSuffix: string;
  filesystem: string;
  onFailure: CreateFailurePolicy;
}

export interface LifecycleDependencies {
  keyStore: KeyStore;
  blockDevice: BlockEncryptionProvider;
  wrapper: KeyWrappingProvider;
  system: SystemProvider;
  mounts: MountManager;
  confirmations: ConfirmationProvider;
  audit: AuditSink;
  settings: LifecycleSettings;
}

export const CREATE_STEPS = [
  'Check free space',
  'Allocate container file',
  'Generate container key pair',
  'Format container',
  'Open container',
  'Create filesystem',
  'Enroll master key',
  'Mount container',
] as const;

export type CreateStep = (typeof CREATE_STEPS)[number];

export type StepStatus = 'in_progress' | 'completed' | 'error';

export interface CreateOptions {
  /** Called as each create step starts and ends */
  onStep?: (index: number, step: CreateStep, status: StepStatus) => void;
}

export interface CreateResult {
  handle: ContainerHandle;
  keyPair: KeyPairPaths;
  mountPath: string;
  masterCreated: boolean;
}

export interface OpenResult {
  handle: ContainerHandle;
  keyFilePath: string;
  /** A mapping with the same name was active and had to be closed first */
  staleClosed: boolean;
}

export interface KeyPairResult {
  created: boolean;
  paths: KeyPairPaths;
}

export interface RotationReport {
  masterPath: string;
  outcomes: RotationOutcome[];
}

export interface UnsealOptions {
  useMaster?: boolean;
}

// ============================================================================
// Lifecycle manager
// ============================================================================

const ROTATION_LOCK = 'master-rotation';

const declinedUnlessCreated = (result: KeyPairResult): AuditOutcome =>
  result.created ? 'success' : 'declined';

export class LifecycleManager {
  private keyStore: KeyStore;
  private blockDevice: BlockEncryptionProvider;
  private wrapper: KeyWrappingProvider;
  private system: SystemProvider;
  private mounts: MountManager;
  private confirmations: ConfirmationProvider;
  private audit: AuditSink;
  private settings: LifecycleSettings;

  private containerLocks = new KeyedLock();
  private rotationLock = new KeyedLock();

  constructor(deps: LifecycleDependencies) {
    this.keyStore = deps.keyStore;
    this.blockDevice = deps.blockDevice;
    this.wrapper = deps.wrapper;
    this.system = deps.system;
    this.mounts = deps.mounts;
    this.confirmations = deps.confirmations;
    this.audit = deps.audit;
    this.settings = deps.settings;
  }

  handle(name: string): ContainerHandle {
    return createContainerHandle(name, {
      containerRoot: this.settings.containerRoot,
      mountRoot: this.settings.mountRoot,
      suffix: this.settings.containerSuffix,
    });
  }

  /** Current state, derived from live provider, mount and file state */
  async state(name: string): Promise<ContainerState> {
    return this.stateOf(this.handle(name));
  }

  // --------------------------------------------------------------------------
  // Open / mount / unmount / close
  // --------------------------------------------------------------------------

  /**
   * Open protocol. Without a key file the container's own private key is used;
   * if that is missing the confirmation provider is asked once for another path.
   * A mapping left active under the same name is torn down first.
   */
  async open(name: string, keyFilePath?: string): Promise<OpenResult> {
    const handle = this.handle(name);
    return this.locked(handle, () => this.audited('open', name, () => this.openContainer(handle, keyFilePath)));
  }

  async openWithMaster(name: string): Promise<OpenResult> {
    return this.open(name, this.keyStore.masterPaths().privatePath);
  }

  /** Mount an opened container, opening it with its own key first when needed */
  async mount(name: string): Promise<string> {
    const handle = this.handle(name);
    return this.locked(handle, async () => {
      if ((await this.blockDevice.status(handle.mappingName)) === 'absent') {
        await this.audited('open', name, () => this.openContainer(handle));
      }
      return this.audited('mount', name, () => this.mountContainer(handle));
    });
  }

  async openAndMount(name: string, keyFilePath?: string): Promise<OpenResult & { mountPath: string }> {
    const handle = this.handle(name);
    return this.locked(handle, async () => {
      const opened = await this.audited('open', name, () => this.openContainer(handle, keyFilePath));
      const mountPath = await this.audited('mount', name, () => this.mountContainer(handle));
      return { ...opened, mountPath };
    });
  }

  /** @returns null when the container was not mounted */
  async unmount(name: string): Promise<UnmountResult | null> {
    const handle = this.handle(name);
    return this.locked(handle, () => this.audited('unmount', name, () => this.unmountContainer(handle)));
  }

  /**
   * Unmount when mounted, then close the mapping.
   * @returns false when no mapping was active
   */
  async close(name: string): Promise<boolean> {
    const handle = this.handle(name);
    return this.locked(handle, () =>
      this.audited('close', name, async () => {
        await this.unmountContainer(handle);
        if ((await this.blockDevice.status(handle.mappingName)) === 'absent') {
          return false;
        }
        await this.blockDevice.close(handle.mappingName);
        return true;
      })
    );
  }

  // --------------------------------------------------------------------------
  // Create
  // --------------------------------------------------------------------------

  /**
   * Create protocol: space check, allocation, key pair, format, open,
   * filesystem, master enrollment, mount. A failure stops the remaining steps;
   * what happens to completed ones follows `create.onFailure`.
   */
  async create(name: string, sizeMiB: number, options: CreateOptions = {}): Promise<CreateResult> {
    const handle = this.handle(name);
    if (!Number.isInteger(sizeMiB) || sizeMiB <= 0) {
      throw new InvalidSizeError(String(sizeMiB));
    }

    return this.locked(handle, () =>
      this.audited('create', name, async () => {
        if (await pathExists(handle.containerPath)) {
          throw new ContainerExistsError(handle.containerPath);
        }
        if (await this.keyStore.keyPairExists(name)) {
          throw new ContainerExistsError(this.keyStore.derivePaths(name).privatePath, 'Key pair');
        }
        return this.runCreate(handle, sizeMiB, options);
      })
    );
  }

  private async runCreate(handle: ContainerHandle, sizeMiB: number, options: CreateOptions): Promise<CreateResult> {
    const { onStep } = options;
    const bytes = sizeMiB * CAPACITY_UNIT_BYTES;
    const keyPair = this.keyStore.derivePaths(handle.name);
    const masterPaths = this.keyStore.masterPaths();
    const completed: CreateStep[] = [];
    let masterCreated = false;
    let mountPath = handle.mountPath;

    const steps: Record<CreateStep, () => Promise<void>> = {
      'Check free space': async () => {
        await ensureDir(this.settings.containerRoot);
        const available = await this.system.freeSpace(this.settings.containerRoot);
        if (available < bytes) {
          throw new InsufficientSpaceError(this.settings.containerRoot, bytes, available);
        }
      },
      'Allocate container file': () => this.system.allocate(handle.containerPath, bytes),
      'Generate container key pair': async () => {
        await this.keyStore.createKeyPair(handle.name);
      },
      'Format container': () => this.blockDevice.format(handle.containerPath, keyPair.privatePath),
      'Open container': async () => {
        await this.openContainer(handle, keyPair.privatePath);
      },
      'Create filesystem': () => this.system.makeFilesystem(handle.devicePath, this.settings.filesystem),
      'Enroll master key': async () => {
        if (!(await this.keyStore.masterKeyExists())) {
          const result = await this.keyStore.createMasterKeyPair(this.confirmations);
          masterCreated = result.created;
        }
        await this.blockDevice.addKey(handle.containerPath, keyPair.privatePath, masterPaths.privatePath);
      },
      'Mount container': async () => {
        mountPath = await this.mounts.mount(handle.mappingName);
      },
    };

    for (const [index, step] of CREATE_STEPS.entries()) {
      onStep?.(index, step, 'in_progress');
      try {
        await steps[step]();
      } catch (error) {
        onStep?.(index, step, 'error');
        throw await this.handleCreateFailure(handle, step, completed, error);
      }
      completed.push(step);
      onStep?.(index, step, 'completed');
    }

    if (masterCreated) {
      logger.debug(`Created master key at ${masterPaths.privatePath}`);
    }
    return { handle, keyPair, mountPath, masterCreated };
  }

  /**
   * Apply the failure policy and return the error to throw: the failing
   * step's own error, annotated with what was kept or rolled back.
   */
  private async handleCreateFailure(
    handle: ContainerHandle,
    failedStep: CreateStep,
    completed: CreateStep[],
    error: unknown
  ): Promise<unknown> {
    const notes: string[] = [`Failed at step "${failedStep}"`];

    if (this.settings.onFailure === 'keep') {
      if (completed.includes('Allocate container file')) {
        notes.push(`Partial container kept at ${handle.containerPath} (create.onFailure = keep)`);
      }
    } else {
      const rollbackErrors = await this.rollbackCreate(handle, completed);
      notes.push(
        rollbackErrors.length === 0
          ? 'Completed steps were rolled back'
          : `Rollback incomplete: ${rollbackErrors.join('; ')}`
      );
    }

    if (error instanceof CofferError) {
      error.suggestions = [...notes, ...(error.suggestions ?? [])];
      return error;
    }
    return new CofferError(`${failedStep} failed: ${errorMessage(error)}`, 'PROVIDER_COMMAND_FAILED', notes);
  }

  /** Undo completed create steps in reverse; the master key is shared and kept */
  private async rollbackCreate(handle: ContainerHandle, completed: CreateStep[]): Promise<string[]> {
    const undo: Partial<Record<CreateStep, () => Promise<unknown>>> = {
      'Mount container': () => this.mounts.unmount(handle.mountPath),
      'Open container': () => this.blockDevice.close(handle.mappingName),
      'Generate container key pair': () => this.keyStore.removeKeyPair(handle.name),
      'Allocate container file': () => this.system.removeFile(handle.containerPath),
    };

    const errors: string[] = [];
    for (const step of [...completed].reverse()) {
      const action = undo[step];
      if (!action) {
        continue;
      }
      try {
        await action();
      } catch (error) {
        errors.push(`${step}: ${errorMessage(error)}`);
      }
    }

    return errors;
  }

  // --------------------------------------------------------------------------
  // Keys
  // --------------------------------------------------------------------------

  /** Generate a container key pair; replacing an existing one needs confirmation */
  async generateKeyPair(name: string): Promise<KeyPairResult> {
    const paths = this.keyStore.derivePaths(name);
    return this.audited(
      'key-generate',
      name,
      async () => {
        if (await this.keyStore.keyPairExists(name)) {
          const replace = await this.confirmations.confirm(
            `A key pair for ${name} already exists. Replace it? Keyslots enrolled with it stop matching.`
          );
          if (!replace) {
            return { created: false, paths };
          }
        }
        await this.keyStore.createKeyPair(name);
        return { created: true, paths };
      },
      declinedUnlessCreated
    );
  }

  async createMasterKey(): Promise<KeyPairResult> {
    return this.rotationLock.run(ROTATION_LOCK, () =>
      this.audited(
        'key-master',
        'master',
        () => this.keyStore.createMasterKeyPair(this.confirmations),
        declinedUnlessCreated
      )
    );
  }

  /** Enroll `newKeyPath` in a new keyslot, authenticated by `authKeyPath` */
  async enrollKey(name: string, authKeyPath: string, newKeyPath: string): Promise<void> {
    const handle = this.handle(name);
    await this.locked(handle, () =>
      this.audited('key-add', name, async () => {
        await this.requireContainer(handle);
        await this.blockDevice.addKey(handle.containerPath, expandPath(authKeyPath), expandPath(newKeyPath));
      })
    );
  }

  /**
   * Remove the keyslot unlocked by `keyFilePath` after confirmation. The last
   * keyslot of a container is never removed.
   */
  async removeKey(name: string, keyFilePath: string): Promise<void> {
    const handle = this.handle(name);
    const keyFile = expandPath(keyFilePath);
    await this.locked(handle, () =>
      this.audited('key-remove', name, async () => {
        await this.requireContainer(handle);
        const report = await this.blockDevice.dumpKeyslots(handle.containerPath);
        if (report.keyslots.length <= 1) {
          throw new LastKeyslotError(handle.containerPath);
        }
        if (!(await this.confirmations.confirm(`Remove the keyslot opened by ${keyFile} from ${name}?`))) {
          throw new UserDeclinedError(`removing the keyslot of ${keyFile} from ${name}`);
        }
        await this.blockDevice.removeKey(handle.containerPath, keyFile);
      })
    );
  }

  async dumpKeyslots(name: string): Promise<KeyslotReport> {
    const handle = this.handle(name);
    await this.requireContainer(handle);
    return this.blockDevice.dumpKeyslots(handle.containerPath);
  }

  /**
   * Master-key rotation across one or more containers.
   *
   * The next master key is staged beside the canonical one. Each container is
   * opened with its own key, the staged key is enrolled and only then the old
   * master slot is removed. The staged key replaces the canonical master (by
   * rename) only once every listed container has completed and no other
   * container still opens with the canonical master; otherwise the canonical
   * master is left alone and a RotationInconsistentError reports each
   * container's progress. A rerun reuses the staged key and skips work that is
   * already done.
   */
  async rotateMaster(names: string[]): Promise<RotationReport> {
    const handles = [...new Set(names)].map((name) => this.handle(name));
    if (handles.length === 0) {
      throw new CofferError('At least one container is required to rotate the master key', 'CONTAINER_NOT_FOUND');
    }
    const target = handles.map((h) => h.name).join(',');

    return this.rotationLock.run(ROTATION_LOCK, () =>
      this.audited('rotate-master', target, async () => {
        const current = this.keyStore.masterPaths();
        if (!(await this.keyStore.masterKeyExists())) {
          throw new KeyFileNotFoundError(current.privatePath, 'Master private');
        }
        for (const handle of handles) {
          await this.requireContainer(handle);
          const containerKey = this.keyStore.derivePaths(handle.name).privatePath;
          if (!(await isFile(containerKey))) {
            throw new KeyFileNotFoundError(containerKey, 'Container private');
          }
        }

        const pending = (await this.keyStore.pendingMasterExists())
          ? this.keyStore.pendingMasterPaths()
          : await this.keyStore.createPendingMasterKeyPair();

        const work: { handle: ContainerHandle; outcome: RotationOutcome }[] = handles.map((handle) => ({
          handle,
          outcome: { name: handle.name, enrolled: false, oldSlotRemoved: false },
        }));
        const outcomes: RotationOutcome[] = work.map(({ outcome }) => outcome);

        for (const [index, { handle, outcome }] of work.entries()) {
          try {
            await this.locked(handle, () => this.rotateContainer(handle, current, pending, outcome));
          } catch (error) {
            const message = errorMessage(error);
            outcome.error = message;
            for (const skipped of work.slice(index + 1)) {
              skipped.outcome.error = 'not attempted';
            }
            throw new RotationInconsistentError(`${handle.name}: ${message}`, outcomes, pending.privatePath);
          }
        }

        // Promotion overwrites the current master, so no other container may still need it
        const dependents = await this.containersOpenedBy(current.privatePath, handles);
        if (dependents.length > 0) {
          throw new RotationInconsistentError(
            `the current master key still opens ${dependents.join(', ')}; rotate ${dependents.length === 1 ? 'it' : 'them'} as well`,
            outcomes,
            pending.privatePath
          );
        }

        const promoted = await this.keyStore.promotePendingMaster();
        return { masterPath: promoted.privatePath, outcomes };
      })
    );
  }

  /** Formatted containers outside `exclude` that `keyFilePath` opens */
  private async containersOpenedBy(keyFilePath: string, exclude: ContainerHandle[]): Promise<string[]> {
    const excluded = new Set(exclude.map((h) => h.name));
    const names: string[] = [];
    for (const summary of await this.listContainers()) {
      if (excluded.has(summary.name) || summary.state === 'unprovisioned' || summary.state === 'allocated') {
        continue;
      }
      if (await this.blockDevice.testKey(summary.path, keyFilePath)) {
        names.push(summary.name);
      }
    }
    return names;
  }

  private async rotateContainer(
    handle: ContainerHandle,
    current: KeyPairPaths,
    pending: KeyPairPaths,
    outcome: RotationOutcome
  ): Promise<void> {
    const containerKey = this.keyStore.derivePaths(handle.name).privatePath;

    await this.openContainer(handle, containerKey);
    try {
      if (!(await this.blockDevice.testKey(handle.containerPath, pending.privatePath))) {
        await this.blockDevice.addKey(handle.containerPath, containerKey, pending.privatePath);
      }
      outcome.enrolled = true;

      // Only after the new master opens the container
      if (await this.blockDevice.testKey(handle.containerPath, current.privatePath)) {
        await this.blockDevice.removeKey(handle.containerPath, current.privatePath);
      }
      outcome.oldSlotRemoved = true;
    } finally {
      await this.closeQuietly(handle);
    }
  }

  // --------------------------------------------------------------------------
  // Seal / unseal
  // --------------------------------------------------------------------------

  /**
   * Encrypt the closed container file into `<container>.enc` for the
   * container key and, when present, the master key.
   */
  async seal(name: string): Promise<string> {
    const handle = this.handle(name);
    return this.locked(handle, () =>
      this.audited('seal', name, async () => {
        await this.requireContainer(handle);
        if (await this.isActive(handle)) {
          throw new ContainerBusyError(name, 'it is open');
        }

        const sealedPath = `${handle.containerPath}${SEALED_SUFFIX}`;
        if (await pathExists(sealedPath)) {
          throw new PathConflictError(sealedPath, 'a sealed copy already exists');
        }

        const recipients: SealRecipient[] = [
          { label: name, publicKeyPem: await this.keyStore.readPublicKey(this.keyStore.derivePaths(name)) },
        ];
        if (await this.keyStore.masterKeyExists()) {
          recipients.push({
            label: 'master',
            publicKeyPem: await this.keyStore.readPublicKey(this.keyStore.masterPaths()),
          });
        }

        await sealFile(handle.containerPath, sealedPath, recipients, this.wrapper);
        return sealedPath;
      })
    );
  }

  /** Restore `<container>` from `<container>.enc` */
  async unseal(name: string, options: UnsealOptions = {}): Promise<string> {
    const handle = this.handle(name);
    return this.locked(handle, () =>
      this.audited('unseal', name, async () => {
        const sealedPath = `${handle.containerPath}${SEALED_SUFFIX}`;
        if (!(await isFile(sealedPath))) {
          throw new ContainerNotFoundError(sealedPath);
        }
        if (await pathExists(handle.containerPath)) {
          throw new PathConflictError(handle.containerPath, 'the container file already exists');
        }

        const label = options.useMaster ? 'master' : name;
        const keyPaths = options.useMaster ? this.keyStore.masterPaths() : this.keyStore.derivePaths(name);
        const privateKey = await this.keyStore.readPrivateKey(keyPaths);

        await unsealFile(sealedPath, handle.containerPath, label, privateKey, this.wrapper);
        return handle.containerPath;
      })
    );
  }

  // --------------------------------------------------------------------------
  // Listing
  // --------------------------------------------------------------------------

  /** Container files (plain or sealed) under the container root */
  async listContainers(): Promise<ContainerSummary[]> {
    const root = this.settings.containerRoot;
    if (!(await pathExists(root))) {
      return [];
    }

    const suffix = this.settings.containerSuffix;
    const sealedSuffix = `${suffix}${SEALED_SUFFIX}`;
    const entries = await readdir(root);
    const names = new Set<string>();
    for (const entry of entries) {
      const base = entry.endsWith(sealedSuffix)
        ? entry.slice(0, -sealedSuffix.length)
        : entry.endsWith(suffix)
          ? entry.slice(0, -suffix.length)
          : null;
      if (base !== null && this.isValidName(base)) {
        names.add(base);
      }
    }

    const summaries: ContainerSummary[] = [];
    for (const name of [...names].sort()) {
      const handle = this.handle(name);
      const present = await isFile(handle.containerPath);
      summaries.push({
        name,
        path: handle.containerPath,
        sizeBytes: present ? (await stat(handle.containerPath)).size : 0,
        state: await this.stateOf(handle),
        sealed: await isFile(`${handle.containerPath}${SEALED_SUFFIX}`),
      });
    }
    return summaries;
  }

  /** Active mappings that follow the managed naming convention */
  async listMappings(): Promise<string[]> {
    const mappings = await this.blockDevice.listActiveMappings();
    return mappings.filter(isManagedMapping);
  }

  async listMounts(): Promise<MountEntry[]> {
    return this.mounts.listManagedMounts();
  }

  // --------------------------------------------------------------------------
  // Bulk recovery
  // --------------------------------------------------------------------------

  /**
   * Unmount and close every live managed mapping. The live set is queried
   * once; each mapping is attempted independently.
   */
  async closeAllMappings(): Promise<BulkReport> {
    return this.bulk('close-all', async (report) => {
      const mappings = await this.listMappings();
      const mountTable = await this.system.listMounts();

      for (const mappingName of mappings) {
        const devicePath = devicePathFor(mappingName);
        const lockKey = containerNameFromMapping(mappingName, this.settings.containerSuffix);

        await this.containerLocks.run(lockKey, async () => {
          const mounted = mountTable.filter((entry) => entry.device === devicePath);
          for (const entry of mounted) {
            try {
              await this.mounts.unmount(entry.mountPath);
            } catch (error) {
              report.failed.push(this.failure(mappingName, 'unmount', error));
              return;
            }
          }

          try {
            await this.blockDevice.close(mappingName);
            report.succeeded.push(mappingName);
          } catch (error) {
            report.failed.push(this.failure(mappingName, 'close', error));
          }
        });
      }
    });
  }

  /**
   * Unmount every live mount under the mount root, plus managed mappings
   * mounted elsewhere. Mappings stay open.
   */
  async unmountAllVolumes(): Promise<BulkReport> {
    return this.bulk('unmount-all', async (report) => {
      const mountTable = await this.system.listMounts();
      const targets = mountTable.filter(
        (entry) =>
          (entry.mountPath !== this.settings.mountRoot && isPathWithin(entry.mountPath, this.settings.mountRoot)) ||
          (dirname(entry.device) === DEVICE_MAPPER_DIR && isManagedMapping(basename(entry.device)))
      );

      for (const entry of targets) {
        try {
          await this.mounts.unmount(entry.mountPath);
          report.succeeded.push(entry.mountPath);
        } catch (error) {
          report.failed.push(this.failure(entry.mountPath, 'unmount', error));
        }
      }
    });
  }

  // --------------------------------------------------------------------------
  // Internals (callers hold the container lock)
  // --------------------------------------------------------------------------

  private async openContainer(handle: ContainerHandle, keyFilePath?: string): Promise<OpenResult> {
    await this.requireContainer(handle);
    const keyFile = await this.resolveKeyFile(handle, keyFilePath);

    let staleClosed = false;
    if (await this.isActive(handle)) {
      logger.debug(`Mapping ${handle.mappingName} is already active, closing it first`);
      const mountPoint = await this.mounts.mountPointOf(handle.devicePath);
      if (mountPoint !== null && isPathWithin(mountPoint, this.settings.mountRoot)) {
        await this.mounts.unmount(mountPoint);
      }
      await this.blockDevice.close(handle.mappingName);
      staleClosed = true;
    }

    try {
      await this.blockDevice.open(handle.containerPath, handle.mappingName, keyFile);
    } catch (error) {
      throw new OpenFailedError(handle.containerPath, keyFile, errorMessage(error));
    }

    return { handle, keyFilePath: keyFile, staleClosed };
  }

  /** Explicit key, else the container key, else one alternate path from the user */
  private async resolveKeyFile(handle: ContainerHandle, keyFilePath?: string): Promise<string> {
    if (keyFilePath !== undefined) {
      const explicit = expandPath(keyFilePath);
      if (!(await isFile(explicit))) {
        throw new KeyNotFoundError(explicit);
      }
      return explicit;
    }

    const defaultKey = this.keyStore.derivePaths(handle.name).privatePath;
    if (await isFile(defaultKey)) {
      return defaultKey;
    }

    const alternate = await this.confirmations.requestPath(
      `No key found at ${defaultKey}. Path to another key file for ${handle.name}:`
    );
    if (alternate === null) {
      throw new KeyNotFoundError(defaultKey);
    }
    const expanded = expandPath(alternate);
    if (!(await isFile(expanded))) {
      throw new KeyNotFoundError(expanded);
    }
    return expanded;
  }

  private async mountContainer(handle: ContainerHandle): Promise<string> {
    const existing = await this.mounts.mountPointOf(handle.devicePath);
    if (existing !== null) {
      return existing;
    }
    return this.mounts.mount(handle.mappingName);
  }

  private async unmountContainer(handle: ContainerHandle): Promise<UnmountResult | null> {
    const mountPoint = await this.mounts.mountPointOf(handle.devicePath);
    if (mountPoint === null) {
      return null;
    }
    return this.mounts.unmount(mountPoint);
  }

  private async closeQuietly(handle: ContainerHandle): Promise<void> {
    try {
      if (await this.isActive(handle)) {
        await this.blockDevice.close(handle.mappingName);
      }
    } catch (error) {
      logger.warning(`Could not close ${handle.mappingName}: ${errorMessage(error)}`);
    }
  }

  private async stateOf(handle: ContainerHandle): Promise<ContainerState> {
    if (await this.isActive(handle)) {
      return (await this.mounts.mountPointOf(handle.devicePath)) === null ? 'opened' : 'mounted';
    }
    if (!(await isFile(handle.containerPath))) {
      return 'unprovisioned';
    }
    return (await this.blockDevice.isFormatted(handle.containerPath)) ? 'formatted' : 'allocated';
  }

  private async isActive(handle: ContainerHandle): Promise<boolean> {
    return (await this.blockDevice.status(handle.mappingName)) === 'active';
  }

  private async requireContainer(handle: ContainerHandle): Promise<void> {
    if (!(await isFile(handle.containerPath))) {
      throw new ContainerNotFoundError(handle.containerPath);
    }
  }

  private isValidName(name: string): boolean {
    try {
      validateContainerName(name);
      return true;
    } catch {
      return false;
    }
  }

  private failure(target: string, step: BulkFailure['step'], error: unknown): BulkFailure {
    return { target, step, error: errorMessage(error) };
  }

  private async bulk(
    operation: AuditOperation,
    run: (report: BulkReport) => Promise<void>
  ): Promise<BulkReport> {
    const report: BulkReport = { succeeded: [], failed: [] };
    try {
      await run(report);
    } catch (error) {
      await this.audit.record({ operation, target: '*', outcome: 'failure', details: errorMessage(error) });
      throw error;
    }

    await this.audit.record({
      operation,
      target: '*',
      outcome: report.failed.length === 0 ? 'success' : 'failure',
      details: `${report.succeeded.length} succeeded, ${report.failed.length} failed`,
    });
    return report;
  }

  private locked<T>(handle: ContainerHandle, task: () => Promise<T>): Promise<T> {
    return this.containerLocks.run(handle.name, task);
  }

  /** Record the outcome of `task`; failures are recorded before they propagate */
  private async audited<T>(
    operation: AuditOperation,
    target: string,
    task: () => Promise<T>,
    outcomeOf: (result: T) => AuditOutcome = () => 'success'
  ): Promise<T> {
    try {
      const result = await task();
      await this.audit.record({ operation, target, outcome: outcomeOf(result) });
      return result;
    } catch (error) {
      const outcome = error instanceof UserDeclinedError ? 'declined' : 'failure';
      await this.audit.record({ operation, target, outcome, details: errorMessage(error) });
      throw error;
    }
  }
}
