/**
 * Lifecycle manager tests: create, open, mount, close, keys, seal and listing
 * over in-process fakes of the block-encryption and OS providers.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { vol } from 'memfs';
import { TEST_CONTAINER_ROOT, TEST_HOME, TEST_KEYS_DIR, TEST_MOUNT_ROOT } from '../setup.js';

vi.mock('fs/promises', async () => {
  const memfs = await vi.importActual<typeof import('memfs')>('memfs');
  return memfs.fs.promises;
});

vi.mock('fs', async () => {
  const memfs = await vi.importActual<typeof import('memfs')>('memfs');
  return memfs.fs;
});

vi.mock('fs-extra', async () => ({
  pathExists: async (path: string) => {
    const { vol } = await import('memfs');
    return vol.existsSync(path);
  },
  ensureDir: async (dir: string) => {
    const { vol } = await import('memfs');
    vol.mkdirSync(dir, { recursive: true });
  },
}));

vi.mock('os', async (importOriginal) => {
  const original = await importOriginal<typeof import('os')>();
  return {
    ...original,
    homedir: () => TEST_HOME,
  };
});

import { CREATE_STEPS } from '../../src/lib/lifecycle.js';
import { createStaticConfirmations } from '../../src/lib/confirmations.js';
import { CAPACITY_UNIT_BYTES } from '../../src/constants.js';
import {
  CofferError,
  ContainerBusyError,
  ContainerExistsError,
  ContainerNotFoundError,
  InsufficientSpaceError,
  InvalidSizeError,
  KeyNotFoundError,
  LastKeyslotError,
  MountFailedError,
  OpenFailedError,
  ProviderCommandError,
  UnmountBusyError,
  UserDeclinedError,
} from '../../src/errors.js';
import { createTestHarness, readTestFile, testFileExists, writeTestFile, type TestHarness } from '../utils/testHelpers.js';

const containerPath = (name: string): string => `${TEST_CONTAINER_ROOT}/${name}.img`;
const keyPath = (name: string): string => `${TEST_KEYS_DIR}/${name}/priv/${name}_private.pem`;
const MASTER_KEY = `${TEST_KEYS_DIR}/master/priv/master_private.pem`;

describe('LifecycleManager', () => {
  let h: TestHarness;

  beforeEach(() => {
    h = createTestHarness();
  });

  /** A formatted, closed container enrolled with its own key pair */
  const seedContainer = async (name: string): Promise<void> => {
    await h.keyStore.createKeyPair(name);
    h.blockDevice.seed(containerPath(name), [keyPath(name)]);
  };

  // ============================================================================
  // Create
  // ============================================================================

  describe('create', () => {
    it('should provision vaultA end to end', async () => {
      let slotsAfterFormat = 0;

      const result = await h.lifecycle.create('vaultA', 1024, {
        onStep: (_index, step, status) => {
          if (step === 'Format container' && status === 'completed') {
            slotsAfterFormat = h.blockDevice.containers.get(containerPath('vaultA'))?.size ?? 0;
          }
        },
      });

      // exactly 1024 units reserved for the one container file
      expect([...h.system.allocations]).toEqual([[containerPath('vaultA'), 1024 * CAPACITY_UNIT_BYTES]]);
      // format leaves the container key as the only keyslot
      expect(slotsAfterFormat).toBe(1);
      expect(await h.blockDevice.status('vaultA_mapper')).toBe('active');
      expect(result.mountPath).toBe(`${TEST_MOUNT_ROOT}/vaultA`);
      expect(h.system.mounts).toEqual([
        { device: '/dev/mapper/vaultA_mapper', mountPath: `${TEST_MOUNT_ROOT}/vaultA`, fsType: 'ext4' },
      ]);
      expect(h.system.chowns).toEqual([{ path: `${TEST_MOUNT_ROOT}/vaultA`, owner: 'tester', recursive: true }]);
    });

    it('should enroll a newly created master key next to the container key', async () => {
      const result = await h.lifecycle.create('vaultA', 64);

      expect(result.masterCreated).toBe(true);
      expect(result.keyPair.privatePath).toBe(keyPath('vaultA'));
      expect((await h.lifecycle.dumpKeyslots('vaultA')).keyslots).toEqual([0, 1]);
      expect(h.blockDevice.unlocks(containerPath('vaultA'), keyPath('vaultA'))).toBe(true);
      expect(h.blockDevice.unlocks(containerPath('vaultA'), MASTER_KEY)).toBe(true);
    });

    it('should reuse an existing master key without asking', async () => {
      await h.keyStore.createMasterKeyPair(createStaticConfirmations());
      const master = readTestFile(MASTER_KEY);

      const result = await h.lifecycle.create('vaultA', 64);

      expect(result.masterCreated).toBe(false);
      expect(readTestFile(MASTER_KEY)).toBe(master);
      expect(h.blockDevice.unlocks(containerPath('vaultA'), MASTER_KEY)).toBe(true);
    });

    it('should report every step in order', async () => {
      const seen: string[] = [];

      await h.lifecycle.create('vaultA', 64, {
        onStep: (index, step, status) => seen.push(`${index}:${step}:${status}`),
      });

      expect(seen).toEqual(
        CREATE_STEPS.flatMap((step, index) => [`${index}:${step}:in_progress`, `${index}:${step}:completed`])
      );
    });

    it('should apply the configured filesystem', async () => {
      h = createTestHarness({ settings: { filesystem: 'xfs' } });

      await h.lifecycle.create('vaultA', 64);

      expect(h.system.filesystems.get('/dev/mapper/vaultA_mapper')).toBe('xfs');
    });

    it('should check free space before allocating anything', async () => {
      h.system.available = 100 * CAPACITY_UNIT_BYTES;

      await expect(h.lifecycle.create('vaultA', 1024)).rejects.toThrow(InsufficientSpaceError);

      expect(h.system.allocations.size).toBe(0);
      expect(testFileExists(containerPath('vaultA'))).toBe(false);
      expect(await h.keyStore.keyPairExists('vaultA')).toBe(false);
    });

    it.each([0, -1, 1.5])('should reject a size of %s', async (size) => {
      await expect(h.lifecycle.create('vaultA', size)).rejects.toThrow(InvalidSizeError);
    });

    it('should refuse to overwrite an existing container file', async () => {
      writeTestFile(containerPath('vaultA'), 'existing');

      await expect(h.lifecycle.create('vaultA', 64)).rejects.toThrow(ContainerExistsError);
      expect(readTestFile(containerPath('vaultA'))).toBe('existing');
    });

    it('should refuse to replace an existing key pair', async () => {
      await h.keyStore.createKeyPair('vaultA');

      const error = await h.lifecycle.create('vaultA', 64).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ContainerExistsError);
      expect(error).toMatchObject({ message: `Key pair already exists: ${keyPath('vaultA')}` });
      expect(h.system.allocations.size).toBe(0);
    });

    it('should keep completed steps and name the failed one by default', async () => {
      h.system.fail('makeFilesystem', new ProviderCommandError('mkfs.ext4', 1, 'bad superblock'));

      const error = await h.lifecycle.create('vaultA', 64).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderCommandError);
      expect(error).toMatchObject({
        suggestions: [
          'Failed at step "Create filesystem"',
          `Partial container kept at ${containerPath('vaultA')} (create.onFailure = keep)`,
        ],
      });
      expect(testFileExists(containerPath('vaultA'))).toBe(true);
      expect(await h.keyStore.keyPairExists('vaultA')).toBe(true);
      expect(await h.keyStore.masterKeyExists()).toBe(false);
      expect(h.system.mounts).toEqual([]);
    });

    it('should roll back completed steps under the rollback policy', async () => {
      h = createTestHarness({ settings: { onFailure: 'rollback' } });
      h.system.fail('mount', new ProviderCommandError('mount', 32, 'wrong fs type'));

      const error = await h.lifecycle.create('vaultA', 64).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MountFailedError);
      expect(error).toMatchObject({
        suggestions: [
          'Failed at step "Mount container"',
          'Completed steps were rolled back',
          `The mount directory ${TEST_MOUNT_ROOT}/vaultA was left in place for inspection`,
        ],
      });
      expect(testFileExists(containerPath('vaultA'))).toBe(false);
      expect(await h.keyStore.keyPairExists('vaultA')).toBe(false);
      expect(await h.blockDevice.listActiveMappings()).toEqual([]);
      // the master key is shared and survives
      expect(await h.keyStore.masterKeyExists()).toBe(true);
    });

    it('should say when a rollback is incomplete', async () => {
      h = createTestHarness({ settings: { onFailure: 'rollback' } });
      h.blockDevice.fail('format', new ProviderCommandError('cryptsetup', 1, 'device busy'));
      h.system.fail('removeFile', new Error('EBUSY'));

      const error = await h.lifecycle.create('vaultA', 64).catch((e: unknown) => e);

      expect(error).toMatchObject({
        suggestions: ['Failed at step "Format container"', 'Rollback incomplete: Allocate container file: EBUSY'],
      });
      expect(await h.keyStore.keyPairExists('vaultA')).toBe(false);
    });

    it('should wrap unexpected errors with the failing step', async () => {
      h.blockDevice.fail('format', new Error('disk on fire'));

      const error = await h.lifecycle.create('vaultA', 64).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CofferError);
      expect(error).toMatchObject({
        message: 'Format container failed: disk on fire',
        code: 'PROVIDER_COMMAND_FAILED',
      });
    });

    it('should audit success and failure', async () => {
      await h.lifecycle.create('vaultA', 64);
      h.system.available = 0;
      await expect(h.lifecycle.create('vaultB', 64)).rejects.toThrow(InsufficientSpaceError);

      expect(h.audit.operations()).toEqual(['create:vaultA:success', 'create:vaultB:failure']);
      expect(h.audit.entries[1].details).toContain('Not enough free space');
    });
  });

  // ============================================================================
  // Open / close
  // ============================================================================

  describe('open and close', () => {
    it.each(['vaultA', 'backup-2024', 'x.y_z'])(
      'should leave no mapping and an unchanged file after create, open, close (%s)',
      async (name) => {
        await h.lifecycle.create(name, 64);
        const size = vol.statSync(containerPath(name)).size;

        await h.lifecycle.open(name);
        expect(await h.lifecycle.close(name)).toBe(true);

        expect(await h.blockDevice.listActiveMappings()).toEqual([]);
        expect(h.system.mounts).toEqual([]);
        expect(vol.statSync(containerPath(name)).size).toBe(size);
      }
    );

    it('should open over a stale mapping with the same name', async () => {
      await seedContainer('vaultA');
      h.blockDevice.mappings.set('vaultA_mapper', containerPath('vaultA'));
      await h.system.mount('/dev/mapper/vaultA_mapper', `${TEST_MOUNT_ROOT}/vaultA`);

      const result = await h.lifecycle.open('vaultA');

      expect(result.staleClosed).toBe(true);
      expect((await h.blockDevice.listActiveMappings()).filter((m) => m === 'vaultA_mapper')).toHaveLength(1);
      expect(h.system.mounts).toEqual([]);
    });

    it('should default to the container key', async () => {
      await seedContainer('vaultA');

      const result = await h.lifecycle.open('vaultA');

      expect(result).toMatchObject({ keyFilePath: keyPath('vaultA'), staleClosed: false });
      expect(h.blockDevice.mappings.get('vaultA_mapper')).toBe(containerPath('vaultA'));
    });

    it('should ask once for another key when the container key is missing', async () => {
      const requestPath = vi.fn(async () => '/keys/alt.pem');
      h = createTestHarness({ confirmations: { ...createStaticConfirmations(), requestPath } });
      writeTestFile('/keys/alt.pem', 'alternate key');
      h.blockDevice.seed(containerPath('vaultA'), ['/keys/alt.pem']);

      const result = await h.lifecycle.open('vaultA');

      expect(result.keyFilePath).toBe('/keys/alt.pem');
      expect(requestPath).toHaveBeenCalledTimes(1);
    });

    it('should fail with KeyNotFound when no alternate key is given', async () => {
      writeTestFile('/keys/alt.pem', 'alternate key');
      h.blockDevice.seed(containerPath('vaultA'), ['/keys/alt.pem']);

      await expect(h.lifecycle.open('vaultA')).rejects.toThrow(`Key file not found: ${keyPath('vaultA')}`);
    });

    it('should not retry when the alternate key is missing too', async () => {
      const requestPath = vi.fn(async () => '/keys/typo.pem');
      h = createTestHarness({ confirmations: { ...createStaticConfirmations(), requestPath } });
      writeTestFile('/keys/alt.pem', 'alternate key');
      h.blockDevice.seed(containerPath('vaultA'), ['/keys/alt.pem']);

      await expect(h.lifecycle.open('vaultA')).rejects.toThrow('Key file not found: /keys/typo.pem');
      expect(requestPath).toHaveBeenCalledTimes(1);
    });

    it('should fail with KeyNotFound for a missing explicit key without prompting', async () => {
      const requestPath = vi.fn(async () => null);
      h = createTestHarness({ confirmations: { ...createStaticConfirmations(), requestPath } });
      await seedContainer('vaultA');

      await expect(h.lifecycle.open('vaultA', '/keys/none.pem')).rejects.toThrow(KeyNotFoundError);
      expect(requestPath).not.toHaveBeenCalled();
    });

    it('should report the key when the provider refuses it', async () => {
      await seedContainer('vaultA');
      writeTestFile('/keys/wrong.pem', 'wrong key');

      const error = await h.lifecycle.open('vaultA', '/keys/wrong.pem').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(OpenFailedError);
      expect(error).toMatchObject({
        message: `Failed to open ${containerPath('vaultA')} with key /keys/wrong.pem: cryptsetup failed with exit code 2: No key available with this passphrase.`,
      });
      expect(await h.blockDevice.status('vaultA_mapper')).toBe('absent');
      expect(h.audit.operations()).toEqual(['open:vaultA:failure']);
    });

    it('should fail for a container that does not exist', async () => {
      await expect(h.lifecycle.open('ghost')).rejects.toThrow(ContainerNotFoundError);
    });

    it('should open with the master key', async () => {
      await h.lifecycle.create('vaultA', 64);
      await h.lifecycle.close('vaultA');

      const result = await h.lifecycle.openWithMaster('vaultA');

      expect(result.keyFilePath).toBe(MASTER_KEY);
    });

    it('should open before mounting when needed', async () => {
      await seedContainer('vaultA');

      const mountPath = await h.lifecycle.mount('vaultA');

      expect(mountPath).toBe(`${TEST_MOUNT_ROOT}/vaultA`);
      expect(h.audit.operations()).toEqual(['open:vaultA:success', 'mount:vaultA:success']);
    });

    it('should not mount twice', async () => {
      await seedContainer('vaultA');
      await h.lifecycle.openAndMount('vaultA');

      await expect(h.lifecycle.mount('vaultA')).resolves.toBe(`${TEST_MOUNT_ROOT}/vaultA`);
      expect(h.system.mounts).toHaveLength(1);
    });

    it('should return null when unmounting a container that is not mounted', async () => {
      await seedContainer('vaultA');
      await h.lifecycle.open('vaultA');

      expect(await h.lifecycle.unmount('vaultA')).toBeNull();
      expect(await h.blockDevice.status('vaultA_mapper')).toBe('active');
    });

    it('should report false when closing a container with no mapping', async () => {
      await seedContainer('vaultA');

      expect(await h.lifecycle.close('vaultA')).toBe(false);
    });

    it('should keep the mapping when a busy unmount is aborted', async () => {
      await seedContainer('vaultA');
      await h.lifecycle.openAndMount('vaultA');
      h.system.holders.set(`${TEST_MOUNT_ROOT}/vaultA`, [{ pid: 7, command: 'vim' }]);

      await expect(h.lifecycle.close('vaultA')).rejects.toThrow(UnmountBusyError);

      expect(await h.blockDevice.status('vaultA_mapper')).toBe('active');
      expect(h.system.mounts).toHaveLength(1);
    });

    it('should force-detach a busy mount when confirmed', async () => {
      h = createTestHarness({ answers: { busy: 'force' } });
      await seedContainer('vaultA');
      await h.lifecycle.openAndMount('vaultA');
      h.system.holders.set(`${TEST_MOUNT_ROOT}/vaultA`, [{ pid: 7, command: 'vim' }]);

      expect(await h.lifecycle.close('vaultA')).toBe(true);
      expect(h.system.forcedUnmounts).toEqual([`${TEST_MOUNT_ROOT}/vaultA`]);
    });

    it('should serialize operations on the same container', async () => {
      await seedContainer('vaultA');

      const [opened, closed] = await Promise.all([h.lifecycle.open('vaultA'), h.lifecycle.close('vaultA')]);

      expect(opened.staleClosed).toBe(false);
      expect(closed).toBe(true);
      expect(await h.blockDevice.listActiveMappings()).toEqual([]);
    });
  });

  // ============================================================================
  // State
  // ============================================================================

  describe('state', () => {
    it('should derive each state from live provider and mount data', async () => {
      expect(await h.lifecycle.state('vaultA')).toBe('unprovisioned');

      await h.system.allocate(containerPath('vaultA'), 1024);
      expect(await h.lifecycle.state('vaultA')).toBe('allocated');

      await h.keyStore.createKeyPair('vaultA');
      await h.blockDevice.format(containerPath('vaultA'), keyPath('vaultA'));
      expect(await h.lifecycle.state('vaultA')).toBe('formatted');

      await h.lifecycle.open('vaultA');
      expect(await h.lifecycle.state('vaultA')).toBe('opened');

      await h.lifecycle.mount('vaultA');
      expect(await h.lifecycle.state('vaultA')).toBe('mounted');
    });
  });

  // ============================================================================
  // Keys
  // ============================================================================

  describe('keys', () => {
    it('should refuse to remove the last keyslot and leave the table unchanged', async () => {
      await seedContainer('vaultA');

      await expect(h.lifecycle.removeKey('vaultA', keyPath('vaultA'))).rejects.toThrow(LastKeyslotError);

      expect((await h.lifecycle.dumpKeyslots('vaultA')).keyslots).toEqual([0]);
      expect(h.blockDevice.calls.some((c) => c.startsWith('removeKey'))).toBe(false);
    });

    it('should remove a keyslot when another remains', async () => {
      await h.lifecycle.create('vaultA', 64);

      await h.lifecycle.removeKey('vaultA', MASTER_KEY);

      expect((await h.lifecycle.dumpKeyslots('vaultA')).keyslots).toEqual([0]);
      expect(h.blockDevice.unlocks(containerPath('vaultA'), MASTER_KEY)).toBe(false);
    });

    it('should keep the keyslot when removal is declined', async () => {
      const declining = createTestHarness({ answers: { confirm: false } });
      await declining.lifecycle.create('vaultA', 64);

      await expect(declining.lifecycle.removeKey('vaultA', MASTER_KEY)).rejects.toThrow(UserDeclinedError);

      expect((await declining.lifecycle.dumpKeyslots('vaultA')).keyslots).toEqual([0, 1]);
      expect(declining.blockDevice.calls.some((c) => c.startsWith('removeKey'))).toBe(false);
      expect(declining.audit.operations().pop()).toBe('key-remove:vaultA:declined');
    });

    it('should enroll another key authenticated by an existing one', async () => {
      await seedContainer('vaultA');
      writeTestFile(`${TEST_HOME}/backup.pem`, 'backup key');

      await h.lifecycle.enrollKey('vaultA', keyPath('vaultA'), '~/backup.pem');

      expect((await h.lifecycle.dumpKeyslots('vaultA')).keyslots).toEqual([0, 1]);
      expect(h.blockDevice.unlocks(containerPath('vaultA'), `${TEST_HOME}/backup.pem`)).toBe(true);
      expect(h.audit.operations()).toEqual(['key-add:vaultA:success']);
    });

    it('should generate a container key pair', async () => {
      const result = await h.lifecycle.generateKeyPair('vaultA');

      expect(result).toEqual({
        created: true,
        paths: {
          privatePath: keyPath('vaultA'),
          publicPath: `${TEST_KEYS_DIR}/vaultA/pub/vaultA_public.pem`,
        },
      });
    });

    it('should record a declined replacement as declined', async () => {
      h = createTestHarness({ answers: { confirm: false } });
      await h.keyStore.createKeyPair('vaultA');
      const before = readTestFile(keyPath('vaultA'));

      const result = await h.lifecycle.generateKeyPair('vaultA');

      expect(result.created).toBe(false);
      expect(readTestFile(keyPath('vaultA'))).toBe(before);
      expect(h.audit.operations()).toEqual(['key-generate:vaultA:declined']);
    });

    it('should create the master key once and honour a declined replacement', async () => {
      h = createTestHarness({ answers: { confirm: false } });

      expect((await h.lifecycle.createMasterKey()).created).toBe(true);
      expect((await h.lifecycle.createMasterKey()).created).toBe(false);
      expect(h.audit.operations()).toEqual(['key-master:master:success', 'key-master:master:declined']);
    });
  });

  // ============================================================================
  // Seal / unseal
  // ============================================================================

  describe('seal and unseal', () => {
    beforeEach(async () => {
      await h.lifecycle.create('vaultA', 64);
      await h.lifecycle.close('vaultA');
      writeTestFile(containerPath('vaultA'), 'container bytes');
    });

    it('should seal for the container key and the master key', async () => {
      const sealedPath = await h.lifecycle.seal('vaultA');

      expect(sealedPath).toBe(`${containerPath('vaultA')}.enc`);
      expect(testFileExists(sealedPath)).toBe(true);
      expect(readTestFile(containerPath('vaultA'))).toBe('container bytes');

      vol.unlinkSync(containerPath('vaultA'));
      await h.lifecycle.unseal('vaultA');
      expect(readTestFile(containerPath('vaultA'))).toBe('container bytes');

      vol.unlinkSync(containerPath('vaultA'));
      await h.lifecycle.unseal('vaultA', { useMaster: true });
      expect(readTestFile(containerPath('vaultA'))).toBe('container bytes');
    });

    it('should refuse to seal an open container', async () => {
      await h.lifecycle.open('vaultA');

      await expect(h.lifecycle.seal('vaultA')).rejects.toThrow(ContainerBusyError);
    });

    it('should not overwrite an existing sealed copy', async () => {
      await h.lifecycle.seal('vaultA');

      await expect(h.lifecycle.seal('vaultA')).rejects.toThrow('a sealed copy already exists');
    });

    it('should not unseal over an existing container file', async () => {
      await h.lifecycle.seal('vaultA');

      await expect(h.lifecycle.unseal('vaultA')).rejects.toThrow('the container file already exists');
    });

    it('should need a sealed copy to unseal', async () => {
      vol.unlinkSync(containerPath('vaultA'));

      await expect(h.lifecycle.unseal('vaultA')).rejects.toThrow(ContainerNotFoundError);
    });
  });

  // ============================================================================
  // Listing
  // ============================================================================

  describe('listing', () => {
    it('should list container files with their derived state', async () => {
      await h.lifecycle.create('vaultA', 64);
      await h.lifecycle.create('vaultB', 64);
      await h.lifecycle.close('vaultB');
      writeTestFile(`${TEST_CONTAINER_ROOT}/notes.txt`, 'not a container');
      writeTestFile(`${TEST_CONTAINER_ROOT}/bad name.img`, 'invalid name');

      const containers = await h.lifecycle.listContainers();

      expect(containers).toEqual([
        { name: 'vaultA', path: containerPath('vaultA'), sizeBytes: 512, state: 'mounted', sealed: false },
        { name: 'vaultB', path: containerPath('vaultB'), sizeBytes: 512, state: 'formatted', sealed: false },
      ]);
    });

    it('should list sealed containers whose plaintext is gone', async () => {
      await h.lifecycle.create('vaultA', 64);
      await h.lifecycle.close('vaultA');
      await h.lifecycle.seal('vaultA');
      vol.unlinkSync(containerPath('vaultA'));

      expect(await h.lifecycle.listContainers()).toEqual([
        { name: 'vaultA', path: containerPath('vaultA'), sizeBytes: 0, state: 'unprovisioned', sealed: true },
      ]);
    });

    it('should return nothing when the container root is missing', async () => {
      expect(await h.lifecycle.listContainers()).toEqual([]);
    });

    it('should list only managed mappings and mounts', async () => {
      await h.lifecycle.create('vaultA', 64);
      h.blockDevice.externalMappings.push('luks-root');
      await h.system.mount('/dev/sda1', '/boot');

      expect(await h.lifecycle.listMappings()).toEqual(['vaultA_mapper']);
      expect((await h.lifecycle.listMounts()).map((m) => m.mountPath)).toEqual([`${TEST_MOUNT_ROOT}/vaultA`]);
    });
  });
});
