import { describe, it, expect, vi, beforeEach } from 'vitest';
import { vol } from 'memfs';
import { TEST_HOME, TEST_KEYS_DIR } from '../setup.js';

vi.mock('fs/promises', async () => {
  const memfs = await vi.importActual<typeof import('memfs')>('memfs');
  return memfs.fs.promises;
});

vi.mock('fs', async () => {
  const memfs = await vi.importActual<typeof import('memfs')>('memfs');
  return memfs.fs;
});

vi.mock('os', async (importOriginal) => {
  const original = await importOriginal<typeof import('os')>();
  return {
    ...original,
    homedir: () => TEST_HOME,
  };
});

import { KeyStore } from '../../src/lib/crypto/keyStore.js';
import { createStaticConfirmations } from '../../src/lib/confirmations.js';
import { InvalidContainerNameError, KeyFileNotFoundError, PathConflictError } from '../../src/errors.js';
import { FakeKeyWrapper } from '../utils/fakes.js';
import { fileMode, readTestFile, testFileExists, writeTestFile } from '../utils/testHelpers.js';

describe('KeyStore', () => {
  let wrapper: FakeKeyWrapper;
  let store: KeyStore;

  beforeEach(() => {
    vol.mkdirSync(TEST_HOME, { recursive: true });
    wrapper = new FakeKeyWrapper();
    store = new KeyStore(TEST_KEYS_DIR, wrapper, 3072);
  });

  describe('derivePaths', () => {
    it('should derive the private and public key paths without touching disk', () => {
      expect(store.derivePaths('vaultA')).toEqual({
        privatePath: `${TEST_KEYS_DIR}/vaultA/priv/vaultA_private.pem`,
        publicPath: `${TEST_KEYS_DIR}/vaultA/pub/vaultA_public.pem`,
      });
      expect(testFileExists(TEST_KEYS_DIR)).toBe(false);
    });

    it('should reject names that would escape the key store', () => {
      expect(() => store.derivePaths('../vaultA')).toThrow(InvalidContainerNameError);
    });

    it('should keep the master pair and its pending successor apart', () => {
      expect(store.masterPaths().privatePath).toBe(`${TEST_KEYS_DIR}/master/priv/master_private.pem`);
      expect(store.pendingMasterPaths().privatePath).toBe(`${TEST_KEYS_DIR}/master/priv/master_private.next.pem`);
      expect(store.pendingMasterPaths().publicPath).toBe(`${TEST_KEYS_DIR}/master/pub/master_public.next.pem`);
    });
  });

  describe('createKeyPair', () => {
    it('should write both keys with owner-only private material', async () => {
      const paths = await store.createKeyPair('vaultA');

      expect(readTestFile(paths.privatePath)).toContain('FAKE PRIVATE 1 (3072)');
      expect(readTestFile(paths.publicPath)).toContain('FAKE PUBLIC 1 (3072)');
      expect(fileMode(paths.privatePath)).toBe(0o600);
      expect(fileMode(`${TEST_KEYS_DIR}/vaultA/priv`)).toBe(0o700);
      expect(fileMode(paths.publicPath)).toBe(0o644);
      expect(fileMode(`${TEST_KEYS_DIR}/vaultA/pub`)).toBe(0o755);
      expect(await store.keyPairExists('vaultA')).toBe(true);
    });

    it('should fail with PathConflict when a file blocks the key directory', async () => {
      writeTestFile(`${TEST_KEYS_DIR}/vaultA`, 'not a directory');

      await expect(store.createKeyPair('vaultA')).rejects.toThrow(PathConflictError);
    });
  });

  describe('createMasterKeyPair', () => {
    it('should create the master pair when none exists without asking', async () => {
      const confirm = vi.fn(async () => false);

      const result = await store.createMasterKeyPair({
        ...createStaticConfirmations(),
        confirm,
      });

      expect(result.created).toBe(true);
      expect(confirm).not.toHaveBeenCalled();
      expect(await store.masterKeyExists()).toBe(true);
    });

    it('should keep the existing master when replacement is declined', async () => {
      await store.createMasterKeyPair(createStaticConfirmations());
      const before = readTestFile(store.masterPaths().privatePath);

      const result = await store.createMasterKeyPair(createStaticConfirmations({ confirm: false }));

      expect(result.created).toBe(false);
      expect(readTestFile(store.masterPaths().privatePath)).toBe(before);
    });

    it('should replace the existing master when confirmed', async () => {
      await store.createMasterKeyPair(createStaticConfirmations());

      const result = await store.createMasterKeyPair(createStaticConfirmations({ confirm: true }));

      expect(result.created).toBe(true);
      expect(readTestFile(store.masterPaths().privatePath)).toContain('FAKE PRIVATE 2');
    });
  });

  describe('pending master', () => {
    it('should promote the pending pair over the canonical one by rename', async () => {
      await store.createMasterKeyPair(createStaticConfirmations());
      const pending = await store.createPendingMasterKeyPair();
      expect(await store.pendingMasterExists()).toBe(true);

      const promoted = await store.promotePendingMaster();

      expect(promoted).toEqual(store.masterPaths());
      expect(readTestFile(promoted.privatePath)).toContain('FAKE PRIVATE 2');
      expect(readTestFile(promoted.publicPath)).toContain('FAKE PUBLIC 2');
      expect(testFileExists(pending.privatePath)).toBe(false);
      expect(await store.pendingMasterExists()).toBe(false);
    });

    it('should refuse to promote without a pending pair', async () => {
      await expect(store.promotePendingMaster()).rejects.toThrow(KeyFileNotFoundError);
    });
  });

  describe('removeKeyPair', () => {
    it('should delete the container key directory only', async () => {
      await store.createKeyPair('vaultA');
      await store.createKeyPair('vaultB');

      await store.removeKeyPair('vaultA');

      expect(testFileExists(`${TEST_KEYS_DIR}/vaultA`)).toBe(false);
      expect(await store.keyPairExists('vaultB')).toBe(true);
    });
  });

  describe('reading keys', () => {
    it('should read both halves of a pair', async () => {
      const paths = await store.createKeyPair('vaultA');

      expect(await store.readPublicKey(paths)).toContain('FAKE PUBLIC 1');
      expect(await store.readPrivateKey(paths)).toContain('FAKE PRIVATE 1');
    });

    it('should name the missing file', async () => {
      const paths = store.derivePaths('ghost');

      await expect(store.readPublicKey(paths)).rejects.toThrow(`Public key file not found: ${paths.publicPath}`);
    });
  });
});
