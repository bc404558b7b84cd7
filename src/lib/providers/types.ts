/**
 * External collaborator contracts
 *
 * coffer never performs disk encryption, key generation or mounting
 * itself. It drives these three providers and coordinates them in the
 * lifecycle manager.
 */

import type { KeyPairPaths } from '../../types.js';

// ============================================================================
// Block-Encryption Provider
// ============================================================================

export type MappingStatus = 'active' | 'absent';

/** Keyslot table of one container as reported by the provider */
export interface KeyslotReport {
  containerPath: string;
  /** Indices of the occupied keyslots, ascending */
  keyslots: number[];
  /** Provider's full textual dump */
  raw: string;
}

/**
 * Formats container files as encrypted block devices and manages their
 * keyslot tables and kernel mappings. Physical slot indices belong to the
 * provider; callers identify keys by key file.
 *
 * Every method throws a ProviderCommandError when the underlying call fails.
 */
export interface BlockEncryptionProvider {
  /** Human-readable name for display */
  readonly name: string;

  /** Initialize the header with `keyFilePath` as the only keyslot */
  format(containerPath: string, keyFilePath: string): Promise<void>;

  open(containerPath: string, mappingName: string, keyFilePath: string): Promise<void>;

  close(mappingName: string): Promise<void>;

  /**
   * Enroll `newKeyFilePath` into a free keyslot, authenticated by `existingKeyFilePath`.
   * @throws KeyFileNotFoundError before invoking the provider if either file is missing
   */
  addKey(containerPath: string, existingKeyFilePath: string, newKeyFilePath: string): Promise<void>;

  /**
   * Remove the keyslot unlocked by `keyFilePath`.
   * @throws KeyFileNotFoundError before invoking the provider if the file is missing
   */
  removeKey(containerPath: string, keyFilePath: string): Promise<void>;

  /** Whether `keyFilePath` unlocks a keyslot, without creating a mapping */
  testKey(containerPath: string, keyFilePath: string): Promise<boolean>;

  status(mappingName: string): Promise<MappingStatus>;

  /** Names of every active encrypted mapping known to the kernel */
  listActiveMappings(): Promise<string[]>;

  dumpKeyslots(containerPath: string): Promise<KeyslotReport>;

  /** Whether the file carries an encrypted-volume header */
  isFormatted(containerPath: string): Promise<boolean>;
}

// ============================================================================
// Key-Wrapping Provider
// ============================================================================

/** PEM-encoded asymmetric key pair */
export interface KeyPairMaterial {
  privateKey: string;
  publicKey: string;
}

export interface KeyWrappingProvider {
  readonly name: string;

  generateKeyPair(bits: number): Promise<KeyPairMaterial>;

  /** Encrypt small key material for the holder of `publicKeyPem` */
  wrap(data: Buffer, publicKeyPem: string): Promise<Buffer>;

  unwrap(ciphertext: Buffer, privateKeyPem: string): Promise<Buffer>;
}

// ============================================================================
// OS filesystem / mount surface
// ============================================================================

export interface MountEntry {
  device: string;
  mountPath: string;
  fsType: string;
}

export interface ProcessInfo {
  pid: number;
  command: string;
}

export interface UnmountOptions {
  /** Detach even though the target is busy */
  force?: boolean;
}

export interface SystemProvider {
  /** Reserve `bytes` for a new file (not a sparse declaration) */
  allocate(path: string, bytes: number): Promise<void>;

  /** Bytes available to unprivileged users on the filesystem holding `path` */
  freeSpace(path: string): Promise<number>;

  makeFilesystem(devicePath: string, fsType: string): Promise<void>;

  /** `mkdir -p`, elevated where the parent needs it */
  makeDirectory(path: string): Promise<void>;

  mount(devicePath: string, mountPath: string): Promise<void>;

  unmount(mountPath: string, options?: UnmountOptions): Promise<void>;

  listMounts(): Promise<MountEntry[]>;

  chown(path: string, owner: string, recursive: boolean): Promise<void>;

  /** Processes holding files open under `path` */
  processesUsing(path: string): Promise<ProcessInfo[]>;

  /** The user that invoked coffer (not root when elevated through sudo) */
  invokingUser(): string;

  removeFile(path: string): Promise<void>;
}

export type { KeyPairPaths };
