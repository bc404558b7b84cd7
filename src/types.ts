/**
 * Identity of one container, derived once from its name and passed
 * explicitly through every lifecycle operation.
 */
export interface ContainerHandle {
  name: string;
  /** `<containerRoot>/<name><suffix>` */
  containerPath: string;
  /** `<name>_mapper` */
  mappingName: string;
  /** `/dev/mapper/<mappingName>` */
  devicePath: string;
  /** `<mountRoot>/<name>` */
  mountPath: string;
}

export type ContainerState = 'unprovisioned' | 'allocated' | 'formatted' | 'opened' | 'mounted';

export interface KeyPairPaths {
  privatePath: string;
  publicPath: string;
}

export interface ContainerSummary {
  name: string;
  path: string;
  sizeBytes: number;
  state: ContainerState;
  sealed: boolean;
}

export interface BulkFailure {
  target: string;
  step: 'unmount' | 'close';
  error: string;
}

/** End-of-run report of a bulk recovery operation */
export interface BulkReport {
  succeeded: string[];
  failed: BulkFailure[];
}

// Command options

export interface GlobalOptions {
  config?: string;
  yes?: boolean;
}

export interface CreateOptions extends GlobalOptions {
  size: string;
}

export interface OpenOptions extends GlobalOptions {
  key?: string;
  master?: boolean;
  mount?: boolean;
}

export interface KeyAddOptions extends GlobalOptions {
  auth: string;
  new: string;
}

export interface KeyRemoveOptions extends GlobalOptions {
  key: string;
}

export interface MasterKeyOptions extends GlobalOptions {
  force?: boolean;
}

export interface UnsealOptions extends GlobalOptions {
  master?: boolean;
}

export interface ListOptions extends GlobalOptions {
  mappings?: boolean;
  mounts?: boolean;
  json?: boolean;
}
