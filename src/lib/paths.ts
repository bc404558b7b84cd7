import { homedir } from 'os';
import { join, basename, isAbsolute, resolve } from 'path';
import { stat, access } from 'fs/promises';
import { constants } from 'fs';
import {
  DEFAULT_APP_DIR,
  CONFIG_FILE,
  MAPPING_SUFFIX,
  MASTER_KEY_NAME,
  DEVICE_MAPPER_DIR,
  CONTAINER_NAME_PATTERN,
} from '../constants.js';
import { InvalidContainerNameError } from '../errors.js';
import type { ContainerHandle } from '../types.js';

export const expandPath = (path: string): string => {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  if (path.startsWith('$HOME/')) {
    return join(homedir(), path.slice(6));
  }
  return isAbsolute(path) ? path : resolve(path);
};

export const collapsePath = (path: string): string => {
  const home = homedir();
  if (path === home || path.startsWith(home + '/')) {
    return '~' + path.slice(home.length);
  }
  return path;
};

export const getAppDir = (customDir?: string): string => {
  return expandPath(customDir || DEFAULT_APP_DIR);
};

export const getConfigPath = (appDir: string): string => {
  return join(appDir, CONFIG_FILE);
};

export const pathExists = async (path: string): Promise<boolean> => {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
};

export const isDirectory = async (path: string): Promise<boolean> => {
  try {
    const stats = await stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
};

export const isFile = async (path: string): Promise<boolean> => {
  try {
    const stats = await stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
};

/**
 * Check that a path stays inside a root once resolved.
 */
export const isPathWithin = (path: string, root: string): boolean => {
  const normalizedPath = resolve(path);
  const normalizedRoot = resolve(root);
  return normalizedPath === normalizedRoot || normalizedPath.startsWith(normalizedRoot + '/');
};

// ============================================================================
// Container identity
// ============================================================================

/**
 * Reject names that cannot safely become a file name, a device-mapper name
 * and a mount directory at the same time.
 */
export const validateContainerName = (name: string): void => {
  if (!name) {
    throw new InvalidContainerNameError(name, 'name cannot be empty');
  }
  if (!CONTAINER_NAME_PATTERN.test(name)) {
    throw new InvalidContainerNameError(name, 'only letters, digits, ".", "-" and "_" are allowed');
  }
  if (name.includes('..')) {
    throw new InvalidContainerNameError(name, '".." is not allowed');
  }
  if (name === MASTER_KEY_NAME) {
    throw new InvalidContainerNameError(name, `"${MASTER_KEY_NAME}" is reserved for the master key`);
  }
  if (name.endsWith(MAPPING_SUFFIX)) {
    throw new InvalidContainerNameError(name, `names cannot end with "${MAPPING_SUFFIX}"`);
  }
};

export const mappingNameFor = (name: string): string => `${name}${MAPPING_SUFFIX}`;

export const devicePathFor = (mappingName: string): string => join(DEVICE_MAPPER_DIR, mappingName);

export const isManagedMapping = (mappingName: string): boolean =>
  mappingName.endsWith(MAPPING_SUFFIX) && mappingName.length > MAPPING_SUFFIX.length;

/**
 * Strip the mapping suffix and then any container-file suffix:
 * `vaultA.img_mapper` and `vaultA_mapper` both give `vaultA`.
 */
export const containerNameFromMapping = (mappingName: string, containerSuffix: string): string => {
  let base = basename(mappingName);
  if (base.endsWith(MAPPING_SUFFIX)) {
    base = base.slice(0, -MAPPING_SUFFIX.length);
  }
  if (containerSuffix && base.endsWith(containerSuffix)) {
    base = base.slice(0, -containerSuffix.length);
  }
  return base;
};

export interface IdentityRoots {
  containerRoot: string;
  mountRoot: string;
  suffix: string;
}

export const createContainerHandle = (name: string, roots: IdentityRoots): ContainerHandle => {
  validateContainerName(name);
  const mappingName = mappingNameFor(name);
  return {
    name,
    containerPath: join(roots.containerRoot, `${name}${roots.suffix}`),
    mappingName,
    devicePath: devicePathFor(mappingName),
    mountPath: join(roots.mountRoot, containerNameFromMapping(mappingName, roots.suffix)),
  };
};
