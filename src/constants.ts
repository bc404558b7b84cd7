import { homedir } from 'os';
import { join, dirname } from 'path';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

// Read version from package.json at runtime
const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJsonPath = join(__dirname, '..', 'package.json');
let VERSION_VALUE = '0.0.0'; // fallback
try {
  const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    VERSION_VALUE = pkg.version;
  }
} catch {
  // Fallback if package.json can't be read (e.g., bundled)
}
export const VERSION = VERSION_VALUE;
export const DESCRIPTION = 'Encrypted container lifecycle manager';
export const APP_NAME = 'coffer';

export const HOME_DIR = homedir();
export const DEFAULT_APP_DIR = join(HOME_DIR, '.coffer');
export const CONFIG_FILE = 'config.json';

// Persisted layout defaults
export const DEFAULT_KEYS_DIR = join(HOME_DIR, '.secrets');
export const DEFAULT_CONTAINER_ROOT = HOME_DIR;
export const DEFAULT_MOUNT_ROOT = '/mnt';
export const DEFAULT_LOG_FILE = join(HOME_DIR, 'coffer.log');

export const CONTAINER_SUFFIX = '.img';
export const SEALED_SUFFIX = '.enc';
export const MAPPING_SUFFIX = '_mapper';
export const DEVICE_MAPPER_DIR = '/dev/mapper';

export const MASTER_KEY_NAME = 'master';
export const PRIVATE_DIR = 'priv';
export const PUBLIC_DIR = 'pub';
export const PENDING_KEY_MARKER = '.next';

export const DEFAULT_KEY_BITS = 2048;
export const DEFAULT_FILESYSTEM = 'ext4';

// One capacity unit is one MiB
export const CAPACITY_UNIT_BYTES = 1024 * 1024;

// File modes
export const PRIVATE_DIR_MODE = 0o700;
export const PRIVATE_FILE_MODE = 0o600;
export const PUBLIC_DIR_MODE = 0o755;
export const PUBLIC_FILE_MODE = 0o644;

export const CONTAINER_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/;
