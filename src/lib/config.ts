import { readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { ensureDir } from 'fs-extra';
import { cosmiconfig } from 'cosmiconfig';
import {
  cofferConfigSchema,
  type CofferConfigOutput,
  type ResolvedConfig,
} from '../schemas/config.schema.js';
import { getConfigPath, getAppDir, pathExists, expandPath } from './paths.js';
import { ConfigError, errorMessage } from '../errors.js';
import {
  APP_NAME,
  DEFAULT_KEYS_DIR,
  DEFAULT_CONTAINER_ROOT,
  DEFAULT_MOUNT_ROOT,
  DEFAULT_LOG_FILE,
} from '../constants.js';

export const CONFIG_ENV_VAR = 'COFFER_CONFIG';

let cachedConfig: ResolvedConfig | null = null;
let cachedConfigPath: string | null = null;

/** Schema defaults, without any file */
export const defaultConfig = (): CofferConfigOutput => cofferConfigSchema.parse({});

export const resolvePaths = (config: CofferConfigOutput): ResolvedConfig => ({
  ...config,
  paths: {
    keysDir: expandPath(config.paths.keysDir ?? DEFAULT_KEYS_DIR),
    containerRoot: expandPath(config.paths.containerRoot ?? DEFAULT_CONTAINER_ROOT),
    mountRoot: expandPath(config.paths.mountRoot ?? DEFAULT_MOUNT_ROOT),
    logFile: expandPath(config.paths.logFile ?? DEFAULT_LOG_FILE),
  },
});

/**
 * Look for a project-local config file in the working directory or its parents.
 */
export const findConfigFile = async (): Promise<string | null> => {
  const explorer = cosmiconfig(APP_NAME, {
    searchPlaces: ['.cofferrc', '.cofferrc.json', 'coffer.config.json'],
    loaders: {
      noExt: (_filepath: string, content: string): unknown => JSON.parse(content),
    },
  });

  try {
    const result = await explorer.search();
    return result?.filepath ?? null;
  } catch (error) {
    throw new ConfigError(`Failed to search for a config file: ${errorMessage(error)}`);
  }
};

/**
 * Explicit path, then $COFFER_CONFIG, then a project-local file, then ~/.coffer/config.json
 */
export const resolveConfigPath = async (explicitPath?: string): Promise<string> => {
  if (explicitPath) {
    return expandPath(explicitPath);
  }
  const fromEnv = process.env[CONFIG_ENV_VAR];
  if (fromEnv) {
    return expandPath(fromEnv);
  }
  const found = await findConfigFile();
  return found ?? getConfigPath(getAppDir());
};

const readRawConfig = async (configPath: string): Promise<CofferConfigOutput> => {
  if (!(await pathExists(configPath))) {
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(configPath, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(`${configPath} contains invalid JSON`);
    }
    throw new ConfigError(`Failed to read ${configPath}: ${errorMessage(error)}`);
  }

  const result = cofferConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${configPath}: ${result.error.message}`);
  }
  return result.data;
};

export const loadConfig = async (configPath?: string): Promise<ResolvedConfig> => {
  const path = await resolveConfigPath(configPath);

  if (cachedConfig && cachedConfigPath === path) {
    return cachedConfig;
  }

  cachedConfig = resolvePaths(await readRawConfig(path));
  cachedConfigPath = path;
  return cachedConfig;
};

const writeConfig = async (config: CofferConfigOutput, path: string): Promise<void> => {
  const result = cofferConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${result.error.message}`);
  }

  try {
    await ensureDir(dirname(path));
    await writeFile(path, JSON.stringify(result.data, null, 2) + '\n', 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to save configuration: ${errorMessage(error)}`);
  }

  cachedConfig = resolvePaths(result.data);
  cachedConfigPath = path;
};

/**
 * Parse a CLI value: booleans and numbers are coerced, everything else stays a string.
 */
export const parseConfigValue = (value: string): string | number | boolean => {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (/^-?\d+(\.\d+)?$/.test(value)) return Number(value);
  return value;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const getConfigValue = async (key: string, configPath?: string): Promise<unknown> => {
  const config = await loadConfig(configPath);
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isRecord(current) || !(part in current)) {
      throw new ConfigError(`Unknown key: ${key}`);
    }
    current = current[part];
  }
  return current;
};

/**
 * Set a dotted key such as `create.onFailure` and persist the file.
 */
export const setConfigValue = async (
  key: string,
  value: string,
  configPath?: string
): Promise<void> => {
  const path = await resolveConfigPath(configPath);
  const [section, field, ...rest] = key.split('.');
  if (!section || !field || rest.length > 0) {
    throw new ConfigError(`Keys have the form <section>.<field>, got "${key}"`);
  }

  const reference: Record<string, unknown> = { ...resolvePaths(defaultConfig()) };
  const knownFields = reference[section];
  if (!isRecord(knownFields) || !(field in knownFields)) {
    throw new ConfigError(`Unknown key: ${key}`);
  }

  const existing = await readRawConfig(path);
  const sections: Record<string, unknown> = { ...existing };
  const current = sections[section];
  const parsed = section === 'paths' ? value : parseConfigValue(value);
  sections[section] = { ...(isRecord(current) ? current : {}), [field]: parsed };

  const result = cofferConfigSchema.safeParse(sections);
  if (!result.success) {
    throw new ConfigError(`Invalid value for ${key}: ${result.error.issues[0]?.message ?? 'rejected'}`);
  }
  await writeConfig(result.data, path);
};

export const resetConfig = async (configPath?: string): Promise<void> => {
  const path = await resolveConfigPath(configPath);
  await writeConfig(defaultConfig(), path);
};

export const clearConfigCache = (): void => {
  cachedConfig = null;
  cachedConfigPath = null;
};
