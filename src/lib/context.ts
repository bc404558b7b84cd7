import { loadConfig } from './config.js';
import { createFileAuditSink } from './audit.js';
import { createInteractiveConfirmations, createStaticConfirmations, type ConfirmationProvider } from './confirmations.js';
import { KeyStore } from './crypto/index.js';
import { LifecycleManager } from './lifecycle.js';
import { MountManager } from './mount.js';
import { CryptsetupProvider, LinuxSystemProvider, NodeKeyWrappingProvider } from './providers/index.js';
import type { ResolvedConfig } from '../schemas/config.schema.js';
import type { GlobalOptions } from '../types.js';

export interface CofferContext {
  config: ResolvedConfig;
  keyStore: KeyStore;
  mounts: MountManager;
  lifecycle: LifecycleManager;
}

/**
 * Wire the real providers together from configuration.
 */
export const createContext = (config: ResolvedConfig, confirmations: ConfirmationProvider): CofferContext => {
  const sudo = config.privilege.sudo;
  const wrapper = new NodeKeyWrappingProvider();
  const system = new LinuxSystemProvider({ sudo });
  const keyStore = new KeyStore(config.paths.keysDir, wrapper, config.keys.bits);
  const mounts = new MountManager(system, confirmations, config.paths.mountRoot, config.container.suffix);

  const lifecycle = new LifecycleManager({
    keyStore,
    blockDevice: new CryptsetupProvider({ sudo }),
    wrapper,
    system,
    mounts,
    confirmations,
    audit: createFileAuditSink(config.paths.logFile),
    settings: {
      containerRoot: config.paths.containerRoot,
      mountRoot: config.paths.mountRoot,
      containerSuffix: config.container.suffix,
      filesystem: config.container.filesystem,
      onFailure: config.create.onFailure,
    },
  });

  return { config, keyStore, mounts, lifecycle };
};

/**
 * Context for a command run: `--yes` answers confirmations without prompting
 * (a busy mount is still never force-detached).
 */
export const contextFromOptions = async (
  options: GlobalOptions,
  answers: { confirm?: boolean } = {}
): Promise<CofferContext> => {
  const config = await loadConfig(options.config);
  const confirmations = options.yes
    ? createStaticConfirmations({ confirm: answers.confirm ?? true })
    : createInteractiveConfirmations();
  return createContext(config, confirmations);
};
