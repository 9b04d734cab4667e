/**
 * ConfigManager - Project Configuration Manager
 *
 * Typed access to `.k7/config.json` with defaults, plus the environment
 * override for the encryption password.
 *
 * Uses ConfigStore abstraction for backend-agnostic persistence.
 */

import type { ConfigStore } from '../config_store/config_store';
import type {
  IConfigManager,
  K7Config,
  K7Environment,
  ResolvedK7Config,
} from './config_manager.types';

export const DEFAULT_CONFIG = {
  roleMetadataKey: 'capabilities',
  maxArchiveBytes: 5 * 1024 * 1024,
  logRetentionSeconds: 3600,
  accountsDir: '.k7/accounts',
} as const;

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * // Production usage
 * import { FsConfigStore } from '@k7/core/fs';
 * const configManager = new ConfigManager(new FsConfigStore('/path/to/project'));
 *
 * // Test usage
 * import { MemoryConfigStore } from '@k7/core/memory';
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ maxArchiveBytes: 1024 });
 * const configManager = new ConfigManager(configStore, {});
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;
  private readonly env: K7Environment;

  constructor(configStore: ConfigStore, env: K7Environment = process.env) {
    this.configStore = configStore;
    this.env = env;
  }

  async loadConfig(): Promise<K7Config | null> {
    return this.configStore.loadConfig();
  }

  /**
   * Password from `K7_ENCRYPTION_PASSWORD`, else from config.json.
   * Empty values count as unset.
   */
  async getEncryptionPassword(): Promise<string | null> {
    const fromEnv = this.env.K7_ENCRYPTION_PASSWORD;
    if (fromEnv) {
      return fromEnv;
    }
    const config = await this.loadConfig();
    return config?.encryptionPassword || null;
  }

  async getRoleMetadataKey(): Promise<string> {
    const config = await this.loadConfig();
    return config?.roleMetadataKey || DEFAULT_CONFIG.roleMetadataKey;
  }

  async getMaxArchiveBytes(): Promise<number> {
    const config = await this.loadConfig();
    return positiveOr(config?.maxArchiveBytes, DEFAULT_CONFIG.maxArchiveBytes);
  }

  async getLogRetentionSeconds(): Promise<number> {
    const config = await this.loadConfig();
    return positiveOr(config?.logRetentionSeconds, DEFAULT_CONFIG.logRetentionSeconds);
  }

  async getAccountsDir(): Promise<string> {
    const config = await this.loadConfig();
    return config?.accountsDir || DEFAULT_CONFIG.accountsDir;
  }

  /**
   * Everything at once, with defaults applied.
   */
  async getResolvedConfig(): Promise<ResolvedK7Config> {
    return {
      encryptionPassword: await this.getEncryptionPassword(),
      roleMetadataKey: await this.getRoleMetadataKey(),
      maxArchiveBytes: await this.getMaxArchiveBytes(),
      logRetentionSeconds: await this.getLogRetentionSeconds(),
      accountsDir: await this.getAccountsDir(),
    };
  }
}

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;
}
